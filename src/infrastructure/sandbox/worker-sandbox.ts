import { Worker } from 'node:worker_threads';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Sandbox, SandboxRequest, SandboxResult } from '../../application/executor.js';
import type { JsonValue } from '../../domain/index.js';
import { WORKER_BOOTSTRAP } from './bootstrap.js';

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const sandboxMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('log'), line: z.string() }),
  z.object({
    type: z.literal('done'),
    result: jsonValueSchema,
    changes: z.object({ set: z.record(jsonValueSchema), deleted: z.array(z.string()) }),
    duration_ms: z.number(),
  }),
  z.object({
    type: z.literal('failed'),
    error: z.string(),
    resource: z.literal('storage').optional(),
    duration_ms: z.number(),
  }),
]);

export interface WorkerSandboxOptions {
  /** Young-generation cap as a fraction of `memory_mb`. */
  readonly youngGenerationRatio?: number;
}

/**
 * Runs each invocation in a dedicated worker thread.
 *
 * - `execution_time_ms`: wall-clock deadline from spawn; the thread is
 *   terminated and the outcome is `timed_out`.
 * - `memory_mb`: V8 old-generation cap; running out is `resource_exceeded`.
 * - `storage_kb`: enforced inside the thread on every write.
 *
 * Console output is collected as the thread prints it, so every outcome
 * carries the lines written before it ended.
 */
export class WorkerSandbox implements Sandbox {
  constructor(
    private readonly log: Logger,
    private readonly options: WorkerSandboxOptions = {},
  ) {}

  run(request: SandboxRequest): Promise<SandboxResult> {
    const started = Date.now();
    const { limits } = request;
    const youngRatio = this.options.youngGenerationRatio ?? 0.25;

    return new Promise<SandboxResult>((resolve) => {
      let settled = false;
      const logs: string[] = [];

      const worker = new Worker(WORKER_BOOTSTRAP, {
        eval: true,
        workerData: {
          code: request.code,
          eventJson: JSON.stringify(request.event),
          contextJson: JSON.stringify(request.context),
          storage: request.storage,
          permissions: request.permissions,
          storageLimitBytes: limits.storage_kb * 1024,
        },
        resourceLimits: {
          maxOldGenerationSizeMb: limits.memory_mb,
          maxYoungGenerationSizeMb: Math.max(1, Math.floor(limits.memory_mb * youngRatio)),
        },
      });

      const finish = (result: Omit<SandboxResult, 'logs'>): void => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        worker.terminate().catch((err: unknown) => {
          this.log.debug({ err }, 'Worker terminate failed');
        });
        resolve({ ...result, logs: [...logs] });
      };

      const deadline = setTimeout(() => {
        finish({
          outcome: 'timed_out',
          error: `Execution exceeded ${limits.execution_time_ms}ms`,
          duration_ms: Date.now() - started,
        });
      }, limits.execution_time_ms);

      worker.on('message', (message: unknown) => {
        const parsed = sandboxMessageSchema.safeParse(message);
        if (!parsed.success) {
          finish({
            outcome: 'failed',
            error: 'Sandbox sent a malformed message',
            duration_ms: Date.now() - started,
          });
          return;
        }

        const msg = parsed.data;
        switch (msg.type) {
          case 'log':
            logs.push(msg.line);
            return;
          case 'done':
            finish({
              outcome: 'succeeded',
              result: msg.result,
              changes: msg.changes,
              duration_ms: msg.duration_ms,
            });
            return;
          case 'failed':
            finish({
              outcome: msg.resource === 'storage' ? 'resource_exceeded' : 'failed',
              error: msg.error,
              duration_ms: msg.duration_ms,
            });
        }
      });

      worker.on('error', (err: Error) => {
        const oom = 'code' in err && err.code === 'ERR_WORKER_OUT_OF_MEMORY';
        finish({
          outcome: oom ? 'resource_exceeded' : 'failed',
          error: oom ? `Memory limit of ${limits.memory_mb}MB exceeded` : err.message,
          duration_ms: Date.now() - started,
        });
      });

      worker.on('exit', (code: number) => {
        finish({
          outcome: 'failed',
          error: `Sandbox exited with code ${code} before completing`,
          duration_ms: Date.now() - started,
        });
      });
    });
  }
}
