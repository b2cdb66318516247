import type { Logger } from 'pino';
import { LeaseExpiredError, ResourceExceededError, toWire } from '../domain/index.js';
import type {
  ExecutionOutcome,
  ExecutionReport,
  Func,
  JsonValue,
  Permissions,
  ResourceLimits,
  TaskAssignment,
  TaskState,
  WireEvent,
} from '../domain/index.js';
import { sleep } from './sleep.js';
import type { TaskSource } from './task-source.js';

// ─── Ports ──────────────────────────────────────────────────────

export interface SandboxContext {
  readonly function_id: string;
  readonly version: number;
  readonly task_id: string;
  readonly attempt: number;
}

export interface SandboxRequest {
  readonly code: string;
  readonly event: WireEvent;
  readonly context: SandboxContext;
  readonly limits: ResourceLimits;
  readonly permissions: Permissions;
  /** Current contents of the function's storage namespace. */
  readonly storage: Readonly<Record<string, JsonValue>>;
}

/** Keys one run wrote or deleted in its storage namespace. */
export interface StorageChanges {
  readonly set: Readonly<Record<string, JsonValue>>;
  readonly deleted: readonly string[];
}

export interface SandboxResult {
  readonly outcome: ExecutionOutcome;
  readonly duration_ms: number;
  readonly error?: string | undefined;
  readonly result?: JsonValue | undefined;
  /** Only meaningful on success. */
  readonly changes?: StorageChanges | undefined;
  readonly logs: readonly string[];
}

/** Runs one invocation of user code under resource limits. */
export interface Sandbox {
  run(request: SandboxRequest): Promise<SandboxResult>;
}

/** Per-namespace key/value storage exposed to functions. */
export interface FunctionStorage {
  load(namespace: string): Promise<Record<string, JsonValue>>;
  /**
   * Merges `changes` into the namespace as one atomic step. Throws
   * `ResourceExceededError` when the merged namespace is over `limitKb`.
   */
  apply(namespace: string, changes: StorageChanges, limitKb: number): Promise<void>;
}

// ─── Executor ───────────────────────────────────────────────────

export interface ExecutorDeps {
  readonly source: TaskSource;
  readonly sandbox: Sandbox;
  readonly storage: FunctionStorage;
  readonly log: Logger;
}

export interface ExecutorOptions {
  /** Worker identity presented to the task source. */
  readonly uid: string;
  readonly concurrency: number;
  /** Pause after an unexpected slot error. */
  readonly errorBackoffMs?: number;
}

export interface TaskRun {
  readonly report: ExecutionReport;
  readonly transitions: readonly TaskState[];
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function hasStorageChanges(changes: StorageChanges): boolean {
  return changes.deleted.length > 0 || Object.keys(changes.set).length > 0;
}

export function mergeStorageChanges(
  current: Readonly<Record<string, JsonValue>>,
  changes: StorageChanges,
): Record<string, JsonValue> {
  const next: Record<string, JsonValue> = { ...current };
  for (const key of changes.deleted) delete next[key];
  return Object.assign(next, changes.set);
}

/** Same measure the sandbox applies on every write: key bytes plus JSON value bytes. */
export function assertStorageWithin(entries: Readonly<Record<string, JsonValue>>, limitKb: number): void {
  let total = 0;
  for (const [key, value] of Object.entries(entries)) {
    total += Buffer.byteLength(key) + Buffer.byteLength(JSON.stringify(value));
  }
  if (total > limitKb * 1024) {
    throw new ResourceExceededError('storage', `storage limit of ${limitKb * 1024} bytes exceeded`);
  }
}

/**
 * Worker-side executor.
 *
 * Each task moves through `acquired → loading → running` to exactly one
 * terminal outcome, which is acknowledged to the task source. Outcomes are
 * never retried here; redelivery is the task source's concern.
 */
export class WorkerExecutor {
  private readonly cache = new Map<string, Func>();

  constructor(
    private readonly deps: ExecutorDeps,
    private readonly options: ExecutorOptions,
  ) {}

  /** Runs `concurrency` acquire/execute slots until `signal` aborts. */
  async run(signal: AbortSignal): Promise<void> {
    this.deps.log.info({ uid: this.options.uid, concurrency: this.options.concurrency }, 'Executor started');
    const slots = Array.from({ length: Math.max(1, this.options.concurrency) }, (_, i) => this.slot(i, signal));
    await Promise.all(slots);
    this.deps.log.info('Executor stopped');
  }

  private async slot(index: number, signal: AbortSignal): Promise<void> {
    const log = this.deps.log.child({ slot: index });
    // Last executed function: asking for it again keeps its code warm
    let fidHint: string | undefined;

    while (!signal.aborted) {
      try {
        const task = await this.deps.source.acquireTask(this.options.uid, fidHint, { signal });
        if (task === null) continue;
        fidHint = task.fid;
        await this.execute(task, log);
      } catch (err: unknown) {
        if (signal.aborted) break;
        log.error({ err }, 'Executor slot error; retrying');
        await sleep(this.options.errorBackoffMs ?? 1_000, signal);
      }
    }
  }

  /** Executes one leased task and acknowledges its outcome. */
  async execute(task: TaskAssignment, log: Logger = this.deps.log): Promise<TaskRun> {
    const started = Date.now();
    const transitions: TaskState[] = ['acquired'];
    const enter = (state: TaskState): void => {
      transitions.push(state);
      log.debug({ task_id: task.task_id, fid: task.fid, state }, 'Task state changed');
    };

    enter('loading');
    let func: Func;
    try {
      func = await this.load(task);
    } catch (err: unknown) {
      const report: ExecutionReport = {
        outcome: 'failed',
        error: `Failed to load function: ${describe(err)}`,
        duration_ms: Date.now() - started,
      };
      enter(report.outcome);
      await this.acknowledge(task, report, log);
      return { report, transitions };
    }

    enter('running');
    const report = await this.invoke(task, func, log);
    enter(report.outcome);
    await this.acknowledge(task, report, log);
    return { report, transitions };
  }

  /** Function code cached per (fid, version); a newer assignment version forces a refetch. */
  private async load(task: TaskAssignment): Promise<Func> {
    const cached = this.cache.get(task.fid);
    if (cached !== undefined && cached.version >= task.version) return cached;

    const func = await this.deps.source.acquireFunc(this.options.uid, task.fid);
    this.cache.set(task.fid, func);
    this.deps.log.debug({ fid: task.fid, version: func.version }, 'Function code loaded');
    return func;
  }

  private async invoke(task: TaskAssignment, func: Func, log: Logger): Promise<ExecutionReport> {
    const started = Date.now();
    const { namespace, allow_read, allow_write } = func.permissions.storage;

    let snapshot: Record<string, JsonValue> = {};
    if (allow_read || allow_write) {
      try {
        snapshot = await this.deps.storage.load(namespace);
      } catch (err: unknown) {
        return { outcome: 'failed', error: `Failed to load storage: ${describe(err)}`, duration_ms: Date.now() - started };
      }
    }

    const result = await this.deps.sandbox.run({
      code: func.code,
      event: toWire(task.event),
      context: { function_id: task.fid, version: func.version, task_id: task.task_id, attempt: task.attempt },
      limits: func.resources,
      permissions: func.permissions,
      storage: snapshot,
    });

    if (result.duration_ms > func.resources.cpu_ms) {
      log.warn(
        { task_id: task.task_id, fid: task.fid, duration_ms: result.duration_ms, cpu_ms: func.resources.cpu_ms },
        'CPU budget exceeded (soft limit)',
      );
    }

    if (result.outcome === 'succeeded' && allow_write && result.changes !== undefined && hasStorageChanges(result.changes)) {
      try {
        await this.deps.storage.apply(namespace, result.changes, func.resources.storage_kb);
      } catch (err: unknown) {
        if (err instanceof ResourceExceededError) {
          return { outcome: 'resource_exceeded', error: err.message, duration_ms: result.duration_ms, logs: result.logs };
        }
        return {
          outcome: 'failed',
          error: `Failed to write storage: ${describe(err)}`,
          duration_ms: result.duration_ms,
          logs: result.logs,
        };
      }
    }

    return {
      outcome: result.outcome,
      duration_ms: result.duration_ms,
      error: result.error,
      result: result.result,
      logs: result.logs,
    };
  }

  private async acknowledge(task: TaskAssignment, report: ExecutionReport, log: Logger): Promise<void> {
    try {
      await this.deps.source.acknowledge(task.task_id, this.options.uid, report);
      log.info(
        { task_id: task.task_id, fid: task.fid, outcome: report.outcome, duration_ms: report.duration_ms },
        'Task completed',
      );
    } catch (err: unknown) {
      if (err instanceof LeaseExpiredError) {
        log.warn({ task_id: task.task_id, outcome: report.outcome }, 'Lease expired before acknowledgment; outcome discarded');
        return;
      }
      throw err;
    }
  }
}
