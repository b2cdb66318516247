import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { SourceAdapter } from '../../domain/index.js';
import { FunctionStore } from '../../application/function-store.js';
import { IngestionPipeline } from '../../application/ingestion.js';
import { TaskSourceService } from '../../application/task-source.js';
import type { TaskSourceOptions } from '../../application/task-source.js';
import { runSource } from '../../application/source-runner.js';
import { DirectRequestSource, createSources } from '../sources/index.js';
import type { SourcesConfig } from '../sources/index.js';

export interface Engine {
  readonly store: FunctionStore;
  readonly tasks: TaskSourceService;
  readonly ingestion: IngestionPipeline;
  /** Intake queue fed by the HTTP event and invoke routes. */
  readonly intake: DirectRequestSource;
  readonly sources: readonly SourceAdapter[];
}

export interface EnginePluginOptions {
  readonly log: Logger;
  readonly sources: SourcesConfig;
  /** Replaces the adapters built from `sources.sources`. */
  readonly adapters?: readonly SourceAdapter[];
  readonly taskSource?: Partial<TaskSourceOptions>;
  /** Retention sweep period; 0 disables the sweep timer. */
  readonly sweepIntervalMs: number;
}

/**
 * Fastify plugin that wires the dispatch engine.
 *
 * Order:
 * 1) Function snapshot loaded from the registry, then kept current
 * 2) Task source recovered from the lease table and started
 * 3) Source runners started once the server is ready
 *
 * Decorates `fastify.engine`. On close, sources are stopped first, then the
 * task source; registered events are never retracted.
 */
async function enginePlugin(fastify: FastifyInstance, opts: EnginePluginOptions): Promise<void> {
  const { registry, executions } = fastify;
  const log = opts.log;

  const store = new FunctionStore();
  await store.reload(registry, log);
  const detach = store.attach(registry, log);

  const tasks = new TaskSourceService(
    { registry, store, recorder: executions, log: log.child({ component: 'task-source' }) },
    opts.taskSource,
  );
  await tasks.recover();
  tasks.start();

  const ingestion = new IngestionPipeline({ registry, store, tasks, log: log.child({ component: 'ingestion' }) });
  const intake = new DirectRequestSource('intake', 'request');
  const adapters = [intake, ...(opts.adapters ?? createSources(opts.sources, { log }))];

  const engine: Engine = { store, tasks, ingestion, intake, sources: adapters };
  fastify.decorate('engine', engine);

  const ac = new AbortController();
  let running: Promise<unknown> = Promise.resolve();

  fastify.addHook('onReady', async () => {
    running = Promise.allSettled(adapters.map((adapter) =>
      runSource(
        adapter,
        { registry, ingest: (event) => ingestion.ingest(event), log },
        ac.signal,
        { restartDelayMs: opts.sources.restart_delay_ms },
      )));
    log.info({ sources: adapters.map((a) => a.name) }, 'Sources started');
  });

  let sweeper: NodeJS.Timeout | undefined;
  if (opts.sweepIntervalMs > 0) {
    sweeper = setInterval(() => {
      registry.sweep()
        .then(({ evicted }) => {
          if (evicted > 0) log.debug({ evicted }, 'Retention sweep evicted events');
        })
        .catch((err: unknown) => {
          log.error({ err }, 'Retention sweep failed');
        });
    }, opts.sweepIntervalMs);
    sweeper.unref();
  }

  fastify.addHook('onClose', async () => {
    ac.abort();
    intake.close();
    clearInterval(sweeper);
    await running;

    for (const adapter of adapters) {
      try {
        await adapter.close?.();
      } catch (err: unknown) {
        log.warn({ err, source: adapter.name }, 'Failed to close source');
      }
    }

    tasks.stop();
    detach();
    log.info('Engine stopped');
  });
}

export default fp(enginePlugin, {
  name: 'engine',
  dependencies: ['registry', 'db'],
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.engine` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    engine: Engine;
  }
}
