import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { SourceAdapter } from './domain/index.js';
import { dbPlugin, enginePlugin, loadSourcesConfig, registryPlugin } from './infrastructure/index.js';
import type { EngineConfig, SourcesConfig } from './infrastructure/index.js';
import {
  errorHandler,
  eventRoutes,
  executionRoutes,
  functionRoutes,
  healthRoutes,
  taskRoutes,
} from './interfaces/http/index.js';

export interface BuildAppOptions {
  readonly config: EngineConfig;
  readonly log: Logger;
  /** Defaults to the file named by `SOURCES_CONFIG`. */
  readonly sources?: SourcesConfig;
  /** Replaces the adapters described by `sources`. */
  readonly adapters?: readonly SourceAdapter[];
}

/**
 * Assembles the engine server without listening.
 *
 * Order:
 * 1) Error handler
 * 2) Infrastructure plugins (registry, execution log, engine)
 * 3) HTTP routes
 */
export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const { config, log } = opts;
  const loggerInstance: FastifyBaseLogger = log;
  const fastify = Fastify({ loggerInstance });

  await fastify.register(errorHandler);

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(registryPlugin, {
    url: config.REGISTRY_URL,
    options: {
      maxEvents: config.MAX_EVENTS,
      eventTtlSeconds: config.EVENT_TTL_S,
      hardTtlSeconds: config.HARD_TTL_S,
    },
    log,
  });
  await fastify.register(dbPlugin, { databaseUrl: config.DATABASE_URL, log });
  await fastify.register(enginePlugin, {
    log,
    sources: opts.sources ?? loadSourcesConfig(config.SOURCES_CONFIG),
    adapters: opts.adapters,
    taskSource: {
      leaseTimeoutMs: config.LEASE_TIMEOUT_MS,
      acquireTimeoutMs: config.ACQUIRE_TIMEOUT_MS,
    },
    sweepIntervalMs: config.SWEEP_INTERVAL_MS,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(functionRoutes);
  await fastify.register(eventRoutes, { apiKey: config.INVOKE_API_KEY });
  await fastify.register(taskRoutes);
  await fastify.register(executionRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
