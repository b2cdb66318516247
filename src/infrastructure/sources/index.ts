import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { SourceAdapter } from '../../domain/index.js';
import type { SourceConfig, SourcesConfig } from './config.js';
import { NeoRpcClient, httpTransport } from './neo-rpc-client.js';
import type { JsonRpcTransport } from './neo-rpc-client.js';
import { NeoBlockSource } from './neo-source.js';
import { TimerSource } from './timer-source.js';
import { RedisStreamSource } from './redis-stream-source.js';
import { MockSource } from './mock-source.js';

export { withRetry, backoffDelay, DEFAULT_RETRY_POLICY } from './retry.js';
export type { RetryPolicy } from './retry.js';
export { NeoRpcClient, JsonRpcError, httpTransport } from './neo-rpc-client.js';
export type { JsonRpcRequest, JsonRpcTransport, NeoBlock, NeoTransaction, NeoApplicationLog } from './neo-rpc-client.js';
export { NeoBlockSource, DEFAULT_NEO_SOURCE_OPTIONS } from './neo-source.js';
export type { NeoSourceOptions } from './neo-source.js';
export { TimerSource } from './timer-source.js';
export type { TimerSourceOptions } from './timer-source.js';
export { DirectRequestSource } from './direct-request-source.js';
export { RedisStreamSource } from './redis-stream-source.js';
export type { RedisStreamSourceOptions } from './redis-stream-source.js';
export { MockSource, syntheticEvent } from './mock-source.js';
export type { MockSourceOptions } from './mock-source.js';
export {
  loadSourcesConfig,
  sourcesConfigSchema,
  sourceConfigSchema,
  DEFAULT_SOURCES_CONFIG,
  SourcesConfigError,
} from './config.js';
export type { SourceConfig, SourcesConfig } from './config.js';

export interface SourceFactoryDeps {
  readonly log: Logger;
  /** Overrides the HTTP transport of Neo sources. */
  readonly rpcTransport?: (url: string) => JsonRpcTransport;
  /** Overrides the connection used by Redis stream sources. */
  readonly connectRedis?: (url: string) => Redis;
}

export function createSource(config: SourceConfig, deps: SourceFactoryDeps): SourceAdapter {
  switch (config.type) {
    case 'neo': {
      const transport = (deps.rpcTransport ?? httpTransport)(config.rpc_url);
      return new NeoBlockSource(new NeoRpcClient(transport), config, deps.log);
    }
    case 'timer':
      return new TimerSource({ name: config.name, interval_ms: config.interval_ms });
    case 'redis_stream': {
      const redis = deps.connectRedis?.(config.url) ?? new Redis(config.url, {
        maxRetriesPerRequest: null,   // blocking stream reads
        enableReadyCheck: true,
      });
      return new RedisStreamSource(redis, deps.log, config);
    }
    case 'mock':
      return new MockSource(config);
  }
}

/** Adapters for every enabled entry, in configuration order. */
export function createSources(config: SourcesConfig, deps: SourceFactoryDeps): SourceAdapter[] {
  return config.sources.filter((source) => source.enabled).map((source) => createSource(source, deps));
}
