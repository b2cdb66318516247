import { Redis } from 'ioredis';
import { MemoryKeyValueStore } from './memory-store.js';
import { RedisKeyValueStore } from './redis-store.js';
import type { KeyValueStore } from './types.js';

/**
 * Opens the store named by `url`:
 *
 * - `memory:`               process-local map
 * - `redis://…`, `rediss://…` Redis, keys under the `chainfunc:` namespace
 */
export async function openKeyValueStore(url: string): Promise<KeyValueStore> {
  if (url === 'memory:' || url === 'memory://') {
    return new MemoryKeyValueStore();
  }

  if (url.startsWith('redis://') || url.startsWith('rediss://')) {
    const redis = new Redis(url, {
      enableReadyCheck: true,
      lazyConnect: true,
    });
    await redis.connect();
    return new RedisKeyValueStore(redis);
  }

  throw new Error(`Unsupported registry URL: ${url}`);
}
