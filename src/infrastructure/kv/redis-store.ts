import type { Redis } from 'ioredis';
import type { KeyValueEntry, KeyValueStore } from './types.js';

const SCAN_COUNT = 500;
const MGET_CHUNK = 200;

/**
 * Atomic compare-and-swap. ARGV[2] = '0' means "expect absent".
 * Returns 1 when the write happened.
 */
const CAS_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if ARGV[2] == '0' then
  if current then return 0 end
elseif current ~= ARGV[1] then
  return 0
end
redis.call('SET', KEYS[1], ARGV[3])
return 1
`;

function escapeGlob(text: string): string {
  return text.replace(/[*?[\]\\]/g, '\\$&');
}

/**
 * Redis-backed store. Every key is prefixed with `namespace` so several
 * engines can share one Redis database.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly redis: Redis,
    private readonly namespace = 'chainfunc:',
  ) {}

  private k(key: string): string {
    return `${this.namespace}${key}`;
  }

  async get(key: string): Promise<string | undefined> {
    const value = await this.redis.get(this.k(key));
    return value ?? undefined;
  }

  async put(key: string, value: string): Promise<void> {
    await this.redis.set(this.k(key), value);
  }

  async putIfAbsent(key: string, value: string): Promise<boolean> {
    const result = await this.redis.set(this.k(key), value, 'NX');
    return result === 'OK';
  }

  async compareAndSwap(key: string, expected: string | undefined, next: string): Promise<boolean> {
    const result = await this.redis.eval(
      CAS_SCRIPT,
      1,
      this.k(key),
      expected ?? '',
      expected === undefined ? '0' : '1',
      next,
    );
    return result === 1;
  }

  async delete(key: string): Promise<boolean> {
    const removed = await this.redis.del(this.k(key));
    return removed > 0;
  }

  async scan(prefix: string): Promise<KeyValueEntry[]> {
    const pattern = `${escapeGlob(this.k(prefix))}*`;
    const keys = new Set<string>();

    let cursor = '0';
    do {
      const [nextCursor, batch] = await this.redis.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
      for (const key of batch) keys.add(key);
      cursor = nextCursor;
    } while (cursor !== '0');

    const sorted = [...keys].sort();
    const entries: KeyValueEntry[] = [];

    for (let i = 0; i < sorted.length; i += MGET_CHUNK) {
      const chunk = sorted.slice(i, i + MGET_CHUNK);
      const values = await this.redis.mget(...chunk);
      chunk.forEach((fullKey, j) => {
        const value = values[j];
        // Deleted between SCAN and MGET
        if (value === null || value === undefined) return;
        entries.push({ key: fullKey.slice(this.namespace.length), value });
      });
    }

    return entries;
  }

  async increment(key: string): Promise<number> {
    return this.redis.incr(this.k(key));
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
