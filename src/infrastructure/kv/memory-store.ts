import type { KeyValueEntry, KeyValueStore } from './types.js';

/** Process-local store. Used for development and tests. */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.data.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  async putIfAbsent(key: string, value: string): Promise<boolean> {
    if (this.data.has(key)) return false;
    this.data.set(key, value);
    return true;
  }

  async compareAndSwap(key: string, expected: string | undefined, next: string): Promise<boolean> {
    if (this.data.get(key) !== expected) return false;
    this.data.set(key, next);
    return true;
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async scan(prefix: string): Promise<KeyValueEntry[]> {
    const entries: KeyValueEntry[] = [];
    for (const [key, value] of this.data) {
      if (key.startsWith(prefix)) entries.push({ key, value });
    }
    return entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async increment(key: string): Promise<number> {
    const next = Number(this.data.get(key) ?? '0') + 1;
    this.data.set(key, String(next));
    return next;
  }

  async ping(): Promise<void> {
    // always reachable
  }

  async close(): Promise<void> {
    this.data.clear();
  }

  get size(): number {
    return this.data.size;
  }
}
