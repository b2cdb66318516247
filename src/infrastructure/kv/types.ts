export interface KeyValueEntry {
  readonly key: string;
  readonly value: string;
}

/**
 * Prefix-keyed string store backing the registry.
 *
 * Implementations must make `putIfAbsent`, `compareAndSwap` and
 * `increment` atomic per key; `scan` returns entries sorted by key.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string): Promise<void>;
  /** Writes only when the key does not exist. Returns whether it wrote. */
  putIfAbsent(key: string, value: string): Promise<boolean>;
  /** Writes `next` only when the current value equals `expected` (`undefined` = absent). */
  compareAndSwap(key: string, expected: string | undefined, next: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  scan(prefix: string): Promise<KeyValueEntry[]>;
  increment(key: string): Promise<number>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
