export type { KeyValueStore, KeyValueEntry } from './types.js';
export { MemoryKeyValueStore } from './memory-store.js';
export { RedisKeyValueStore } from './redis-store.js';
export { openKeyValueStore } from './open.js';
export { KeyValueFunctionStorage } from './function-storage.js';
