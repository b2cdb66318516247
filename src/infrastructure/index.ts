export { registryPlugin, enginePlugin } from './engine/index.js';
export type { Engine, EnginePluginOptions, RegistryPluginOptions } from './engine/index.js';
export { dbPlugin, createDbClient, ensureSchema, PgExecutionLog } from './db/index.js';
export type { Database, DbPluginOptions } from './db/index.js';
export { loadEngineConfig, loadWorkerConfig, ConfigError } from './config/index.js';
export type { EngineConfig, WorkerConfig } from './config/index.js';
export { openKeyValueStore, KeyValueFunctionStorage, MemoryKeyValueStore, RedisKeyValueStore } from './kv/index.js';
export type { KeyValueStore } from './kv/index.js';
export { WorkerSandbox } from './sandbox/index.js';
export { createSources, loadSourcesConfig } from './sources/index.js';
export type { SourcesConfig } from './sources/index.js';
export { HttpTaskSourceClient, TaskSourceRequestError } from './task-source-client.js';
export type { HttpTaskSourceOptions } from './task-source-client.js';
