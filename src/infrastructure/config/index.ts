export { loadEngineConfig, loadWorkerConfig, engineConfigSchema, workerConfigSchema, ConfigError } from './engine-config.js';
export type { EngineConfig, WorkerConfig } from './engine-config.js';
