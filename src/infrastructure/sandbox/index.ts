export { WorkerSandbox } from './worker-sandbox.js';
export type { WorkerSandboxOptions } from './worker-sandbox.js';
