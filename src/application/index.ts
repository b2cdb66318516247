export { wireEventSchema, eventBatchSchema, toEvent } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export {
  registerFunctionSchema,
  patchFunctionSchema,
  triggerSchema,
  filterSchema,
  validateTrigger,
  toValidationIssues,
} from './function-schema.js';
export type { RegisterFunctionBody, PatchFunctionBody } from './function-schema.js';
export { createFunction, listFunctions, getFunction, patchFunction, removeFunction, toSummary } from './function-crud.js';
export type { FunctionSummary, ListFunctionsParams, FunctionListResult } from './function-crud.js';
export { listExecutions } from './query-executions.js';
export type { ListExecutionsParams } from './query-executions.js';
export { Registry, openRegistry, DEFAULT_REGISTRY_OPTIONS, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './registry.js';
export type {
  RegistryOptions,
  RegisterEventResult,
  EventRange,
  StoredEventView,
  FunctionPage,
  TaskRecord,
  SourceState,
  SourceStatus,
  FunctionChange,
  SweepResult,
} from './registry.js';
export { FunctionStore, compileFunction } from './function-store.js';
export type { CompiledFunction, CompiledTrigger } from './function-store.js';
export { matchEvent } from './trigger-matcher.js';
export type { Match, MatchDiagnostic, MatchResult } from './trigger-matcher.js';
export { TaskSourceService, DEFAULT_TASK_SOURCE_OPTIONS } from './task-source.js';
export type { TaskSource, TaskSourceOptions, TaskSourceDeps, TaskSourceStats, AcquireOptions } from './task-source.js';
export { IngestionPipeline } from './ingestion.js';
export type { IngestResult, IngestionDeps } from './ingestion.js';
export { runSource, DEFAULT_SOURCE_RUNNER_OPTIONS } from './source-runner.js';
export type { SourceRunnerOptions, SourceRunnerDeps } from './source-runner.js';
export { WorkerExecutor, assertStorageWithin, hasStorageChanges, mergeStorageChanges } from './executor.js';
export type {
  Sandbox,
  SandboxRequest,
  SandboxResult,
  SandboxContext,
  FunctionStorage,
  StorageChanges,
  ExecutorDeps,
  ExecutorOptions,
  TaskRun,
} from './executor.js';
export { InMemoryExecutionLog } from './execution-log.js';
export type { ExecutionRecord, NewExecution, ExecutionRecorder, ExecutionQueryFilters, PaginationParams } from './execution-log.js';
export { KeyedMutex } from './keyed-mutex.js';
export { sleep } from './sleep.js';
export {
  acquireTaskRequestSchema,
  ackRequestSchema,
  releaseRequestSchema,
  acquireFuncRequestSchema,
  funcSchema,
  parseAssignment,
  parseFunc,
} from './task-schema.js';
export type { AcquireTaskRequest, AckRequest } from './task-schema.js';
