export type { Value, JsonValue, JsonObject } from './value.js';
export { fromJson, toJson, isJsonValue, getPath, stringify, entryOf, str, int, bool, list, map, EMPTY_MAP } from './value.js';
export type {
  Event,
  EventContext,
  EventData,
  WireEvent,
  TriggerKind,
  SourceKind,
  BlockchainEventType,
  CreateEventParams,
} from './event.js';
export {
  TRIGGER_KINDS,
  SOURCE_KINDS,
  BLOCKCHAIN_EVENT_TYPES,
  createEvent,
  toWire,
  fromWire,
  nowSeconds,
} from './event.js';
export type {
  FunctionMetadata,
  FunctionInput,
  FunctionPatch,
  TriggerConfig,
  TriggerType,
  SingleTrigger,
  BlockchainTriggerConfig,
  ScheduleTriggerConfig,
  RequestTriggerConfig,
  OracleTriggerConfig,
  Permissions,
  ResourceLimits,
} from './function.js';
export { DEFAULT_RESOURCES, TRIGGER_TYPES, defaultPermissions, triggersOf, listensTo } from './function.js';
export type { TaskAssignment, Func, ExecutionOutcome, ExecutionReport, TaskState } from './task.js';
export { EXECUTION_OUTCOMES, isExecutionOutcome } from './task.js';
export type { CronSchedule } from './cron.js';
export { parseCron, cronMatches, isValidTimezone, CronSyntaxError } from './cron.js';
export type { SourceAdapter } from './source.js';
export * from './errors.js';
export * from './filter/index.js';
