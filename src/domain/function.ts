import type { BlockchainEventType, SourceKind, TriggerKind } from './event.js';
import type { FilterSpec } from './filter/types.js';
import type { JsonValue } from './value.js';

/**
 * Registered function model.
 *
 * The trigger is a tagged variant: each `type` carries exactly the fields
 * that trigger kind needs, so a schedule trigger can never hold a filter
 * and a request trigger can never lack a path.
 */

export interface BlockchainTriggerConfig {
  /** Source kind to accept, or `*` for any chain. */
  readonly source: SourceKind | '*';
  readonly event_type: BlockchainEventType | '*';
  readonly filter?: FilterSpec;
}

export interface ScheduleTriggerConfig {
  readonly cron: string;
  /** IANA timezone; UTC when absent. */
  readonly timezone?: string;
}

export interface RequestTriggerConfig {
  readonly path: string;
  readonly methods: readonly string[];
  readonly auth_required: boolean;
}

export interface OracleTriggerConfig {
  readonly type: string;
  readonly config: Readonly<Record<string, JsonValue>>;
}

export type SingleTrigger =
  | { readonly type: 'blockchain'; readonly config: BlockchainTriggerConfig }
  | { readonly type: 'schedule'; readonly config: ScheduleTriggerConfig }
  | { readonly type: 'request'; readonly config: RequestTriggerConfig }
  | { readonly type: 'oracle'; readonly config: OracleTriggerConfig };

export type TriggerConfig =
  | SingleTrigger
  | { readonly type: 'multi_event'; readonly config: { readonly triggers: readonly SingleTrigger[] } };

export type TriggerType = TriggerConfig['type'];

export const TRIGGER_TYPES: readonly TriggerType[] = ['blockchain', 'schedule', 'request', 'oracle', 'multi_event'];

/** Flattens a trigger into the single triggers it subscribes to, in declaration order. */
export function triggersOf(trigger: TriggerConfig): readonly SingleTrigger[] {
  return trigger.type === 'multi_event' ? trigger.config.triggers : [trigger];
}

/** Whether any (sub-)trigger of `trigger` can receive events of `kind`. */
export function listensTo(trigger: TriggerConfig, kind: TriggerKind): boolean {
  return triggersOf(trigger).some((t) => t.type === kind);
}

export interface NetworkPermissions {
  readonly allow_outbound: boolean;
  readonly allowed_domains: readonly string[];
}

export interface StoragePermissions {
  readonly allow_read: boolean;
  readonly allow_write: boolean;
  readonly namespace: string;
}

export interface BlockchainPermissions {
  readonly allow_read: boolean;
  readonly allow_write: boolean;
  readonly allowed_contracts: readonly string[];
}

export interface Permissions {
  readonly network: NetworkPermissions;
  readonly storage: StoragePermissions;
  readonly blockchain: BlockchainPermissions;
}

export interface ResourceLimits {
  readonly memory_mb: number;
  /** Soft CPU budget; overruns are reported, not enforced. */
  readonly cpu_ms: number;
  readonly execution_time_ms: number;
  readonly storage_kb: number;
}

export const DEFAULT_RESOURCES: ResourceLimits = {
  memory_mb: 128,
  cpu_ms: 1000,
  execution_time_ms: 10_000,
  storage_kb: 1024,
};

export function defaultPermissions(functionId: string): Permissions {
  return {
    network: { allow_outbound: false, allowed_domains: [] },
    storage: { allow_read: true, allow_write: true, namespace: functionId },
    blockchain: { allow_read: true, allow_write: false, allowed_contracts: [] },
  };
}

export interface FunctionMetadata {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  /** Starts at 1 and increases by one on every update. */
  readonly version: number;
  /** Unix seconds. */
  readonly created_at: number;
  readonly updated_at: number;
  readonly trigger: TriggerConfig;
  readonly permissions: Permissions;
  readonly resources: ResourceLimits;
  readonly code: string;
}

export interface FunctionInput {
  readonly name: string;
  readonly description: string;
  readonly trigger: TriggerConfig;
  readonly permissions?: Permissions | undefined;
  readonly resources: ResourceLimits;
  readonly code: string;
}

export type FunctionPatch = {
  readonly [K in keyof FunctionInput]?: FunctionInput[K] | undefined;
};
