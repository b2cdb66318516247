import type { Event } from './event.js';
import type { Permissions, ResourceLimits } from './function.js';
import type { JsonValue } from './value.js';

/** A unit of work: one matched (function, event) pair leased to one worker. */
export interface TaskAssignment {
  readonly task_id: string;
  /** Worker holding the lease. */
  readonly uid: string;
  readonly fid: string;
  /** Function version current when the task was acquired. */
  readonly version: number;
  readonly event: Event;
  /** 1 on first delivery, incremented on each redelivery. */
  readonly attempt: number;
}

/** Executable function body handed to a worker by `acquireFunc`. */
export interface Func {
  readonly version: number;
  readonly code: string;
  readonly resources: ResourceLimits;
  readonly permissions: Permissions;
}

export const EXECUTION_OUTCOMES = ['succeeded', 'failed', 'timed_out', 'resource_exceeded'] as const;
export type ExecutionOutcome = (typeof EXECUTION_OUTCOMES)[number];

export function isExecutionOutcome(value: string): value is ExecutionOutcome {
  return EXECUTION_OUTCOMES.some((outcome) => outcome === value);
}

export type TaskState = 'acquired' | 'loading' | 'running' | ExecutionOutcome;

export interface ExecutionReport {
  readonly outcome: ExecutionOutcome;
  readonly duration_ms: number;
  readonly error?: string | undefined;
  readonly result?: JsonValue | undefined;
  readonly logs?: readonly string[] | undefined;
}
