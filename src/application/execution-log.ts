import { randomUUID } from 'node:crypto';
import type { ExecutionOutcome, JsonValue } from '../domain/index.js';

/** Stored outcome of one task attempt. */
export interface ExecutionRecord {
  readonly execution_id: string;
  readonly task_id: string;
  readonly function_id: string;
  readonly function_version: number;
  readonly event_id: string;
  readonly event_key: string;
  readonly worker_id: string;
  readonly outcome: ExecutionOutcome;
  readonly error: string | null;
  readonly result: JsonValue | null;
  readonly duration_ms: number;
  readonly attempt: number;
  readonly finished_at: Date;
}

export type NewExecution = Omit<ExecutionRecord, 'execution_id' | 'finished_at'> & {
  readonly finished_at?: Date;
};

export interface ExecutionQueryFilters {
  function_id?: string | undefined;
  event_id?: string | undefined;
  outcome?: ExecutionOutcome | undefined;
}

export interface PaginationParams {
  limit: number;
  offset: number;
}

/** Sink and query port for execution records. */
export interface ExecutionRecorder {
  record(input: NewExecution): Promise<ExecutionRecord>;
  query(filters: ExecutionQueryFilters, pagination: PaginationParams): Promise<ExecutionRecord[]>;
}

/** Used when no database is configured. Keeps the newest `capacity` records. */
export class InMemoryExecutionLog implements ExecutionRecorder {
  private readonly records: ExecutionRecord[] = [];

  constructor(private readonly capacity = 10_000) {}

  async record(input: NewExecution): Promise<ExecutionRecord> {
    const record: ExecutionRecord = {
      ...input,
      execution_id: randomUUID(),
      finished_at: input.finished_at ?? new Date(),
    };
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.splice(0, this.records.length - this.capacity);
    }
    return record;
  }

  /** Newest first. */
  async query(filters: ExecutionQueryFilters, pagination: PaginationParams): Promise<ExecutionRecord[]> {
    const matching = this.records.filter((r) =>
      (filters.function_id === undefined || r.function_id === filters.function_id)
      && (filters.event_id === undefined || r.event_id === filters.event_id)
      && (filters.outcome === undefined || r.outcome === filters.outcome));

    return matching
      .reverse()
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }
}
