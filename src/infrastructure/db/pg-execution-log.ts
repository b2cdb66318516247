import { isExecutionOutcome, isJsonValue } from '../../domain/index.js';
import type {
  ExecutionQueryFilters,
  ExecutionRecord,
  ExecutionRecorder,
  NewExecution,
  PaginationParams,
} from '../../application/execution-log.js';
import type { Database } from './client.js';
import { insertExecution } from './execution-repository.js';
import { queryExecutions } from './execution-query-repository.js';
import type { ExecutionRow } from './execution-query-repository.js';

/** Execution log stored in the `executions` table. */
export class PgExecutionLog implements ExecutionRecorder {
  constructor(private readonly db: Database) {}

  record(input: NewExecution): Promise<ExecutionRecord> {
    return insertExecution(this.db, input);
  }

  async query(filters: ExecutionQueryFilters, pagination: PaginationParams): Promise<ExecutionRecord[]> {
    const rows = await queryExecutions(this.db, filters, pagination);
    return rows.map(toRecord);
  }
}

export function toRecord(row: ExecutionRow): ExecutionRecord {
  return {
    execution_id: row.execution_id,
    task_id: row.task_id,
    function_id: row.function_id,
    function_version: row.function_version,
    event_id: row.event_id,
    event_key: row.event_key,
    worker_id: row.worker_id,
    // Rows are only written through insertExecution; anything else reads as failed
    outcome: isExecutionOutcome(row.outcome) ? row.outcome : 'failed',
    error: row.error,
    result: row.result !== null && isJsonValue(row.result) ? row.result : null,
    duration_ms: row.duration_ms,
    attempt: row.attempt,
    finished_at: row.finished_at,
  };
}
