import { randomUUID } from 'node:crypto';
import type { ExecutionRecord, NewExecution } from '../../application/execution-log.js';
import type { Database } from './client.js';
import { executions } from './schema.js';

/**
 * Inserts one execution record and returns it as stored.
 * `execution_id` is generated here; `finished_at` defaults to now.
 */
export async function insertExecution(
  db: Database,
  input: NewExecution,
): Promise<ExecutionRecord> {
  const record: ExecutionRecord = {
    ...input,
    execution_id: randomUUID(),
    finished_at: input.finished_at ?? new Date(),
  };

  await db.insert(executions).values({
    execution_id: record.execution_id,
    task_id: record.task_id,
    function_id: record.function_id,
    function_version: record.function_version,
    event_id: record.event_id,
    event_key: record.event_key,
    worker_id: record.worker_id,
    outcome: record.outcome,
    error: record.error,
    result: record.result,
    duration_ms: Math.round(record.duration_ms),
    attempt: record.attempt,
    finished_at: record.finished_at,
  });

  return record;
}
