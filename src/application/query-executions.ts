import type { ExecutionOutcome } from '../domain/index.js';
import type { ExecutionQueryFilters, ExecutionRecorder } from './execution-log.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListExecutionsParams {
  limit?: number | undefined;
  offset?: number | undefined;
  function_id?: string | undefined;
  event_id?: string | undefined;
  outcome?: ExecutionOutcome | undefined;
}

/**
 * Use case: list execution records, newest first.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listExecutions(recorder: ExecutionRecorder, params: ListExecutionsParams) {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filters: ExecutionQueryFilters = {};
  if (params.function_id !== undefined) filters.function_id = params.function_id;
  if (params.event_id !== undefined) filters.event_id = params.event_id;
  if (params.outcome !== undefined) filters.outcome = params.outcome;

  const data = await recorder.query(filters, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}
