import { eq, and, desc, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { executions } from './schema.js';
import type { ExecutionQueryFilters, PaginationParams } from '../../application/execution-log.js';

/**
 * Fetches a paginated, filtered list of execution records.
 *
 * Filters build a dynamic WHERE clause — only non-undefined filters are
 * applied. Default ordering: newest first (finished_at DESC).
 */
export async function queryExecutions(
  db: Database,
  filters: ExecutionQueryFilters,
  pagination: PaginationParams,
) {
  const conditions: SQL[] = [];

  if (filters.function_id !== undefined) {
    conditions.push(eq(executions.function_id, filters.function_id));
  }
  if (filters.event_id !== undefined) {
    conditions.push(eq(executions.event_id, filters.event_id));
  }
  if (filters.outcome !== undefined) {
    conditions.push(eq(executions.outcome, filters.outcome));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  const rows = await db
    .select()
    .from(executions)
    .where(whereClause)
    .orderBy(desc(executions.finished_at))
    .limit(pagination.limit)
    .offset(pagination.offset);

  return rows;
}

export type ExecutionRow = Awaited<ReturnType<typeof queryExecutions>>[number];
