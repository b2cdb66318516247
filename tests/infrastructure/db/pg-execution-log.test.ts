import { describe, it, expect } from 'vitest';
import { toRecord } from '../../../src/infrastructure/db/pg-execution-log.js';
import type { ExecutionRow } from '../../../src/infrastructure/db/execution-query-repository.js';

function row(overrides: Partial<ExecutionRow> = {}): ExecutionRow {
  return {
    execution_id: '0b7e2a5c-8d43-4f1e-9a6b-2c1d3e4f5a6b',
    task_id: '1c8f3b6d-9e54-4a2f-8b7c-3d2e4f5a6b7c',
    function_id: '2d9a4c7e-af65-4b3a-9c8d-4e3f5a6b7c8d',
    function_version: 3,
    event_id: 'block:12',
    event_key: 'ev:blockchain:0000000000000012',
    worker_id: 'worker-1',
    outcome: 'succeeded',
    error: null,
    result: { ok: true },
    duration_ms: 8,
    attempt: 1,
    finished_at: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

describe('toRecord', () => {
  it('maps a stored row to an execution record', () => {
    expect(toRecord(row())).toEqual({ ...row(), result: { ok: true } });
  });

  it('reads an unknown outcome as failed and a non-JSON result as null', () => {
    const record = toRecord(row({ outcome: 'exploded', result: undefined }));
    expect(record.outcome).toBe('failed');
    expect(record.result).toBeNull();
  });
});
