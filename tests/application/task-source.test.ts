import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_RESOURCES, FunctionNotFoundError, LeaseExpiredError } from '../../src/domain/index.js';
import { InMemoryExecutionLog } from '../../src/application/execution-log.js';
import { FunctionStore, compileFunction } from '../../src/application/function-store.js';
import { TaskSourceService } from '../../src/application/task-source.js';
import type { TaskSourceOptions } from '../../src/application/task-source.js';
import type { Registry } from '../../src/application/registry.js';
import type { Match } from '../../src/application/trigger-matcher.js';
import { blockTrigger, chainEvent, functionInput, memoryRegistry, silentLogger } from '../helpers.js';

const FID_A = '00000000-0000-4000-8000-00000000000a';
const FID_B = '00000000-0000-4000-8000-00000000000b';

const match = (fid: string): Match => ({ function_id: fid, version: 1, trigger_index: 0 });

const services: TaskSourceService[] = [];

function service(
  options: Partial<TaskSourceOptions> = {},
  registry: Registry = memoryRegistry(),
  store: FunctionStore = new FunctionStore(),
) {
  const recorder = new InMemoryExecutionLog();
  const tasks = new TaskSourceService(
    { registry, store, recorder, log: silentLogger() },
    { acquireTimeoutMs: 50, ...options },
  );
  services.push(tasks);
  return { tasks, recorder, registry };
}

async function enqueueOne(tasks: TaskSourceService, fid = FID_A, id?: string): Promise<string> {
  const event = chainEvent({ index: 1 }, id === undefined ? {} : { id });
  return tasks.enqueue(match(fid), event, `ev:blockchain:${event.data.id}`);
}

afterEach(() => {
  for (const tasks of services.splice(0)) tasks.stop();
});

describe('TaskSourceService.acquireTask', () => {
  it('hands a single pending task to exactly one of two concurrent workers', async () => {
    const { tasks } = service();
    const taskId = await enqueueOne(tasks);

    const [first, second] = await Promise.all([
      tasks.acquireTask('worker-1'),
      tasks.acquireTask('worker-2'),
    ]);

    const winners = [first, second].filter((a) => a !== null);
    expect(winners).toHaveLength(1);
    expect(winners[0]?.task_id).toBe(taskId);
    expect(winners[0]?.attempt).toBe(1);
  });

  it('returns null when nothing arrives before the deadline', async () => {
    const { tasks } = service();
    expect(await tasks.acquireTask('worker-1', undefined, { timeoutMs: 10 })).toBeNull();
    expect(tasks.stats().waiting).toBe(0);
  });

  it('wakes a waiting worker when a task is enqueued', async () => {
    const { tasks } = service({ acquireTimeoutMs: 5_000 });
    const pending = tasks.acquireTask('worker-1');
    await vi.waitFor(() => expect(tasks.stats().waiting).toBe(1));

    const taskId = await enqueueOne(tasks);
    expect((await pending)?.task_id).toBe(taskId);
  });

  it('removes the waiter and returns null on abort', async () => {
    const { tasks } = service({ acquireTimeoutMs: 5_000 });
    const ac = new AbortController();
    const pending = tasks.acquireTask('worker-1', undefined, { signal: ac.signal });
    await vi.waitFor(() => expect(tasks.stats().waiting).toBe(1));

    ac.abort();
    expect(await pending).toBeNull();
    expect(tasks.stats().waiting).toBe(0);

    // The task goes to the next caller, not the aborted one
    await enqueueOne(tasks);
    expect(tasks.stats().pending).toBe(1);
  });

  it('prefers a task for the hinted function, oldest first otherwise', async () => {
    const { tasks } = service();
    const forA = await enqueueOne(tasks, FID_A);
    const forB = await enqueueOne(tasks, FID_B);

    expect((await tasks.acquireTask('worker-1', FID_B))?.task_id).toBe(forB);
    expect((await tasks.acquireTask('worker-1', FID_B))?.task_id).toBe(forA);
  });

  it('routes a new task to the waiter hinting its function', async () => {
    const { tasks } = service({ acquireTimeoutMs: 5_000 });
    const plain = tasks.acquireTask('worker-1');
    const hinted = tasks.acquireTask('worker-2', FID_B);
    await vi.waitFor(() => expect(tasks.stats().waiting).toBe(2));

    const forB = await enqueueOne(tasks, FID_B);
    expect((await hinted)?.uid).toBe('worker-2');
    expect((await hinted)?.task_id).toBe(forB);

    tasks.stop();
    expect(await plain).toBeNull();
  });
});

describe('TaskSourceService leases', () => {
  it('makes a task acquirable again once its lease expires', async () => {
    let now = 1_000_000;
    const { tasks } = service({ leaseTimeoutMs: 1_000, now: () => now });
    const taskId = await enqueueOne(tasks);

    const first = await tasks.acquireTask('worker-1');
    expect(await tasks.acquireTask('worker-2', undefined, { timeoutMs: 10 })).toBeNull();

    now += 1_001;
    const second = await tasks.acquireTask('worker-2');

    expect(first?.task_id).toBe(taskId);
    expect(second?.task_id).toBe(taskId);
    expect(second?.attempt).toBe(2);

    await expect(tasks.acknowledge(taskId, 'worker-1', { outcome: 'succeeded', duration_ms: 5 }))
      .rejects.toBeInstanceOf(LeaseExpiredError);
  });

  it('keeps the lease for as long as the function may run', async () => {
    let now = 1_000_000;
    const registry = memoryRegistry();
    const fn = await registry.registerFunction(
      functionInput(blockTrigger(), { resources: { ...DEFAULT_RESOURCES, execution_time_ms: 120_000 } }),
    );
    const { tasks, recorder } = service({ now: () => now }, registry, new FunctionStore([compileFunction(fn)]));
    expect(tasks.leaseDurationFor(fn.id)).toBe(130_000);
    expect(tasks.leaseDurationFor(FID_B)).toBe(60_000);

    const taskId = await enqueueOne(tasks, fn.id);
    await tasks.acquireTask('worker-1');

    now += 61_000;
    expect(await tasks.acquireTask('worker-2', undefined, { timeoutMs: 10 })).toBeNull();

    now += 60_000;
    await tasks.acknowledge(taskId, 'worker-1', { outcome: 'timed_out', duration_ms: 120_000, error: 'deadline' });

    const records = await recorder.query({}, { limit: 10, offset: 0 });
    expect(records.map((r) => [r.outcome, r.attempt])).toEqual([['timed_out', 1]]);
  });

  it('records the outcome and clears the lease on acknowledge', async () => {
    const { tasks, recorder, registry } = service();
    const taskId = await enqueueOne(tasks, FID_A, 'block:9');
    await tasks.acquireTask('worker-1');

    await tasks.acknowledge(taskId, 'worker-1', { outcome: 'timed_out', duration_ms: 100, error: 'deadline' });

    const [record] = await recorder.query({}, { limit: 10, offset: 0 });
    expect(record).toMatchObject({
      task_id: taskId,
      function_id: FID_A,
      event_id: 'block:9',
      event_key: 'ev:blockchain:block:9',
      worker_id: 'worker-1',
      outcome: 'timed_out',
      error: 'deadline',
      result: null,
      attempt: 1,
    });
    expect(await registry.listTasks()).toEqual([]);
    expect(tasks.stats()).toEqual({ pending: 0, leased: 0, waiting: 0 });
  });

  it('rejects an acknowledgment from a worker that does not hold the lease', async () => {
    const { tasks } = service();
    const taskId = await enqueueOne(tasks);
    await tasks.acquireTask('worker-1');

    await expect(tasks.acknowledge(taskId, 'worker-2', { outcome: 'succeeded', duration_ms: 1 }))
      .rejects.toBeInstanceOf(LeaseExpiredError);
    await expect(tasks.acknowledge('unknown', 'worker-1', { outcome: 'succeeded', duration_ms: 1 }))
      .rejects.toBeInstanceOf(LeaseExpiredError);
  });

  it('returns a released task to the pool without counting an attempt', async () => {
    const { tasks } = service();
    const taskId = await enqueueOne(tasks);
    await tasks.acquireTask('worker-1');

    expect(await tasks.release(taskId, 'worker-2')).toBe(false);
    expect(await tasks.release(taskId, 'worker-1')).toBe(true);

    const again = await tasks.acquireTask('worker-2');
    expect(again?.attempt).toBe(1);
  });

  it('rebuilds the pool from the lease table after a restart', async () => {
    const registry = memoryRegistry();
    let clock = 0;
    const now = (): number => ++clock;
    const before = service({ now }, registry).tasks;
    const leasedId = await enqueueOne(before, FID_A);
    const pendingId = await enqueueOne(before, FID_B);
    await before.acquireTask('worker-1', FID_A);
    before.stop();

    const after = service({ now }, registry).tasks;
    expect(await after.recover()).toBe(2);

    const first = await after.acquireTask('worker-2');
    const second = await after.acquireTask('worker-2');
    expect(first?.task_id).toBe(leasedId);
    expect(first?.attempt).toBe(2);
    expect(second?.task_id).toBe(pendingId);
  });
});

describe('TaskSourceService.acquireFunc', () => {
  it('serves the current code of a registered function', async () => {
    const { tasks, registry } = service();
    const fn = await registry.registerFunction({
      name: 'f',
      description: '',
      trigger: { type: 'blockchain', config: { source: '*', event_type: '*' } },
      resources: { memory_mb: 64, cpu_ms: 100, execution_time_ms: 1_000, storage_kb: 8 },
      code: 'function handler() { return 1; }',
    });

    const func = await tasks.acquireFunc('worker-1', fn.id);
    expect(func).toEqual({
      version: 1,
      code: 'function handler() { return 1; }',
      resources: { memory_mb: 64, cpu_ms: 100, execution_time_ms: 1_000, storage_kb: 8 },
      permissions: fn.permissions,
    });
  });

  it('throws FunctionNotFound for unknown functions', async () => {
    const { tasks } = service();
    await expect(tasks.acquireFunc('worker-1', FID_A)).rejects.toBeInstanceOf(FunctionNotFoundError);
  });
});
