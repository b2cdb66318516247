import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_RESOURCES, LeaseExpiredError, defaultPermissions } from '../../src/domain/index.js';
import type { ExecutionReport, Func, JsonValue, TaskAssignment } from '../../src/domain/index.js';
import { WorkerExecutor } from '../../src/application/executor.js';
import type { FunctionStorage, Sandbox, SandboxRequest, SandboxResult, StorageChanges } from '../../src/application/executor.js';
import type { AcquireOptions, TaskSource } from '../../src/application/task-source.js';
import { KeyValueFunctionStorage } from '../../src/infrastructure/kv/function-storage.js';
import { MemoryKeyValueStore } from '../../src/infrastructure/kv/memory-store.js';
import { chainEvent, silentLogger } from '../helpers.js';

const FID = '6f1c2a54-0b4e-4c36-9d0a-3f2b8e7c1a90';

function func(overrides: Partial<Func> = {}): Func {
  return {
    version: 1,
    code: 'function handler(event) { return 1; }',
    resources: DEFAULT_RESOURCES,
    permissions: defaultPermissions(FID),
    ...overrides,
  };
}

function task(overrides: Partial<TaskAssignment> = {}): TaskAssignment {
  return {
    task_id: 'task-1',
    uid: 'worker-1',
    fid: FID,
    version: 1,
    event: chainEvent({ index: 7 }, { id: 'block:7' }),
    attempt: 1,
    ...overrides,
  };
}

class FakeSource implements TaskSource {
  readonly acks: { taskId: string; uid: string; report: ExecutionReport }[] = [];
  readonly queue: TaskAssignment[] = [];
  funcs = new Map<string, Func>([[FID, func()]]);
  acquireFunc = vi.fn(async (_uid: string, fid: string): Promise<Func> => {
    const found = this.funcs.get(fid);
    if (found === undefined) throw new Error(`Function not found: ${fid}`);
    return found;
  });
  ackError: Error | undefined;

  async acquireTask(_uid: string, _hint?: string, options: AcquireOptions = {}): Promise<TaskAssignment | null> {
    const next = this.queue.shift();
    if (next !== undefined) return next;
    await new Promise<void>((resolve) => {
      if (options.signal?.aborted) resolve();
      options.signal?.addEventListener('abort', () => resolve(), { once: true });
    });
    return null;
  }

  async acknowledge(taskId: string, uid: string, report: ExecutionReport): Promise<void> {
    if (this.ackError !== undefined) throw this.ackError;
    this.acks.push({ taskId, uid, report });
  }

  async release(): Promise<boolean> {
    return true;
  }
}

class FakeSandbox implements Sandbox {
  readonly requests: SandboxRequest[] = [];
  constructor(private readonly result: SandboxResult) {}

  async run(request: SandboxRequest): Promise<SandboxResult> {
    this.requests.push(request);
    return this.result;
  }
}

class FakeStorage implements FunctionStorage {
  readonly applied: { namespace: string; changes: StorageChanges }[] = [];
  constructor(private readonly contents: Record<string, JsonValue> = {}) {}

  async load(): Promise<Record<string, JsonValue>> {
    return this.contents;
  }

  async apply(namespace: string, changes: StorageChanges): Promise<void> {
    this.applied.push({ namespace, changes });
  }
}

const setOnly = (set: Record<string, JsonValue>): StorageChanges => ({ set, deleted: [] });

function executor(source: FakeSource, sandbox: Sandbox, storage: FunctionStorage = new FakeStorage()) {
  return new WorkerExecutor({ source, sandbox, storage, log: silentLogger() }, { uid: 'worker-1', concurrency: 1 });
}

describe('WorkerExecutor.execute', () => {
  it('walks acquired, loading and running to a success and acknowledges it', async () => {
    const source = new FakeSource();
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 4, result: 7, logs: ['hello'] });

    const run = await executor(source, sandbox).execute(task());

    expect(run.transitions).toEqual(['acquired', 'loading', 'running', 'succeeded']);
    expect(source.acks).toEqual([{
      taskId: 'task-1',
      uid: 'worker-1',
      report: { outcome: 'succeeded', duration_ms: 4, error: undefined, result: 7, logs: ['hello'] },
    }]);
  });

  it('passes code, event, context and limits to the sandbox', async () => {
    const source = new FakeSource();
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, logs: [] });

    await executor(source, sandbox, new FakeStorage({ count: 2 })).execute(task({ attempt: 3 }));

    const request = sandbox.requests[0];
    expect(request?.code).toBe('function handler(event) { return 1; }');
    expect(request?.event.data).toEqual({ id: 'block:7', payload: { index: 7 } });
    expect(request?.context).toEqual({ function_id: FID, version: 1, task_id: 'task-1', attempt: 3 });
    expect(request?.limits).toEqual(DEFAULT_RESOURCES);
    expect(request?.storage).toEqual({ count: 2 });
  });

  it('acknowledges a timeout exactly once and does not retry it', async () => {
    const source = new FakeSource();
    source.funcs.set(FID, func({ resources: { ...DEFAULT_RESOURCES, execution_time_ms: 50 } }));
    const sandbox = new FakeSandbox({
      outcome: 'timed_out',
      duration_ms: 50,
      error: 'Execution exceeded 50ms',
      logs: [],
    });

    const run = await executor(source, sandbox).execute(task());

    expect(run.report.outcome).toBe('timed_out');
    expect(run.transitions).toEqual(['acquired', 'loading', 'running', 'timed_out']);
    expect(sandbox.requests).toHaveLength(1);
    expect(source.acks).toHaveLength(1);
    expect(source.acks[0]?.report.error).toBe('Execution exceeded 50ms');
  });

  it('fails the task when the function cannot be loaded', async () => {
    const source = new FakeSource();
    source.funcs.clear();
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, logs: [] });

    const run = await executor(source, sandbox).execute(task());

    expect(run.transitions).toEqual(['acquired', 'loading', 'failed']);
    expect(run.report.error).toBe(`Failed to load function: Function not found: ${FID}`);
    expect(sandbox.requests).toHaveLength(0);
    expect(source.acks).toHaveLength(1);
  });

  it('caches function code until a newer version is assigned', async () => {
    const source = new FakeSource();
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, logs: [] });
    const exec = executor(source, sandbox);

    await exec.execute(task({ task_id: 'a' }));
    await exec.execute(task({ task_id: 'b' }));
    expect(source.acquireFunc).toHaveBeenCalledTimes(1);

    source.funcs.set(FID, func({ version: 2, code: 'function handler() { return 2; }' }));
    await exec.execute(task({ task_id: 'c', version: 2 }));

    expect(source.acquireFunc).toHaveBeenCalledTimes(2);
    expect(sandbox.requests[2]?.code).toBe('function handler() { return 2; }');
  });

  it('writes storage back only after a successful run with write permission', async () => {
    const source = new FakeSource();
    const storage = new FakeStorage({ count: 1 });

    await executor(source, new FakeSandbox({ outcome: 'failed', duration_ms: 1, error: 'boom', changes: setOnly({ count: 9 }), logs: [] }), storage)
      .execute(task({ task_id: 'a' }));
    expect(storage.applied).toEqual([]);

    await executor(source, new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, changes: setOnly({}), logs: [] }), storage)
      .execute(task({ task_id: 'b' }));
    expect(storage.applied).toEqual([]);

    await executor(source, new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, changes: setOnly({ count: 2 }), logs: [] }), storage)
      .execute(task({ task_id: 'c' }));
    expect(storage.applied).toEqual([{ namespace: FID, changes: { set: { count: 2 }, deleted: [] } }]);

    const readOnly = defaultPermissions(FID);
    source.funcs.set(FID, func({
      version: 2,
      permissions: { ...readOnly, storage: { ...readOnly.storage, allow_write: false } },
    }));
    await executor(source, new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, changes: setOnly({ count: 3 }), logs: [] }), storage)
      .execute(task({ task_id: 'd', version: 2 }));
    expect(storage.applied).toHaveLength(1);
  });

  it('keeps the writes of concurrent runs against one namespace', async () => {
    const kv = new MemoryKeyValueStore();
    const storage = new KeyValueFunctionStorage(kv);
    const source = new FakeSource();
    const sandbox: Sandbox = {
      run: async (request) => ({
        outcome: 'succeeded',
        duration_ms: 1,
        changes: setOnly({ [request.context.task_id]: true }),
        logs: [],
      }),
    };
    const exec = executor(source, sandbox, storage);

    await Promise.all([exec.execute(task({ task_id: 'a' })), exec.execute(task({ task_id: 'b' }))]);

    expect(await storage.load(FID)).toEqual({ a: true, b: true });
  });

  it('refuses a write-back larger than the storage limit', async () => {
    const source = new FakeSource();
    source.funcs.set(FID, func({ resources: { ...DEFAULT_RESOURCES, storage_kb: 1 } }));
    const kv = new MemoryKeyValueStore();
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 2, changes: setOnly({ big: 'x'.repeat(2048) }), logs: [] });

    const run = await executor(source, sandbox, new KeyValueFunctionStorage(kv)).execute(task());

    expect(run.report).toEqual({
      outcome: 'resource_exceeded',
      error: 'storage limit of 1024 bytes exceeded',
      duration_ms: 2,
      logs: [],
    });
    expect(await kv.get(`store:${FID}`)).toBeUndefined();
    expect(run.transitions).toEqual(['acquired', 'loading', 'running', 'resource_exceeded']);
  });

  it('discards the outcome when the lease expired before acknowledgment', async () => {
    const source = new FakeSource();
    source.ackError = new LeaseExpiredError('task-1');
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, logs: [] });

    const run = await executor(source, sandbox).execute(task());
    expect(run.report.outcome).toBe('succeeded');
  });

  it('propagates other acknowledgment failures', async () => {
    const source = new FakeSource();
    source.ackError = new Error('connection reset');
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, logs: [] });

    await expect(executor(source, sandbox).execute(task())).rejects.toThrow('connection reset');
  });
});

describe('WorkerExecutor.run', () => {
  it('executes queued tasks and stops when aborted', async () => {
    const source = new FakeSource();
    source.queue.push(task({ task_id: 'a' }), task({ task_id: 'b' }));
    const sandbox = new FakeSandbox({ outcome: 'succeeded', duration_ms: 1, logs: [] });
    const ac = new AbortController();

    const running = executor(source, sandbox).run(ac.signal);
    await vi.waitFor(() => expect(source.acks).toHaveLength(2));
    ac.abort();
    await running;

    expect(source.acks.map((a) => a.taskId)).toEqual(['a', 'b']);
  });
});
