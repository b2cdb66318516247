import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { FunctionNotFoundError, LeaseExpiredError, fromWire, toWire } from '../domain/index.js';
import type { Event, ExecutionReport, Func, TaskAssignment } from '../domain/index.js';
import type { ExecutionRecorder } from './execution-log.js';
import type { FunctionStore } from './function-store.js';
import type { Registry, TaskRecord } from './registry.js';
import type { Match } from './trigger-matcher.js';

export interface AcquireOptions {
  /** Aborting removes the waiter and returns `null`. */
  readonly signal?: AbortSignal | undefined;
  /** Long-poll deadline; defaults to the service's `acquireTimeoutMs`. */
  readonly timeoutMs?: number | undefined;
}

/** Worker-facing side of the task protocol, local or remote. */
export interface TaskSource {
  acquireTask(uid: string, fidHint?: string, options?: AcquireOptions): Promise<TaskAssignment | null>;
  acquireFunc(uid: string, fid: string): Promise<Func>;
  acknowledge(taskId: string, uid: string, report: ExecutionReport): Promise<void>;
  release(taskId: string, uid: string): Promise<boolean>;
}

export interface TaskSourceOptions {
  /** Lower bound on every lease. */
  readonly leaseTimeoutMs: number;
  /** Added to a function's `execution_time_ms` when that outlasts `leaseTimeoutMs`. */
  readonly leaseGraceMs: number;
  readonly acquireTimeoutMs: number;
  readonly reapIntervalMs: number;
  /** Unix milliseconds. */
  readonly now?: () => number;
}

export const DEFAULT_TASK_SOURCE_OPTIONS: TaskSourceOptions = {
  leaseTimeoutMs: 60_000,
  leaseGraceMs: 10_000,
  acquireTimeoutMs: 30_000,
  reapIntervalMs: 1_000,
};

export interface TaskSourceDeps {
  readonly registry: Registry;
  readonly store: FunctionStore;
  readonly recorder: ExecutionRecorder;
  readonly log: Logger;
}

export interface TaskSourceStats {
  readonly pending: number;
  readonly leased: number;
  readonly waiting: number;
}

interface LiveTask {
  readonly task_id: string;
  readonly fid: string;
  readonly trigger_index: number;
  readonly event_key: string;
  readonly event: Event;
  readonly enqueued_at: number;
  status: 'pending' | 'leased';
  uid: string | undefined;
  lease_expires_at: number | undefined;
  attempt: number;
}

interface Waiter {
  readonly uid: string;
  readonly fidHint: string | undefined;
  deliver(task: LiveTask): void;
  cancel(): void;
}

function toRecord(task: LiveTask): TaskRecord {
  return {
    task_id: task.task_id,
    fid: task.fid,
    trigger_index: task.trigger_index,
    event_key: task.event_key,
    event: toWire(task.event),
    status: task.status,
    uid: task.uid,
    lease_expires_at: task.lease_expires_at,
    attempt: task.attempt,
    enqueued_at: task.enqueued_at,
  };
}

/**
 * Pull-based task distribution with leases.
 *
 * All pool and lease mutations happen synchronously between awaits, so
 * each dequeue is a critical section even with many concurrent callers:
 * a task is handed to exactly one worker. Persistence to the registry's
 * lease table follows each mutation so `recover()` can rebuild the pool
 * after a restart.
 *
 * Delivery is at-least-once. A lease that is not acknowledged before it
 * expires returns the task to the pool with its attempt counter intact.
 */
export class TaskSourceService implements TaskSource {
  private readonly options: TaskSourceOptions;
  private readonly pending: LiveTask[] = [];
  private readonly leased = new Map<string, LiveTask>();
  private waiters: Waiter[] = [];
  private reaper: NodeJS.Timeout | undefined;
  private stopped = false;

  constructor(
    private readonly deps: TaskSourceDeps,
    options: Partial<TaskSourceOptions> = {},
  ) {
    this.options = { ...DEFAULT_TASK_SOURCE_OPTIONS, ...options };
  }

  private now(): number {
    return this.options.now?.() ?? Date.now();
  }

  stats(): TaskSourceStats {
    return { pending: this.pending.length, leased: this.leased.size, waiting: this.waiters.length };
  }

  // ─── Pool ─────────────────────────────────────────────────────

  async enqueue(match: Match, event: Event, eventKey: string): Promise<string> {
    const task: LiveTask = {
      task_id: randomUUID(),
      fid: match.function_id,
      trigger_index: match.trigger_index,
      event_key: eventKey,
      event,
      enqueued_at: this.now(),
      status: 'pending',
      uid: undefined,
      lease_expires_at: undefined,
      attempt: 0,
    };

    await this.deps.registry.putTask(toRecord(task));
    this.offer(task);

    this.deps.log.debug({ task_id: task.task_id, fid: task.fid, event_id: event.data.id }, 'Task enqueued');
    return task.task_id;
  }

  /** Hands a pending task to a waiting worker, or parks it in the pool by age. */
  private offer(task: LiveTask): void {
    const index = this.pickWaiter(task.fid);
    const waiter = index === -1 ? undefined : this.waiters[index];
    if (waiter !== undefined) {
      this.waiters.splice(index, 1);
      waiter.deliver(this.lease(task, waiter.uid));
      return;
    }

    const position = this.pending.findIndex((p) => p.enqueued_at > task.enqueued_at);
    if (position === -1) this.pending.push(task);
    else this.pending.splice(position, 0, task);
  }

  private pickWaiter(fid: string): number {
    const hinted = this.waiters.findIndex((w) => w.fidHint === fid);
    if (hinted !== -1) return hinted;
    return this.waiters.length > 0 ? 0 : -1;
  }

  private take(fidHint: string | undefined): LiveTask | undefined {
    if (fidHint !== undefined) {
      const index = this.pending.findIndex((t) => t.fid === fidHint);
      if (index !== -1) return this.pending.splice(index, 1)[0];
    }
    return this.pending.shift();
  }

  private lease(task: LiveTask, uid: string): LiveTask {
    task.status = 'leased';
    task.uid = uid;
    task.attempt += 1;
    task.lease_expires_at = this.now() + this.leaseDurationFor(task.fid);
    this.leased.set(task.task_id, task);
    return task;
  }

  /** A lease never expires while the function may still be within its execution budget. */
  leaseDurationFor(fid: string): number {
    const budget = this.deps.store.resourcesOf(fid)?.execution_time_ms;
    if (budget === undefined) return this.options.leaseTimeoutMs;
    return Math.max(this.options.leaseTimeoutMs, budget + this.options.leaseGraceMs);
  }

  private returnToPool(task: LiveTask): void {
    this.leased.delete(task.task_id);
    task.status = 'pending';
    task.uid = undefined;
    task.lease_expires_at = undefined;
    this.offer(task);
  }

  private async persist(task: LiveTask): Promise<void> {
    try {
      await this.deps.registry.putTask(toRecord(task));
    } catch (err: unknown) {
      this.deps.log.error({ err, task_id: task.task_id }, 'Failed to persist task lease');
    }
  }

  // ─── Protocol ─────────────────────────────────────────────────

  /**
   * Returns the oldest unclaimed task, preferring one for `fidHint`, or
   * waits for one. Resolves `null` on deadline, abort or shutdown.
   */
  async acquireTask(uid: string, fidHint?: string, options: AcquireOptions = {}): Promise<TaskAssignment | null> {
    await this.reapExpired();

    const ready = this.take(fidHint);
    if (ready !== undefined) {
      return this.handOut(this.lease(ready, uid), options.signal);
    }

    const { signal } = options;
    if (this.stopped || signal?.aborted) return null;

    const timeoutMs = options.timeoutMs ?? this.options.acquireTimeoutMs;

    const delivered = await new Promise<LiveTask | null>((resolve) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const waiter: Waiter = {
        uid,
        fidHint,
        deliver: (task) => {
          cleanup();
          resolve(task);
        },
        cancel: () => {
          cleanup();
          resolve(null);
        },
      };
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        waiter.cancel();
      };

      timer = setTimeout(onAbort, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });

    if (delivered === null) return null;
    return this.handOut(delivered, signal);
  }

  private async handOut(task: LiveTask, signal: AbortSignal | undefined): Promise<TaskAssignment | null> {
    const uid = task.uid ?? '';
    if (signal?.aborted) {
      // Never delivered; not an attempt
      task.attempt -= 1;
      this.returnToPool(task);
      await this.persist(task);
      return null;
    }

    await this.persist(task);
    this.deps.log.info(
      { task_id: task.task_id, fid: task.fid, uid, attempt: task.attempt },
      'Task leased',
    );

    return {
      task_id: task.task_id,
      uid,
      fid: task.fid,
      version: this.deps.store.versionOf(task.fid) ?? 0,
      event: task.event,
      attempt: task.attempt,
    };
  }

  async acquireFunc(uid: string, fid: string): Promise<Func> {
    const metadata = await this.deps.registry.getFunction(fid);
    if (metadata === undefined) throw new FunctionNotFoundError(fid);

    this.deps.log.debug({ uid, fid, version: metadata.version }, 'Function code served');
    return {
      version: metadata.version,
      code: metadata.code,
      resources: metadata.resources,
      permissions: metadata.permissions,
    };
  }

  /**
   * Completes a lease and records the outcome. Throws `LeaseExpiredError`
   * when the lease is unknown, expired or held by another worker.
   */
  async acknowledge(taskId: string, uid: string, report: ExecutionReport): Promise<void> {
    await this.reapExpired();

    const task = this.leased.get(taskId);
    if (task === undefined || task.uid !== uid) {
      throw new LeaseExpiredError(taskId);
    }

    this.leased.delete(taskId);
    await this.deps.registry.deleteTask(taskId);

    const version = this.deps.store.versionOf(task.fid) ?? 0;
    try {
      await this.deps.recorder.record({
        task_id: task.task_id,
        function_id: task.fid,
        function_version: version,
        event_id: task.event.data.id,
        event_key: task.event_key,
        worker_id: uid,
        outcome: report.outcome,
        error: report.error ?? null,
        result: report.result ?? null,
        duration_ms: report.duration_ms,
        attempt: task.attempt,
      });
    } catch (err: unknown) {
      this.deps.log.error({ err, task_id: taskId, outcome: report.outcome }, 'Failed to record execution');
      throw err;
    }

    this.deps.log.info(
      { task_id: taskId, fid: task.fid, uid, outcome: report.outcome, duration_ms: report.duration_ms },
      'Task acknowledged',
    );
  }

  /** Gives a lease back before it expires. Returns false when `uid` does not hold it. */
  async release(taskId: string, uid: string): Promise<boolean> {
    const task = this.leased.get(taskId);
    if (task === undefined || task.uid !== uid) return false;

    task.attempt -= 1;
    this.returnToPool(task);
    await this.persist(task);
    this.deps.log.info({ task_id: taskId, uid }, 'Task released');
    return true;
  }

  /** Returns expired leases to the pool. */
  async reapExpired(nowMs: number = this.now()): Promise<number> {
    const expired: LiveTask[] = [];
    for (const task of this.leased.values()) {
      if (task.lease_expires_at !== undefined && task.lease_expires_at <= nowMs) expired.push(task);
    }

    for (const task of expired) {
      this.deps.log.warn(
        { task_id: task.task_id, fid: task.fid, uid: task.uid, attempt: task.attempt },
        'Lease expired; task returned to pool',
      );
      this.returnToPool(task);
    }

    await Promise.all(expired.map((task) => this.persist(task)));
    return expired.length;
  }

  /** Rebuilds the pool from the lease table. Every recovered task becomes pending. */
  async recover(): Promise<number> {
    const records = await this.deps.registry.listTasks();
    const known = new Set([...this.leased.keys(), ...this.pending.map((t) => t.task_id)]);

    const recovered = records
      .filter((r) => !known.has(r.task_id))
      .sort((a, b) => a.enqueued_at - b.enqueued_at)
      .map((r): LiveTask => ({
        task_id: r.task_id,
        fid: r.fid,
        trigger_index: r.trigger_index,
        event_key: r.event_key,
        event: fromWire(r.event),
        enqueued_at: r.enqueued_at,
        status: 'pending',
        uid: undefined,
        lease_expires_at: undefined,
        attempt: r.attempt,
      }));

    for (const task of recovered) {
      this.offer(task);
      await this.persist(task);
    }

    if (recovered.length > 0) {
      this.deps.log.info({ count: recovered.length }, 'Recovered tasks from lease table');
    }
    return recovered.length;
  }

  start(): void {
    this.stopped = false;
    if (this.reaper !== undefined) return;
    this.reaper = setInterval(() => {
      this.reapExpired().catch((err: unknown) => {
        this.deps.log.error({ err }, 'Lease reaper failed');
      });
    }, this.options.reapIntervalMs);
    this.reaper.unref();
  }

  /** Stops the reaper and resolves every waiting `acquireTask` with `null`. */
  stop(): void {
    this.stopped = true;
    clearInterval(this.reaper);
    this.reaper = undefined;

    const waiting = this.waiters;
    this.waiters = [];
    for (const waiter of waiting) waiter.cancel();
  }
}
