import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  FunctionNotFoundError,
  VersionConflictError,
  defaultPermissions,
  fromWire,
  listensTo,
  toWire,
} from '../domain/index.js';
import type {
  Event,
  FunctionInput,
  FunctionMetadata,
  FunctionPatch,
  TriggerKind,
  TriggerType,
  WireEvent,
} from '../domain/index.js';
import { openKeyValueStore } from '../infrastructure/kv/index.js';
import type { KeyValueStore } from '../infrastructure/kv/index.js';
import { KeyedMutex } from './keyed-mutex.js';

// ─── Keyspaces ──────────────────────────────────────────────────

const FN = 'fn:';
const CODE = 'code:';
const EV = 'ev:';
const EVID = 'evid:';
const SEQ = 'seq:';
const LEASE = 'lease:';
const SRC = 'src:';

const pad = (n: number, width: number): string => String(n).padStart(width, '0');

const fnKey = (id: string): string => `${FN}${id}`;
const codeKey = (id: string, version: number): string => `${CODE}${id}:${pad(version, 10)}`;
const eventPrefix = (trigger: TriggerKind): string => `${EV}${trigger}:`;
const eventKey = (trigger: TriggerKind, seq: number): string => `${eventPrefix(trigger)}${pad(seq, 16)}`;
const eventIdKey = (event: Event): string =>
  `${EVID}${event.context.source}:${event.context.trigger}:${event.data.id}`;

// ─── Records ────────────────────────────────────────────────────

export interface RegistryOptions {
  /** Per trigger class. */
  readonly maxEvents: number;
  readonly eventTtlSeconds: number;
  /** Age past which even lease-pinned events are evicted. */
  readonly hardTtlSeconds: number;
  /** Unix milliseconds. */
  readonly now?: () => number;
}

export const DEFAULT_REGISTRY_OPTIONS: RegistryOptions = {
  maxEvents: 1000,
  eventTtlSeconds: 86_400,
  hardTtlSeconds: 7 * 86_400,
};

interface StoredEvent {
  readonly key: string;
  readonly seq: number;
  /** Unix seconds at registration. */
  readonly stored_at: number;
  readonly event: WireEvent;
}

export interface RegisterEventResult {
  /** False when an event with the same (source, trigger, id) is already retained. */
  readonly stored: boolean;
  readonly key: string;
}

export interface EventRange {
  /** Inclusive bounds on `triggered_time` (unix seconds). */
  readonly from?: number | undefined;
  readonly to?: number | undefined;
}

export interface StoredEventView {
  readonly key: string;
  readonly stored_at: number;
  readonly event: Event;
}

export interface ListFunctionsFilter {
  readonly trigger_type?: TriggerType | undefined;
}

export interface FunctionPage {
  readonly functions: FunctionMetadata[];
  /** Absent on the last page. */
  readonly next_page_token?: string;
}

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;

/** Persisted lease-table row for one task. */
export interface TaskRecord {
  readonly task_id: string;
  readonly fid: string;
  readonly trigger_index: number;
  readonly event_key: string;
  readonly event: WireEvent;
  readonly status: 'pending' | 'leased';
  readonly uid?: string | undefined;
  /** Unix milliseconds. */
  readonly lease_expires_at?: number | undefined;
  readonly attempt: number;
  /** Unix milliseconds. */
  readonly enqueued_at: number;
}

export type SourceState = 'running' | 'unavailable' | 'completed' | 'stopped';

export interface SourceStatus {
  readonly name: string;
  readonly kind: string;
  readonly state: SourceState;
  readonly emitted: number;
  readonly last_error?: string | undefined;
  /** Unix seconds. */
  readonly updated_at: number;
}

export interface FunctionChange {
  readonly reason: 'register' | 'update' | 'delete';
  readonly function_id: string;
  /** Present for register and update. */
  readonly metadata?: FunctionMetadata;
}

export type FunctionChangeListener = (change: FunctionChange) => void;

export interface SweepResult {
  readonly evicted: number;
}

/**
 * Durable state of the engine: function metadata and code versions, the
 * event log, the task lease table and source status.
 *
 * Handles are explicit: every component receives the registry it uses,
 * opened with `openRegistry` and released with `close`.
 */
export class Registry {
  private readonly options: RegistryOptions;
  private readonly listeners = new Set<FunctionChangeListener>();
  private readonly functionLocks = new KeyedMutex();
  private readonly triggerLocks = new KeyedMutex();

  constructor(
    private readonly kv: KeyValueStore,
    options: Partial<RegistryOptions> = {},
    private readonly log?: Logger,
  ) {
    this.options = { ...DEFAULT_REGISTRY_OPTIONS, ...options };
  }

  private nowSeconds(): number {
    return Math.floor((this.options.now?.() ?? Date.now()) / 1000);
  }

  async ping(): Promise<void> {
    await this.kv.ping();
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.kv.close();
  }

  // ─── Events ───────────────────────────────────────────────────

  /** Appends an event to its trigger class log unless it is a duplicate. */
  async registerEvent(event: Event): Promise<RegisterEventResult> {
    const trigger = event.context.trigger;
    const idKey = eventIdKey(event);

    const existing = await this.kv.get(idKey);
    if (existing !== undefined) return { stored: false, key: existing };

    const seq = await this.kv.increment(`${SEQ}${trigger}`);
    const key = eventKey(trigger, seq);

    if (!(await this.kv.putIfAbsent(idKey, key))) {
      return { stored: false, key: (await this.kv.get(idKey)) ?? key };
    }

    const record: StoredEvent = { key, seq, stored_at: this.nowSeconds(), event: toWire(event) };
    await this.kv.put(key, JSON.stringify(record));

    await this.triggerLocks.run(trigger, () => this.enforceCountBound(trigger, key));
    return { stored: true, key };
  }

  async getEvent(key: string): Promise<Event | undefined> {
    const raw = await this.kv.get(key);
    if (raw === undefined) return undefined;
    return fromWire(decode<StoredEvent>(raw).event);
  }

  /** Retained events of one trigger class in insertion order. */
  async getEventsByTrigger(trigger: TriggerKind, range: EventRange = {}): Promise<StoredEventView[]> {
    const entries = await this.kv.scan(eventPrefix(trigger));
    const out: StoredEventView[] = [];

    for (const entry of entries) {
      const record = decode<StoredEvent>(entry.value);
      const t = record.event.context.triggered_time;
      if (range.from !== undefined && t < range.from) continue;
      if (range.to !== undefined && t > range.to) continue;
      out.push({ key: record.key, stored_at: record.stored_at, event: fromWire(record.event) });
    }
    return out;
  }

  private async evict(record: StoredEvent): Promise<void> {
    await this.kv.delete(record.key);
    const idKey = `${EVID}${record.event.context.source}:${record.event.context.trigger}:${record.event.data.id}`;
    // Only drop the dedup entry if it still points at this record
    if ((await this.kv.get(idKey)) === record.key) {
      await this.kv.delete(idKey);
    }
  }

  /** Events behind a currently-acquired task. Pending tasks carry their own copy of the event. */
  private async pinnedEventKeys(): Promise<Set<string>> {
    const pinned = new Set<string>();
    for (const entry of await this.kv.scan(LEASE)) {
      const task = decode<TaskRecord>(entry.value);
      if (task.status === 'leased') pinned.add(task.event_key);
    }
    return pinned;
  }

  /** Evicts the oldest events over `maxEvents`, never the one just registered. */
  private async enforceCountBound(trigger: TriggerKind, registeredKey: string): Promise<void> {
    const entries = await this.kv.scan(eventPrefix(trigger));
    let excess = entries.length - this.options.maxEvents;
    if (excess <= 0) return;

    const pinned = await this.pinnedEventKeys();
    const now = this.nowSeconds();

    for (const entry of entries) {
      if (excess <= 0) break;
      const record = decode<StoredEvent>(entry.value);
      if (record.key === registeredKey) continue;
      if (pinned.has(record.key) && now - record.stored_at <= this.options.hardTtlSeconds) continue;
      await this.evict(record);
      excess--;
    }

    if (excess > 0) {
      this.log?.warn({ trigger, excess }, 'Event log over capacity; remaining events are pinned by leases');
    }
  }

  /** Evicts events past their TTL. Lease-pinned events survive until the hard TTL. */
  async sweep(nowMs?: number): Promise<SweepResult> {
    const now = Math.floor((nowMs ?? this.options.now?.() ?? Date.now()) / 1000);
    const pinned = await this.pinnedEventKeys();
    let evicted = 0;

    for (const entry of await this.kv.scan(EV)) {
      const record = decode<StoredEvent>(entry.value);
      const age = now - record.stored_at;
      const expired = pinned.has(record.key)
        ? age > this.options.hardTtlSeconds
        : age > this.options.eventTtlSeconds;
      if (expired) {
        await this.evict(record);
        evicted++;
      }
    }

    if (evicted > 0) this.log?.info({ evicted }, 'Retention sweep evicted events');
    return { evicted };
  }

  // ─── Functions ────────────────────────────────────────────────

  subscribe(listener: FunctionChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(change: FunctionChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err: unknown) {
        this.log?.error({ err, function_id: change.function_id }, 'Function change listener failed');
      }
    }
  }

  async registerFunction(input: FunctionInput): Promise<FunctionMetadata> {
    const id = randomUUID();
    const now = this.nowSeconds();

    const metadata: FunctionMetadata = {
      id,
      name: input.name,
      description: input.description,
      version: 1,
      created_at: now,
      updated_at: now,
      trigger: input.trigger,
      permissions: input.permissions ?? defaultPermissions(id),
      resources: input.resources,
      code: input.code,
    };

    await this.functionLocks.run(id, async () => {
      if (!(await this.kv.compareAndSwap(fnKey(id), undefined, JSON.stringify(metadata)))) {
        throw new VersionConflictError(id);
      }
      await this.kv.put(codeKey(id, 1), metadata.code);
    });

    this.notify({ reason: 'register', function_id: id, metadata });
    return metadata;
  }

  /**
   * Applies `patch` and bumps the version. With `expectedVersion` the update
   * only succeeds against exactly that stored version.
   */
  async updateFunction(id: string, patch: FunctionPatch, expectedVersion?: number): Promise<FunctionMetadata> {
    const next = await this.functionLocks.run(id, async () => {
      const raw = await this.kv.get(fnKey(id));
      if (raw === undefined) throw new FunctionNotFoundError(id);

      const current = decode<FunctionMetadata>(raw);
      if (expectedVersion !== undefined && expectedVersion !== current.version) {
        throw new VersionConflictError(id, expectedVersion, current.version);
      }

      const updated: FunctionMetadata = {
        ...current,
        name: patch.name ?? current.name,
        description: patch.description ?? current.description,
        trigger: patch.trigger ?? current.trigger,
        permissions: patch.permissions ?? current.permissions,
        resources: patch.resources ?? current.resources,
        code: patch.code ?? current.code,
        version: current.version + 1,
        updated_at: this.nowSeconds(),
      };

      if (!(await this.kv.compareAndSwap(fnKey(id), raw, JSON.stringify(updated)))) {
        throw new VersionConflictError(id);
      }
      await this.kv.put(codeKey(id, updated.version), updated.code);
      return updated;
    });

    this.notify({ reason: 'update', function_id: id, metadata: next });
    return next;
  }

  async getFunction(id: string): Promise<FunctionMetadata | undefined> {
    const raw = await this.kv.get(fnKey(id));
    return raw === undefined ? undefined : decode<FunctionMetadata>(raw);
  }

  async getFunctionCode(id: string, version: number): Promise<string | undefined> {
    return this.kv.get(codeKey(id, version));
  }

  /** Removes the function and every stored code version. */
  async deleteFunction(id: string): Promise<boolean> {
    const deleted = await this.functionLocks.run(id, async () => {
      if (!(await this.kv.delete(fnKey(id)))) return false;
      for (const entry of await this.kv.scan(`${CODE}${id}:`)) {
        await this.kv.delete(entry.key);
      }
      return true;
    });

    if (deleted) this.notify({ reason: 'delete', function_id: id });
    return deleted;
  }

  /**
   * Lists functions ordered by id. `page_token` is opaque: the id after
   * which the page starts.
   */
  async listFunctions(
    filter: ListFunctionsFilter = {},
    pageToken?: string,
    pageSize: number = DEFAULT_PAGE_SIZE,
  ): Promise<FunctionPage> {
    const size = Math.min(Math.max(Math.trunc(pageSize), 1), MAX_PAGE_SIZE);
    const after = pageToken === undefined || pageToken === ''
      ? undefined
      : Buffer.from(pageToken, 'base64url').toString('utf8');

    const matching: FunctionMetadata[] = [];
    for (const entry of await this.kv.scan(FN)) {
      const id = entry.key.slice(FN.length);
      if (after !== undefined && id <= after) continue;

      const metadata = decode<FunctionMetadata>(entry.value);
      if (filter.trigger_type !== undefined && !matchesTriggerType(metadata, filter.trigger_type)) continue;

      matching.push(metadata);
      if (matching.length > size) break;
    }

    if (matching.length <= size) return { functions: matching };

    const page = matching.slice(0, size);
    const last = page[page.length - 1];
    return last === undefined
      ? { functions: page }
      : { functions: page, next_page_token: Buffer.from(last.id, 'utf8').toString('base64url') };
  }

  /** Every registered function, following pages to the end. */
  async listAllFunctions(): Promise<FunctionMetadata[]> {
    const all: FunctionMetadata[] = [];
    let token: string | undefined;
    do {
      const page = await this.listFunctions({}, token, MAX_PAGE_SIZE);
      all.push(...page.functions);
      token = page.next_page_token;
    } while (token !== undefined);
    return all;
  }

  // ─── Lease table ──────────────────────────────────────────────

  async putTask(record: TaskRecord): Promise<void> {
    await this.kv.put(`${LEASE}${record.task_id}`, JSON.stringify(record));
  }

  async deleteTask(taskId: string): Promise<boolean> {
    return this.kv.delete(`${LEASE}${taskId}`);
  }

  async listTasks(): Promise<TaskRecord[]> {
    const entries = await this.kv.scan(LEASE);
    return entries.map((entry) => decode<TaskRecord>(entry.value));
  }

  // ─── Source status ────────────────────────────────────────────

  async setSourceStatus(status: Omit<SourceStatus, 'updated_at'>): Promise<void> {
    const record: SourceStatus = { ...status, updated_at: this.nowSeconds() };
    await this.kv.put(`${SRC}${status.name}`, JSON.stringify(record));
  }

  async listSourceStatus(): Promise<SourceStatus[]> {
    const entries = await this.kv.scan(SRC);
    return entries.map((entry) => decode<SourceStatus>(entry.value));
  }
}

function matchesTriggerType(metadata: FunctionMetadata, type: TriggerType): boolean {
  if (metadata.trigger.type === type) return true;
  return type !== 'multi_event' && listensTo(metadata.trigger, type);
}

/** Records in the store are only ever written by this module. */
function decode<T>(raw: string): T {
  return JSON.parse(raw) as T;
}

/**
 * Opens a registry over the store named by `url` (`memory:` or
 * `redis://…`).
 */
export async function openRegistry(
  url: string,
  options: Partial<RegistryOptions> = {},
  log?: Logger,
): Promise<Registry> {
  const kv = await openKeyValueStore(url);
  return new Registry(kv, options, log);
}
