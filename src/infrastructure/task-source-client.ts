import { FunctionNotFoundError, LeaseExpiredError } from '../domain/index.js';
import type { ExecutionReport, Func, TaskAssignment } from '../domain/index.js';
import type { AcquireOptions, TaskSource } from '../application/task-source.js';
import { parseAssignment, parseFunc } from '../application/task-schema.js';

export interface HttpTaskSourceOptions {
  /** Engine base URL, e.g. `http://localhost:3000`. */
  readonly baseUrl: string;
  /** Long-poll deadline sent with each acquire. */
  readonly acquireTimeoutMs?: number | undefined;
  readonly fetch?: typeof fetch;
}

export class TaskSourceRequestError extends Error {
  constructor(readonly status: number, path: string, detail: string) {
    super(`Task source ${path} returned ${status}: ${detail}`);
    this.name = 'TaskSourceRequestError';
  }
}

/**
 * Task source reached over the engine's HTTP task RPC.
 *
 * 204 on acquire means no task before the deadline. 404 and 409 come back
 * as FunctionNotFoundError and LeaseExpiredError.
 */
export class HttpTaskSourceClient implements TaskSource {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: HttpTaskSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async acquireTask(uid: string, fidHint?: string, options: AcquireOptions = {}): Promise<TaskAssignment | null> {
    const timeoutMs = options.timeoutMs ?? this.options.acquireTimeoutMs;
    let response: Response;
    try {
      response = await this.post('/api/v1/tasks/acquire', { uid, fid_hint: fidHint, timeout_ms: timeoutMs }, options.signal);
    } catch (err: unknown) {
      if (options.signal?.aborted) return null;
      throw err;
    }

    if (response.status === 204) return null;
    await this.ensureOk(response, '/api/v1/tasks/acquire');
    return parseAssignment(await response.json());
  }

  async acquireFunc(uid: string, fid: string): Promise<Func> {
    const path = `/api/v1/functions/${encodeURIComponent(fid)}/acquire`;
    const response = await this.post(path, { uid });
    if (response.status === 404) throw new FunctionNotFoundError(fid);
    await this.ensureOk(response, path);
    return parseFunc(await response.json());
  }

  async acknowledge(taskId: string, uid: string, report: ExecutionReport): Promise<void> {
    const path = `/api/v1/tasks/${encodeURIComponent(taskId)}/ack`;
    const response = await this.post(path, { uid, ...report });
    if (response.status === 409) throw new LeaseExpiredError(taskId);
    await this.ensureOk(response, path);
  }

  async release(taskId: string, uid: string): Promise<boolean> {
    const path = `/api/v1/tasks/${encodeURIComponent(taskId)}/release`;
    const response = await this.post(path, { uid });
    await this.ensureOk(response, path);
    const body: unknown = await response.json();
    return typeof body === 'object' && body !== null && 'released' in body && body.released === true;
  }

  private post(path: string, body: unknown, signal?: AbortSignal): Promise<Response> {
    return this.fetchFn(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });
  }

  private async ensureOk(response: Response, path: string): Promise<void> {
    if (response.ok) return;
    const detail = await response.text().catch(() => response.statusText);
    throw new TaskSourceRequestError(response.status, path, detail);
  }
}
