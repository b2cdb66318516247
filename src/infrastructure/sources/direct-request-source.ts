import type { Event, SourceAdapter, SourceKind } from '../../domain/index.js';

interface Submission {
  readonly event: Event;
  readonly done: () => void;
}

/**
 * In-process intake queue.
 *
 * HTTP intake routes `submit` events here; the source runner pulls them in
 * submission order like any other adapter. A submission settles once the
 * runner has finished with it and asked for the next event.
 */
export class DirectRequestSource implements SourceAdapter {
  private readonly queue: Submission[] = [];
  private closed = false;
  private wake: (() => void) | undefined;

  constructor(
    readonly name: string = 'request',
    readonly kind: SourceKind = 'request',
  ) {}

  /** A finite source that emits `events` once, then completes. */
  static fromList(events: readonly Event[], name = 'list', kind: SourceKind = 'mock'): DirectRequestSource {
    const source = new DirectRequestSource(name, kind);
    for (const event of events) source.queue.push({ event, done: () => {} });
    source.close();
    return source;
  }

  get pending(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  submit(event: Event): Promise<void> {
    if (this.closed) return Promise.reject(new Error(`Source ${this.name} is closed`));
    return new Promise<void>((resolve) => {
      this.queue.push({ event, done: resolve });
      this.notify();
    });
  }

  /** Stops intake; already queued events are still emitted. */
  close(): void {
    this.closed = true;
    this.notify();
  }

  async *poll(signal: AbortSignal): AsyncGenerator<Event> {
    while (!signal.aborted) {
      const next = this.queue.shift();
      if (next !== undefined) {
        try {
          yield next.event;
        } finally {
          next.done();
        }
        continue;
      }
      if (this.closed) return;
      await this.waitForWork(signal);
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private waitForWork(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        this.wake = undefined;
        resolve();
      };
      this.wake = () => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
