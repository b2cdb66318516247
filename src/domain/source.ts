import type { Event, SourceKind } from './event.js';

/**
 * A producer of canonical events.
 *
 * `poll` is lazy and restartable: calling it again after the iterator ended
 * or threw resumes after the last event it emitted. Aborting `signal` stops
 * emission without retracting anything already yielded.
 */
export interface SourceAdapter {
  readonly name: string;
  readonly kind: SourceKind;
  poll(signal: AbortSignal): AsyncIterable<Event>;
  /** Releases connections the adapter owns. */
  close?(): void | Promise<void>;
}
