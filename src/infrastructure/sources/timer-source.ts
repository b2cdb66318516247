import { createEvent } from '../../domain/index.js';
import type { Event, SourceAdapter } from '../../domain/index.js';
import { sleep } from '../../application/sleep.js';

export interface TimerSourceOptions {
  readonly name: string;
  readonly interval_ms: number;
  /** Clock in epoch milliseconds. */
  readonly now: () => number;
}

export const DEFAULT_TIMER_SOURCE_OPTIONS: TimerSourceOptions = {
  name: 'timer',
  interval_ms: 60_000,
  now: () => Date.now(),
};

/**
 * Emits one `schedule` event per interval boundary, aligned to the epoch
 * (so a 60s interval ticks on every whole minute). Never completes.
 */
export class TimerSource implements SourceAdapter {
  readonly kind = 'timer' as const;
  readonly name: string;
  private readonly options: TimerSourceOptions;
  /** Last boundary emitted, in epoch ms. */
  private last: number | undefined;

  constructor(options: Partial<TimerSourceOptions> = {}) {
    this.options = { ...DEFAULT_TIMER_SOURCE_OPTIONS, ...options };
    this.name = this.options.name;
  }

  async *poll(signal: AbortSignal): AsyncGenerator<Event> {
    const interval = Math.max(1_000, this.options.interval_ms);

    while (!signal.aborted) {
      const now = this.options.now();
      const boundary = Math.floor(now / interval) * interval;

      if (this.last === undefined || boundary > this.last) {
        this.last = boundary;
        yield this.tick(boundary, interval);
        continue;
      }

      await sleep(boundary + interval - now, signal);
    }
  }

  private tick(boundaryMs: number, interval: number): Event {
    const seconds = Math.floor(boundaryMs / 1000);
    return createEvent({
      trigger: 'schedule',
      source: 'timer',
      id: `tick:${seconds}`,
      triggered_time: seconds,
      payload: { interval_ms: interval, source: this.name },
    });
  }
}
