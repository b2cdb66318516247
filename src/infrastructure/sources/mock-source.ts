import { createEvent, nowSeconds } from '../../domain/index.js';
import type { Event, SourceAdapter } from '../../domain/index.js';
import { sleep } from '../../application/sleep.js';

export interface MockSourceOptions {
  readonly name: string;
  /** Number of events to emit before completing. */
  readonly count: number;
  readonly interval_ms: number;
  /** Block index of the first synthetic block. */
  readonly start_index: number;
}

export const DEFAULT_MOCK_SOURCE_OPTIONS: MockSourceOptions = {
  name: 'mock',
  count: 12,
  interval_ms: 1_000,
  start_index: 1,
};

/**
 * Finite stream of synthetic blockchain events for local development.
 *
 * Cycles block → transaction → notification; each cycle advances the block
 * index by one. Event ids are `mock:<sequence>`.
 */
export class MockSource implements SourceAdapter {
  readonly kind = 'mock' as const;
  readonly name: string;
  private readonly options: MockSourceOptions;
  private emitted = 0;

  constructor(options: Partial<MockSourceOptions> = {}) {
    this.options = { ...DEFAULT_MOCK_SOURCE_OPTIONS, ...options };
    this.name = this.options.name;
  }

  async *poll(signal: AbortSignal): AsyncGenerator<Event> {
    while (!signal.aborted && this.emitted < this.options.count) {
      if (this.emitted > 0) await sleep(this.options.interval_ms, signal);
      if (signal.aborted) return;

      const event = syntheticEvent(this.emitted, this.options.start_index);
      this.emitted++;
      yield event;
    }
  }
}

/** The `sequence`-th synthetic event. */
export function syntheticEvent(sequence: number, startIndex = 1): Event {
  const index = startIndex + Math.floor(sequence / 3);
  const hash = `0x${index.toString(16).padStart(64, '0')}`;
  const txHash = `0x${(index * 1000 + 1).toString(16).padStart(64, '0')}`;
  const base = { trigger: 'blockchain', source: 'mock', id: `mock:${sequence}`, triggered_time: nowSeconds() } as const;

  switch (sequence % 3) {
    case 0:
      return createEvent({
        ...base,
        event_type: 'block',
        payload: { index, hash, tx_count: 1, transactions: [txHash] },
      });
    case 1:
      return createEvent({
        ...base,
        event_type: 'transaction',
        payload: { hash: txHash, block_index: index, position: 0, sysfee: '1000000', netfee: '500000' },
      });
    default:
      return createEvent({
        ...base,
        event_type: 'notification',
        payload: {
          tx_hash: txHash,
          block_index: index,
          position: 0,
          contract: '0xd2a4cff31913016155e38e474a2c06d08be276cf',
          event_name: 'Transfer',
          state: { type: 'Array', value: [{ type: 'Integer', value: String(index * 100) }] },
        },
      });
  }
}
