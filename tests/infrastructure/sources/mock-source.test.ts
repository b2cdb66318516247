import { describe, it, expect } from 'vitest';
import type { Event } from '../../../src/domain/index.js';
import { getPath, int } from '../../../src/domain/index.js';
import { MockSource } from '../../../src/infrastructure/sources/mock-source.js';

describe('MockSource', () => {
  it('cycles block, transaction and notification then completes', async () => {
    const source = new MockSource({ count: 4, interval_ms: 0, start_index: 10 });
    const events: Event[] = [];
    for await (const event of source.poll(new AbortController().signal)) events.push(event);

    expect(events.map((e) => e.data.id)).toEqual(['mock:0', 'mock:1', 'mock:2', 'mock:3']);
    expect(events.map((e) => e.context.event_type)).toEqual(['block', 'transaction', 'notification', 'block']);
    const last = events[3];
    expect(last && getPath(last.data.payload, 'index')).toEqual(int(11));
  });
});
