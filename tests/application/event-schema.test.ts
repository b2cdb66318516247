import { describe, it, expect } from 'vitest';
import { eventBatchSchema, toEvent, wireEventSchema } from '../../src/application/event-schema.js';
import { int, toWire } from '../../src/domain/index.js';

describe('wireEventSchema', () => {
  it('defaults the payload to an empty map', () => {
    const input = wireEventSchema.parse({
      context: { trigger: 'blockchain', source: 'neo', event_type: 'block', triggered_time: 1_767_225_600 },
      data: { id: 'block:1' },
    });

    expect(toWire(toEvent(input))).toEqual({
      context: { trigger: 'blockchain', source: 'neo', event_type: 'block', triggered_time: 1_767_225_600 },
      data: { id: 'block:1', payload: {} },
    });
  });

  it('assigns an id and intake time when absent', () => {
    const before = Math.floor(Date.now() / 1000);
    const event = toEvent(wireEventSchema.parse({
      context: { trigger: 'oracle', source: 'oracle' },
      data: { payload: { price: 42 } },
    }));

    expect(event.data.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(event.context.triggered_time).toBeGreaterThanOrEqual(before);
    expect(event.data.payload.kind === 'map' && event.data.payload.entries['price']).toEqual(int(42));
  });

  it('rejects unknown sources and event types', () => {
    const result = wireEventSchema.safeParse({
      context: { trigger: 'blockchain', source: 'bitcoin', event_type: 'epoch' },
      data: {},
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((i) => i.path.join('.'))).toEqual(['context.source', 'context.event_type']);
  });
});

describe('eventBatchSchema', () => {
  it('rejects an empty batch', () => {
    const result = eventBatchSchema.safeParse([]);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('Batch must contain at least one event');
  });
});
