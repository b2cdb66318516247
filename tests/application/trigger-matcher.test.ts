import { describe, it, expect } from 'vitest';
import { DEFAULT_RESOURCES, createEvent, defaultPermissions } from '../../src/domain/index.js';
import type { FunctionMetadata, TriggerConfig } from '../../src/domain/index.js';
import { compileFunction } from '../../src/application/function-store.js';
import { matchEvent } from '../../src/application/trigger-matcher.js';
import { blockTrigger, chainEvent } from '../helpers.js';

let seq = 0;

function fn(trigger: TriggerConfig): FunctionMetadata {
  seq++;
  const id = `00000000-0000-4000-8000-${String(seq).padStart(12, '0')}`;
  return {
    id,
    name: `fn-${seq}`,
    description: '',
    version: 1,
    created_at: 0,
    updated_at: 0,
    trigger,
    permissions: defaultPermissions(id),
    resources: DEFAULT_RESOURCES,
    code: '',
  };
}

function requestEvent(payload: Record<string, unknown>) {
  return createEvent({ trigger: 'request', source: 'request', id: `req-${seq}`, payload });
}

describe('matchEvent', () => {
  it('matches blockchain triggers by source, event type and filter', () => {
    const any = fn(blockTrigger());
    const neoTx = fn({ type: 'blockchain', config: { source: 'neo', event_type: 'transaction' } });
    const big = fn(blockTrigger({ type: 'value', field: 'index', operator: '>=', value: 1_000_000 }));
    const functions = [any, neoTx, big].map(compileFunction);

    const block = matchEvent(chainEvent({ index: 999_999 }), functions);
    const tx = matchEvent(chainEvent({ index: 1_000_000 }, { event_type: 'transaction' }), functions);

    expect(block.matches.map((m) => m.function_id)).toEqual([any.id]);
    expect(tx.matches.map((m) => m.function_id)).toEqual([any.id, neoTx.id, big.id]);
  });

  it('never matches across trigger classes', () => {
    const schedule = fn({ type: 'schedule', config: { cron: '* * * * *' } });
    const result = matchEvent(chainEvent({}), [compileFunction(schedule)]);
    expect(result.matches).toEqual([]);
  });

  it('matches schedule triggers on their cron minute', () => {
    const hourly = compileFunction(fn({ type: 'schedule', config: { cron: '0 * * * *' } }));
    const onHour = createEvent({ trigger: 'schedule', source: 'timer', id: 'tick:a', triggered_time: Date.parse('2026-01-05T10:00:00Z') / 1000 });
    const offHour = createEvent({ trigger: 'schedule', source: 'timer', id: 'tick:b', triggered_time: Date.parse('2026-01-05T10:01:00Z') / 1000 });

    expect(matchEvent(onHour, [hourly]).matches).toHaveLength(1);
    expect(matchEvent(offHour, [hourly]).matches).toHaveLength(0);
  });

  it('matches request triggers by path, method and authentication', () => {
    const open = fn({ type: 'request', config: { path: '/hooks/pay', methods: ['POST'], auth_required: false } });
    const secured = fn({ type: 'request', config: { path: '/hooks/pay', methods: ['post', 'PUT'], auth_required: true } });
    const functions = [open, secured].map(compileFunction);

    const anonymous = matchEvent(requestEvent({ path: '/hooks/pay', method: 'post', authenticated: false }), functions);
    const signedIn = matchEvent(requestEvent({ path: '/hooks/pay', method: 'POST', authenticated: true }), functions);
    const wrongPath = matchEvent(requestEvent({ path: '/hooks/other', method: 'POST', authenticated: true }), functions);

    expect(anonymous.matches.map((m) => m.function_id)).toEqual([open.id]);
    expect(signedIn.matches.map((m) => m.function_id)).toEqual([open.id, secured.id]);
    expect(wrongPath.matches).toEqual([]);
  });

  it('matches oracle triggers by oracle_type', () => {
    const price = compileFunction(fn({ type: 'oracle', config: { type: 'price', config: {} } }));
    const event = createEvent({ trigger: 'oracle', source: 'oracle', id: 'o1', payload: { oracle_type: 'price' } });
    expect(matchEvent(event, [price]).matches).toHaveLength(1);
  });

  it('yields one match per applicable multi_event sub-trigger', () => {
    const multi = fn({
      type: 'multi_event',
      config: {
        triggers: [
          { type: 'schedule', config: { cron: '* * * * *' } },
          blockTrigger(),
          { type: 'blockchain', config: { source: 'neo', event_type: 'block' } },
        ],
      },
    });

    const result = matchEvent(chainEvent({}), [compileFunction(multi)]);
    expect(result.matches).toEqual([
      { function_id: multi.id, version: 1, trigger_index: 1 },
      { function_id: multi.id, version: 1, trigger_index: 2 },
    ]);
  });

  it('isolates a failing script to its own function', () => {
    const broken = fn(blockTrigger({ type: 'script', code: 'event.a.b' }));
    const fine = fn(blockTrigger());

    const result = matchEvent(chainEvent({}), [broken, fine].map(compileFunction));

    expect(result.matches.map((m) => m.function_id)).toEqual([fine.id]);
    expect(result.diagnostics).toEqual([
      { function_id: broken.id, trigger_index: 0, message: "Cannot read property 'b' of undefined" },
    ]);
  });
});
