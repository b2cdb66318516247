import { describe, it, expect } from 'vitest';
import { DirectRequestSource } from '../../../src/infrastructure/sources/direct-request-source.js';
import { chainEvent } from '../../helpers.js';

describe('DirectRequestSource', () => {
  it('emits a fixed list in order and completes', async () => {
    const source = DirectRequestSource.fromList([chainEvent({}, { id: 'a' }), chainEvent({}, { id: 'b' })]);
    const ids: string[] = [];
    for await (const event of source.poll(new AbortController().signal)) ids.push(event.data.id);

    expect(ids).toEqual(['a', 'b']);
    expect(source.kind).toBe('mock');
  });

  it('settles a submission once the consumer moves past it', async () => {
    const source = new DirectRequestSource();
    const iterator = source.poll(new AbortController().signal)[Symbol.asyncIterator]();

    let settled = false;
    const submitted = source.submit(chainEvent({}, { id: 'x' })).then(() => { settled = true; });

    const first = await iterator.next();
    expect(first.done).toBe(false);
    expect(first.done ? undefined : first.value.data.id).toBe('x');
    expect(settled).toBe(false);

    source.close();
    const second = await iterator.next();
    await submitted;

    expect(second.done).toBe(true);
    expect(settled).toBe(true);
  });

  it('refuses submissions after close', async () => {
    const source = new DirectRequestSource('intake');
    source.close();
    await expect(source.submit(chainEvent({}))).rejects.toThrow('Source intake is closed');
  });

  it('returns when aborted while idle', async () => {
    const ac = new AbortController();
    const source = new DirectRequestSource();
    const iterator = source.poll(ac.signal)[Symbol.asyncIterator]();

    const next = iterator.next();
    ac.abort();
    expect((await next).done).toBe(true);
  });
});
