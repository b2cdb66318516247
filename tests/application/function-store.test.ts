import { describe, it, expect, vi } from 'vitest';
import { FunctionStore, compileFunction } from '../../src/application/function-store.js';
import { blockTrigger, functionInput, memoryRegistry, silentLogger } from '../helpers.js';

describe('FunctionStore', () => {
  it('loads every registered function on reload', async () => {
    const registry = memoryRegistry();
    const a = await registry.registerFunction(functionInput(blockTrigger()));
    const b = await registry.registerFunction(functionInput({ type: 'schedule', config: { cron: '*/5 * * * *' } }));

    const store = new FunctionStore();
    await store.reload(registry, silentLogger());

    expect(store.get().map((f) => f.id).sort()).toEqual([a.id, b.id].sort());
  });

  it('follows registry changes once attached', async () => {
    const registry = memoryRegistry();
    const store = new FunctionStore();
    const detach = store.attach(registry, silentLogger());

    const fn = await registry.registerFunction(functionInput(blockTrigger()));
    expect(store.versionOf(fn.id)).toBe(1);

    await registry.updateFunction(fn.id, { name: 'b' });
    expect(store.versionOf(fn.id)).toBe(2);

    await registry.deleteFunction(fn.id);
    expect(store.get()).toEqual([]);

    detach();
    await registry.registerFunction(functionInput(blockTrigger()));
    expect(store.get()).toEqual([]);
  });

  it('ignores an older version arriving after a newer one', async () => {
    const registry = memoryRegistry();
    const v1 = await registry.registerFunction(functionInput(blockTrigger()));
    const v2 = await registry.updateFunction(v1.id, { name: 'b' });

    const store = new FunctionStore([compileFunction(v2)]);
    store.upsert(compileFunction(v1));

    expect(store.versionOf(v1.id)).toBe(2);
  });

  it('skips functions whose triggers no longer compile', async () => {
    const registry = memoryRegistry();
    await registry.registerFunction(functionInput({ type: 'schedule', config: { cron: 'not a cron' } }));
    const log = silentLogger();
    const error = vi.spyOn(log, 'error');

    const store = new FunctionStore();
    await store.reload(registry, log);

    expect(store.get()).toEqual([]);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it('keeps the previous snapshot intact when swapping', () => {
    const store = new FunctionStore();
    const before = store.get();
    store.set([]);
    expect(before).toEqual([]);
    expect(store.get()).not.toBe(before);
  });
});
