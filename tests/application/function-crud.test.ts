import { describe, it, expect } from 'vitest';
import {
  createFunction,
  getFunction,
  listFunctions,
  patchFunction,
  removeFunction,
} from '../../src/application/function-crud.js';
import { registerFunctionSchema } from '../../src/application/function-schema.js';
import { FunctionNotFoundError, RegistrationInvalidError, VersionConflictError } from '../../src/domain/index.js';
import { memoryRegistry } from '../helpers.js';

function body(trigger: unknown = { type: 'blockchain', config: {} }) {
  return registerFunctionSchema.parse({ name: 'fn', trigger, code: 'function handler() { return 1; }' });
}

describe('function CRUD', () => {
  it('creates at version 1 with permissions scoped to the new id', async () => {
    const registry = memoryRegistry();
    const created = await createFunction(registry, body());

    expect(created.version).toBe(1);
    expect(created.permissions.storage.namespace).toBe(created.id);
    expect(await getFunction(registry, created.id)).toEqual(created);
  });

  it('rejects an unusable trigger before touching the registry', async () => {
    const registry = memoryRegistry();
    const err = await createFunction(registry, body({ type: 'schedule', config: { cron: '61 * * * *' } }))
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RegistrationInvalidError);
    expect(err instanceof RegistrationInvalidError && err.issues).toEqual([
      { path: 'trigger.config.cron', message: 'Invalid cron expression "61 * * * *": minute 61 outside 0-59' },
    ]);
    expect((await listFunctions(registry, {})).data).toEqual([]);
  });

  it('lists summaries without code', async () => {
    const registry = memoryRegistry();
    await createFunction(registry, body());

    const page = await listFunctions(registry, {});
    expect(page.data).toHaveLength(1);
    expect(page.data[0]).not.toHaveProperty('code');
    expect(page.next_page_token).toBeNull();
  });

  it('patches into a new version and honours expected_version', async () => {
    const registry = memoryRegistry();
    const created = await createFunction(registry, body());

    const patched = await patchFunction(registry, created.id, { name: 'renamed', expected_version: 1 });
    expect(patched).toMatchObject({ name: 'renamed', version: 2, code: created.code });

    await expect(patchFunction(registry, created.id, { name: 'again', expected_version: 1 }))
      .rejects.toBeInstanceOf(VersionConflictError);
  });

  it('validates a patched trigger', async () => {
    const registry = memoryRegistry();
    const created = await createFunction(registry, body());

    await expect(patchFunction(registry, created.id, {
      trigger: { type: 'schedule', config: { cron: 'bad' } },
    })).rejects.toBeInstanceOf(RegistrationInvalidError);
    expect((await getFunction(registry, created.id))?.version).toBe(1);
  });

  it('reports missing functions', async () => {
    const registry = memoryRegistry();
    const missing = '00000000-0000-4000-8000-000000000000';

    expect(await getFunction(registry, missing)).toBeNull();
    expect(await removeFunction(registry, missing)).toBe(false);
    await expect(patchFunction(registry, missing, { name: 'x' })).rejects.toBeInstanceOf(FunctionNotFoundError);
  });
});
