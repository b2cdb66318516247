import { assertStorageWithin, mergeStorageChanges } from '../../application/executor.js';
import type { FunctionStorage, StorageChanges } from '../../application/executor.js';
import { VersionConflictError, isJsonValue } from '../../domain/index.js';
import type { JsonValue } from '../../domain/index.js';
import type { KeyValueStore } from './types.js';

const PREFIX = 'store:';
const MAX_APPLY_ATTEMPTS = 16;

function parseDocument(raw: string | undefined): Record<string, JsonValue> {
  if (raw === undefined) return {};
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed).filter((entry): entry is [string, JsonValue] => isJsonValue(entry[1])));
}

/**
 * Function storage namespaces kept as one JSON document per namespace.
 *
 * Runs hand back only the keys they touched; each delta is merged into the
 * latest document and committed by compare-and-swap, so concurrent runs
 * against one namespace keep each other's writes.
 */
export class KeyValueFunctionStorage implements FunctionStorage {
  constructor(private readonly kv: KeyValueStore) {}

  async load(namespace: string): Promise<Record<string, JsonValue>> {
    return parseDocument(await this.kv.get(`${PREFIX}${namespace}`));
  }

  async apply(namespace: string, changes: StorageChanges, limitKb: number): Promise<void> {
    const key = `${PREFIX}${namespace}`;
    for (let attempt = 0; attempt < MAX_APPLY_ATTEMPTS; attempt++) {
      const raw = await this.kv.get(key);
      const next = mergeStorageChanges(parseDocument(raw), changes);
      assertStorageWithin(next, limitKb);
      if (await this.kv.compareAndSwap(key, raw, JSON.stringify(next))) return;
    }
    throw new VersionConflictError(namespace);
  }
}
