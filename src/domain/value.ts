/**
 * Payload value model.
 *
 * Source payloads are untyped JSON in transit. Inside the engine they are
 * carried as a closed tagged tree so that filter evaluation can switch on
 * `kind` exhaustively instead of probing runtime types.
 */

export type Value =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'int'; readonly value: number }
  | { readonly kind: 'bool'; readonly value: boolean }
  | { readonly kind: 'list'; readonly items: readonly Value[] }
  | { readonly kind: 'map'; readonly entries: Readonly<Record<string, Value>> };

/** Plain JSON as it appears on the wire and in stored records. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function str(value: string): Value {
  return { kind: 'string', value };
}

export function int(value: number): Value {
  return { kind: 'int', value: Math.trunc(value) };
}

export function bool(value: boolean): Value {
  return { kind: 'bool', value };
}

export function list(items: readonly Value[]): Value {
  return { kind: 'list', items };
}

export function map(entries: Readonly<Record<string, Value>>): Value {
  return { kind: 'map', entries };
}

export const EMPTY_MAP: Value = map({});

function isPlainObject(input: unknown): input is Record<string, unknown> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return false;
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

/** Structural check for decoded JSON of unknown provenance. */
export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (value === null) return true;
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Converts decoded JSON (or any plain JS data) into a `Value`.
 *
 * Safe integers become `int`; every other finite number is carried as its
 * decimal text. `null`, `undefined` and non-data values yield `undefined`
 * and are dropped from the enclosing list or map.
 */
export function fromJson(input: unknown): Value | undefined {
  switch (typeof input) {
    case 'string':
      return str(input);
    case 'boolean':
      return bool(input);
    case 'number':
      if (Number.isSafeInteger(input)) return int(input);
      return Number.isFinite(input) ? str(String(input)) : undefined;
    case 'bigint':
      return input >= BigInt(Number.MIN_SAFE_INTEGER) && input <= BigInt(Number.MAX_SAFE_INTEGER)
        ? int(Number(input))
        : str(input.toString());
    case 'object':
      break;
    default:
      return undefined;
  }

  if (input === null) return undefined;
  if (input instanceof Date) return str(input.toISOString());

  if (Array.isArray(input)) {
    const items: Value[] = [];
    for (const item of input) {
      const converted = fromJson(item);
      if (converted !== undefined) items.push(converted);
    }
    return list(items);
  }

  if (!isPlainObject(input)) return undefined;

  const entries: Record<string, Value> = {};
  for (const [key, raw] of Object.entries(input)) {
    const converted = fromJson(raw);
    if (converted !== undefined) {
      Object.defineProperty(entries, key, { value: converted, enumerable: true, writable: false });
    }
  }
  return map(entries);
}

/** Inverse of `fromJson` for every value it can produce. */
export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case 'string':
    case 'int':
    case 'bool':
      return value.value;
    case 'list':
      return value.items.map(toJson);
    case 'map': {
      const out: JsonObject = {};
      for (const [key, entry] of Object.entries(value.entries)) {
        Object.defineProperty(out, key, { value: toJson(entry), enumerable: true, writable: true });
      }
      return out;
    }
  }
}

/** Own-property lookup on a map value; inherited names never resolve. */
export function entryOf(value: Value, key: string): Value | undefined {
  if (value.kind !== 'map' || !Object.hasOwn(value.entries, key)) return undefined;
  return value.entries[key];
}

/**
 * Resolves a dotted path (`tx.length`, `state.value.0.value`).
 *
 * Segments select map keys and list indexes; `length` on a list or string
 * yields its size. An empty path resolves to the value itself.
 */
export function getPath(root: Value, path: string): Value | undefined {
  if (path === '') return root;

  let current: Value | undefined = root;
  for (const segment of path.split('.')) {
    if (current === undefined) return undefined;

    switch (current.kind) {
      case 'map':
        current = entryOf(current, segment);
        break;
      case 'list':
        if (segment === 'length') {
          current = int(current.items.length);
        } else if (/^\d+$/.test(segment)) {
          current = current.items[Number(segment)];
        } else {
          current = undefined;
        }
        break;
      case 'string':
        current = segment === 'length' ? int(current.value.length) : undefined;
        break;
      default:
        current = undefined;
    }
  }
  return current;
}

/** Text form used by pattern filters and logs. */
export function stringify(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'int':
    case 'bool':
      return String(value.value);
    case 'list':
    case 'map':
      return JSON.stringify(toJson(value));
  }
}
