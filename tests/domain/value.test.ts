import { describe, it, expect } from 'vitest';
import { fromJson, getPath, int, isJsonValue, list, map, str, stringify, toJson } from '../../src/domain/index.js';

describe('fromJson', () => {
  it('converts JSON into the tagged value tree and drops nulls', () => {
    const value = fromJson({ a: 1, b: 'x', c: true, d: [1, null], e: null, f: 1.5 });

    expect(value).toEqual(map({
      a: int(1),
      b: str('x'),
      c: { kind: 'bool', value: true },
      d: list([int(1)]),
      f: str('1.5'),
    }));
  });

  it('returns undefined for non-data values', () => {
    expect(fromJson(undefined)).toBeUndefined();
    expect(fromJson(null)).toBeUndefined();
    expect(fromJson(() => 1)).toBeUndefined();
    expect(fromJson(Number.NaN)).toBeUndefined();
  });

  it('keeps a key named __proto__ as ordinary data', () => {
    const value = fromJson(JSON.parse('{"__proto__": {"x": 1}}'));
    expect(value === undefined ? undefined : getPath(value, '__proto__.x')).toEqual(int(1));
  });
});

describe('toJson', () => {
  it('inverts fromJson', () => {
    const input = { index: 10, hash: '0xab', tx: [{ size: 3 }], ok: false };
    const value = fromJson(input);
    expect(value === undefined ? undefined : toJson(value)).toEqual(input);
  });
});

describe('getPath', () => {
  const root = map({
    tx: list([str('a'), str('b'), str('c')]),
    name: str('neo'),
    state: map({ value: list([map({ type: str('Integer'), value: str('5') })]) }),
  });

  it('selects nested map keys and list indexes', () => {
    expect(getPath(root, 'state.value.0.value')).toEqual(str('5'));
  });

  it('yields list and string lengths', () => {
    expect(getPath(root, 'tx.length')).toEqual(int(3));
    expect(getPath(root, 'name.length')).toEqual(int(3));
  });

  it('returns undefined for missing or inherited keys', () => {
    expect(getPath(root, 'missing')).toBeUndefined();
    expect(getPath(root, 'tx.7')).toBeUndefined();
    expect(getPath(root, 'constructor')).toBeUndefined();
    expect(getPath(root, 'name.first')).toBeUndefined();
  });

  it('returns the root for an empty path', () => {
    expect(getPath(root, '')).toBe(root);
  });
});

describe('stringify', () => {
  it('renders scalars bare and containers as JSON', () => {
    expect(stringify(int(42))).toBe('42');
    expect(stringify(str('hi'))).toBe('hi');
    expect(stringify(list([int(1), str('a')]))).toBe('[1,"a"]');
  });
});

describe('isJsonValue', () => {
  it('accepts nested JSON and rejects other values', () => {
    expect(isJsonValue({ a: [1, 'x', null, { b: true }] })).toBe(true);
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue({ a: () => 1 })).toBe(false);
  });
});
