import { describe, it, expect } from 'vitest';
import { FilterEvaluationError, parseScript, runScript } from '../../src/domain/index.js';
import type { ScriptValue } from '../../src/domain/index.js';

function run(code: string, bindings: Record<string, ScriptValue> = {}, stepBudget?: number): ScriptValue {
  return runScript(parseScript(code), bindings, stepBudget === undefined ? {} : { stepBudget });
}

describe('runScript', () => {
  it('returns the last expression when there is no return', () => {
    expect(run('const a = 2; const b = 3; a * b + 1')).toBe(7);
  });

  it('follows if/else branches', () => {
    const code = "if (event.kind === 'mint') { return 'new'; } else if (event.amount >= 10) return 'big'; else return 'small'";
    expect(run(code, { event: { kind: 'mint', amount: 1 } })).toBe('new');
    expect(run(code, { event: { kind: 'transfer', amount: 10 } })).toBe('big');
    expect(run(code, { event: { kind: 'transfer', amount: 9 } })).toBe('small');
  });

  it('uses strict equality for ==', () => {
    expect(run("1 == '1'")).toBe(false);
    expect(run('1 == 1')).toBe(true);
  });

  it('evaluates ternaries, nullish coalescing and typeof', () => {
    expect(run('event.fee ?? 5', { event: {} })).toBe(5);
    expect(run("typeof event.fee === 'undefined' ? 'none' : 'some'", { event: {} })).toBe('none');
  });

  it('exposes whitelisted globals and string/array methods', () => {
    expect(run('Math.max(1, 5, 3)')).toBe(5);
    expect(run("'Transfer'.startsWith('Trans')")).toBe(true);
    expect(run('[1, 2, 3].includes(2)')).toBe(true);
    expect(run("parseInt('42abc')")).toBe(42);
    expect(run('tags.length', { tags: ['a', 'b'] })).toBe(2);
  });

  it('scopes block declarations', () => {
    expect(run('const a = 1; if (true) { const a = 2; } a')).toBe(1);
  });
});

describe('runScript errors', () => {
  it('rejects unsupported statements at parse time', () => {
    expect(() => parseScript('while (true) {}')).toThrow("'while' is not supported");
    expect(() => parseScript('x = 1')).toThrow('assignment is not supported');
    expect(() => parseScript('const f = (a) => a')).toThrow('arrow functions are not supported');
    expect(() => parseScript("'open")).toThrow('unterminated string');
  });

  it('rejects unknown identifiers and redeclarations', () => {
    expect(() => run('process.exit(1)')).toThrow('process is not defined');
    expect(() => run('const a = 1; const a = 2')).toThrow("'a' has already been declared");
  });

  it('only calls builtins', () => {
    expect(() => run('event.name()', { event: { name: 'x' } })).toThrow('value is not a function');
  });

  it('enforces the step budget', () => {
    expect(() => run('1 + 1', {}, 3)).toThrow(FilterEvaluationError);
    expect(run('1 + 1', {}, 4)).toBe(2);
  });
});
