import { FilterEvaluationError } from '../errors.js';
import type { JsonValue } from '../value.js';
import { parseScript } from './script.js';
import type { ScriptProgram } from './script.js';
import type { Filter, FilterSpec, ValueOperator } from './types.js';

/**
 * Compiled filter tree. Regexes and scripts are prepared once per
 * function version instead of on every event.
 */
export type CompiledFilter =
  | { readonly kind: 'always' }
  | {
    readonly kind: 'value';
    readonly field: string;
    readonly operator: ValueOperator;
    readonly value: JsonValue;
    readonly gate: CompiledFilter | undefined;
  }
  | {
    readonly kind: 'range';
    readonly field: string;
    readonly min: number | undefined;
    readonly max: number | undefined;
    readonly gate: CompiledFilter | undefined;
  }
  | { readonly kind: 'pattern'; readonly field: string; readonly regex: RegExp; readonly gate: CompiledFilter | undefined }
  | {
    readonly kind: 'compound';
    readonly operator: 'and' | 'or';
    readonly conditions: readonly CompiledFilter[];
    readonly gate: CompiledFilter | undefined;
  }
  | { readonly kind: 'script'; readonly program: ScriptProgram; readonly gate: CompiledFilter | undefined };

export const ALWAYS: CompiledFilter = { kind: 'always' };

function compileOne(filter: Filter, path: string): CompiledFilter {
  const gate = filter.apply_if === undefined ? undefined : compileOne(filter.apply_if, `${path}.apply_if`);

  switch (filter.type) {
    case 'value':
      if (filter.operator === 'in' && !Array.isArray(filter.value)) {
        throw new FilterEvaluationError(`${path}: operator "in" requires a list value`);
      }
      return { kind: 'value', field: filter.field, operator: filter.operator, value: filter.value, gate };

    case 'range':
      if (filter.min === undefined && filter.max === undefined) {
        throw new FilterEvaluationError(`${path}: range filter needs min or max`);
      }
      if (filter.min !== undefined && filter.max !== undefined && filter.min > filter.max) {
        throw new FilterEvaluationError(`${path}: range min ${filter.min} is greater than max ${filter.max}`);
      }
      return { kind: 'range', field: filter.field, min: filter.min, max: filter.max, gate };

    case 'pattern': {
      let regex: RegExp;
      try {
        regex = new RegExp(filter.pattern);
      } catch (err: unknown) {
        throw new FilterEvaluationError(`${path}: invalid pattern ${JSON.stringify(filter.pattern)}`, { cause: err });
      }
      return { kind: 'pattern', field: filter.field, regex, gate };
    }

    case 'compound':
      return {
        kind: 'compound',
        operator: filter.operator,
        conditions: filter.conditions.map((c, i) => compileOne(c, `${path}.conditions.${i}`)),
        gate,
      };

    case 'script': {
      let program: ScriptProgram;
      try {
        program = parseScript(filter.code);
      } catch (err: unknown) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new FilterEvaluationError(`${path}: ${reason}`, { cause: err });
      }
      return { kind: 'script', program, gate };
    }
  }
}

/**
 * Compiles a filter or filter list. A list compiles to an `and` compound;
 * no filter compiles to `ALWAYS`.
 *
 * Throws `FilterEvaluationError` for definitions that can never evaluate
 * (bad regex, script syntax error, empty range).
 */
export function compileFilter(spec: FilterSpec | undefined): CompiledFilter {
  if (spec === undefined) return ALWAYS;
  if (isFilterList(spec)) {
    if (spec.length === 0) return ALWAYS;
    return {
      kind: 'compound',
      operator: 'and',
      conditions: spec.map((f, i) => compileOne(f, `filter.${i}`)),
      gate: undefined,
    };
  }
  return compileOne(spec, 'filter');
}

function isFilterList(spec: FilterSpec): spec is readonly Filter[] {
  return Array.isArray(spec);
}
