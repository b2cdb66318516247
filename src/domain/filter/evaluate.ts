import { FilterEvaluationError } from '../errors.js';
import type { Event } from '../event.js';
import { getPath, stringify, toJson, entryOf } from '../value.js';
import type { JsonValue, Value } from '../value.js';
import type { CompiledFilter } from './compile.js';
import { isTruthy, runScript } from './script.js';
import type { ScriptValue } from './script.js';
import type { ValueOperator } from './types.js';

export interface FilterDiagnostic {
  readonly message: string;
}

export interface EvaluateOptions {
  /** Collects script failures; each one also counts as a non-match. */
  readonly diagnostics?: FilterDiagnostic[];
  readonly stepBudget?: number;
}

const NUMERIC_RE = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_RE = /^-?\d+$/;

/** Integers outside the safe range stay exact as `bigint`. */
type Numeric = number | bigint;

function numericOfText(text: string): Numeric | undefined {
  const trimmed = text.trim();
  if (INTEGER_RE.test(trimmed)) {
    const n = Number(trimmed);
    return Number.isSafeInteger(n) ? n : BigInt(trimmed);
  }
  return NUMERIC_RE.test(trimmed) ? Number(trimmed) : undefined;
}

function numericOfValue(value: Value): Numeric | undefined {
  if (value.kind === 'int') return value.value;
  if (value.kind === 'string') return numericOfText(value.value);
  return undefined;
}

function numericOfJson(value: JsonValue): Numeric | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return numericOfText(value);
  return undefined;
}

// Relational operators compare bigint and number by exact value
function compareNumeric(a: Numeric, b: Numeric): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Equality between a payload value and a filter literal. */
export function valueEquals(actual: Value, expected: JsonValue): boolean {
  if (expected === null) return false;

  switch (actual.kind) {
    case 'bool':
      return typeof expected === 'boolean' && actual.value === expected;

    case 'int':
    case 'string': {
      if (actual.kind === 'int' || typeof expected === 'number') {
        const a = numericOfValue(actual);
        const b = numericOfJson(expected);
        return a !== undefined && b !== undefined && compareNumeric(a, b) === 0;
      }
      return typeof expected === 'string' && actual.value === expected;
    }

    case 'list':
      return Array.isArray(expected)
        && expected.length === actual.items.length
        && actual.items.every((item, i) => {
          const other = expected[i];
          return other !== undefined && valueEquals(item, other);
        });

    case 'map': {
      if (!isJsonObject(expected)) return false;
      const keys = Object.keys(actual.entries);
      if (keys.length !== Object.keys(expected).length) return false;
      return keys.every((key) => {
        const entry = entryOf(actual, key);
        const other = Object.hasOwn(expected, key) ? expected[key] : undefined;
        return entry !== undefined && other !== undefined && valueEquals(entry, other);
      });
    }
  }
}

/** Ordering between a payload value and a filter literal; `undefined` when incomparable. */
function compareValue(actual: Value, expected: JsonValue): number | undefined {
  if (actual.kind === 'int' || typeof expected === 'number') {
    const a = numericOfValue(actual);
    const b = numericOfJson(expected);
    if (a === undefined || b === undefined) return undefined;
    return compareNumeric(a, b);
  }
  if (actual.kind === 'string' && typeof expected === 'string') {
    const a = numericOfValue(actual);
    const b = numericOfJson(expected);
    if (a !== undefined && b !== undefined) return compareNumeric(a, b);
    return actual.value === expected ? 0 : actual.value < expected ? -1 : 1;
  }
  return undefined;
}

export function applyOperator(actual: Value, operator: ValueOperator, expected: JsonValue): boolean {
  switch (operator) {
    case '==':
      return valueEquals(actual, expected);
    case '!=':
      return !valueEquals(actual, expected);
    case 'in':
      return Array.isArray(expected) && expected.some((candidate) => valueEquals(actual, candidate));
  }

  const order = compareValue(actual, expected);
  if (order === undefined) return false;
  switch (operator) {
    case '>': return order > 0;
    case '>=': return order >= 0;
    case '<': return order < 0;
    case '<=': return order <= 0;
  }
}

function contextBindings(event: Event): ScriptValue {
  const ctx: { [key: string]: ScriptValue } = {
    trigger: event.context.trigger,
    triggered_time: event.context.triggered_time,
    source: event.context.source,
    id: event.data.id,
  };
  if (event.context.event_type !== undefined) ctx['event_type'] = event.context.event_type;
  return ctx;
}

/** A gate on a field the payload does not have lets the guarded filter apply. */
function gatePasses(gate: CompiledFilter, event: Event, options: EvaluateOptions): boolean {
  if ((gate.kind === 'value' || gate.kind === 'range' || gate.kind === 'pattern')
    && getPath(event.data.payload, gate.field) === undefined) {
    return true;
  }
  return evaluateFilter(gate, event, options);
}

/**
 * Evaluates a compiled filter against an event payload.
 *
 * Pure: never throws for data-dependent reasons. Script failures are
 * appended to `options.diagnostics` and evaluate to false.
 */
export function evaluateFilter(filter: CompiledFilter, event: Event, options: EvaluateOptions = {}): boolean {
  if (filter.kind === 'always') return true;
  if (filter.gate !== undefined && !gatePasses(filter.gate, event, options)) return true;

  const payload = event.data.payload;

  switch (filter.kind) {
    case 'value': {
      const actual = getPath(payload, filter.field);
      return actual !== undefined && applyOperator(actual, filter.operator, filter.value);
    }

    case 'range': {
      const actual = getPath(payload, filter.field);
      const n = actual === undefined ? undefined : numericOfValue(actual);
      if (n === undefined) return false;
      if (filter.min !== undefined && n < filter.min) return false;
      if (filter.max !== undefined && n > filter.max) return false;
      return true;
    }

    case 'pattern': {
      const actual = getPath(payload, filter.field);
      return actual !== undefined && filter.regex.test(stringify(actual));
    }

    case 'compound':
      if (filter.operator === 'and') {
        return filter.conditions.every((c) => evaluateFilter(c, event, options));
      }
      return filter.conditions.some((c) => evaluateFilter(c, event, options));

    case 'script':
      try {
        const result = runScript(
          filter.program,
          { event: toJson(payload), context: contextBindings(event) },
          options.stepBudget === undefined ? {} : { stepBudget: options.stepBudget },
        );
        return isTruthy(result);
      } catch (err: unknown) {
        if (!(err instanceof FilterEvaluationError)) {
          options.diagnostics?.push({ message: `Script failed: ${err instanceof Error ? err.message : String(err)}` });
          return false;
        }
        options.diagnostics?.push({ message: err.message });
        return false;
      }
  }
}
