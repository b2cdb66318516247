import type { JsonValue } from '../value.js';

/**
 * Filter definitions as authored in a function's blockchain trigger.
 *
 * Every variant may carry `apply_if`: when the gate evaluates to false the
 * guarded filter is vacuously satisfied.
 */

export const VALUE_OPERATORS = ['==', '!=', '>', '>=', '<', '<=', 'in'] as const;
export type ValueOperator = (typeof VALUE_OPERATORS)[number];

interface Gated {
  readonly apply_if?: Filter;
}

export interface ValueFilter extends Gated {
  readonly type: 'value';
  readonly field: string;
  readonly operator: ValueOperator;
  readonly value: JsonValue;
}

export interface RangeFilter extends Gated {
  readonly type: 'range';
  readonly field: string;
  readonly min?: number;
  readonly max?: number;
}

export interface PatternFilter extends Gated {
  readonly type: 'pattern';
  readonly field: string;
  readonly pattern: string;
}

export interface CompoundFilter extends Gated {
  readonly type: 'compound';
  readonly operator: 'and' | 'or';
  readonly conditions: readonly Filter[];
}

export interface ScriptFilter extends Gated {
  readonly type: 'script';
  readonly code: string;
}

export type Filter = ValueFilter | RangeFilter | PatternFilter | CompoundFilter | ScriptFilter;

/** A single filter, or a list that is implicitly and-ed. */
export type FilterSpec = Filter | readonly Filter[];
