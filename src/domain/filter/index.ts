export type {
  Filter,
  FilterSpec,
  ValueFilter,
  RangeFilter,
  PatternFilter,
  CompoundFilter,
  ScriptFilter,
  ValueOperator,
} from './types.js';
export { VALUE_OPERATORS } from './types.js';
export { compileFilter, ALWAYS } from './compile.js';
export type { CompiledFilter } from './compile.js';
export { evaluateFilter, applyOperator, valueEquals } from './evaluate.js';
export type { FilterDiagnostic, EvaluateOptions } from './evaluate.js';
export { parseScript, runScript, DEFAULT_STEP_BUDGET } from './script.js';
export type { ScriptProgram, ScriptValue } from './script.js';
