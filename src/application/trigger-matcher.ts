import { cronMatches, evaluateFilter, getPath, stringify } from '../domain/index.js';
import type { Event, FilterDiagnostic, Value } from '../domain/index.js';
import type { CompiledFunction, CompiledTrigger } from './function-store.js';

export interface Match {
  readonly function_id: string;
  readonly version: number;
  readonly trigger_index: number;
}

export interface MatchDiagnostic {
  readonly function_id: string;
  readonly trigger_index: number;
  readonly message: string;
}

export interface MatchResult {
  readonly matches: Match[];
  readonly diagnostics: MatchDiagnostic[];
}

function payloadText(event: Event, field: string): string | undefined {
  const value: Value | undefined = getPath(event.data.payload, field);
  return value === undefined ? undefined : stringify(value);
}

function triggerApplies(compiled: CompiledTrigger, event: Event, diagnostics: FilterDiagnostic[]): boolean {
  const { trigger } = compiled;
  if (trigger.type !== event.context.trigger) return false;

  switch (trigger.type) {
    case 'blockchain': {
      const { source, event_type } = trigger.config;
      if (source !== '*' && source !== event.context.source) return false;
      if (event_type !== '*' && event_type !== event.context.event_type) return false;
      return evaluateFilter(compiled.filter, event, { diagnostics });
    }

    case 'schedule':
      return compiled.schedule !== undefined
        && cronMatches(compiled.schedule, event.context.triggered_time, trigger.config.timezone ?? 'UTC');

    case 'request': {
      const { path, methods, auth_required } = trigger.config;
      if (payloadText(event, 'path') !== path) return false;
      const method = payloadText(event, 'method')?.toUpperCase();
      if (method === undefined || !methods.some((m) => m.toUpperCase() === method)) return false;
      if (auth_required) {
        const authenticated = getPath(event.data.payload, 'authenticated');
        return authenticated?.kind === 'bool' && authenticated.value;
      }
      return true;
    }

    case 'oracle':
      return payloadText(event, 'oracle_type') === trigger.config.type;
  }
}

/**
 * Matches one event against every function.
 *
 * Synchronous and side-effect free. A multi-event function yields one match
 * per applicable sub-trigger. A function whose evaluation throws is skipped
 * and reported in `diagnostics`; the others are unaffected.
 */
export function matchEvent(event: Event, functions: readonly CompiledFunction[]): MatchResult {
  const matches: Match[] = [];
  const diagnostics: MatchDiagnostic[] = [];

  for (const fn of functions) {
    for (const compiled of fn.triggers) {
      const local: FilterDiagnostic[] = [];
      let applies = false;
      try {
        applies = triggerApplies(compiled, event, local);
      } catch (err: unknown) {
        local.push({ message: err instanceof Error ? err.message : String(err) });
      }

      for (const d of local) {
        diagnostics.push({ function_id: fn.id, trigger_index: compiled.index, message: d.message });
      }
      if (applies) {
        matches.push({ function_id: fn.id, version: fn.version, trigger_index: compiled.index });
      }
    }
  }

  return { matches, diagnostics };
}
