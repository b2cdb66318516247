import type { Logger } from 'pino';
import { compileFilter, parseCron, triggersOf, ALWAYS } from '../domain/index.js';
import type { CompiledFilter, CronSchedule, FunctionMetadata, ResourceLimits, SingleTrigger } from '../domain/index.js';
import type { FunctionChange, Registry } from './registry.js';

export interface CompiledTrigger {
  readonly index: number;
  readonly trigger: SingleTrigger;
  readonly filter: CompiledFilter;
  readonly schedule: CronSchedule | undefined;
}

/** Matcher-ready form of one function version. */
export interface CompiledFunction {
  readonly id: string;
  readonly version: number;
  readonly resources: ResourceLimits;
  readonly triggers: readonly CompiledTrigger[];
}

/** Prepares filters and cron schedules once per function version. */
export function compileFunction(metadata: FunctionMetadata): CompiledFunction {
  const triggers = triggersOf(metadata.trigger).map((trigger, index): CompiledTrigger => {
    switch (trigger.type) {
      case 'blockchain':
        return { index, trigger, filter: compileFilter(trigger.config.filter), schedule: undefined };
      case 'schedule':
        return { index, trigger, filter: ALWAYS, schedule: parseCron(trigger.config.cron) };
      default:
        return { index, trigger, filter: ALWAYS, schedule: undefined };
    }
  });

  return { id: metadata.id, version: metadata.version, resources: metadata.resources, triggers };
}

/**
 * In-memory snapshot of compiled functions used on the ingestion path.
 *
 * `get()` is synchronous and always returns a complete snapshot; changes
 * swap in a new array rather than mutating the current one.
 */
export class FunctionStore {
  private functions: readonly CompiledFunction[];

  constructor(initial: readonly CompiledFunction[] = []) {
    this.functions = initial;
  }

  /** Returns the current snapshot. O(1), no copy. */
  get(): readonly CompiledFunction[] {
    return this.functions;
  }

  /** Atomically replaces the snapshot. */
  set(next: readonly CompiledFunction[]): void {
    this.functions = next;
  }

  versionOf(functionId: string): number | undefined {
    return this.functions.find((f) => f.id === functionId)?.version;
  }

  resourcesOf(functionId: string): ResourceLimits | undefined {
    return this.functions.find((f) => f.id === functionId)?.resources;
  }

  upsert(compiled: CompiledFunction): void {
    const index = this.functions.findIndex((f) => f.id === compiled.id);
    if (index === -1) {
      this.functions = [...this.functions, compiled];
      return;
    }
    const existing = this.functions[index];
    // An out-of-order notification must not roll a function back
    if (existing !== undefined && existing.version > compiled.version) return;
    this.functions = this.functions.map((f, i) => (i === index ? compiled : f));
  }

  remove(functionId: string): void {
    this.functions = this.functions.filter((f) => f.id !== functionId);
  }

  /** Reloads every function from the registry. Functions that fail to compile are skipped. */
  async reload(registry: Registry, log: Logger): Promise<void> {
    const all = await registry.listAllFunctions();
    const compiled: CompiledFunction[] = [];

    for (const metadata of all) {
      try {
        compiled.push(compileFunction(metadata));
      } catch (err: unknown) {
        log.error({ err, function_id: metadata.id }, 'Failed to compile function; skipping');
      }
    }

    this.set(compiled);
    log.info({ functionCount: compiled.length }, 'Functions loaded');
  }

  /** Applies registry change notifications to the snapshot. Returns an unsubscribe handle. */
  attach(registry: Registry, log: Logger): () => void {
    return registry.subscribe((change: FunctionChange) => {
      if (change.reason === 'delete' || change.metadata === undefined) {
        this.remove(change.function_id);
        log.info({ function_id: change.function_id }, 'Function removed from matcher');
        return;
      }

      try {
        this.upsert(compileFunction(change.metadata));
        log.info(
          { function_id: change.function_id, version: change.metadata.version, reason: change.reason },
          'Function loaded into matcher',
        );
      } catch (err: unknown) {
        this.remove(change.function_id);
        log.error({ err, function_id: change.function_id }, 'Failed to compile function; removed from matcher');
      }
    });
  }
}
