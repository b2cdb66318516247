import type { Logger } from 'pino';
import type { Event } from '../domain/index.js';
import type { FunctionStore } from './function-store.js';
import type { Registry } from './registry.js';
import type { TaskSourceService } from './task-source.js';
import { matchEvent } from './trigger-matcher.js';

export interface IngestResult {
  readonly stored: boolean;
  readonly key: string;
  /** Task ids created for this event; empty for duplicates. */
  readonly task_ids: string[];
}

export interface IngestionDeps {
  readonly registry: Registry;
  readonly store: FunctionStore;
  readonly tasks: Pick<TaskSourceService, 'enqueue'>;
  readonly log: Logger;
}

/**
 * Register → match → enqueue, in that order, for one event.
 *
 * Duplicates stop after registration. Filter diagnostics are logged and
 * count as non-matches; a failed enqueue for one match does not prevent
 * the others.
 */
export class IngestionPipeline {
  constructor(private readonly deps: IngestionDeps) {}

  async ingest(event: Event): Promise<IngestResult> {
    const { registry, store, tasks, log } = this.deps;

    const registered = await registry.registerEvent(event);
    if (!registered.stored) {
      log.debug(
        { source: event.context.source, trigger: event.context.trigger, event_id: event.data.id },
        'Duplicate event skipped',
      );
      return { stored: false, key: registered.key, task_ids: [] };
    }

    const { matches, diagnostics } = matchEvent(event, store.get());

    for (const d of diagnostics) {
      log.warn(
        { function_id: d.function_id, trigger_index: d.trigger_index, event_id: event.data.id, reason: d.message },
        'Filter evaluation failed; treated as non-match',
      );
    }

    const taskIds: string[] = [];
    for (const match of matches) {
      try {
        taskIds.push(await tasks.enqueue(match, event, registered.key));
      } catch (err: unknown) {
        log.error({ err, function_id: match.function_id, event_id: event.data.id }, 'Failed to enqueue task');
      }
    }

    log.debug(
      { event_id: event.data.id, key: registered.key, matchCount: matches.length },
      'Event ingested',
    );
    return { stored: true, key: registered.key, task_ids: taskIds };
  }
}
