import type { Logger } from 'pino';
import { SourceUnavailableError } from '../domain/index.js';
import type { Event, SourceAdapter } from '../domain/index.js';
import type { Registry, SourceState } from './registry.js';
import { sleep } from './sleep.js';

export interface SourceRunnerOptions {
  /** Delay before restarting an adapter that failed. */
  readonly restartDelayMs: number;
}

export const DEFAULT_SOURCE_RUNNER_OPTIONS: SourceRunnerOptions = {
  restartDelayMs: 5_000,
};

export interface SourceRunnerDeps {
  readonly registry: Registry;
  readonly ingest: (event: Event) => Promise<unknown>;
  readonly log: Logger;
}

/**
 * Drives one adapter into ingestion until `signal` aborts or the adapter
 * finishes.
 *
 * Events are ingested one at a time in emission order. A failure to ingest
 * one event is logged and the loop moves on; a failure of the adapter
 * itself is reported to the registry as source status and the adapter is
 * restarted after `restartDelayMs`. Nothing here affects other sources.
 */
export async function runSource(
  adapter: SourceAdapter,
  deps: SourceRunnerDeps,
  signal: AbortSignal,
  options: Partial<SourceRunnerOptions> = {},
): Promise<void> {
  const { restartDelayMs } = { ...DEFAULT_SOURCE_RUNNER_OPTIONS, ...options };
  const log = deps.log.child({ source: adapter.name, kind: adapter.kind });
  let emitted = 0;

  const report = async (state: SourceState, lastError?: string): Promise<void> => {
    try {
      await deps.registry.setSourceStatus({
        name: adapter.name,
        kind: adapter.kind,
        state,
        emitted,
        last_error: lastError,
      });
    } catch (err: unknown) {
      log.error({ err, state }, 'Failed to record source status');
    }
  };

  while (!signal.aborted) {
    await report('running');
    log.info('Source started');

    try {
      for await (const event of adapter.poll(signal)) {
        if (signal.aborted) break;
        try {
          await deps.ingest(event);
          emitted++;
        } catch (err: unknown) {
          log.error({ err, event_id: event.data.id }, 'Failed to ingest event');
        }
      }

      if (signal.aborted) break;
      await report('completed');
      log.info({ emitted }, 'Source completed');
      return;
    } catch (err: unknown) {
      if (signal.aborted) break;

      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof SourceUnavailableError) {
        log.error({ err }, 'Source unavailable; restarting after delay');
      } else {
        log.error({ err }, 'Source failed; restarting after delay');
      }
      await report('unavailable', message);
      await sleep(restartDelayMs, signal);
    }
  }

  await report('stopped');
  log.info({ emitted }, 'Source stopped');
}
