import { SourceUnavailableError } from '../../domain/index.js';
import { sleep } from '../../application/sleep.js';

export interface RetryPolicy {
  readonly max_attempts: number;
  readonly initial_delay_ms: number;
  readonly max_delay_ms: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  max_attempts: 5,
  initial_delay_ms: 500,
  max_delay_ms: 10_000,
};

/** Exponential backoff (doubling) capped at `max_delay_ms`, with ±25% jitter. */
export function backoffDelay(retry: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const base = policy.initial_delay_ms * Math.pow(2, retry);
  const capped = Math.min(base, policy.max_delay_ms);
  const jitter = capped * 0.25 * (random() * 2 - 1);
  return Math.max(0, Math.floor(capped + jitter));
}

/**
 * Runs `operation` up to `max_attempts` times.
 *
 * When every attempt fails the last error is wrapped in a
 * `SourceUnavailableError` for `source`. Aborting `signal` stops waiting and
 * rethrows the last error as-is.
 */
export async function withRetry<T>(
  source: string,
  operation: () => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<T> {
  const attempts = Math.max(1, policy.max_attempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await operation();
    } catch (err: unknown) {
      lastError = err;
      if (signal?.aborted) throw err;
      if (attempt < attempts - 1) {
        await sleep(backoffDelay(attempt, policy), signal);
      }
    }
  }

  const reason = lastError instanceof Error ? lastError.message : String(lastError);
  throw new SourceUnavailableError(source, `gave up after ${attempts} attempts: ${reason}`, { cause: lastError });
}
