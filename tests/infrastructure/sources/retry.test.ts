import { describe, it, expect, vi } from 'vitest';
import { SourceUnavailableError } from '../../../src/domain/index.js';
import { backoffDelay, withRetry } from '../../../src/infrastructure/sources/retry.js';

const FAST = { max_attempts: 3, initial_delay_ms: 0, max_delay_ms: 0 };

describe('backoffDelay', () => {
  const policy = { max_attempts: 5, initial_delay_ms: 100, max_delay_ms: 1_000 };

  it('doubles per retry with jitter of a quarter either way', () => {
    expect(backoffDelay(0, policy, () => 0.5)).toBe(100);
    expect(backoffDelay(2, policy, () => 0.5)).toBe(400);
    expect(backoffDelay(2, policy, () => 1)).toBe(500);
    expect(backoffDelay(2, policy, () => 0)).toBe(300);
  });

  it('caps at max_delay_ms before jitter', () => {
    expect(backoffDelay(5, policy, () => 0)).toBe(750);
  });
});

describe('withRetry', () => {
  it('returns once an attempt succeeds', async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(42);

    await expect(withRetry('neo', operation, FAST)).resolves.toBe(42);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('wraps the last error after the final attempt', async () => {
    const operation = vi.fn().mockRejectedValue(new Error('nope'));

    const err = await withRetry('neo', operation, FAST).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    expect(err instanceof Error && err.message).toBe('Source neo unavailable: gave up after 3 attempts: nope');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('rethrows as-is once aborted', async () => {
    const ac = new AbortController();
    const failure = new Error('aborted mid-flight');
    const operation = vi.fn(async () => {
      ac.abort();
      throw failure;
    });

    await expect(withRetry('neo', operation, FAST, ac.signal)).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });
});
