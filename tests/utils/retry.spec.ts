import { describe, expect, it, vi } from 'vitest';
import { withRetry } from '../../src/utils/retry.js';
import { EvidenceRetrievalError } from '../../src/utils/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

describe('withRetry', () => {
  it('returns success immediately when the operation succeeds on first attempt', async () => {
    const fn = vi.fn(async () => 'ok');

    const result = await withRetry(fn, { maxAttempts: 3, baseDelayMs: 0 });

    expect(result.ok).toBe(true);
    expect(result.value).toBe('ok');
    expect(result.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('retries failed operations and eventually succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('transient-failure'))
      .mockResolvedValueOnce('recovered');

    const result = await withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 0,
      backoffFactor: 2,
      label: 'retry-recovery',
    });

    expect(result.ok).toBe(true);
    expect(result.value).toBe('recovered');
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('returns a failed result with the last cause after exhausting all attempts', async () => {
    const failure = new Error('permanent-failure');
    const fn = vi.fn(async () => {
      throw failure;
    });

    const result = await withRetry(fn, { maxAttempts: 2, baseDelayMs: 0, label: 'retry-exhausted' });

    expect(result.ok).toBe(false);
    expect(result.error).toBe('permanent-failure');
    expect(result.cause).toBe(failure);
    expect(result.attempts).toBe(2);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at the first error shouldRetry rejects', async () => {
    const failure = new EvidenceRetrievalError('Backboard POST /x returned HTTP 404.', 404);
    const fn = vi.fn(async () => {
      throw failure;
    });

    const result = await withRetry(fn, {
      maxAttempts: 5,
      baseDelayMs: 0,
      shouldRetry: (error) => !(error instanceof EvidenceRetrievalError && error.status === 404),
    });

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.cause).toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('treats maxAttempts below one as a single attempt', async () => {
    const fn = vi.fn(async () => {
      throw new Error('nope');
    });

    const result = await withRetry(fn, { maxAttempts: 0, baseDelayMs: 0 });

    expect(result.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
