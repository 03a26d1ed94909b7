/**
 * Unit tests for the retry decision function and retry runner.
 */
import { describe, it, expect, vi } from 'vitest';
import { decideRetry, withRetry, type RetryPolicy } from '../retry.js';
import { PermanentError, TransientError } from '../errors.js';

const POLICY: RetryPolicy = { maxAttempts: 4, baseDelayMs: 100, maxDelayMs: 250 };
const noSleep = (_ms: number) => Promise.resolve();

// ============================================================================
// decideRetry
// ============================================================================

describe('decideRetry', () => {
  it('backs off exponentially for transient errors', () => {
    expect(decideRetry(1, 'transient', POLICY)).toEqual({ action: 'retry', delayMs: 100 });
    expect(decideRetry(2, 'transient', POLICY)).toEqual({ action: 'retry', delayMs: 200 });
  });

  it('caps the delay at maxDelayMs', () => {
    expect(decideRetry(3, 'transient', POLICY)).toEqual({ action: 'retry', delayMs: 250 });
  });

  it('aborts once maxAttempts attempts were made', () => {
    expect(decideRetry(4, 'transient', POLICY)).toEqual({ action: 'abort' });
  });

  it('never retries permanent errors', () => {
    expect(decideRetry(1, 'permanent', POLICY)).toEqual({ action: 'abort' });
  });

  it('does not retry when only one attempt is allowed', () => {
    expect(decideRetry(1, 'transient', { ...POLICY, maxAttempts: 1 })).toEqual({ action: 'abort' });
  });
});

// ============================================================================
// withRetry
// ============================================================================

describe('withRetry', () => {
  it('succeeds on the third attempt after two transient failures', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('HTTP 503: busy', 'https://example.com', 503))
      .mockRejectedValueOnce(new TransientError('HTTP 502: bad gateway', 'https://example.com', 502))
      .mockResolvedValueOnce('ok');
    const sleep = vi.fn(noSleep);

    const result = await withRetry(operation, POLICY, { sleep, onRetry: () => {} });

    expect(result).toEqual({ value: 'ok', attempts: 3 });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200]);
  });

  it('rethrows a permanent error without retrying', async () => {
    const error = new PermanentError('HTTP 400: bad site', 'https://example.com', 400);
    const operation = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(operation, POLICY, { sleep: noSleep })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxAttempts transient failures', async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new TransientError('HTTP 500: down', 'https://example.com', 500));
    const onRetry = vi.fn();

    await expect(withRetry(operation, POLICY, { sleep: noSleep, onRetry })).rejects.toThrow('HTTP 500: down');
    expect(operation).toHaveBeenCalledTimes(4);
    expect(onRetry).toHaveBeenCalledTimes(3);
  });

  it('passes the attempt number to the operation', async () => {
    const seen: number[] = [];
    await withRetry(
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 2) throw new TransientError('timeout', 'https://example.com');
        return attempt;
      },
      POLICY,
      { sleep: noSleep, onRetry: () => {} }
    );
    expect(seen).toEqual([1, 2]);
  });
});
