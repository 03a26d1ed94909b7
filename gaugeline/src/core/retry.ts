/**
 * Retry policy as a pure decision function, kept apart from the I/O it guards.
 */
import { classifyError, errorMessage, type ErrorKind } from './errors.js';
import { sleep as defaultSleep } from './rate-limiter.js';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'abort' };

export const DEFAULT_RETRY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30000,
};

/**
 * Decide what to do after `attempt` (1-based) failed with an error of `kind`.
 */
export function decideRetry(
  attempt: number,
  kind: ErrorKind,
  policy: RetryPolicy = DEFAULT_RETRY
): RetryDecision {
  if (kind === 'permanent' || attempt >= policy.maxAttempts) {
    return { action: 'abort' };
  }
  const delayMs = Math.min(
    policy.baseDelayMs * Math.pow(2, attempt - 1),
    policy.maxDelayMs
  );
  return { action: 'retry', delayMs };
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

/**
 * Run `operation` until it succeeds or decideRetry() says to stop.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY,
  hooks: RetryHooks = {}
): Promise<RetryResult<T>> {
  const wait = hooks.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (err) {
      const decision = decideRetry(attempt, classifyError(err), policy);
      if (decision.action === 'abort') {
        throw err;
      }

      if (hooks.onRetry) {
        hooks.onRetry({ attempt, delayMs: decision.delayMs, error: err });
      } else {
        console.warn(
          `Request failed (attempt ${attempt}/${policy.maxAttempts}): ${errorMessage(err)}. Retrying in ${decision.delayMs}ms...`
        );
      }
      await wait(decision.delayMs);
    }
  }
}
