/**
 * Request throttling shared by every concurrent caller of a run.
 */

export interface RateLimiter {
  /** Resolves when the caller may issue its next request. */
  acquire(): Promise<void>;
}

export interface IntervalRateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces requests at least `minIntervalMs` apart across all callers.
 *
 * Each acquire() reserves the next free slot before it awaits, so two callers
 * can never be handed the same slot.
 */
export class IntervalRateLimiter implements RateLimiter {
  private nextSlot = 0;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    readonly minIntervalMs: number,
    options: IntervalRateLimiterOptions = {}
  ) {
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be >= 0, got ${minIntervalMs}`);
    }
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const wait = slot - now;
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}

export const unlimitedRateLimiter: RateLimiter = {
  acquire: () => Promise.resolve(),
};
