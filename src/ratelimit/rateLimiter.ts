import { CapacityError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface RateLimiterOptions {
  /** Requests allowed per window. */
  limit: number;
  windowMs: number;
  /** Longest an acquire may wait before giving up with a CapacityError. */
  maxWaitMs: number;
}

/**
 * Sliding-window limiter: at most `limit` acquisitions in any `windowMs`.
 * Acquisitions are served one at a time, in call order.
 */
export class SlidingWindowLimiter {
  private readonly timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly key: string,
    private readonly options: RateLimiterOptions,
  ) {}

  acquire(): Promise<void> {
    const next = this.tail.then(() => this.take());
    // A rejected acquire must not block the ones queued behind it.
    this.tail = next.catch(() => undefined);
    return next;
  }

  /** Slots left in the current window. */
  available(now = Date.now()): number {
    this.prune(now);
    return Math.max(0, this.options.limit - this.timestamps.length);
  }

  private prune(now: number): void {
    const cutoff = now - this.options.windowMs;
    while (this.timestamps.length > 0 && (this.timestamps[0] ?? 0) <= cutoff) {
      this.timestamps.shift();
    }
  }

  private async take(): Promise<void> {
    let waited = 0;
    for (;;) {
      const now = Date.now();
      this.prune(now);
      if (this.timestamps.length < this.options.limit) {
        this.timestamps.push(now);
        return;
      }

      const oldest = this.timestamps[0] ?? now;
      const wait = oldest + this.options.windowMs - now;
      if (waited + wait > this.options.maxWaitMs) {
        throw new CapacityError(
          `Rate limit for ${this.key} exhausted`,
          { limit: this.options.limit, window_ms: this.options.windowMs },
          wait,
        );
      }

      logger.debug({ source: this.key, wait_ms: wait }, 'Rate limit reached, waiting');
      await sleep(wait);
      waited += wait;
    }
  }
}

/** One limiter per source key, created on first use. */
export class RateLimiterRegistry {
  private readonly limiters = new Map<string, SlidingWindowLimiter>();

  constructor(private readonly defaults: { windowMs: number; maxWaitMs: number }) {}

  forSource(key: string, requestsPerWindow: number): SlidingWindowLimiter {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new SlidingWindowLimiter(key, {
        limit: requestsPerWindow,
        windowMs: this.defaults.windowMs,
        maxWaitMs: this.defaults.maxWaitMs,
      });
      this.limiters.set(key, limiter);
    }
    return limiter;
  }

  acquire(key: string, requestsPerWindow: number): Promise<void> {
    return this.forSource(key, requestsPerWindow).acquire();
  }
}
