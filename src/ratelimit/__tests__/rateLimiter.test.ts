import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SlidingWindowLimiter, RateLimiterRegistry } from '../rateLimiter.js';
import { CapacityError } from '../../shared/errors.js';

describe('SlidingWindowLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('grants up to the limit immediately', async () => {
    const limiter = new SlidingWindowLimiter('dane_ipc', { limit: 3, windowMs: 60_000, maxWaitMs: 60_000 });
    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.available()).toBe(0);
  });

  it('waits for the oldest slot to leave the window', async () => {
    const limiter = new SlidingWindowLimiter('dane_ipc', { limit: 2, windowMs: 60_000, maxWaitMs: 60_000 });
    await limiter.acquire();
    vi.advanceTimersByTime(10_000);
    await limiter.acquire();

    let granted = false;
    const third = limiter.acquire().then(() => {
      granted = true;
    });

    await vi.advanceTimersByTimeAsync(49_999);
    expect(granted).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await third;
    expect(granted).toBe(true);
  });

  it('throws CapacityError when the wait would exceed the maximum', async () => {
    const limiter = new SlidingWindowLimiter('slow', { limit: 1, windowMs: 60_000, maxWaitMs: 5_000 });
    await limiter.acquire();

    const err = await limiter.acquire().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CapacityError);
    expect(err instanceof CapacityError ? err.retryAfterMs : undefined).toBe(60_000);
  });

  it('keeps serving after a rejected acquire', async () => {
    const limiter = new SlidingWindowLimiter('slow', { limit: 1, windowMs: 1_000, maxWaitMs: 0 });
    await limiter.acquire();
    await expect(limiter.acquire()).rejects.toBeInstanceOf(CapacityError);

    vi.advanceTimersByTime(1_000);
    await expect(limiter.acquire()).resolves.toBeUndefined();
  });
});

describe('RateLimiterRegistry', () => {
  it('keeps one limiter per source', () => {
    const registry = new RateLimiterRegistry({ windowMs: 60_000, maxWaitMs: 1_000 });
    expect(registry.forSource('a', 10)).toBe(registry.forSource('a', 10));
    expect(registry.forSource('a', 10)).not.toBe(registry.forSource('b', 10));
  });
});
