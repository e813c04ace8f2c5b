import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TokenBucketRateLimiter } from '../rate-limiter.js';

describe('TokenBucketRateLimiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-15T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should reject non-positive settings', () => {
    expect(() => new TokenBucketRateLimiter({ name: 'x', maxTokens: 0, refillRate: 1 })).toThrow(RangeError);
    expect(() => new TokenBucketRateLimiter({ name: 'x', maxTokens: 1, refillRate: 0 })).toThrow(RangeError);
  });

  it('should allow a burst of requestsPerMinute', () => {
    const limiter = TokenBucketRateLimiter.perMinute('audit', 60);

    for (let i = 0; i < 60; i++) {
      expect(limiter.tryAcquire()).toBe(true);
    }
    expect(limiter.tryAcquire()).toBe(false);
  });

  it('should refill at requestsPerMinute / 60 tokens per second', () => {
    const limiter = TokenBucketRateLimiter.perMinute('audit', 60);
    for (let i = 0; i < 60; i++) limiter.tryAcquire();

    vi.advanceTimersByTime(3000);

    expect([limiter.tryAcquire(), limiter.tryAcquire(), limiter.tryAcquire(), limiter.tryAcquire()]).toEqual([
      true,
      true,
      true,
      false,
    ]);
  });

  it('should never refill beyond capacity', () => {
    const limiter = TokenBucketRateLimiter.perMinute('audit', 10);

    vi.advanceTimersByTime(60_000);

    for (let i = 0; i < 10; i++) {
      expect(limiter.tryAcquire()).toBe(true);
    }
    expect(limiter.tryAcquire()).toBe(false);
  });

  it('should block acquire until a token is refilled', async () => {
    const limiter = new TokenBucketRateLimiter({ name: 'audit', maxTokens: 1, refillRate: 1 });
    limiter.tryAcquire();

    let acquired = false;
    const pending = limiter.acquire().then(() => {
      acquired = true;
    });

    await vi.advanceTimersByTimeAsync(500);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(600);
    await pending;
    expect(acquired).toBe(true);
  });
});
