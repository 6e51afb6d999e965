import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limit.js';

describe('RateLimiter', () => {
  it('should allow bursts up to the bucket size', () => {
    const limiter = new RateLimiter(2, 60, () => 0);

    expect(limiter.tryConsume('client:a')).toEqual({ allowed: true, remaining: 1 });
    expect(limiter.tryConsume('client:a')).toEqual({ allowed: true, remaining: 0 });
    expect(limiter.tryConsume('client:a')).toEqual({ allowed: false, retryAfter: 1, remaining: 0 });
  });

  it('should keep separate buckets per key', () => {
    const limiter = new RateLimiter(1, 60, () => 0);

    expect(limiter.tryConsume('client:a').allowed).toBe(true);
    expect(limiter.tryConsume('client:b').allowed).toBe(true);
    expect(limiter.tryConsume('client:a').allowed).toBe(false);
  });

  it('should refill over time without exceeding the bucket size', () => {
    let now = 0;
    const limiter = new RateLimiter(2, 60, () => now);
    limiter.tryConsume('ip:1');
    limiter.tryConsume('ip:1');

    now = 1000;
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 0 });

    now = 600_000;
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 1 });
  });

  it('should round the retry delay up to whole seconds', () => {
    const limiter = new RateLimiter(1, 7, () => 0);
    limiter.tryConsume('ip:1');

    expect(limiter.tryConsume('ip:1').retryAfter).toBe(9);
  });

  it('should forget clients whose buckets have refilled', () => {
    let now = 0;
    const limiter = new RateLimiter(2, 60, () => now);
    limiter.tryConsume('ip:1');
    limiter.tryConsume('ip:2');
    expect(limiter.size).toBe(2);

    now = 120_000;
    limiter.tryConsume('ip:3');

    expect(limiter.size).toBe(1);
  });

  it('should keep clients that are still refilling', () => {
    let now = 0;
    const limiter = new RateLimiter(2, 1, () => now);
    limiter.tryConsume('ip:1');
    limiter.tryConsume('ip:1');

    now = 60_000;
    limiter.tryConsume('ip:2');

    expect(limiter.size).toBe(2);
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 0 });
  });
});
