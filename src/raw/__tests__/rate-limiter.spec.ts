import { RateLimiter } from '../rate-limiter.js';
import type { RateLimiterOptions } from '../rate-limiter.js';

const buildLimiter = (overrides: Partial<RateLimiterOptions> = {}) => {
  const clock = { now: 0 };
  const limiter = new RateLimiter('bitbucket', {
    quota: 2,
    windowMs: 1000,
    baseBackoffMs: 100,
    maxBackoffMs: 1000,
    now: () => clock.now,
    random: () => 0,
    ...overrides,
  });
  return { limiter, clock };
};

describe('RateLimiter', () => {
  it('grants calls until the window budget is spent', () => {
    const { limiter } = buildLimiter();
    expect(limiter.acquire()).toBe(0);
    expect(limiter.acquire()).toBe(0);
    expect(limiter.acquire()).toBe(1000);
    expect(limiter.status().used).toBe(2);
  });

  it('frees tokens as the window slides', () => {
    const { limiter, clock } = buildLimiter();
    limiter.acquire();
    clock.now = 400;
    limiter.acquire();

    clock.now = 600;
    expect(limiter.acquire()).toBe(400);

    clock.now = 1000;
    expect(limiter.acquire()).toBe(0);
    expect(limiter.acquire()).toBe(400);
  });

  it('does not count a call that was told to wait', () => {
    const { limiter, clock } = buildLimiter({ quota: 1 });
    limiter.acquire();
    clock.now = 10;
    expect(limiter.acquire()).toBe(990);
    expect(limiter.acquire()).toBe(990);
    expect(limiter.status().used).toBe(1);
  });

  it('backs off exponentially on consecutive quota signals', () => {
    const { limiter } = buildLimiter({ random: () => 1 });
    expect(limiter.noteRateLimited()).toBe(100);
    expect(limiter.noteRateLimited()).toBe(200);
    expect(limiter.noteRateLimited()).toBe(400);
    expect(limiter.noteRateLimited()).toBe(800);
    expect(limiter.noteRateLimited()).toBe(1000);
    expect(limiter.status().consecutiveRateLimits).toBe(5);
  });

  it('applies jitter between half and all of the capped delay', () => {
    const { limiter } = buildLimiter({ random: () => 0 });
    expect(limiter.noteRateLimited()).toBe(50);

    const { limiter: mid } = buildLimiter({ random: () => 0.5 });
    expect(mid.noteRateLimited()).toBe(75);
  });

  it('honours a longer Retry-After', () => {
    const { limiter } = buildLimiter();
    expect(limiter.noteRateLimited(5000)).toBe(5000);
  });

  it('reports the larger of the token wait and the backoff wait', () => {
    const { limiter } = buildLimiter();
    limiter.acquire();
    limiter.acquire();
    expect(limiter.acquire()).toBe(1000);

    limiter.noteRateLimited(3000);
    expect(limiter.acquire()).toBe(3000);
  });

  it('blocks until the backoff expires', () => {
    const { limiter, clock } = buildLimiter();
    limiter.noteRateLimited();
    expect(limiter.acquire()).toBe(50);

    clock.now = 50;
    expect(limiter.acquire()).toBe(0);
  });

  it('resets the backoff exponent after a success', () => {
    const { limiter } = buildLimiter({ random: () => 1 });
    limiter.noteRateLimited();
    limiter.noteRateLimited();
    limiter.noteSuccess();
    expect(limiter.noteRateLimited()).toBe(100);
  });

  it('waits for the reported reset when the platform quota is exhausted', () => {
    const { limiter, clock } = buildLimiter({ quota: 100 });
    limiter.observeQuota({ remaining: 0, resetAt: 2500 });
    expect(limiter.acquire()).toBe(2500);

    clock.now = 2500;
    expect(limiter.acquire()).toBe(0);
  });

  it('ignores quota headers with budget left', () => {
    const { limiter } = buildLimiter();
    limiter.observeQuota({ remaining: 10, resetAt: 2500 });
    expect(limiter.acquire()).toBe(0);
  });

  it('rejects a non-positive quota', () => {
    expect(() => buildLimiter({ quota: 0 })).toThrow(RangeError);
  });
});
