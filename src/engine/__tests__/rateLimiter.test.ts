import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from '../rateLimiter.js';
import { RateLimitError } from '../../shared/errors.js';
import { ConfigSchema } from '../../shared/config.js';

function makeClock(start = 1_700_000_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (seconds: number) => {
      current += seconds * 1000;
    },
  };
}

function makeLimiter(overrides: Partial<ConstructorParameters<typeof RateLimiter>[0]> = {}) {
  const clock = makeClock();
  const sleep = vi.fn(async (ms: number) => {
    clock.advance(ms / 1000);
  });
  const limiter = new RateLimiter({
    requestsPerMinute: 3,
    maxRetries: 4,
    backoffBase: 2.0,
    now: clock.now,
    sleep,
    ...overrides,
  });
  return { limiter, clock, sleep };
}

describe('RateLimiter.checkRateLimit', () => {
  it('admits exactly N requests per window, then asks to wait', () => {
    const { limiter } = makeLimiter();

    for (let i = 0; i < 3; i++) {
      expect(limiter.checkRateLimit('api')).toBe(0);
      limiter.recordRequest('api');
    }

    expect(limiter.checkRateLimit('api')).toBeGreaterThan(0);
  });

  it('returns the remaining window time', () => {
    const { limiter, clock } = makeLimiter();
    for (let i = 0; i < 3; i++) limiter.recordRequest('api');

    clock.advance(20);
    expect(limiter.checkRateLimit('api')).toBe(40);
  });

  it('admits again once the window has elapsed', () => {
    const { limiter, clock } = makeLimiter();
    for (let i = 0; i < 3; i++) limiter.recordRequest('api');
    expect(limiter.checkRateLimit('api')).toBeGreaterThan(0);

    clock.advance(61);
    expect(limiter.checkRateLimit('api')).toBe(0);
    expect(limiter.getStats('api').requestsMade).toBe(0);
  });

  it('keeps keys independent', () => {
    const { limiter } = makeLimiter();
    for (let i = 0; i < 3; i++) limiter.recordRequest('api');

    expect(limiter.checkRateLimit('api')).toBeGreaterThan(0);
    expect(limiter.checkRateLimit('feed')).toBe(0);
  });
});

describe('RateLimiter.recordFailure', () => {
  it('returns base^k backoff for k = 1..4', () => {
    const { limiter } = makeLimiter();
    expect([1, 2, 3, 4].map(() => limiter.recordFailure('api'))).toEqual([2, 4, 8, 16]);
  });

  it('throws RateLimitError naming the key beyond max retries', () => {
    const { limiter } = makeLimiter();
    for (let i = 0; i < 4; i++) limiter.recordFailure('api');

    let caught: unknown;
    try {
      limiter.recordFailure('api');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RateLimitError);
    if (caught instanceof RateLimitError) {
      expect(caught.sourceKey).toBe('api');
      expect(caught.message).toBe('Max retries (4) exceeded for api');
    }
  });

  it('recordSuccess forgives the failure streak', () => {
    const { limiter } = makeLimiter();
    limiter.recordFailure('api');
    limiter.recordFailure('api');
    limiter.recordSuccess('api');

    expect(limiter.getStats('api').retryCount).toBe(0);
    expect(limiter.recordFailure('api')).toBe(2);
  });
});

describe('RateLimiter.acquire', () => {
  it('takes a slot without waiting while under the limit', async () => {
    const { limiter, sleep } = makeLimiter();
    await limiter.acquire('api');

    expect(sleep).not.toHaveBeenCalled();
    expect(limiter.getStats('api').requestsMade).toBe(1);
  });

  it('sleeps out the window when full, then admits', async () => {
    const { limiter, sleep, clock } = makeLimiter();
    for (let i = 0; i < 3; i++) await limiter.acquire('api');

    clock.advance(15);
    await limiter.acquire('api');

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(45_000);
    expect(limiter.getStats('api').requestsMade).toBe(1);
  });

  it('never admits more than the window allows to concurrent callers', async () => {
    const { limiter } = makeLimiter({ sleep: () => new Promise(() => undefined) });

    const callers = Array.from({ length: 5 }, () => limiter.acquire('shared'));
    await Promise.resolve();

    expect(limiter.getStats('shared').requestsMade).toBe(3);
    expect(callers).toHaveLength(5);
  });
});

describe('RateLimiter.waitIfNeeded', () => {
  it('does not sleep when admitted', async () => {
    const { limiter, sleep } = makeLimiter();
    await limiter.waitIfNeeded('api');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sleeps for the remaining window', async () => {
    const { limiter, sleep } = makeLimiter();
    for (let i = 0; i < 3; i++) limiter.recordRequest('api');

    await limiter.waitIfNeeded('api');
    expect(sleep).toHaveBeenCalledWith(60_000);
  });
});

describe('RateLimiter.fromConfig', () => {
  it('reads the rate_limit section', () => {
    const config = ConfigSchema.parse({ rate_limit: { requests_per_minute: 10 } });
    const limiter = RateLimiter.fromConfig(config.rate_limit);

    expect(limiter.requestsPerMinute).toBe(10);
    expect(limiter.maxRetries).toBe(5);
    expect(limiter.backoffBase).toBe(2);
  });
});
