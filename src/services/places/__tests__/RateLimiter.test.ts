import { describe, it, expect } from 'vitest';
import { TokenBucketLimiter } from '../RateLimiter.js';
import { PlacesApiError } from '../../../utils/errors.js';
import { FakeClock } from '../../../test/fakes.js';

const HOUR_MS = 3_600_000;

describe('TokenBucketLimiter', () => {
  it('never lets more than the capacity through inside one window', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketLimiter({ capacity: 5, windowMs: HOUR_MS, policy: 'fail_fast', maxWaitMs: 0, clock });

    let granted = 0;
    let refused = 0;
    for (let i = 0; i < 8; i++) {
      try {
        await limiter.acquire();
        granted++;
      } catch (error: unknown) {
        expect(error).toBeInstanceOf(PlacesApiError);
        refused++;
      }
    }

    expect(granted).toBe(5);
    expect(refused).toBe(3);
    expect(clock.sleeps).toEqual([]);
  });

  it('fails fast with a local, non-retryable error', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketLimiter({ capacity: 1, windowMs: HOUR_MS, policy: 'fail_fast', maxWaitMs: 0, clock });
    await limiter.acquire();

    const error = await limiter.acquire().catch((e: unknown) => e);
    if (!(error instanceof PlacesApiError)) throw new Error('expected a PlacesApiError');
    expect(error.kind).toBe('rate_limited');
    expect(error.local).toBe(true);
    expect(error.retryable).toBe(false);
  });

  it('waits for the next token when the wait fits the bound', async () => {
    const clock = new FakeClock();
    // Two tokens per 2048 ms: one token every 1024 ms
    const limiter = new TokenBucketLimiter({ capacity: 2, windowMs: 2048, policy: 'wait', maxWaitMs: 5_000, clock });
    await limiter.acquire();
    await limiter.acquire();

    await limiter.acquire();

    expect(clock.sleeps).toEqual([1024]);
  });

  it('refuses to wait longer than the bound', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketLimiter({ capacity: 2, windowMs: HOUR_MS, policy: 'wait', maxWaitMs: 30_000, clock });
    await limiter.acquire();
    await limiter.acquire();

    await expect(limiter.acquire()).rejects.toMatchObject({ kind: 'rate_limited', local: true });
    expect(clock.sleeps).toEqual([]);
  });

  it('refills over time', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketLimiter({ capacity: 4, windowMs: 4096, policy: 'fail_fast', maxWaitMs: 0, clock });
    for (let i = 0; i < 4; i++) await limiter.acquire();
    expect(limiter.getState().availableTokens).toBe(0);

    clock.advance(2048);
    expect(limiter.getState().availableTokens).toBe(2);
  });

  it('holds requests while paused by the directory', async () => {
    const clock = new FakeClock();
    const limiter = new TokenBucketLimiter({ capacity: 10, windowMs: HOUR_MS, policy: 'wait', maxWaitMs: 10_000, clock });
    limiter.pause(3_000);
    expect(limiter.getState().pausedUntil).toEqual(new Date(clock.now().getTime() + 3_000));

    await limiter.acquire();
    expect(clock.sleeps).toEqual([3_000]);
    expect(limiter.getState().pausedUntil).toBeNull();
  });
});
