import { logger } from '../../config/logger.js';
import { PlacesApiError } from '../../utils/errors.js';
import { systemClock, type Clock } from '../../utils/clock.js';

export type RateLimitPolicy = 'wait' | 'fail_fast';

export interface RateLimiterOptions {
  /** Requests allowed per window */
  capacity: number;
  windowMs: number;
  policy: RateLimitPolicy;
  /** Longest a caller may block before getting RateLimited instead */
  maxWaitMs: number;
  clock?: Clock;
}

export interface RateLimiterState {
  availableTokens: number;
  capacity: number;
  pausedUntil: Date | null;
}

/**
 * Token bucket sized to the directory quota. Tokens refill continuously;
 * a caller that finds the bucket empty waits for the next token (bounded by
 * maxWaitMs) or fails fast, depending on policy.
 */
export class TokenBucketLimiter {
  private readonly clock: Clock;
  private readonly refillPerMs: number;
  private tokens: number;
  private lastRefill: number;
  private pausedUntil = 0;

  constructor(private readonly options: RateLimiterOptions) {
    this.clock = options.clock ?? systemClock;
    this.refillPerMs = options.capacity / options.windowMs;
    this.tokens = options.capacity;
    this.lastRefill = this.clock.now().getTime();
  }

  /**
   * Take one token, waiting for it if the policy allows.
   * Throws a local `rate_limited` PlacesApiError when the wait would exceed the bound.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.clock.now().getTime();
    this.refill(now);

    const pauseWait = Math.max(0, this.pausedUntil - now);
    const tokenWait = this.tokens >= 1 ? 0 : Math.ceil((1 - this.tokens) / this.refillPerMs);
    const wait = Math.max(pauseWait, tokenWait);

    if (wait > 0 && (this.options.policy === 'fail_fast' || wait > this.options.maxWaitMs)) {
      throw new PlacesApiError(
        `Places rate limit reached, next slot in ${wait}ms`,
        'rate_limited',
        { retryAfterMs: wait, local: true },
      );
    }

    // Reserve the token now so concurrent callers queue behind this one
    this.tokens -= 1;

    if (wait === 0) return;

    logger.debug(`[RateLimiter] Waiting ${wait}ms for a request slot`);
    try {
      await this.clock.sleep(wait, signal);
    } catch (error: unknown) {
      this.tokens += 1;
      throw error;
    }
  }

  /** Hold all requests until the directory's Retry-After has passed. */
  pause(ms: number): void {
    const until = this.clock.now().getTime() + ms;
    this.pausedUntil = Math.max(this.pausedUntil, until);
  }

  getState(): RateLimiterState {
    const now = this.clock.now().getTime();
    this.refill(now);
    return {
      availableTokens: Math.max(0, Math.floor(this.tokens)),
      capacity: this.options.capacity,
      pausedUntil: this.pausedUntil > now ? new Date(this.pausedUntil) : null,
    };
  }

  private refill(now: number): void {
    const elapsed = now - this.lastRefill;
    if (elapsed <= 0) return;
    this.tokens = Math.min(this.options.capacity, this.tokens + elapsed * this.refillPerMs);
    this.lastRefill = now;
  }
}
