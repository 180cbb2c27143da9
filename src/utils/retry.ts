import { logger } from '../config/logger.js';
import { toErrorMessage } from './errors.js';
import { backoffDelay } from './delay.js';
import { systemClock, type Clock } from './clock.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
  /** Return false to give up immediately on this error */
  shouldRetry: (error: unknown) => boolean;
  /** Minimum wait the failed call asked for (e.g. a Retry-After header) */
  minDelayFor: (error: unknown) => number;
  clock: Clock;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterMs: 250,
  shouldRetry: () => true,
  minDelayFor: () => 0,
  clock: systemClock,
};

/**
 * Retry a function with exponential backoff and jitter.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  label: string,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      lastError = error;
      if (attempt === opts.maxAttempts || !opts.shouldRetry(error) || opts.signal?.aborted) break;

      const delay = Math.min(
        Math.max(
          backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.backoffMultiplier, opts.jitterMs),
          opts.minDelayFor(error),
        ),
        opts.maxDelayMs,
      );

      logger.warn(`${label} attempt ${attempt}/${opts.maxAttempts} failed: ${toErrorMessage(error)}. Retrying in ${delay}ms`);
      await opts.clock.sleep(delay, opts.signal);
    }
  }

  throw lastError;
}
