import axios, { type AxiosInstance } from 'axios';
import { logger } from '../../config/logger.js';
import type { Environment } from '../../config/environment.js';
import { PlacesApiError, isAbortError, toErrorMessage } from '../../utils/errors.js';
import { withRetry } from '../../utils/retry.js';
import { systemClock, type Clock } from '../../utils/clock.js';
import { TokenBucketLimiter, type RateLimitPolicy, type RateLimiterState } from './RateLimiter.js';
import { parsePlacesResponse, PLACE_FIELDS, type MalformedRecord } from './placeMapper.js';
import type { Business, GeoPoint } from '../../types/business.types.js';

const HOUR_MS = 3_600_000;
/** The directory returns at most 50 results per search */
const MAX_RESULTS = 50;

export interface PlacesClientOptions {
  apiKey: string | undefined;
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs?: number;
  rateLimit: {
    perHour: number;
    policy: RateLimitPolicy;
    maxWaitMs: number;
  };
  clock?: Clock;
  /** Preconfigured axios instance (tests pass one with a stub adapter) */
  http?: AxiosInstance;
}

export interface PlacesSearchFilters {
  categoryIds?: readonly string[];
  limit?: number;
}

export interface PlacesFetchResult {
  businesses: Business[];
  malformed: MalformedRecord[];
  fetchedAt: Date;
}

/**
 * Rate-limited client for the places directory search endpoint.
 * Handles bearer auth, the token bucket, per-request timeouts, retries with
 * backoff, and maps every failure onto a typed PlacesApiError.
 */
export class PlacesClient {
  private readonly http: AxiosInstance;
  private readonly limiter: TokenBucketLimiter;
  private readonly clock: Clock;

  constructor(private readonly options: PlacesClientOptions) {
    this.clock = options.clock ?? systemClock;
    this.http = options.http ?? axios.create({ baseURL: options.baseUrl });
    this.limiter = new TokenBucketLimiter({
      capacity: options.rateLimit.perHour,
      windowMs: HOUR_MS,
      policy: options.rateLimit.policy,
      maxWaitMs: options.rateLimit.maxWaitMs,
      clock: this.clock,
    });
  }

  static fromEnvironment(env: Environment, clock?: Clock): PlacesClient {
    return new PlacesClient({
      apiKey: env.PLACES_API_KEY,
      baseUrl: env.PLACES_API_BASE_URL,
      timeoutMs: env.PLACES_REQUEST_TIMEOUT_MS,
      maxAttempts: env.PLACES_MAX_ATTEMPTS,
      retryBaseDelayMs: env.PLACES_RETRY_BASE_DELAY_MS,
      rateLimit: {
        perHour: env.PLACES_RATE_LIMIT_PER_HOUR,
        policy: env.PLACES_RATE_LIMIT_POLICY,
        maxWaitMs: env.PLACES_RATE_LIMIT_MAX_WAIT_MS,
      },
      clock,
    });
  }

  getRateLimitState(): RateLimiterState {
    return this.limiter.getState();
  }

  /**
   * Search the directory around a point. Resolves with the usable businesses
   * plus any records that had to be skipped; rejects with a PlacesApiError.
   */
  async fetch(
    location: GeoPoint,
    radiusMeters: number,
    filters: PlacesSearchFilters = {},
    signal?: AbortSignal,
  ): Promise<PlacesFetchResult> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new PlacesApiError('PLACES_API_KEY is not configured', 'unauthorized');
    }

    const params: Record<string, string | number> = {
      ll: `${location.lat},${location.lng}`,
      radius: radiusMeters,
      limit: Math.min(filters.limit ?? MAX_RESULTS, MAX_RESULTS),
      fields: PLACE_FIELDS,
    };
    if (filters.categoryIds && filters.categoryIds.length > 0) {
      params.categories = filters.categoryIds.join(',');
    }

    const body = await withRetry(
      () => this.request(apiKey, params, signal),
      '[PlacesClient] Search',
      {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.retryBaseDelayMs,
        maxDelayMs: this.options.retryMaxDelayMs ?? 30_000,
        shouldRetry: (error) => error instanceof PlacesApiError && error.retryable,
        minDelayFor: (error) => (error instanceof PlacesApiError ? error.retryAfterMs ?? 0 : 0),
        clock: this.clock,
        signal,
      },
    );

    const fetchedAt = this.clock.now();
    const { businesses, malformed } = parsePlacesResponse(body, fetchedAt);

    if (malformed.length > 0) {
      logger.warn(`[PlacesClient] Skipped ${malformed.length} malformed record(s)`);
    }
    logger.info(
      `[PlacesClient] Search at ${params.ll} (${radiusMeters}m) returned ${businesses.length} businesses`,
    );

    return { businesses, malformed, fetchedAt };
  }

  /** One attempt: take a limiter slot, call the directory, classify failures. */
  private async request(
    apiKey: string,
    params: Record<string, string | number>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    await this.limiter.acquire(signal);

    try {
      const response = await this.http.get<unknown>('/search', {
        headers: {
          Authorization: `Bearer ${apiKey}`,
          Accept: 'application/json',
        },
        params,
        timeout: this.options.timeoutMs,
        signal,
      });
      return response.data;
    } catch (error: unknown) {
      if (isAbortError(error) || axios.isCancel(error)) throw error;

      const classified = this.classify(error);
      if (classified.kind === 'rate_limited' && classified.retryAfterMs !== undefined) {
        this.limiter.pause(classified.retryAfterMs);
      }
      logger.error(`[PlacesClient] Request failed (${classified.kind}): ${classified.message}`);
      throw classified;
    }
  }

  private classify(error: unknown): PlacesApiError {
    if (error instanceof PlacesApiError) return error;

    if (!axios.isAxiosError(error)) {
      return new PlacesApiError(`Unexpected transport failure: ${toErrorMessage(error)}`, 'transient');
    }

    const response = error.response;
    if (!response) {
      // Timeouts, DNS failures, connection resets
      return new PlacesApiError(`Network error: ${error.code ?? error.message}`, 'transient');
    }

    const status = response.status;
    if (status === 401 || status === 403) {
      return new PlacesApiError(`Places API rejected credentials (${status})`, 'unauthorized', { status });
    }
    if (status === 429) {
      const header: unknown = response.headers['retry-after'];
      return new PlacesApiError('Places API rate limit exceeded', 'rate_limited', {
        status,
        retryAfterMs: this.parseRetryAfter(header),
      });
    }
    if (status >= 500 || status === 408) {
      return new PlacesApiError(`Places API unavailable (${status})`, 'transient', { status });
    }
    // Other 4xx: the request itself was refused
    return new PlacesApiError(`Places API rejected the request (${status})`, 'rejected', { status });
  }

  private parseRetryAfter(header: unknown): number | undefined {
    if (typeof header === 'number') return header * 1000;
    if (typeof header !== 'string' || header.trim() === '') return undefined;

    const seconds = Number(header);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);

    const at = Date.parse(header);
    if (Number.isNaN(at)) return undefined;
    return Math.max(0, at - this.clock.now().getTime());
  }
}
