import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { sendError } from '../utils/response.js';

interface RateLimitBucket {
  count: number;
  resetAt: number;
}

export interface ApiRateLimitOptions {
  windowMs?: number;
  maxRequests?: number;
  now?: () => number;
}

/**
 * In-memory per-IP limiter for the HTTP API. Independent of the places
 * token bucket, which guards the upstream quota.
 */
export function createRateLimiter(options: ApiRateLimitOptions = {}): RequestHandler {
  const windowMs = options.windowMs ?? 60_000;
  const maxRequests = options.maxRequests ?? 120;
  const now = options.now ?? Date.now;
  const buckets = new Map<string, RateLimitBucket>();

  return (req: Request, res: Response, next: NextFunction): void => {
    const key = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const current = now();
    const bucket = buckets.get(key);

    if (!bucket || current >= bucket.resetAt) {
      buckets.set(key, { count: 1, resetAt: current + windowMs });
      next();
      return;
    }

    if (bucket.count >= maxRequests) {
      res.setHeader('Retry-After', String(Math.ceil((bucket.resetAt - current) / 1000)));
      sendError(res, 'Too many requests', 429, 'RATE_LIMITED');
      return;
    }

    bucket.count++;
    next();
  };
}
