import { Router } from 'express';
import { sendSuccess } from '../utils/response.js';
import type { ScanScheduler } from '../services/scheduler/ScanScheduler.js';
import type { SnapshotStore } from '../services/store/SnapshotStore.js';
import type { RateLimiterState } from '../services/places/RateLimiter.js';

export interface RateLimitSource {
  getRateLimitState(): RateLimiterState;
}

export function createSystemRoutes(
  scheduler: ScanScheduler,
  store: SnapshotStore,
  places: RateLimitSource,
): Router {
  const router = Router();

  // GET /api/system/status — Scheduler state, upstream quota and counts
  router.get('/status', (_req, res, next) => {
    try {
      sendSuccess(res, {
        scheduler: scheduler.getStatus(),
        rateLimit: places.getRateLimitState(),
        trackedBusinesses: store.getCurrent().size,
        unreadNotifications: store.countUnread(),
      });
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
