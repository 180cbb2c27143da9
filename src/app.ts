import express, { type Express } from 'express';
import cors from 'cors';
import { createRateLimiter } from './middleware/rateLimiter.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createHealthRoutes } from './routes/health.routes.js';
import { createBusinessRoutes } from './routes/business.routes.js';
import { createNotificationRoutes } from './routes/notification.routes.js';
import { createScanRoutes } from './routes/scan.routes.js';
import { createSettingsRoutes } from './routes/settings.routes.js';
import { createSystemRoutes, type RateLimitSource } from './routes/system.routes.js';
import { systemClock, type Clock } from './utils/clock.js';
import type { SnapshotStore } from './services/store/SnapshotStore.js';
import type { SettingsStore } from './services/store/SettingsStore.js';
import type { ScanScheduler } from './services/scheduler/ScanScheduler.js';

export interface AppDeps {
  store: SnapshotStore;
  settings: SettingsStore;
  scheduler: ScanScheduler;
  places: RateLimitSource;
  corsOrigin: string;
  clock?: Clock;
  /** Requests per minute per IP; tests raise it */
  apiRateLimit?: number;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const clock = deps.clock ?? systemClock;

  // Middleware
  app.use(cors({ origin: deps.corsOrigin }));
  app.use(express.json());
  app.use(createRateLimiter({ maxRequests: deps.apiRateLimit, now: () => clock.now().getTime() }));

  // Health check (outside /api prefix)
  app.use(createHealthRoutes(clock));

  // API routes
  app.use('/api/businesses', createBusinessRoutes(deps.store, deps.settings));
  app.use('/api/notifications', createNotificationRoutes(deps.store));
  app.use('/api/scans', createScanRoutes(deps.store, deps.scheduler));
  app.use('/api/settings', createSettingsRoutes(deps.settings));
  app.use('/api/system', createSystemRoutes(deps.scheduler, deps.store, deps.places));

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
