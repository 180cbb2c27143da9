import { Router } from 'express';
import type { Clock } from '../utils/clock.js';

export function createHealthRoutes(clock: Clock): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: clock.now().toISOString(),
      service: 'nearby-business-radar',
    });
  });

  return router;
}
