import { Router } from 'express';
import { sendSuccess } from '../utils/response.js';
import type { SettingsStore } from '../services/store/SettingsStore.js';

export function createSettingsRoutes(settings: SettingsStore): Router {
  const router = Router();

  router.get('/', (_req, res, next) => {
    try {
      sendSuccess(res, settings.get());
    } catch (error: unknown) {
      next(error);
    }
  });

  // PUT /api/settings — Partial update, applied from the next scan on
  router.put('/', (req, res, next) => {
    try {
      const body: unknown = req.body;
      sendSuccess(res, settings.update(body));
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
