import { Router } from 'express';
import { z } from 'zod';
import { BUSINESS_CATEGORIES } from '../config/categories.js';
import { sendPage, sendSuccess } from '../utils/response.js';
import { parseBody, parseQuery, queryBoolean } from '../middleware/validator.js';
import { NotFoundError } from '../utils/errors.js';
import type { SnapshotStore } from '../services/store/SnapshotStore.js';
import type { SettingsStore } from '../services/store/SettingsStore.js';

const listBusinessesSchema = z.object({
  category: z.enum(BUSINESS_CATEGORIES).optional(),
  isCompetitor: queryBoolean.optional(),
  minRating: z.coerce.number().min(0).max(5).optional(),
  search: z.string().trim().min(1).optional(),
  withinMeters: z.coerce.number().positive().optional(),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const updateBusinessSchema = z.object({
  isCompetitor: z.boolean(),
});

export function createBusinessRoutes(store: SnapshotStore, settings: SettingsStore): Router {
  const router = Router();

  // GET /api/businesses — Tracked businesses with filters
  router.get('/', (req, res, next) => {
    try {
      const { page, limit, withinMeters, ...filters } = parseQuery(listBusinessesSchema, req);
      const businesses = store.listBusinesses({
        ...filters,
        withinMeters,
        near: withinMeters === undefined ? undefined : settings.get().location,
      });
      sendPage(res, businesses, page, limit);
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/businesses/summary — Competitors inside the monitoring radius
  router.get('/summary', (_req, res, next) => {
    try {
      sendSuccess(res, store.competitorSummary(settings.get()));
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/businesses/:id
  router.get('/:id', (req, res, next) => {
    try {
      const business = store.getBusiness(req.params.id);
      if (!business) throw new NotFoundError('Business', req.params.id);
      sendSuccess(res, business);
    } catch (error: unknown) {
      next(error);
    }
  });

  // PUT /api/businesses/:id — Operator competitor flag
  router.put('/:id', (req, res, next) => {
    try {
      const { isCompetitor } = parseBody(updateBusinessSchema, req);
      const business = store.setCompetitorFlag(req.params.id, isCompetitor);
      if (!business) throw new NotFoundError('Business', req.params.id);
      sendSuccess(res, business);
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
