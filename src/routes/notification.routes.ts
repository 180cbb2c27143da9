import { Router } from 'express';
import { z } from 'zod';
import { sendSuccess } from '../utils/response.js';
import { parseParams, parseQuery, queryBoolean } from '../middleware/validator.js';
import { NotFoundError } from '../utils/errors.js';
import type { SnapshotStore } from '../services/store/SnapshotStore.js';

const listNotificationsSchema = z.object({
  unreadOnly: queryBoolean.optional(),
  includeDismissed: queryBoolean.optional(),
  kind: z
    .enum(['new_business', 'rating_changed', 'trending_activity', 'business_removed', 'system_status'])
    .optional(),
  businessId: z.string().min(1).optional(),
  sinceHours: z.coerce.number().positive().max(24 * 90).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

const summaryQuerySchema = z.object({
  hours: z.coerce.number().positive().max(24 * 90).default(24),
});

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export function createNotificationRoutes(store: SnapshotStore): Router {
  const router = Router();

  // GET /api/notifications — Newest first, dismissed hidden by default
  router.get('/', (req, res, next) => {
    try {
      const filters = parseQuery(listNotificationsSchema, req);
      sendSuccess(res, {
        unread: store.countUnread(),
        notifications: store.listNotifications(filters),
      });
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/notifications/summary — Open counts per kind plus recent activity
  router.get('/summary', (req, res, next) => {
    try {
      const { hours } = parseQuery(summaryQuerySchema, req);
      sendSuccess(res, store.notificationSummary(hours));
    } catch (error: unknown) {
      next(error);
    }
  });

  router.post('/read-all', (_req, res, next) => {
    try {
      sendSuccess(res, { updated: store.markAllNotificationsRead() });
    } catch (error: unknown) {
      next(error);
    }
  });

  router.post('/:id/read', (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const notification = store.markNotificationRead(id);
      if (!notification) throw new NotFoundError('Notification', id);
      sendSuccess(res, notification);
    } catch (error: unknown) {
      next(error);
    }
  });

  router.post('/:id/dismiss', (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const notification = store.dismissNotification(id);
      if (!notification) throw new NotFoundError('Notification', id);
      sendSuccess(res, notification);
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
