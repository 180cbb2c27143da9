import { Router } from 'express';
import { z } from 'zod';
import { sendSuccess } from '../utils/response.js';
import { parseParams, parseQuery } from '../middleware/validator.js';
import { NotFoundError } from '../utils/errors.js';
import type { SnapshotStore } from '../services/store/SnapshotStore.js';
import type { ScanScheduler } from '../services/scheduler/ScanScheduler.js';

const listScansSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export function createScanRoutes(store: SnapshotStore, scheduler: ScanScheduler): Router {
  const router = Router();

  // POST /api/scans — Manual trigger; 409 while a scan is running
  router.post('/', async (_req, res, next) => {
    try {
      const scan = await scheduler.triggerScan();
      sendSuccess(res, scan, 202);
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/scans — Scan history, newest first
  router.get('/', (req, res, next) => {
    try {
      const { limit } = parseQuery(listScansSchema, req);
      sendSuccess(res, store.getScanHistory(limit));
    } catch (error: unknown) {
      next(error);
    }
  });

  // DELETE /api/scans/current — Cancel the running scan
  router.delete('/current', (_req, res, next) => {
    try {
      const scanId = scheduler.getStatus().currentScanId;
      if (!scheduler.cancel()) throw new NotFoundError('Running scan', 'current');
      sendSuccess(res, { cancelled: true, scanId }, 202);
    } catch (error: unknown) {
      next(error);
    }
  });

  // GET /api/scans/:id
  router.get('/:id', (req, res, next) => {
    try {
      const { id } = parseParams(idParamsSchema, req);
      const scan = store.getScan(id);
      if (!scan) throw new NotFoundError('Scan', id);
      sendSuccess(res, scan);
    } catch (error: unknown) {
      next(error);
    }
  });

  return router;
}
