import type { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.js';
import { AppError, toErrorMessage } from '../utils/errors.js';
import { sendError } from '../utils/response.js';

export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, `Route ${req.method} ${req.path} not found`, 404, 'NOT_FOUND');
}

/**
 * Maps AppError subclasses onto the JSON error envelope. Anything else is a 500.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error(`[API] ${req.method} ${req.path} failed: ${error.message}`);
    }
    sendError(res, error.message, error.statusCode, error.code);
    return;
  }

  if (error instanceof SyntaxError && 'body' in error) {
    sendError(res, 'Malformed JSON body', 400, 'VALIDATION_ERROR');
    return;
  }

  logger.error(`[API] ${req.method} ${req.path} failed: ${toErrorMessage(error)}`);
  sendError(res, 'Internal server error', 500, 'INTERNAL_ERROR');
}
