import type { Response } from 'express';

interface SuccessResponse<T> {
  success: true;
  data: T;
  pagination?: PaginationMeta;
}

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code?: string;
  };
}

export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export function sendSuccess<T>(res: Response, data: T, statusCode = 200): void {
  const body: SuccessResponse<T> = { success: true, data };
  res.status(statusCode).json(body);
}

/** Slice an in-memory list into one page and send it with its meta. */
export function sendPage<T>(res: Response, items: readonly T[], page: number, limit: number): void {
  const pagination: PaginationMeta = {
    page,
    limit,
    total: items.length,
    totalPages: Math.ceil(items.length / limit),
  };
  const start = (page - 1) * limit;
  const body: SuccessResponse<T[]> = { success: true, data: items.slice(start, start + limit), pagination };
  res.status(200).json(body);
}

export function sendError(
  res: Response,
  message: string,
  statusCode = 500,
  code?: string,
): void {
  const body: ErrorResponse = {
    success: false,
    error: { message, code },
  };
  res.status(statusCode).json(body);
}
