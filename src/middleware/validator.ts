import type { Request } from 'express';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}

/**
 * Zod validation helpers for route handlers.
 * Throw a ValidationError (400) that the error handler turns into the JSON envelope.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, req: Request): z.output<T> {
  const result = schema.safeParse(req.body);
  if (!result.success) throw new ValidationError(describeIssues(result.error));
  return result.data;
}

export function parseQuery<T extends z.ZodTypeAny>(schema: T, req: Request): z.output<T> {
  const result = schema.safeParse(req.query);
  if (!result.success) throw new ValidationError(describeIssues(result.error));
  return result.data;
}

export function parseParams<T extends z.ZodTypeAny>(schema: T, req: Request): z.output<T> {
  const result = schema.safeParse(req.params);
  if (!result.success) throw new ValidationError(describeIssues(result.error));
  return result.data;
}

/** Query-string boolean; `z.coerce.boolean()` would read "false" as true */
export const queryBoolean = z.enum(['true', 'false']).transform((value) => value === 'true');
