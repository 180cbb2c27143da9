export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unknown error occurred';
}

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string | number) {
    super(`${resource} with id '${id}' not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** A manual trigger arrived while another scan was running. Not an engine failure. */
export class ScanInProgressError extends AppError {
  constructor(public readonly scanId: number | null) {
    super(
      scanId === null ? 'A scan is already in progress' : `Scan #${scanId} is already in progress`,
      409,
      'SCAN_IN_PROGRESS',
    );
    this.name = 'ScanInProgressError';
  }
}

export class ScanCancelledError extends AppError {
  constructor(scanId: number) {
    super(`Scan #${scanId} was cancelled`, 409, 'CANCELLED');
    this.name = 'ScanCancelledError';
  }
}

/** The snapshot commit did not complete; the previous snapshot is still authoritative. */
export class StorageError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'STORAGE_FAILURE');
    this.name = 'StorageError';
    this.cause = cause;
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'CanceledError');
}

export type PlacesErrorKind = 'unauthorized' | 'rate_limited' | 'transient' | 'malformed' | 'rejected';

const PLACES_ERROR_CODES: Record<PlacesErrorKind, string> = {
  unauthorized: 'UNAUTHORIZED',
  rate_limited: 'RATE_LIMITED',
  transient: 'TRANSIENT',
  malformed: 'MALFORMED',
  rejected: 'REQUEST_REJECTED',
};

interface PlacesErrorDetails {
  /** HTTP status from the directory, when there was a response */
  status?: number;
  /** How long the limiter or the directory asked us to wait */
  retryAfterMs?: number;
  /** Raised by the local token bucket rather than the directory */
  local?: boolean;
}

/**
 * Typed failure from the places directory. Only `transient` errors and
 * directory-side `rate_limited` errors are worth retrying.
 */
export class PlacesApiError extends AppError {
  readonly status: number | undefined;
  readonly retryAfterMs: number | undefined;
  readonly local: boolean;

  constructor(
    message: string,
    public readonly kind: PlacesErrorKind,
    details: PlacesErrorDetails = {},
  ) {
    super(message, kind === 'rate_limited' ? 429 : 502, PLACES_ERROR_CODES[kind]);
    this.name = 'PlacesApiError';
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
    this.local = details.local ?? false;
  }

  get retryable(): boolean {
    if (this.kind === 'transient') return true;
    return this.kind === 'rate_limited' && !this.local;
  }
}
