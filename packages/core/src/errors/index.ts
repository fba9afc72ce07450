/**
 * Custom Error Classes
 *
 * Every failure the sync core reports carries one of the taxonomy kinds so
 * callers can react distinctly (retry on StoreUnavailable, never on
 * PermissionDenied).
 */

export const ERROR_KINDS = [
  'AuthenticationFailed',
  'ValidationFailed',
  'NotFound',
  'PermissionDenied',
  'StoreUnavailable',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

/** Kinds as reported to callers. `Internal` covers anything unexpected. */
export type ResultKind = ErrorKind | 'Internal';

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && ERROR_KINDS.some((kind) => kind === value);
}

/**
 * Base error class for all adsync errors
 */
export class AdSyncError extends Error {
  public readonly kind: ErrorKind;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    kind: ErrorKind,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AdSyncError';
    this.kind = kind;
    this.statusCode = statusCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or mismatched credential
 */
export class AuthenticationError extends AdSyncError {
  constructor(message = 'Valid API key required') {
    super(message, 'AuthenticationFailed', 401);
    this.name = 'AuthenticationError';
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends AdSyncError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'ValidationFailed',
      400,
      { field, message }
    );
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Not found error for missing resources
 */
export class NotFoundError extends AdSyncError {
  constructor(resource: string, identifier: string | number) {
    super(
      `${resource} not found: ${identifier}`,
      'NotFound',
      404,
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * The permission evaluator denied a mutation
 */
export class PermissionDeniedError extends AdSyncError {
  public readonly reason: string;

  constructor(reason: string, details?: Record<string, unknown>) {
    super(reason, 'PermissionDenied', 403, details);
    this.name = 'PermissionDeniedError';
    this.reason = reason;
  }
}

/**
 * Store I/O failed. Safe to retry.
 */
export class StoreUnavailableError extends AdSyncError {
  constructor(model: string, operation: string, cause: unknown) {
    const causeMessage = cause instanceof Error ? cause.message : String(cause);
    super(
      `${model} store unavailable during ${operation}: ${causeMessage}`,
      'StoreUnavailable',
      503,
      { model, operation }
    );
    this.name = 'StoreUnavailableError';
    this.cause = cause;
  }
}

export interface ErrorResult {
  kind: ResultKind;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Flatten any thrown value into the result shape reported to callers.
 */
export function toErrorResult(error: unknown): ErrorResult {
  if (error instanceof AdSyncError) {
    return error.details
      ? { kind: error.kind, message: error.message, details: error.details }
      : { kind: error.kind, message: error.message };
  }
  return {
    kind: 'Internal',
    message: error instanceof Error ? error.message : String(error),
  };
}
