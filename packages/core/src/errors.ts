/**
 * @module
 * Error classes for Keyturn.
 * Every error carries a catalog code, an HTTP status and optional details.
 *
 * @example
 * ```typescript
 * import { StorageError, DuplicateError } from '@keyturn/core';
 *
 * throw new StorageError('Redis command timed out');
 * throw new DuplicateError('User', 'email');
 * ```
 */

/**
 * Base error class for all Keyturn errors.
 *
 * @example
 * ```typescript
 * throw new KeyturnError('Something went wrong', 'CUSTOM_ERROR', 500, { extra: 'info' });
 * ```
 */
export class KeyturnError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "KeyturnError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details ?? undefined;
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

// ============================================
// VALIDATION ERRORS
// ============================================

/** Request validation failed with one or more field errors (HTTP 400) */
export class ValidationError extends KeyturnError {
  constructor(
    message: string = "Validation failed",
    public readonly errors: ValidationErrorDetail[],
    details?: Record<string, unknown>
  ) {
    super(message, "VALIDATION_FAILED", 400, { ...details, errors });
    this.name = "ValidationError";
  }
}

/** Details about a single validation error */
export interface ValidationErrorDetail {
  /** Field path that failed validation */
  field: string;
  /** Human-readable error message */
  message: string;
}

// ============================================
// CONFLICT ERRORS
// ============================================

/** Resource conflict, such as duplicate entry (HTTP 409) */
export class ConflictError extends KeyturnError {
  constructor(message: string = "Conflict", details?: Record<string, unknown>) {
    super(message, "CONFLICT", 409, details);
    this.name = "ConflictError";
  }
}

/**
 * A duplicate resource already exists (HTTP 409).
 * Thrown by repositories when a uniqueness constraint is violated.
 */
export class DuplicateError extends ConflictError {
  constructor(
    /** The type of resource that already exists */
    resource: string = "Resource",
    /** The field that caused the conflict (e.g., 'email') */
    field?: string,
    details?: Record<string, unknown>
  ) {
    super(`${resource} already exists${field ? ` with this ${field}` : ""}`, {
      ...details,
      resource,
      field,
    });
    this.name = "DuplicateError";
  }
}

// ============================================
// STORAGE ERRORS
// ============================================

/**
 * A backing store (KV, database) failed or timed out (HTTP 503).
 * The original failure is kept in `cause` and never sent to clients.
 */
export class StorageError extends KeyturnError {
  constructor(
    message: string = "Storage unavailable",
    public override readonly cause?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, "STORAGE_ERROR", 503, details);
    this.name = "StorageError";
  }
}

/**
 * Check whether a value is a Keyturn error
 */
export function isKeyturnError(error: unknown): error is KeyturnError {
  return error instanceof KeyturnError;
}
