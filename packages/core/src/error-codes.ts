/**
 * @keyturn/core - Error Code Catalog
 * Centralized error code definitions shared by results, errors and HTTP mapping
 */

/**
 * Error category for grouping and filtering
 */
export type ErrorCategory =
  | "auth"
  | "validation"
  | "resource"
  | "server"
  | "storage";

/**
 * Error code definition
 */
export interface ErrorCodeDefinition {
  readonly code: string;
  readonly status: number;
  readonly category: ErrorCategory;
  readonly retryable?: boolean;
}

/**
 * Centralized error code catalog
 */
export const ErrorCodes = {
  // ============================================================================
  // Authentication Errors (401)
  // ============================================================================
  AUTHENTICATION_FAILED: {
    code: "AUTHENTICATION_FAILED",
    status: 401,
    category: "auth",
  },
  INVALID_TOKEN: {
    code: "INVALID_TOKEN",
    status: 401,
    category: "auth",
  },
  TOKEN_EXPIRED: {
    code: "TOKEN_EXPIRED",
    status: 401,
    category: "auth",
  },
  REFRESH_EXPIRED: {
    code: "REFRESH_EXPIRED",
    status: 401,
    category: "auth",
  },
  REFRESH_INVALID: {
    code: "REFRESH_INVALID",
    status: 401,
    category: "auth",
  },

  // ============================================================================
  // Validation Errors (400)
  // ============================================================================
  VALIDATION_FAILED: {
    code: "VALIDATION_FAILED",
    status: 400,
    category: "validation",
  },

  // ============================================================================
  // Resource Errors (404, 409)
  // ============================================================================
  USER_NOT_FOUND: {
    code: "USER_NOT_FOUND",
    status: 404,
    category: "resource",
  },
  CONFLICT: {
    code: "CONFLICT",
    status: 409,
    category: "resource",
  },
  DUPLICATE_EMAIL: {
    code: "DUPLICATE_EMAIL",
    status: 409,
    category: "resource",
  },

  // ============================================================================
  // Server & Storage Errors (500, 503)
  // ============================================================================
  INTERNAL_ERROR: {
    code: "INTERNAL_ERROR",
    status: 500,
    category: "server",
  },
  STORAGE_ERROR: {
    code: "STORAGE_ERROR",
    status: 503,
    category: "storage",
    retryable: true,
  },
  DATABASE_ERROR: {
    code: "DATABASE_ERROR",
    status: 500,
    category: "storage",
  },
  CONNECTION_ERROR: {
    code: "CONNECTION_ERROR",
    status: 503,
    category: "storage",
    retryable: true,
  },
} as const satisfies Record<string, ErrorCodeDefinition>;

/**
 * Error code type (union of all error code keys)
 */
export type ErrorCode = keyof typeof ErrorCodes;

/**
 * Get error code definition by code string
 */
export function getErrorCode(code: string): ErrorCodeDefinition | undefined {
  const catalog: Record<string, ErrorCodeDefinition> = ErrorCodes;
  return catalog[code];
}

/**
 * Get all error codes by category
 */
export function getErrorCodesByCategory(
  category: ErrorCategory
): ErrorCodeDefinition[] {
  const definitions: ErrorCodeDefinition[] = Object.values(ErrorCodes);
  return definitions.filter((e) => e.category === category);
}

/**
 * Check if an error code is retryable
 */
export function isRetryableError(code: string): boolean {
  const errorCode = getErrorCode(code);
  return errorCode?.retryable === true;
}

/**
 * Get HTTP status for an error code
 */
export function getStatusForCode(code: string): number {
  const errorCode = getErrorCode(code);
  return errorCode?.status ?? 500;
}
