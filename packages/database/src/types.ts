/**
 * @keyturn/database - Type Definitions
 * Database configuration, adapter contract and errors
 */

import { KeyturnError } from "@keyturn/core";

/**
 * Database adapter type
 */
export type DatabaseAdapterType = "postgres";

/**
 * PostgreSQL configuration
 */
export interface PostgresConfig {
  type: "postgres";
  /** Database host */
  host: string;
  /** Database port */
  port: number;
  /** Database user */
  user: string;
  /** Database password */
  password: string;
  /** Database name */
  database: string;
  /** SSL configuration */
  ssl?: boolean | { rejectUnauthorized: boolean } | undefined;
  /** Enable query logging */
  logging?: boolean | undefined;
  /** Connection pool size */
  poolSize?: number | undefined;
  /** Seconds to wait for a connection before failing */
  connectTimeout?: number | undefined;
}

/**
 * Combined database configuration
 */
export type DatabaseConfig = PostgresConfig;

/**
 * Database health status
 */
export interface DatabaseHealth {
  /** Whether database is healthy */
  healthy: boolean;
  /** Connection latency in milliseconds */
  latencyMs: number;
  /** Database version */
  version?: string | undefined;
  /** Error message if unhealthy */
  error?: string | undefined;
}

/**
 * Database adapter interface
 */
export interface DatabaseAdapter {
  /** Adapter type */
  readonly type: DatabaseAdapterType;

  /**
   * Execute raw SQL query
   */
  execute<T extends Record<string, unknown> = Record<string, unknown>>(sql: string): Promise<T[]>;

  /**
   * Check connection health
   */
  ping(): Promise<boolean>;

  /**
   * Get connection health with details
   */
  health(): Promise<DatabaseHealth>;

  /**
   * Close database connection
   */
  close(): Promise<void>;
}

/**
 * Common database error codes
 */
export const DatabaseErrorCodes = {
  CONNECTION_FAILED: "CONNECTION_FAILED",
  QUERY_FAILED: "QUERY_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG",
  CONSTRAINT_VIOLATION: "CONSTRAINT_VIOLATION",
} as const;

export type DatabaseErrorCode = (typeof DatabaseErrorCodes)[keyof typeof DatabaseErrorCodes];

/**
 * Database error
 * `reason` narrows the catalog code `DATABASE_ERROR` / `CONNECTION_ERROR`.
 */
export class DatabaseError extends KeyturnError {
  constructor(
    message: string,
    public readonly reason: DatabaseErrorCode,
    public override readonly cause?: unknown,
    details?: Record<string, unknown>
  ) {
    super(
      message,
      reason === DatabaseErrorCodes.CONNECTION_FAILED ? "CONNECTION_ERROR" : "DATABASE_ERROR",
      reason === DatabaseErrorCodes.CONNECTION_FAILED ? 503 : 500,
      { ...details, reason }
    );
    this.name = "DatabaseError";
  }
}

/** SQLSTATE for unique_violation */
const UNIQUE_VIOLATION = "23505";

/**
 * Check whether a driver error is a unique-constraint violation.
 * Looks at the error and its `cause`.
 */
export function isUniqueViolation(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && typeof current === "object" && current !== null; depth++) {
    if ("code" in current && current.code === UNIQUE_VIOLATION) {
      return true;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return false;
}

/**
 * Wrap a driver error, keeping `DatabaseError`s as they are
 */
export function toDatabaseError(err: unknown, message = "Query failed"): DatabaseError {
  if (err instanceof DatabaseError) return err;
  if (isUniqueViolation(err)) {
    return new DatabaseError(`${message}: unique constraint violated`, DatabaseErrorCodes.CONSTRAINT_VIOLATION, err);
  }
  return new DatabaseError(
    `${message}: ${err instanceof Error ? err.message : "Unknown error"}`,
    DatabaseErrorCodes.QUERY_FAILED,
    err
  );
}
