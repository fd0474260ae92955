/**
 * @module
 * PostgreSQL access for Keyturn: a postgres.js connection pool
 * wrapped for Drizzle ORM.
 *
 * @example
 * ```typescript
 * import { createPostgresFromUrl } from '@keyturn/database';
 *
 * const db = await createPostgresFromUrl(process.env.DATABASE_URL ?? '');
 * const rows = await db.drizzle().select().from(users);
 * ```
 */

// Types
export {
  type DatabaseAdapterType,
  type PostgresConfig,
  type DatabaseConfig,
  type DatabaseHealth,
  type DatabaseAdapter,
  type DatabaseErrorCode,
  DatabaseError,
  DatabaseErrorCodes,
  isUniqueViolation,
  toDatabaseError,
} from "./types.js";

// Adapters
export {
  PostgresAdapter,
  createPostgresAdapter,
  createPostgresFromUrl,
  parsePostgresUrl,
} from "./adapters/postgres.js";
