/**
 * @keyturn/database - PostgreSQL Adapter
 * PostgreSQL adapter using postgres.js
 */

import type postgres from "postgres";
import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { DatabaseAdapter, DatabaseHealth, PostgresConfig } from "../types.js";
import { DatabaseError, DatabaseErrorCodes, toDatabaseError } from "../types.js";

/**
 * PostgreSQL Database Adapter
 *
 * @example
 * ```typescript
 * const db = await createPostgresAdapter({
 *   type: 'postgres',
 *   host: 'localhost',
 *   port: 5432,
 *   user: 'keyturn',
 *   password: 'test-password',
 *   database: 'keyturn',
 * });
 *
 * const rows = await db.drizzle().select().from(users);
 * await db.close();
 * ```
 */
export class PostgresAdapter implements DatabaseAdapter {
  readonly type = "postgres" as const;

  private client: postgres.Sql | null = null;
  private db: PostgresJsDatabase | null = null;
  private config: PostgresConfig;

  constructor(config: PostgresConfig) {
    this.config = config;
  }

  /**
   * Initialize the connection pool.
   * postgres.js opens connections lazily on the first query.
   */
  async connect(): Promise<void> {
    if (this.client) return;

    try {
      const postgresModule = await import("postgres");
      const createClient = postgresModule.default;

      type SSLMode = boolean | "require" | { rejectUnauthorized: boolean };
      let sslConfig: SSLMode = false;

      if (this.config.ssl === true) {
        sslConfig = "require";
      } else if (typeof this.config.ssl === "object") {
        sslConfig = this.config.ssl;
      }

      const client = createClient({
        host: this.config.host,
        port: this.config.port,
        user: this.config.user,
        password: this.config.password,
        database: this.config.database,
        ssl: sslConfig,
        max: this.config.poolSize ?? 10,
        connect_timeout: this.config.connectTimeout ?? 10,
      });

      this.client = client;
      this.db = drizzle(client, { logger: this.config.logging ?? false });
    } catch (err) {
      throw new DatabaseError(
        `Failed to connect to PostgreSQL: ${err instanceof Error ? err.message : "Unknown error"}`,
        DatabaseErrorCodes.CONNECTION_FAILED,
        err
      );
    }
  }

  async execute<T extends Record<string, unknown> = Record<string, unknown>>(
    sql: string
  ): Promise<T[]> {
    const client = await this.getConnectedClient();

    try {
      return await client.unsafe<T[]>(sql);
    } catch (err) {
      throw toDatabaseError(err);
    }
  }

  async ping(): Promise<boolean> {
    const health = await this.health();
    return health.healthy;
  }

  async health(): Promise<DatabaseHealth> {
    const start = Date.now();

    try {
      const result = await this.execute<{ version: string }>("SELECT version()");
      return {
        healthy: true,
        latencyMs: Date.now() - start,
        version: result[0]?.version,
      };
    } catch (err) {
      return {
        healthy: false,
        latencyMs: Date.now() - start,
        error: err instanceof Error ? err.message : "Unknown error",
      };
    }
  }

  /**
   * Get the Drizzle instance
   */
  drizzle(): PostgresJsDatabase {
    if (!this.db) {
      throw new DatabaseError(
        "Database not connected. Call connect() first.",
        DatabaseErrorCodes.CONNECTION_FAILED
      );
    }
    return this.db;
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.end();
      this.client = null;
      this.db = null;
    }
  }

  private async getConnectedClient(): Promise<postgres.Sql> {
    if (!this.client) {
      await this.connect();
    }
    if (!this.client) {
      throw new DatabaseError("PostgreSQL client unavailable", DatabaseErrorCodes.CONNECTION_FAILED);
    }
    return this.client;
  }
}

/**
 * Create a PostgreSQL adapter
 */
export async function createPostgresAdapter(config: PostgresConfig): Promise<PostgresAdapter> {
  const adapter = new PostgresAdapter(config);
  await adapter.connect();
  return adapter;
}

/**
 * Parse a postgres:// connection string into adapter config
 */
export function parsePostgresUrl(
  connectionString: string,
  options?: Pick<PostgresConfig, "logging" | "poolSize" | "connectTimeout">
): PostgresConfig {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch (err) {
    throw new DatabaseError("Invalid PostgreSQL connection string", DatabaseErrorCodes.INVALID_CONFIG, err);
  }

  if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
    throw new DatabaseError(
      `Unsupported database URL scheme: ${url.protocol}`,
      DatabaseErrorCodes.INVALID_CONFIG
    );
  }

  return {
    type: "postgres",
    host: url.hostname,
    port: parseInt(url.port || "5432", 10),
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database: url.pathname.slice(1),
    ssl: url.searchParams.get("sslmode") === "require",
    ...options,
  };
}

/**
 * Create a PostgreSQL adapter from connection string
 */
export async function createPostgresFromUrl(
  connectionString: string,
  options?: Pick<PostgresConfig, "logging" | "poolSize" | "connectTimeout">
): Promise<PostgresAdapter> {
  return createPostgresAdapter(parsePostgresUrl(connectionString, options));
}
