/**
 * KV Storage interface
 * Implemented by the memory and Redis adapters
 */

/**
 * Base KV Storage interface that all adapters must implement.
 * Values are strings; callers serialize structured data themselves.
 */
export interface KVStorage {
  /**
   * Get a value by key
   * @returns The value or null if not found or expired
   */
  get(key: string): Promise<string | null>;

  /**
   * Set a value with optional TTL in seconds
   */
  set(key: string, value: string, ttl?: number): Promise<void>;

  /**
   * Delete a key. Deleting a missing key is not an error.
   */
  delete(key: string): Promise<void>;

  /**
   * Check if a key exists
   */
  has(key: string): Promise<boolean>;

  /**
   * Atomically write `next` only if the stored value equals `expected`.
   * A missing key never matches.
   * @returns true when the write happened
   */
  compareAndSwap(key: string, expected: string, next: string, ttl?: number): Promise<boolean>;

  /**
   * Clear all keys (optional, mainly for testing)
   */
  clear?(): Promise<void>;

  /**
   * Close the connection (for Redis)
   */
  close?(): Promise<void>;
}

/**
 * Storage types
 */
export type StorageType = 'memory' | 'redis' | 'custom';

/**
 * The subset of the ioredis client used by the Redis adapter
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * Redis configuration
 */
export interface RedisConfig {
  /** Redis connection URL (redis://...) */
  url?: string;
  /** Existing Redis client instance */
  client?: RedisClient;
  /** Key prefix for namespacing */
  prefix?: string;
  /** Per-command timeout in milliseconds (default: 2000) */
  commandTimeout?: number;
}

/**
 * Memory storage configuration
 */
export interface MemoryConfig {
  /**
   * Maximum number of live entries (default: 10000). Each session and each
   * revoked refresh token holds one until the refresh TTL runs out, so a
   * full store fails logins and rotations with StorageError.
   */
  maxSize?: number;
  /** Key prefix for namespacing */
  prefix?: string;
}

/**
 * Storage configuration
 */
export interface StorageConfig {
  /** Storage type (default: redis when `redis` is set, memory otherwise) */
  type?: StorageType;
  /** Redis configuration */
  redis?: RedisConfig;
  /** Memory configuration */
  memory?: MemoryConfig;
  /** Custom storage adapter */
  custom?: KVStorage;
}
