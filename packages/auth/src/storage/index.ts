/**
 * Storage Factory
 * Creates the KV storage adapter named by configuration
 */

import { StorageError } from '@keyturn/core';
import type { KVStorage, StorageConfig } from './types.js';
import { createMemoryStorage } from './memory.js';
import { createRedisStorage } from './redis.js';

// Re-export types
export * from './types.js';
export { MemoryStorage, createMemoryStorage } from './memory.js';
export {
  RedisStorage,
  createRedisStorage,
  COMPARE_AND_SWAP_SCRIPT,
  DEFAULT_COMMAND_TIMEOUT,
} from './redis.js';

/**
 * Create a storage adapter based on configuration.
 * Memory is the default; Redis is picked when `redis` is configured.
 *
 * @example
 * ```ts
 * // Memory, single process. Sessions and revocations share `maxSize`
 * // (default 10000), sized for the refresh traffic of one refresh TTL.
 * const storage = await createStorage({ memory: { maxSize: 100_000 } });
 *
 * // Redis
 * const storage = await createStorage({
 *   redis: { url: 'redis://localhost:6379', commandTimeout: 2000 }
 * });
 *
 * // Custom adapter
 * const storage = await createStorage({ type: 'custom', custom: myAdapter });
 * ```
 */
export async function createStorage(config?: StorageConfig): Promise<KVStorage> {
  // Custom adapter takes precedence
  if (config?.custom) {
    return config.custom;
  }

  const type = config?.type ?? (config?.redis ? 'redis' : 'memory');

  switch (type) {
    case 'memory':
      return createMemoryStorage(config?.memory);

    case 'redis': {
      if (!config?.redis) {
        throw new StorageError('Redis storage requires redis configuration (url or client)');
      }
      return createRedisStorage(config.redis);
    }

    case 'custom':
      throw new StorageError('Custom storage requires a `custom` adapter');
  }
}

/**
 * Storage key builders
 */
export const StorageKeys = {
  /** Active refresh token of an identity */
  session: (identity: string) => `session:${identity}`,
  /** Revoked token, keyed by SHA-256 of its value */
  revoked: (tokenHash: string) => `revoked:${tokenHash}`,
} as const;
