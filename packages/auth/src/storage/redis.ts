/**
 * Redis KV Storage adapter on ioredis
 */

import { StorageError } from '@keyturn/core';
import type { KVStorage, RedisClient, RedisConfig } from './types.js';

/**
 * GET, compare and SET in one script so no other client can interleave.
 * KEYS[1] key, ARGV[1] expected, ARGV[2] next, ARGV[3] ttl seconds (0 = none)
 */
export const COMPARE_AND_SWAP_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current ~= ARGV[1] then
  return 0
end
local ttl = tonumber(ARGV[3])
if ttl > 0 then
  redis.call('SET', KEYS[1], ARGV[2], 'EX', ttl)
else
  redis.call('SET', KEYS[1], ARGV[2])
end
return 1
`;

/** Default per-command timeout in milliseconds */
export const DEFAULT_COMMAND_TIMEOUT = 2000;

/**
 * Redis storage adapter.
 * Client failures are rethrown as `StorageError`.
 */
export class RedisStorage implements KVStorage {
  private client: RedisClient;
  private readonly prefix: string;

  constructor(client: RedisClient, prefix?: string) {
    this.client = client;
    this.prefix = prefix ?? '';
  }

  private getKey(key: string): string {
    return this.prefix ? `${this.prefix}:${key}` : key;
  }

  private async run<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StorageError(`Redis ${command} failed`, err, { command });
    }
  }

  async get(key: string): Promise<string | null> {
    const fullKey = this.getKey(key);
    return this.run('GET', () => this.client.get(fullKey));
  }

  async set(key: string, value: string, ttl?: number): Promise<void> {
    const fullKey = this.getKey(key);

    if (ttl) {
      await this.run('SET', () => this.client.set(fullKey, value, 'EX', ttl));
    } else {
      await this.run('SET', () => this.client.set(fullKey, value));
    }
  }

  async delete(key: string): Promise<void> {
    const fullKey = this.getKey(key);
    await this.run('DEL', () => this.client.del(fullKey));
  }

  async has(key: string): Promise<boolean> {
    const value = await this.get(key);
    return value !== null;
  }

  async compareAndSwap(
    key: string,
    expected: string,
    next: string,
    ttl?: number
  ): Promise<boolean> {
    const fullKey = this.getKey(key);
    const result = await this.run('EVAL', () =>
      this.client.eval(COMPARE_AND_SWAP_SCRIPT, 1, fullKey, expected, next, ttl ?? 0)
    );
    return result === 1;
  }

  async close(): Promise<void> {
    await this.run('QUIT', () => this.client.quit());
  }
}

/**
 * Create an ioredis client from URL.
 * A command that gets no reply within `commandTimeout` rejects.
 */
async function createRedisClientFromUrl(
  url: string,
  commandTimeout: number
): Promise<RedisClient> {
  const { Redis } = await import('ioredis');
  return new Redis(url, {
    commandTimeout,
    maxRetriesPerRequest: 1,
  });
}

/**
 * Create Redis storage adapter
 *
 * @example
 * ```ts
 * // With URL
 * const storage = await createRedisStorage({ url: 'redis://localhost:6379' });
 *
 * // With existing client
 * import { Redis } from 'ioredis';
 * const storage = await createRedisStorage({ client: new Redis(), prefix: 'keyturn' });
 * ```
 */
export async function createRedisStorage(config: RedisConfig): Promise<RedisStorage> {
  let client: RedisClient;

  if (config.client) {
    client = config.client;
  } else if (config.url) {
    client = await createRedisClientFromUrl(
      config.url,
      config.commandTimeout ?? DEFAULT_COMMAND_TIMEOUT
    );
  } else {
    throw new StorageError('Redis storage requires either url or client configuration');
  }

  return new RedisStorage(client, config.prefix);
}
