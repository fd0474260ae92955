/**
 * Token Store
 * One active refresh token per identity, kept in KV storage
 */

import type { KVStorage } from '../storage/types.js';
import { StorageKeys } from '../storage/index.js';

/**
 * Token store configuration
 */
export interface TokenStoreConfig {
  /** Entry lifetime in seconds, normally the refresh token TTL */
  ttlSeconds: number;
}

/**
 * Single-slot registry of the current refresh token per identity.
 * Every write restarts the entry's TTL.
 */
export class TokenStore {
  private storage: KVStorage;
  private readonly ttlSeconds: number;

  constructor(storage: KVStorage, config: TokenStoreConfig) {
    this.storage = storage;
    this.ttlSeconds = config.ttlSeconds;
  }

  /**
   * Store the active refresh token, replacing any previous one
   */
  async save(identity: string, refreshToken: string): Promise<void> {
    await this.storage.set(StorageKeys.session(identity), refreshToken, this.ttlSeconds);
  }

  /**
   * Active refresh token, or null when there is no session
   */
  async get(identity: string): Promise<string | null> {
    return this.storage.get(StorageKeys.session(identity));
  }

  async delete(identity: string): Promise<void> {
    await this.storage.delete(StorageKeys.session(identity));
  }

  /**
   * Swap `expected` for `next` only if `expected` is still the active token
   * @returns false when another write got there first
   */
  async replace(identity: string, expected: string, next: string): Promise<boolean> {
    return this.storage.compareAndSwap(
      StorageKeys.session(identity),
      expected,
      next,
      this.ttlSeconds
    );
  }
}

/**
 * Create a token store
 */
export function createTokenStore(storage: KVStorage, config: TokenStoreConfig): TokenStore {
  return new TokenStore(storage, config);
}
