/**
 * In-memory KV Storage adapter
 * For tests, development and single-process deployments
 */

import { StorageError } from '@keyturn/core';
import type { KVStorage, MemoryConfig } from './types.js';

interface Entry {
  value: string;
  /** Epoch ms, null for no expiry */
  expiresAt: number | null;
}

/**
 * Map-backed storage with lazy TTL expiry.
 *
 * Live entries are never evicted, revocation entries must outlast their
 * token. Once `maxSize` live entries exist, writes of new keys fail with
 * StorageError.
 */
export class MemoryStorage implements KVStorage {
  private readonly entries = new Map<string, Entry>();
  private readonly maxSize: number;
  private readonly prefix: string;

  constructor(config?: MemoryConfig) {
    this.maxSize = config?.maxSize ?? 10000;
    this.prefix = config?.prefix ? `${config.prefix}:` : '';
  }

  private live(fullKey: string): Entry | null {
    const entry = this.entries.get(fullKey);
    if (!entry) return null;
    if (entry.expiresAt !== null && Date.now() >= entry.expiresAt) {
      this.entries.delete(fullKey);
      return null;
    }
    return entry;
  }

  private purgeExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  private write(fullKey: string, value: string, ttl?: number): void {
    if (!this.entries.has(fullKey) && this.entries.size >= this.maxSize) {
      this.purgeExpired();
      if (this.entries.size >= this.maxSize) {
        throw new StorageError(`Memory storage is full (${this.maxSize} entries)`);
      }
    }

    this.entries.set(fullKey, {
      value,
      expiresAt: ttl ? Date.now() + ttl * 1000 : null,
    });
  }

  async get(key: string): Promise<string | null> {
    return this.live(this.prefix + key)?.value ?? null;
  }

  async set(key: string, value: string, ttl?: number): Promise<void> {
    this.write(this.prefix + key, value, ttl);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(this.prefix + key);
  }

  async has(key: string): Promise<boolean> {
    return this.live(this.prefix + key) !== null;
  }

  async compareAndSwap(
    key: string,
    expected: string,
    next: string,
    ttl?: number
  ): Promise<boolean> {
    // No await between the read and the write
    const fullKey = this.prefix + key;
    if (this.live(fullKey)?.value !== expected) {
      return false;
    }
    this.write(fullKey, next, ttl);
    return true;
  }

  async clear(): Promise<void> {
    if (!this.prefix) {
      this.entries.clear();
      return;
    }
    for (const key of this.entries.keys()) {
      if (key.startsWith(this.prefix)) {
        this.entries.delete(key);
      }
    }
  }

  /** Stored entries, expired ones included until they are touched */
  get size(): number {
    return this.entries.size;
  }
}

export function createMemoryStorage(config?: MemoryConfig): MemoryStorage {
  return new MemoryStorage(config);
}
