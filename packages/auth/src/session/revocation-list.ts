/**
 * Revocation List
 * Rejects consumed token values until they would have expired anyway.
 * Tokens are stored by SHA-256 hash, never raw.
 */

import { type } from '@keyturn/types';
import type { KVStorage } from '../storage/types.js';
import { StorageKeys } from '../storage/index.js';

/**
 * Why a token was revoked
 */
export type RevocationReason = 'rotated' | 'logout';

/**
 * Stored revocation entry
 */
export interface RevocationEntry {
  /** When the entry (and the token) expires */
  expiresAt: string;
  /** Why it was revoked */
  reason: RevocationReason | undefined;
  /** When it was revoked */
  revokedAt: string;
  /** Identity the token belonged to (for audit) */
  identity: string | undefined;
}

const storedEntry = type('string.json.parse').pipe(
  type({
    expiresAt: 'string',
    'reason?': "'rotated' | 'logout'",
    revokedAt: 'string',
    'identity?': 'string',
  })
);

/**
 * Hash a token for storage (don't store raw tokens)
 */
export async function hashToken(token: string): Promise<string> {
  const data = new TextEncoder().encode(token);
  const hashBuffer = await crypto.subtle.digest('SHA-256', data);
  return Array.from(new Uint8Array(hashBuffer))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Revocation list over KV storage
 */
export class RevocationList {
  private storage: KVStorage;

  constructor(storage: KVStorage) {
    this.storage = storage;
  }

  private async getKey(token: string): Promise<string> {
    return StorageKeys.revoked(await hashToken(token));
  }

  /**
   * Revoke a token for `ttlSeconds`. Non-positive TTLs write nothing:
   * the token has already expired.
   */
  async add(
    token: string,
    ttlSeconds: number,
    meta?: { reason?: RevocationReason; identity?: string }
  ): Promise<void> {
    if (ttlSeconds <= 0) return;

    const now = Date.now();
    const entry: RevocationEntry = {
      expiresAt: new Date(now + ttlSeconds * 1000).toISOString(),
      reason: meta?.reason,
      revokedAt: new Date(now).toISOString(),
      identity: meta?.identity,
    };

    await this.storage.set(await this.getKey(token), JSON.stringify(entry), ttlSeconds);
  }

  /**
   * Check if a token is revoked
   */
  async contains(token: string): Promise<boolean> {
    return this.storage.has(await this.getKey(token));
  }

  /**
   * Get revocation entry details
   */
  async getEntry(token: string): Promise<RevocationEntry | null> {
    const raw = await this.storage.get(await this.getKey(token));
    if (raw === null) return null;

    const entry = storedEntry(raw);
    if (entry instanceof type.errors) return null;

    return {
      expiresAt: entry.expiresAt,
      reason: entry.reason,
      revokedAt: entry.revokedAt,
      identity: entry.identity,
    };
  }
}

/**
 * Create a revocation list
 */
export function createRevocationList(storage: KVStorage): RevocationList {
  return new RevocationList(storage);
}
