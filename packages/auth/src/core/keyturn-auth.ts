/**
 * Keyturn Auth
 * Wires configuration, storage, codec, stores and services together
 */

import { createLogger, type Logger } from '@keyturn/core';
import { mergeConfig, validateConfig, type KeyturnAuthConfig, type ResolvedAuthConfig } from '../config.js';
import { createStorage, type KVStorage } from '../storage/index.js';
import { TokenCodec } from '../session/token-codec.js';
import { TokenStore } from '../session/token-store.js';
import { RevocationList } from '../session/revocation-list.js';
import { MemoryUserRepository } from '../users/memory.js';
import type { UserRepository } from '../users/types.js';
import { createHonoAuth } from '../adapters/hono.js';
import { SessionCoordinator } from './session-coordinator.js';
import { AccountService } from './account-service.js';

/**
 * A wired Keyturn instance
 */
export interface KeyturnAuth {
  readonly config: ResolvedAuthConfig;
  readonly storage: KVStorage;
  readonly users: UserRepository;
  readonly codec: TokenCodec;
  readonly tokenStore: TokenStore;
  readonly revocationList: RevocationList;
  readonly sessions: SessionCoordinator;
  readonly accounts: AccountService;
  /** Bearer middleware and routes for Hono */
  hono(): ReturnType<typeof createHonoAuth>;
  /** Release the storage connection */
  close(): Promise<void>;
}

/**
 * Create a Keyturn instance
 * @throws ValidationError when the configuration is invalid
 *
 * @example
 * ```typescript
 * const auth = await createKeyturnAuth(loadConfigFromEnv());
 *
 * const app = new Hono();
 * app.route('/auth', auth.hono().routes);
 * ```
 */
export async function createKeyturnAuth(config: KeyturnAuthConfig): Promise<KeyturnAuth> {
  validateConfig(config);

  const resolved = mergeConfig(config);
  const logger: Logger = config.logger ?? createLogger({ name: 'keyturn' });

  const storage = await createStorage(resolved.storage);
  const users = config.users ?? new MemoryUserRepository();

  const codec = new TokenCodec({
    secret: resolved.secret,
    issuer: resolved.jwt.issuer,
    audience: resolved.jwt.audience,
    accessTokenTTL: resolved.session.accessTokenTTL,
    refreshTokenTTL: resolved.session.refreshTokenTTL,
    previousSecrets: resolved.jwt.previousSecrets,
  });
  const tokenStore = new TokenStore(storage, { ttlSeconds: codec.getTTL('refresh') });
  const revocationList = new RevocationList(storage);

  const sessions = new SessionCoordinator({
    codec,
    tokenStore,
    revocationList,
    users,
    passwordHasher: config.passwordHasher,
    storageTimeoutMs: resolved.storageTimeoutMs,
    logger: config.logger?.child({ module: 'session' }),
  });
  const accounts = new AccountService({
    users,
    passwordHasher: config.passwordHasher,
    storageTimeoutMs: resolved.storageTimeoutMs,
    logger: config.logger?.child({ module: 'account' }),
  });

  logger.debug('Keyturn initialized', {
    storage: resolved.storage.type ?? (resolved.storage.redis ? 'redis' : 'memory'),
    issuer: resolved.jwt.issuer,
  });

  return {
    config: resolved,
    storage,
    users,
    codec,
    tokenStore,
    revocationList,
    sessions,
    accounts,
    hono: () => createHonoAuth({ sessions, accounts, cookies: resolved.cookies }),
    close: async () => {
      await storage.close?.();
    },
  };
}
