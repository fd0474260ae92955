/**
 * @keyturn/auth - Email/password authentication with rotating refresh tokens
 *
 * Access tokens are short-lived and stateless. Refresh tokens are single-use:
 * each rotation revokes the presented token and stores its replacement.
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { createKeyturnAuth, loadConfigFromEnv } from '@keyturn/auth';
 *
 * const auth = await createKeyturnAuth(loadConfigFromEnv());
 *
 * const app = new Hono();
 * app.route('/auth', auth.hono().routes);
 *
 * // Or call the coordinator directly
 * const login = await auth.sessions.login({ email, password });
 * if (login.success) {
 *   const next = await auth.sessions.rotate(login.tokens.refreshToken);
 * }
 * ```
 */

// ============================================
// MAIN EXPORTS
// ============================================

export * from './core/index.js';

export {
  mergeConfig,
  validateConfig,
  loadConfigFromEnv,
  defaultConfig,
  type KeyturnAuthConfig,
  type ResolvedAuthConfig,
} from './config.js';

// ============================================
// SESSION
// ============================================

export * from './session/index.js';

// ============================================
// STORAGE
// ============================================

export {
  createStorage,
  StorageKeys,
  MemoryStorage,
  createMemoryStorage,
  RedisStorage,
  createRedisStorage,
  COMPARE_AND_SWAP_SCRIPT,
  DEFAULT_COMMAND_TIMEOUT,
  type KVStorage,
  type StorageType,
  type StorageConfig,
  type RedisClient,
  type RedisConfig,
  type MemoryConfig,
} from './storage/index.js';

// ============================================
// USERS
// ============================================

export * from './users/index.js';

export {
  hashPassword,
  verifyPassword,
  Pbkdf2PasswordHasher,
  type PasswordHasher,
} from './utils/password.js';

// ============================================
// ADAPTERS
// ============================================

export * from './adapters/index.js';
