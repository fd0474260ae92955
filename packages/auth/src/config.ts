/**
 * Keyturn Auth Configuration
 * Defaults, validation and environment loading
 */

import { createEnvConfig, ValidationError, type Logger, type ValidationErrorDetail } from '@keyturn/core';
import {
  keyturnAuthConfig,
  type,
  type CookieConfig,
  type JwtConfig,
  type SessionConfig,
} from '@keyturn/types';
import type { StorageConfig } from './storage/types.js';
import type { UserRepository } from './users/types.js';
import type { PasswordHasher } from './utils/password.js';
import { DEFAULT_TOKEN_TTL, parseDuration } from './session/token-codec.js';
import { DEFAULT_STORAGE_TIMEOUT_MS } from './core/timeout.js';
import { resolveCookieConfig, type ResolvedCookieConfig } from './adapters/types.js';

export interface KeyturnAuthConfig {
  /**
   * Secret key for signing tokens (required)
   * Use a strong, random string of at least 32 characters
   */
  secret: string;

  /** JWT issuer, audience and retired secrets */
  jwt?: JwtConfig | undefined;

  /** Token lifetimes */
  session?: SessionConfig | undefined;

  /**
   * KV storage for sessions and revocations
   * Memory by default; Redis when a url or client is given
   */
  storage?: StorageConfig | undefined;

  /** Refresh cookie */
  cookies?: CookieConfig | undefined;

  /** Bound on each storage call in ms (default: 5000) */
  storageTimeoutMs?: number | undefined;

  /** Credential store (default: in-memory) */
  users?: UserRepository | undefined;

  /** Password hasher (default: PBKDF2) */
  passwordHasher?: PasswordHasher | undefined;

  logger?: Logger | undefined;
}

/**
 * Configuration with defaults applied
 */
export interface ResolvedAuthConfig {
  secret: string;
  jwt: {
    issuer: string;
    audience: string;
    previousSecrets: string[];
  };
  session: {
    accessTokenTTL: string;
    refreshTokenTTL: string;
  };
  storage: StorageConfig;
  cookies: ResolvedCookieConfig;
  storageTimeoutMs: number;
}

/**
 * Default configuration
 */
export const defaultConfig = {
  jwt: {
    issuer: 'keyturn',
    audience: 'keyturn-client',
  },
  session: DEFAULT_TOKEN_TTL,
  storage: { type: 'memory' },
  storageTimeoutMs: DEFAULT_STORAGE_TIMEOUT_MS,
} as const;

/**
 * Merge user config with defaults
 */
export function mergeConfig(config: KeyturnAuthConfig): ResolvedAuthConfig {
  return {
    secret: config.secret,
    jwt: {
      issuer: config.jwt?.issuer ?? defaultConfig.jwt.issuer,
      audience: config.jwt?.audience ?? defaultConfig.jwt.audience,
      previousSecrets: config.jwt?.previousSecrets ?? [],
    },
    session: {
      accessTokenTTL: config.session?.accessTokenTTL ?? defaultConfig.session.accessTokenTTL,
      refreshTokenTTL: config.session?.refreshTokenTTL ?? defaultConfig.session.refreshTokenTTL,
    },
    storage: config.storage ?? { ...defaultConfig.storage },
    cookies: resolveCookieConfig(config.cookies),
    storageTimeoutMs: config.storageTimeoutMs ?? defaultConfig.storageTimeoutMs,
  };
}

/**
 * Validate configuration
 * @throws ValidationError listing every problem found
 */
export function validateConfig(config: KeyturnAuthConfig): void {
  const errors: ValidationErrorDetail[] = [];

  const checked = keyturnAuthConfig(config);
  if (checked instanceof type.errors) {
    for (const error of checked) {
      errors.push({ field: error.path.join('.') || 'root', message: error.message });
    }
  }

  const merged = mergeConfig(config);
  const accessTTL = tryParseDuration(merged.session.accessTokenTTL);
  const refreshTTL = tryParseDuration(merged.session.refreshTokenTTL);

  if (accessTTL === 0) {
    errors.push({ field: 'session.accessTokenTTL', message: 'must be longer than zero' });
  }
  if (accessTTL !== null && refreshTTL !== null && accessTTL >= refreshTTL) {
    errors.push({
      field: 'session.accessTokenTTL',
      message: 'must be shorter than session.refreshTokenTTL',
    });
  }

  if (errors.length > 0) {
    throw new ValidationError('Invalid Keyturn auth configuration', errors);
  }
}

/** Unparseable TTLs are already reported by the schema */
function tryParseDuration(duration: string): number | null {
  return /^\d+[smhdw]$/.test(duration) ? parseDuration(duration) : null;
}

/**
 * Read configuration from environment variables
 *
 * KEYTURN_SECRET (required), KEYTURN_ACCESS_TTL, KEYTURN_REFRESH_TTL,
 * KEYTURN_ISSUER, KEYTURN_AUDIENCE, KEYTURN_PREVIOUS_SECRETS (comma separated),
 * REDIS_URL, KEYTURN_STORAGE_TIMEOUT_MS
 */
export function loadConfigFromEnv(): KeyturnAuthConfig {
  const env = createEnvConfig({
    KEYTURN_SECRET: { required: true },
    KEYTURN_ACCESS_TTL: { default: defaultConfig.session.accessTokenTTL },
    KEYTURN_REFRESH_TTL: { default: defaultConfig.session.refreshTokenTTL },
    KEYTURN_ISSUER: { default: defaultConfig.jwt.issuer },
    KEYTURN_AUDIENCE: { default: defaultConfig.jwt.audience },
    KEYTURN_PREVIOUS_SECRETS: { type: 'array' },
    REDIS_URL: {},
    KEYTURN_STORAGE_TIMEOUT_MS: { type: 'number', default: DEFAULT_STORAGE_TIMEOUT_MS },
  });

  return {
    secret: env.KEYTURN_SECRET,
    jwt: {
      issuer: env.KEYTURN_ISSUER,
      audience: env.KEYTURN_AUDIENCE,
      previousSecrets: env.KEYTURN_PREVIOUS_SECRETS,
    },
    session: {
      accessTokenTTL: env.KEYTURN_ACCESS_TTL,
      refreshTokenTTL: env.KEYTURN_REFRESH_TTL,
    },
    storage: env.REDIS_URL ? { type: 'redis', redis: { url: env.REDIS_URL } } : { type: 'memory' },
    storageTimeoutMs: env.KEYTURN_STORAGE_TIMEOUT_MS,
  };
}
