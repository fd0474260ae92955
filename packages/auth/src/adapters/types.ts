/**
 * Adapter Types
 * Common interfaces for framework adapters
 */

import type { CookieConfig } from '@keyturn/types';
import type { CookieOptions } from './transport.js';

/**
 * Auth context attached to requests
 */
export interface AuthContext {
  /** Authenticated identity */
  identity: string;
  /** When the presented access token expires */
  expiresAt: Date;
}

/**
 * Refresh cookie settings with defaults applied
 */
export interface ResolvedCookieConfig {
  name: string;
  path: string;
  domain: string | undefined;
  secure: boolean;
  sameSite: 'strict' | 'lax' | 'none';
  httpOnly: boolean;
}

/** Name of the refresh token cookie and body field */
export const REFRESH_COOKIE_NAME = 'refreshToken';

/**
 * Apply cookie defaults: HttpOnly, Secure, SameSite=Strict, path /
 */
export function resolveCookieConfig(config?: CookieConfig): ResolvedCookieConfig {
  return {
    name: config?.name ?? REFRESH_COOKIE_NAME,
    path: config?.path ?? '/',
    domain: config?.domain,
    secure: config?.secure ?? true,
    sameSite: config?.sameSite ?? 'strict',
    httpOnly: config?.httpOnly ?? true,
  };
}

/**
 * Cookie carrying a freshly issued refresh token
 */
export function createRefreshCookie(
  refreshToken: string,
  expiresAt: Date,
  config: ResolvedCookieConfig
): CookieOptions {
  return {
    name: config.name,
    value: refreshToken,
    expires: expiresAt,
    path: config.path,
    domain: config.domain,
    secure: config.secure,
    sameSite: config.sameSite,
    httpOnly: config.httpOnly,
  };
}

/**
 * Expired cookie that clears the refresh token
 */
export function createClearRefreshCookie(config: ResolvedCookieConfig): CookieOptions {
  return {
    name: config.name,
    value: '',
    expires: new Date(0),
    maxAge: 0,
    path: config.path,
    domain: config.domain,
    secure: config.secure,
    sameSite: config.sameSite,
    httpOnly: config.httpOnly,
  };
}
