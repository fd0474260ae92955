/**
 * Typed operation results
 * Coordinator and account operations return these instead of throwing.
 */

import type { PublicUser } from '@keyturn/types';
import type { TokenPair } from '../session/token-codec.js';

/**
 * Error codes an operation can report (all are catalog codes in @keyturn/core)
 */
export type ResultErrorCode =
  | 'AUTHENTICATION_FAILED'
  | 'DUPLICATE_EMAIL'
  | 'REFRESH_EXPIRED'
  | 'REFRESH_INVALID'
  | 'INVALID_TOKEN'
  | 'TOKEN_EXPIRED'
  | 'STORAGE_ERROR'
  | 'USER_NOT_FOUND'
  | 'VALIDATION_FAILED';

/**
 * Failed operation
 */
export interface Failure<C extends ResultErrorCode = ResultErrorCode> {
  success: false;
  error: string;
  errorCode: C;
}

/**
 * Outward messages. Internals never leak through them.
 */
export const RESULT_MESSAGES: Record<ResultErrorCode, string> = {
  AUTHENTICATION_FAILED: 'Invalid email or password',
  DUPLICATE_EMAIL: 'Email is already registered',
  REFRESH_EXPIRED: 'Refresh token expired',
  REFRESH_INVALID: 'Invalid refresh token',
  INVALID_TOKEN: 'Invalid token',
  TOKEN_EXPIRED: 'Access token expired',
  STORAGE_ERROR: 'Storage unavailable',
  USER_NOT_FOUND: 'User not found',
  VALIDATION_FAILED: 'Validation failed',
};

/**
 * Build a failure with the standard message for its code
 */
export function failure<C extends ResultErrorCode>(errorCode: C, error?: string): Failure<C> {
  return { success: false, error: error ?? RESULT_MESSAGES[errorCode], errorCode };
}

/**
 * Login result
 */
export type LoginResult =
  | { success: true; identity: string; tokens: TokenPair }
  | Failure<'AUTHENTICATION_FAILED' | 'STORAGE_ERROR'>;

/**
 * Rotation ("refresh") result
 */
export type RotateResult =
  | { success: true; identity: string; tokens: TokenPair }
  | Failure<'REFRESH_EXPIRED' | 'REFRESH_INVALID' | 'STORAGE_ERROR'>;

/**
 * Logout result
 */
export type LogoutResult =
  | { success: true; identity: string }
  | Failure<'INVALID_TOKEN' | 'STORAGE_ERROR'>;

/**
 * Bearer access token check
 */
export type AuthenticateResult =
  | { success: true; identity: string; expiresAt: Date }
  | Failure<'INVALID_TOKEN' | 'TOKEN_EXPIRED'>;

export type RegisterResult =
  | { success: true; user: PublicUser }
  | Failure<'DUPLICATE_EMAIL' | 'STORAGE_ERROR'>;

export type UserInfoResult =
  | { success: true; user: PublicUser }
  | Failure<'USER_NOT_FOUND' | 'STORAGE_ERROR'>;

export type EditUserInfoResult =
  | { success: true; user: PublicUser }
  | Failure<'USER_NOT_FOUND' | 'DUPLICATE_EMAIL' | 'STORAGE_ERROR'>;
