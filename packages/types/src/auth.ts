/**
 * @module
 * Authentication schemas: request payloads, the public user shape,
 * token claims and auth configuration.
 */

import { type } from "arktype";
import { duration, email, nonEmptyString, nonNegativeInt, timestamp } from "./common.js";

// ============================================================================
// User Schemas
// ============================================================================

/** User as returned to clients (no password hash) */
export const publicUser = type({
  id: "string >= 1",
  email,
  name: "string",
  weight: "number | null",
  dailyCaffeineLimit: "number | null",
  createdAt: timestamp,
  updatedAt: timestamp,
});

// ============================================================================
// Request Schemas
// ============================================================================

/** Registration request */
export const registerRequest = type({
  email,
  password: "8 <= string <= 72",
  name: "1 <= string <= 50",
  "weight?": "number > 0",
  "dailyCaffeineLimit?": nonNegativeInt,
});

/** Login request */
export const loginRequest = type({
  email: nonEmptyString,
  password: nonEmptyString,
});

/** Profile update request; only present fields change */
export const editUserInfoRequest = type({
  "email?": email,
  "name?": "1 <= string <= 50",
  "weight?": "number > 0",
  "dailyCaffeineLimit?": nonNegativeInt,
});

/** Refresh token in a JSON body, for clients without cookies */
export const refreshTokenRequest = type({
  refreshToken: nonEmptyString,
});

// ============================================================================
// Token Schemas
// ============================================================================

/** Claims carried by access and refresh tokens */
export const tokenClaims = type({
  sub: nonEmptyString,
  iat: "number",
  exp: "number",
  jti: nonEmptyString,
  "iss?": "string",
  "aud?": "string | string[]",
});

/** Access token handed to the client */
export const accessTokenResponse = type({
  identity: "string",
  accessToken: "string",
  expiresAt: timestamp,
});

// ============================================================================
// Config Schemas
// ============================================================================

/** JWT config */
export const jwtConfig = type({
  "issuer?": nonEmptyString,
  "audience?": nonEmptyString,
  "previousSecrets?": "string[]",
});

/** Session (token lifetime) config */
export const sessionConfig = type({
  "accessTokenTTL?": duration,
  "refreshTokenTTL?": duration,
});

/** Refresh cookie config */
export const cookieConfig = type({
  "name?": nonEmptyString,
  "domain?": "string",
  "path?": "string",
  "secure?": "boolean",
  "sameSite?": "'strict' | 'lax' | 'none'",
  "httpOnly?": "boolean",
});

/** Storage config */
export const storageConfig = type({
  "type?": "'memory' | 'redis' | 'custom'",
  "redis?": "object",
  "custom?": "object",
});

/** Main Keyturn auth config */
export const keyturnAuthConfig = type({
  secret: "string >= 32",
  "jwt?": jwtConfig,
  "session?": sessionConfig,
  "storage?": storageConfig,
  "cookies?": cookieConfig,
  "storageTimeoutMs?": "number.integer > 0",
});

// ============================================================================
// Type Exports
// ============================================================================

/** Public user type */
export type PublicUser = typeof publicUser.infer;

/** Registration request type */
export type RegisterRequest = typeof registerRequest.infer;

/** Login request type */
export type LoginRequest = typeof loginRequest.infer;

/** Profile update request type */
export type EditUserInfoRequest = typeof editUserInfoRequest.infer;

/** Refresh token request type */
export type RefreshTokenRequest = typeof refreshTokenRequest.infer;

/** Token claims type */
export type TokenClaims = typeof tokenClaims.infer;

/** Access token response type */
export type AccessTokenResponse = typeof accessTokenResponse.infer;

/** JWT config type */
export type JwtConfig = typeof jwtConfig.infer;

/** Session config type */
export type SessionConfig = typeof sessionConfig.infer;

/** Cookie config type */
export type CookieConfig = typeof cookieConfig.infer;

/** Storage config type */
export type StorageConfig = typeof storageConfig.infer;

/** Keyturn auth config type */
export type KeyturnAuthConfigShape = typeof keyturnAuthConfig.infer;
