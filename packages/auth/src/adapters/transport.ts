/**
 * Transport helpers
 * Pure functions for pulling tokens out of headers and writing cookies
 */

/** A Set-Cookie value and its attributes */
export interface CookieOptions {
  name: string;
  value: string;
  /** Seconds */
  maxAge?: number | undefined;
  expires?: Date | undefined;
  path?: string | undefined;
  domain?: string | undefined;
  secure?: boolean | undefined;
  httpOnly?: boolean | undefined;
  sameSite?: 'strict' | 'lax' | 'none' | undefined;
}

const SAME_SITE = { strict: 'Strict', lax: 'Lax', none: 'None' } as const;

/**
 * Token of an `Authorization: Bearer <token>` header, null for any other shape
 */
export function extractBearerToken(authHeader: string | null | undefined): string | null {
  const match = /^Bearer ([^\s]+)$/.exec(authHeader ?? '');
  return match?.[1] ?? null;
}

/**
 * Value of one cookie in a Cookie header; empty values read as absent
 */
export function extractCookie(cookieHeader: string | null | undefined, name: string): string | null {
  for (const pair of (cookieHeader ?? '').split(';')) {
    const separator = pair.indexOf('=');
    if (separator === -1 || pair.slice(0, separator).trim() !== name) continue;
    return pair.slice(separator + 1).trim() || null;
  }
  return null;
}

/**
 * Set-Cookie header value, attributes in a fixed order
 */
export function serializeCookie(cookie: CookieOptions): string {
  const parts = [`${cookie.name}=${cookie.value}`];

  if (cookie.expires) parts.push(`Expires=${cookie.expires.toUTCString()}`);
  if (cookie.maxAge !== undefined) parts.push(`Max-Age=${cookie.maxAge}`);
  if (cookie.path) parts.push(`Path=${cookie.path}`);
  if (cookie.domain) parts.push(`Domain=${cookie.domain}`);
  if (cookie.secure) parts.push('Secure');
  if (cookie.httpOnly) parts.push('HttpOnly');
  if (cookie.sameSite) parts.push(`SameSite=${SAME_SITE[cookie.sameSite]}`);

  return parts.join('; ');
}
