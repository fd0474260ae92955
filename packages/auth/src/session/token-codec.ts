/**
 * Token Codec
 * Issues and verifies HS256 access and refresh tokens with jose.
 * Verification falls back to previous secrets for key rollover.
 */

import * as jose from 'jose';
import { isValid, tokenClaims } from '@keyturn/types';

/**
 * Token codec configuration
 */
export interface TokenCodecConfig {
  /** Secret key for signing tokens */
  secret: string;
  /** Token issuer */
  issuer: string;
  /** Token audience */
  audience: string;
  /** Access token TTL (e.g., '30m') */
  accessTokenTTL?: string;
  /** Refresh token TTL (e.g., '14d') */
  refreshTokenTTL?: string;
  /** Retired secrets still accepted for verification */
  previousSecrets?: string[];
}

export type TokenKind = 'access' | 'refresh';

/** Protected header `typ` per token kind */
export const TOKEN_TYPES: Record<TokenKind, string> = {
  access: 'at+jwt',
  refresh: 'rt+jwt',
};

/**
 * A freshly signed token
 */
export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

/**
 * Token pair (access + refresh)
 */
export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  accessExpiresAt: Date;
  refreshExpiresAt: Date;
}

/**
 * Outcome of verifying a token. `expired` is only reported for tokens
 * whose signature and claims check out.
 */
export type TokenVerification =
  | { valid: true; identity: string; expiresAt: Date }
  | { valid: false; reason: 'expired' | 'invalid' };

/**
 * Parse duration string to seconds
 * Supports: s (seconds), m (minutes), h (hours), d (days), w (weeks)
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)(s|m|h|d|w)$/);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined) {
    throw new Error(`Invalid duration format: ${duration}. Use format like '15m', '1h', '7d'`);
  }

  const value = parseInt(amount, 10);

  switch (unit) {
    case 's':
      return value;
    case 'm':
      return value * 60;
    case 'h':
      return value * 60 * 60;
    case 'd':
      return value * 60 * 60 * 24;
    case 'w':
      return value * 60 * 60 * 24 * 7;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

/**
 * Default token lifetimes
 */
export const DEFAULT_TOKEN_TTL = {
  accessTokenTTL: '30m',
  refreshTokenTTL: '14d',
} as const;

const INVALID: TokenVerification = { valid: false, reason: 'invalid' };
const EXPIRED: TokenVerification = { valid: false, reason: 'expired' };

/**
 * Token Codec
 * Stateless: nothing here touches storage
 */
export class TokenCodec {
  private secret: Uint8Array;
  private previousSecrets: Uint8Array[];
  private readonly issuer: string;
  private readonly audience: string;
  private readonly ttlSeconds: Record<TokenKind, number>;

  constructor(config: TokenCodecConfig) {
    const encoder = new TextEncoder();
    this.secret = encoder.encode(config.secret);
    this.previousSecrets = (config.previousSecrets ?? []).map((s) => encoder.encode(s));
    this.issuer = config.issuer;
    this.audience = config.audience;
    this.ttlSeconds = {
      access: parseDuration(config.accessTokenTTL ?? DEFAULT_TOKEN_TTL.accessTokenTTL),
      refresh: parseDuration(config.refreshTokenTTL ?? DEFAULT_TOKEN_TTL.refreshTokenTTL),
    };
  }

  /**
   * Lifetime of a token kind in seconds
   */
  getTTL(kind: TokenKind): number {
    return this.ttlSeconds[kind];
  }

  private async issue(kind: TokenKind, identity: string): Promise<IssuedToken> {
    const exp = Math.floor(Date.now() / 1000) + this.ttlSeconds[kind];

    const token = await new jose.SignJWT({})
      .setProtectedHeader({ alg: 'HS256', typ: TOKEN_TYPES[kind] })
      .setSubject(identity)
      .setJti(crypto.randomUUID())
      .setIssuedAt()
      .setExpirationTime(exp)
      .setIssuer(this.issuer)
      .setAudience(this.audience)
      .sign(this.secret);

    return { token, expiresAt: new Date(exp * 1000) };
  }

  /**
   * Generate access token
   */
  issueAccessToken(identity: string): Promise<IssuedToken> {
    return this.issue('access', identity);
  }

  /**
   * Generate refresh token
   */
  issueRefreshToken(identity: string): Promise<IssuedToken> {
    return this.issue('refresh', identity);
  }

  /**
   * Generate token pair (access + refresh)
   */
  async issueTokenPair(identity: string): Promise<TokenPair> {
    const [access, refresh] = await Promise.all([
      this.issueAccessToken(identity),
      this.issueRefreshToken(identity),
    ]);

    return {
      accessToken: access.token,
      refreshToken: refresh.token,
      accessExpiresAt: access.expiresAt,
      refreshExpiresAt: refresh.expiresAt,
    };
  }

  verifyAccessToken(token: string | null | undefined): Promise<TokenVerification> {
    return this.verify('access', token);
  }

  verifyRefreshToken(token: string | null | undefined): Promise<TokenVerification> {
    return this.verify('refresh', token);
  }

  /**
   * Tries the current secret, then previous ones. jose checks the
   * signature before any claim, so only authentic tokens reach the
   * expiry check.
   */
  private async verify(
    kind: TokenKind,
    token: string | null | undefined
  ): Promise<TokenVerification> {
    if (!token) return INVALID;

    for (const secret of [this.secret, ...this.previousSecrets]) {
      try {
        const { payload } = await jose.jwtVerify(token, secret, {
          algorithms: ['HS256'],
          typ: TOKEN_TYPES[kind],
          issuer: this.issuer,
          audience: this.audience,
          requiredClaims: ['sub', 'exp', 'jti'],
        });

        if (!isValid(tokenClaims, payload)) return INVALID;

        return { valid: true, identity: payload.sub, expiresAt: new Date(payload.exp * 1000) };
      } catch (error) {
        if (error instanceof jose.errors.JWTExpired) return EXPIRED;
        // Signed with another key: try the next secret
        if (error instanceof jose.errors.JWSSignatureVerificationFailed) continue;
        return INVALID;
      }
    }

    return INVALID;
  }

  /**
   * Seconds until the token's `exp`, read without verification, rounded up
   * so a TTL built from it lasts until the token stops verifying.
   * 0 when expired or undecodable.
   */
  remainingValidity(token: string): number {
    const exp = this.decodeExpiry(token);
    if (exp === null) return 0;
    return Math.max(0, Math.ceil((exp * 1000 - Date.now()) / 1000));
  }

  private decodeExpiry(token: string): number | null {
    try {
      const { exp } = jose.decodeJwt(token);
      return typeof exp === 'number' ? exp : null;
    } catch (error) {
      if (error instanceof jose.errors.JWTInvalid) return null;
      throw error;
    }
  }
}

/**
 * Create a TokenCodec instance
 */
export function createTokenCodec(config: TokenCodecConfig): TokenCodec {
  return new TokenCodec(config);
}
