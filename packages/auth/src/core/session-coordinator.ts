/**
 * Session Coordinator
 * Login, refresh-token rotation and logout over the token codec,
 * the active-token store and the revocation list.
 *
 * A refresh token value moves through unissued -> active -> consumed,
 * or expires naturally. Consumed values stay in the revocation list until
 * their own `exp`, so a value is accepted for rotation or logout once.
 */

import { createLogger, logError, type Logger } from '@keyturn/core';
import type { LoginRequest } from '@keyturn/types';
import type { TokenCodec } from '../session/token-codec.js';
import type { TokenStore } from '../session/token-store.js';
import type { RevocationList } from '../session/revocation-list.js';
import type { UserRepository } from '../users/types.js';
import { Pbkdf2PasswordHasher, type PasswordHasher } from '../utils/password.js';
import { DEFAULT_STORAGE_TIMEOUT_MS, withTimeout } from './timeout.js';
import {
  failure,
  type AuthenticateResult,
  type Failure,
  type LoginResult,
  type LogoutResult,
  type RotateResult,
} from './results.js';

/**
 * Session coordinator dependencies
 */
export interface SessionCoordinatorConfig {
  codec: TokenCodec;
  tokenStore: TokenStore;
  revocationList: RevocationList;
  users: UserRepository;
  /** Defaults to PBKDF2 */
  passwordHasher?: PasswordHasher | undefined;
  /** Bound on each storage call in ms (default: 5000) */
  storageTimeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

export class SessionCoordinator {
  private readonly codec: TokenCodec;
  private readonly tokenStore: TokenStore;
  private readonly revocationList: RevocationList;
  private readonly users: UserRepository;
  private readonly passwordHasher: PasswordHasher;
  private readonly storageTimeoutMs: number;
  private readonly logger: Logger;

  constructor(config: SessionCoordinatorConfig) {
    this.codec = config.codec;
    this.tokenStore = config.tokenStore;
    this.revocationList = config.revocationList;
    this.users = config.users;
    this.passwordHasher = config.passwordHasher ?? new Pbkdf2PasswordHasher();
    this.storageTimeoutMs = config.storageTimeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
    this.logger = config.logger ?? createLogger({ name: 'keyturn:session' });
  }

  private store<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(fn, this.storageTimeoutMs, operation);
  }

  private storageFailure(
    error: unknown,
    operation: string,
    context?: Record<string, unknown>
  ): Failure<'STORAGE_ERROR'> {
    logError(this.logger, error, `${operation} failed: storage fault`, context);
    return failure('STORAGE_ERROR');
  }

  /**
   * Check credentials and open a session.
   * Replaces any session the identity already had.
   */
  async login(credentials: LoginRequest): Promise<LoginResult> {
    try {
      const user = await this.store('User lookup', () => this.users.findByEmail(credentials.email));

      // Unknown email and wrong password look the same from outside
      if (!user) {
        this.logger.debug('Login rejected: unknown email');
        return failure('AUTHENTICATION_FAILED');
      }

      const matches = await this.passwordHasher.matches(credentials.password, user.passwordHash);
      if (!matches) {
        this.logger.debug('Login rejected: wrong password', { identity: user.id });
        return failure('AUTHENTICATION_FAILED');
      }

      const tokens = await this.codec.issueTokenPair(user.id);
      await this.store('Session save', () => this.tokenStore.save(user.id, tokens.refreshToken));

      this.logger.debug('Login succeeded', { identity: user.id });
      return { success: true, identity: user.id, tokens };
    } catch (error) {
      return this.storageFailure(error, 'Login');
    }
  }

  /**
   * Exchange a refresh token for a new pair.
   * The presented token is revoked before the new pair is returned.
   */
  async rotate(presented: string | null | undefined): Promise<RotateResult> {
    if (!presented) return failure('REFRESH_INVALID');

    const verification = await this.codec.verifyRefreshToken(presented);
    if (!verification.valid) {
      return verification.reason === 'expired'
        ? failure('REFRESH_EXPIRED')
        : failure('REFRESH_INVALID');
    }

    const { identity } = verification;

    try {
      const active = await this.store('Session lookup', () => this.tokenStore.get(identity));
      if (active !== presented) {
        this.logger.warn('Rotation rejected: token is not the active session', {
          identity,
          hasSession: active !== null,
        });
        return failure('REFRESH_INVALID');
      }

      const revoked = await this.store('Revocation check', () =>
        this.revocationList.contains(presented)
      );
      if (revoked) {
        this.logger.warn('Rotation rejected: token already consumed', { identity });
        return failure('REFRESH_INVALID');
      }

      const tokens = await this.codec.issueTokenPair(identity);

      await this.store('Revocation write', () =>
        this.revocationList.add(presented, this.codec.remainingValidity(presented), {
          reason: 'rotated',
          identity,
        })
      );

      const swapped = await this.store('Session swap', () =>
        this.tokenStore.replace(identity, presented, tokens.refreshToken)
      );
      if (!swapped) {
        this.logger.warn('Rotation rejected: concurrent rotation won', { identity });
        return failure('REFRESH_INVALID');
      }

      this.logger.debug('Rotation succeeded', { identity });
      return { success: true, identity, tokens };
    } catch (error) {
      return this.storageFailure(error, 'Rotation', { identity });
    }
  }

  /**
   * End the session. Both tokens must verify and name the same identity.
   */
  async logout(
    accessToken: string | null | undefined,
    refreshToken: string | null | undefined
  ): Promise<LogoutResult> {
    if (!refreshToken) return failure('INVALID_TOKEN');

    const [access, refresh] = await Promise.all([
      this.codec.verifyAccessToken(accessToken),
      this.codec.verifyRefreshToken(refreshToken),
    ]);
    if (!access.valid || !refresh.valid) return failure('INVALID_TOKEN');

    const { identity } = refresh;
    if (access.identity !== identity) {
      this.logger.warn('Logout rejected: token identities differ', {
        accessIdentity: access.identity,
        refreshIdentity: identity,
      });
      return failure('INVALID_TOKEN');
    }

    try {
      const revoked = await this.store('Revocation check', () =>
        this.revocationList.contains(refreshToken)
      );
      if (revoked) {
        this.logger.warn('Logout rejected: token already consumed', { identity });
        return failure('INVALID_TOKEN');
      }

      await this.store('Session delete', () => this.tokenStore.delete(identity));

      const remaining = this.codec.remainingValidity(refreshToken);
      if (remaining > 0) {
        await this.store('Revocation write', () =>
          this.revocationList.add(refreshToken, remaining, { reason: 'logout', identity })
        );
      }

      this.logger.debug('Logout succeeded', { identity });
      return { success: true, identity };
    } catch (error) {
      return this.storageFailure(error, 'Logout', { identity });
    }
  }

  /**
   * Resolve a bearer access token to its identity
   */
  async authenticate(accessToken: string | null | undefined): Promise<AuthenticateResult> {
    const verification = await this.codec.verifyAccessToken(accessToken);
    if (!verification.valid) {
      return verification.reason === 'expired'
        ? failure('TOKEN_EXPIRED')
        : failure('INVALID_TOKEN');
    }

    return { success: true, identity: verification.identity, expiresAt: verification.expiresAt };
  }
}

/**
 * Create a session coordinator
 */
export function createSessionCoordinator(config: SessionCoordinatorConfig): SessionCoordinator {
  return new SessionCoordinator(config);
}
