/**
 * Account Service
 * Registration and profile access over the credential store
 */

import { createLogger, DuplicateError, logError, type Logger } from '@keyturn/core';
import type { EditUserInfoRequest, RegisterRequest } from '@keyturn/types';
import { toPublicUser, type UserRepository } from '../users/types.js';
import { Pbkdf2PasswordHasher, type PasswordHasher } from '../utils/password.js';
import { DEFAULT_STORAGE_TIMEOUT_MS, withTimeout } from './timeout.js';
import {
  failure,
  type EditUserInfoResult,
  type Failure,
  type RegisterResult,
  type UserInfoResult,
} from './results.js';

/**
 * Account service dependencies
 */
export interface AccountServiceConfig {
  users: UserRepository;
  /** Defaults to PBKDF2 */
  passwordHasher?: PasswordHasher | undefined;
  /** Bound on each store call in ms (default: 5000) */
  storageTimeoutMs?: number | undefined;
  logger?: Logger | undefined;
}

export class AccountService {
  private readonly users: UserRepository;
  private readonly passwordHasher: PasswordHasher;
  private readonly storageTimeoutMs: number;
  private readonly logger: Logger;

  constructor(config: AccountServiceConfig) {
    this.users = config.users;
    this.passwordHasher = config.passwordHasher ?? new Pbkdf2PasswordHasher();
    this.storageTimeoutMs = config.storageTimeoutMs ?? DEFAULT_STORAGE_TIMEOUT_MS;
    this.logger = config.logger ?? createLogger({ name: 'keyturn:account' });
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
   * Create a user. Nothing is written when the email is taken.
   */
  async register(input: RegisterRequest): Promise<RegisterResult> {
    try {
      if (await this.store('Email check', () => this.users.existsByEmail(input.email))) {
        return failure('DUPLICATE_EMAIL');
      }

      const passwordHash = await this.passwordHasher.hash(input.password);
      const user = await this.store('User create', () =>
        this.users.create({
          email: input.email,
          passwordHash,
          name: input.name,
          weight: input.weight,
          dailyCaffeineLimit: input.dailyCaffeineLimit,
        })
      );

      this.logger.debug('User registered', { identity: user.id });
      return { success: true, user: toPublicUser(user) };
    } catch (error) {
      // Lost a unique-email race inside the store
      if (error instanceof DuplicateError) return failure('DUPLICATE_EMAIL');
      return this.storageFailure(error, 'Registration');
    }
  }

  async getUserInfo(identity: string): Promise<UserInfoResult> {
    try {
      const user = await this.store('User lookup', () => this.users.findById(identity));
      if (!user) return failure('USER_NOT_FOUND');
      return { success: true, user: toPublicUser(user) };
    } catch (error) {
      return this.storageFailure(error, 'User lookup', { identity });
    }
  }

  /**
   * Update the present fields. Keeping one's own email is not a conflict.
   */
  async editUserInfo(identity: string, changes: EditUserInfoRequest): Promise<EditUserInfoResult> {
    try {
      const current = await this.store('User lookup', () => this.users.findById(identity));
      if (!current) return failure('USER_NOT_FOUND');

      if (changes.email !== undefined) {
        const email = changes.email;
        const owner = await this.store('Email check', () => this.users.findIdByEmail(email));
        if (owner !== null && owner !== identity) {
          this.logger.debug('Edit rejected: email owned by another user', { identity });
          return failure('DUPLICATE_EMAIL');
        }
      }

      const user = await this.store('User update', () =>
        this.users.update(identity, {
          email: changes.email,
          name: changes.name,
          weight: changes.weight,
          dailyCaffeineLimit: changes.dailyCaffeineLimit,
        })
      );
      if (!user) return failure('USER_NOT_FOUND');

      this.logger.debug('User updated', { identity });
      return { success: true, user: toPublicUser(user) };
    } catch (error) {
      if (error instanceof DuplicateError) return failure('DUPLICATE_EMAIL');
      return this.storageFailure(error, 'User update', { identity });
    }
  }
}

/**
 * Create an account service
 */
export function createAccountService(config: AccountServiceConfig): AccountService {
  return new AccountService(config);
}
