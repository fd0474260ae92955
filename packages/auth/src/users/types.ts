/**
 * Credential store contract
 */

import type { PublicUser } from '@keyturn/types';

/**
 * Stored user, including the password hash
 */
export interface UserRecord {
  id: string;
  email: string;
  passwordHash: string;
  name: string;
  weight: number | null;
  dailyCaffeineLimit: number | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Create user input
 */
export interface CreateUserInput {
  email: string;
  passwordHash: string;
  name: string;
  weight?: number | undefined;
  dailyCaffeineLimit?: number | undefined;
}

/**
 * Update user input; absent fields are left alone
 */
export interface UpdateUserInput {
  email?: string | undefined;
  name?: string | undefined;
  weight?: number | undefined;
  dailyCaffeineLimit?: number | undefined;
}

/**
 * User repository.
 * `create` and `update` throw `DuplicateError` when the email is taken;
 * infrastructure faults surface as `StorageError` or `DatabaseError`.
 */
export interface UserRepository {
  findByEmail(email: string): Promise<UserRecord | null>;
  existsByEmail(email: string): Promise<boolean>;
  findById(id: string): Promise<UserRecord | null>;
  findIdByEmail(email: string): Promise<string | null>;
  create(input: CreateUserInput): Promise<UserRecord>;
  /** @returns null when no user has this id */
  update(id: string, input: UpdateUserInput): Promise<UserRecord | null>;
}

/**
 * Canonical form used for storage and lookups
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Strip the password hash for responses
 */
export function toPublicUser(user: UserRecord): PublicUser {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    weight: user.weight,
    dailyCaffeineLimit: user.dailyCaffeineLimit,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}
