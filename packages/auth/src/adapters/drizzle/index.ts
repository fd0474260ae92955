/**
 * Drizzle ORM user repository (PostgreSQL)
 */

import { eq } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { DuplicateError } from '@keyturn/core';
import { isUniqueViolation, toDatabaseError } from '@keyturn/database';
import { isValid, uuid } from '@keyturn/types';
import {
  normalizeEmail,
  type CreateUserInput,
  type UpdateUserInput,
  type UserRecord,
  type UserRepository,
} from '../../users/types.js';
import { users, type UserRow } from './schema.js';

export { users, type UserRow, type NewUserRow } from './schema.js';

/**
 * Drizzle database instance accepted by the repository
 */
export type DrizzleDatabase = PostgresJsDatabase;

/**
 * Convert a row to a user record
 */
function toUserRecord(row: UserRow): UserRecord {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.passwordHash,
    name: row.name,
    weight: row.weight,
    dailyCaffeineLimit: row.dailyCaffeineLimit,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Map a driver failure: unique violations on `users.email` become
 * `DuplicateError`, everything else a `DatabaseError`
 */
function mapWriteError(err: unknown, message: string): Error {
  if (isUniqueViolation(err)) {
    return new DuplicateError('User', 'email');
  }
  return toDatabaseError(err, message);
}

/**
 * User repository backed by Drizzle ORM.
 * The `users.email` unique constraint is the final duplicate guard.
 */
export class DrizzleUserRepository implements UserRepository {
  constructor(private readonly db: DrizzleDatabase) {}

  async findByEmail(email: string): Promise<UserRecord | null> {
    try {
      const [row] = await this.db
        .select()
        .from(users)
        .where(eq(users.email, normalizeEmail(email)))
        .limit(1);
      return row ? toUserRecord(row) : null;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to find user by email');
    }
  }

  async existsByEmail(email: string): Promise<boolean> {
    return (await this.findIdByEmail(email)) !== null;
  }

  async findById(id: string): Promise<UserRecord | null> {
    // Not a uuid: the column type would reject it
    if (!isValid(uuid, id)) return null;

    try {
      const [row] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
      return row ? toUserRecord(row) : null;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to find user by id');
    }
  }

  async findIdByEmail(email: string): Promise<string | null> {
    try {
      const [row] = await this.db
        .select({ id: users.id })
        .from(users)
        .where(eq(users.email, normalizeEmail(email)))
        .limit(1);
      return row?.id ?? null;
    } catch (err) {
      throw toDatabaseError(err, 'Failed to find user id by email');
    }
  }

  async create(input: CreateUserInput): Promise<UserRecord> {
    let row: UserRow | undefined;
    try {
      [row] = await this.db
        .insert(users)
        .values({
          email: normalizeEmail(input.email),
          passwordHash: input.passwordHash,
          name: input.name,
          weight: input.weight ?? null,
          dailyCaffeineLimit: input.dailyCaffeineLimit ?? null,
        })
        .returning();
    } catch (err) {
      throw mapWriteError(err, 'Failed to create user');
    }

    if (!row) {
      throw toDatabaseError(new Error('Insert returned no row'), 'Failed to create user');
    }
    return toUserRecord(row);
  }

  async update(id: string, input: UpdateUserInput): Promise<UserRecord | null> {
    if (!isValid(uuid, id)) return null;

    try {
      const [row] = await this.db
        .update(users)
        .set({
          email: input.email !== undefined ? normalizeEmail(input.email) : undefined,
          name: input.name,
          weight: input.weight,
          dailyCaffeineLimit: input.dailyCaffeineLimit,
          updatedAt: new Date(),
        })
        .where(eq(users.id, id))
        .returning();
      return row ? toUserRecord(row) : null;
    } catch (err) {
      throw mapWriteError(err, 'Failed to update user');
    }
  }
}

/**
 * Create a Drizzle user repository
 */
export function createDrizzleUserRepository(db: DrizzleDatabase): DrizzleUserRepository {
  return new DrizzleUserRepository(db);
}
