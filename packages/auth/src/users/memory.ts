/**
 * In-memory user repository for tests and development
 */

import { DuplicateError } from '@keyturn/core';
import {
  normalizeEmail,
  type CreateUserInput,
  type UpdateUserInput,
  type UserRecord,
  type UserRepository,
} from './types.js';

export class MemoryUserRepository implements UserRepository {
  private users = new Map<string, UserRecord>();

  private findRecordByEmail(email: string): UserRecord | undefined {
    const normalized = normalizeEmail(email);
    for (const user of this.users.values()) {
      if (user.email === normalized) return user;
    }
    return undefined;
  }

  async findByEmail(email: string): Promise<UserRecord | null> {
    const user = this.findRecordByEmail(email);
    return user ? { ...user } : null;
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.findRecordByEmail(email) !== undefined;
  }

  async findById(id: string): Promise<UserRecord | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  async findIdByEmail(email: string): Promise<string | null> {
    return this.findRecordByEmail(email)?.id ?? null;
  }

  async create(input: CreateUserInput): Promise<UserRecord> {
    if (this.findRecordByEmail(input.email)) {
      throw new DuplicateError('User', 'email');
    }

    const now = new Date();
    const user: UserRecord = {
      id: crypto.randomUUID(),
      email: normalizeEmail(input.email),
      passwordHash: input.passwordHash,
      name: input.name,
      weight: input.weight ?? null,
      dailyCaffeineLimit: input.dailyCaffeineLimit ?? null,
      createdAt: now,
      updatedAt: now,
    };

    this.users.set(user.id, user);
    return { ...user };
  }

  async update(id: string, input: UpdateUserInput): Promise<UserRecord | null> {
    const user = this.users.get(id);
    if (!user) return null;

    if (input.email !== undefined) {
      const owner = this.findRecordByEmail(input.email);
      if (owner && owner.id !== id) {
        throw new DuplicateError('User', 'email');
      }
    }

    const updated: UserRecord = {
      ...user,
      email: input.email !== undefined ? normalizeEmail(input.email) : user.email,
      name: input.name ?? user.name,
      weight: input.weight ?? user.weight,
      dailyCaffeineLimit: input.dailyCaffeineLimit ?? user.dailyCaffeineLimit,
      updatedAt: new Date(),
    };

    this.users.set(id, updated);
    return { ...updated };
  }

  /**
   * Number of stored users
   */
  get size(): number {
    return this.users.size;
  }
}
