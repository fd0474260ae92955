export {
  normalizeEmail,
  toPublicUser,
  type UserRecord,
  type CreateUserInput,
  type UpdateUserInput,
  type UserRepository,
} from './types.js';
export { MemoryUserRepository } from './memory.js';
