/**
 * Core Module
 * Session coordination, account operations and wiring
 */

export {
  SessionCoordinator,
  createSessionCoordinator,
  type SessionCoordinatorConfig,
} from './session-coordinator.js';

export {
  AccountService,
  createAccountService,
  type AccountServiceConfig,
} from './account-service.js';

export { createKeyturnAuth, type KeyturnAuth } from './keyturn-auth.js';

export {
  withTimeout,
  StorageTimeoutError,
  DEFAULT_STORAGE_TIMEOUT_MS,
} from './timeout.js';

export {
  failure,
  RESULT_MESSAGES,
  type ResultErrorCode,
  type Failure,
  type LoginResult,
  type RotateResult,
  type LogoutResult,
  type AuthenticateResult,
  type RegisterResult,
  type UserInfoResult,
  type EditUserInfoResult,
} from './results.js';
