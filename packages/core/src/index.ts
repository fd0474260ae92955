/**
 * @module
 * Shared building blocks for Keyturn packages: environment access,
 * structured logging, error classes and the error-code catalog.
 *
 * @example
 * ```typescript
 * import { createLogger, getEnv, StorageError, getStatusForCode } from '@keyturn/core';
 *
 * const log = createLogger({ name: 'keyturn:session' });
 * log.info('Session store ready', { driver: getEnv('KEYTURN_STORAGE', 'memory') });
 *
 * getStatusForCode('REFRESH_INVALID'); // 401
 * ```
 */

// ============================================
// ENVIRONMENT
// ============================================

export {
  getEnv,
  requireEnv,
  getEnvNumber,
  getEnvArray,
  getEnvMode,
  isDevelopment,
  createEnvConfig,
  type EnvMode,
} from "./env.js";

// ============================================
// LOGGING
// ============================================

export {
  Logger,
  LogLevel,
  createLogger,
  logError,
  parseLevelName,
  type LogLevelName,
  type LogLevelValue,
  type LogEntry,
  type LoggerConfig,
  type ErrorInfo,
} from "./logger.js";

export {
  ConsoleTransport,
  formatJson,
  formatPretty,
  type ConsoleTransportOptions,
  type LogTransport,
} from "./transports/index.js";

// ============================================
// ERRORS
// ============================================

export * from "./errors.js";

// ============================================
// ERROR CODES
// ============================================

export {
  ErrorCodes,
  getErrorCode,
  getErrorCodesByCategory,
  isRetryableError,
  getStatusForCode,
  type ErrorCode,
  type ErrorCategory,
  type ErrorCodeDefinition,
} from "./error-codes.js";
