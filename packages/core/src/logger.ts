/**
 * @module
 * Structured logging for Keyturn services. Entries pass through field
 * redaction before any transport sees them, so tokens, passwords and
 * cookies never reach the output.
 *
 * @example
 * ```typescript
 * import { createLogger } from '@keyturn/core';
 *
 * const log = createLogger({ name: 'keyturn:session', level: 'DEBUG' });
 *
 * log.debug('Rotation succeeded', { identity: 'u-1' });
 * log.error('Session write failed', error, { identity: 'u-1' });
 *
 * const storeLog = log.child({ store: 'redis' });
 * ```
 */

import { getEnv } from "./env.js";
import { ConsoleTransport } from "./transports/console.js";
import type { LogTransport } from "./transports/types.js";

export { ConsoleTransport, type ConsoleTransportOptions } from "./transports/console.js";
export type { LogTransport } from "./transports/types.js";

/** Numeric severities; an entry is written when its value reaches the logger's */
export const LogLevel = {
  TRACE: 10,
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
  FATAL: 60,
  SILENT: 100,
} as const;

export type LogLevelName = keyof typeof LogLevel;
export type LogLevelValue = (typeof LogLevel)[LogLevelName];

/**
 * Level name from a string such as LOG_LEVEL, ignoring case
 */
export function parseLevelName(value: string | undefined): LogLevelName | undefined {
  if (!value) return undefined;
  const upper = value.toUpperCase();
  return Object.keys(LogLevel).find((name): name is LogLevelName => name === upper);
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack: string | undefined;
}

/** What a transport receives for each written entry */
export interface LogEntry {
  level: LogLevelName;
  levelValue: LogLevelValue;
  message: string;
  /** ISO 8601 unless the logger was given its own clock */
  timestamp: string;
  context: Record<string, unknown> | undefined;
  error: ErrorInfo | undefined;
}

export interface LoggerConfig {
  /** Minimum level (default: LOG_LEVEL, else INFO) */
  level: LogLevelName | undefined;
  /** Written as `module` in every entry */
  name: string | undefined;
  context: Record<string, unknown> | undefined;
  /** Default: a single ConsoleTransport */
  transports: LogTransport[] | undefined;
  /** Passed to the default ConsoleTransport */
  pretty: boolean | undefined;
  /** Extra fields to redact; dotted paths reach into nested objects */
  redact: string[] | undefined;
  /** `false` leaves timestamps empty */
  timestamp: false | (() => string) | undefined;
}

type Context = Record<string, unknown>;

const REDACTED = "[REDACTED]";

const DEFAULT_REDACT_FIELDS = [
  "password",
  "passwordHash",
  "secret",
  "token",
  "accessToken",
  "refreshToken",
  "authorization",
  "cookie",
];

function isContext(value: unknown): value is Context {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Copy of `context` with the value at `path` replaced. Objects along the
 * path are copied, the caller's context is left untouched.
 */
function redactPath(context: Context, path: readonly string[]): Context {
  const [head, ...rest] = path;
  if (head === undefined || !(head in context)) return context;

  if (rest.length === 0) {
    return { ...context, [head]: REDACTED };
  }

  const nested = context[head];
  if (!isContext(nested)) return context;
  return { ...context, [head]: redactPath(nested, rest) };
}

function toErrorInfo(error: Error): ErrorInfo {
  return { name: error.name, message: error.message, stack: error.stack };
}

/**
 * Leveled logger writing structured entries to one or more transports.
 */
export class Logger {
  private readonly levelName: LogLevelName;
  private readonly name: string | undefined;
  private readonly context: Context;
  private readonly transports: LogTransport[];
  private readonly redactPaths: string[][];
  private readonly redactFields: string[];
  private readonly now: () => string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.levelName = config.level ?? parseLevelName(getEnv("LOG_LEVEL")) ?? "INFO";
    this.name = config.name;
    this.context = config.context ?? {};
    this.transports = config.transports ?? [
      new ConsoleTransport(config.pretty === undefined ? {} : { pretty: config.pretty }),
    ];
    this.redactFields = [...new Set([...DEFAULT_REDACT_FIELDS, ...(config.redact ?? [])])];
    this.redactPaths = this.redactFields.map((field) => field.split("."));

    const timestamp = config.timestamp;
    this.now =
      timestamp === false ? () => "" : (timestamp ?? (() => new Date().toISOString()));
  }

  /**
   * Logger sharing this one's level, transports and redaction, with extra context
   */
  child(context: Context): Logger {
    return new Logger({
      level: this.levelName,
      name: this.name,
      context: { ...this.context, ...context },
      transports: this.transports,
      redact: this.redactFields,
      timestamp: this.now,
    });
  }

  isLevelEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= LogLevel[this.levelName] && level !== "SILENT";
  }

  trace(message: string, context?: Context): void {
    this.write("TRACE", message, context);
  }

  debug(message: string, context?: Context): void {
    this.write("DEBUG", message, context);
  }

  info(message: string, context?: Context): void {
    this.write("INFO", message, context);
  }

  warn(message: string, context?: Context): void {
    this.write("WARN", message, context);
  }

  /**
   * The second argument is either the error or, when no error exists, the context.
   */
  error(message: string, error?: unknown, context?: Context): void {
    this.writeFailure("ERROR", message, error, context);
  }

  fatal(message: string, error?: unknown, context?: Context): void {
    this.writeFailure("FATAL", message, error, context);
  }

  private writeFailure(
    level: "ERROR" | "FATAL",
    message: string,
    error: unknown,
    context: Context | undefined
  ): void {
    if (error instanceof Error) {
      this.write(level, message, context, error);
    } else {
      this.write(level, message, isContext(error) ? error : context);
    }
  }

  private write(level: LogLevelName, message: string, context?: Context, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    let merged: Context = {
      ...this.context,
      ...(this.name ? { module: this.name } : {}),
      ...context,
    };
    for (const path of this.redactPaths) {
      merged = redactPath(merged, path);
    }

    const entry: LogEntry = {
      level,
      levelValue: LogLevel[level],
      message,
      timestamp: this.now(),
      context: Object.keys(merged).length > 0 ? merged : undefined,
      error: error ? toErrorInfo(error) : undefined,
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  return new Logger(config);
}

/**
 * Log a caught value at ERROR. Non-Error values are stringified into the context.
 *
 * @example
 * ```typescript
 * try {
 *   await tokenStore.save(identity, refreshToken);
 * } catch (error) {
 *   logError(log, error, 'Login failed: storage fault', { identity });
 * }
 * ```
 */
export function logError(log: Logger, error: unknown, message: string, context?: Context): void {
  if (error instanceof Error) {
    log.error(message, error, context);
  } else {
    log.error(message, { error: String(error), ...context });
  }
}
