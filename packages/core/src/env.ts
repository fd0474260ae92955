/**
 * @keyturn/core - Environment
 * Reads process.env. An empty variable counts as unset.
 */

import { ValidationError, type ValidationErrorDetail } from "./errors.js";

export type EnvMode = "development" | "production" | "test";

/**
 * Read a variable, falling back when it is unset or empty
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? defaultValue : value;
}

/**
 * @throws ValidationError when the variable is unset or empty
 */
export function requireEnv(key: string): string {
  const value = getEnv(key);
  if (value === undefined) {
    throw missing([key]);
  }
  return value;
}

/**
 * Read a number; anything that is not a finite number is rejected
 */
export function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnv(key);
  if (value === undefined) return defaultValue;

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`Environment variable "${key}" must be a number`, [
      { field: key, message: "must be a number" },
    ]);
  }
  return parsed;
}

/**
 * Read a comma separated list, dropping blank items
 */
export function getEnvArray(key: string, defaultValue: string[] = []): string[] {
  const value = getEnv(key);
  if (value === undefined) return defaultValue;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/** NODE_ENV, with anything unknown read as development */
export function getEnvMode(): EnvMode {
  const mode = getEnv("NODE_ENV");
  return mode === "production" || mode === "test" ? mode : "development";
}

export function isDevelopment(): boolean {
  return getEnvMode() === "development";
}

function missing(keys: string[]): ValidationError {
  const errors: ValidationErrorDetail[] = keys.map((field) => ({ field, message: "is not set" }));
  const message =
    keys.length === 1
      ? `Required environment variable "${keys[0]}" is not set`
      : `Required environment variables are not set: ${keys.join(", ")}`;
  return new ValidationError(message, errors);
}

type EnvVariable =
  | { type?: "string"; required?: boolean; default?: string }
  | { type: "number"; required?: boolean; default?: number }
  | { type: "array"; required?: boolean; default?: string[] };

type EnvSchema = Record<string, EnvVariable>;

type EnvValue<V extends EnvVariable> = V extends { type: "number" }
  ? V extends { default: number } | { required: true }
    ? number
    : number | undefined
  : V extends { type: "array" }
    ? string[]
    : V extends { default: string } | { required: true }
      ? string
      : string | undefined;

type EnvResult<T extends EnvSchema> = { [K in keyof T]: EnvValue<T[K]> };

/**
 * Read a set of variables at once. Every missing required variable is
 * reported in a single error.
 *
 * @example
 * ```typescript
 * const env = createEnvConfig({
 *   KEYTURN_SECRET: { required: true },
 *   KEYTURN_STORAGE_TIMEOUT_MS: { type: 'number', default: 5000 },
 *   KEYTURN_PREVIOUS_SECRETS: { type: 'array' },
 * });
 * ```
 */
export function createEnvConfig<const T extends EnvSchema>(schema: T): EnvResult<T> {
  const result: Record<string, unknown> = {};
  const absent: string[] = [];

  for (const [key, variable] of Object.entries(schema)) {
    let value: string | number | string[] | undefined;
    switch (variable.type) {
      case "number":
        value = getEnvNumber(key, variable.default);
        break;
      case "array":
        value = getEnvArray(key, variable.default);
        break;
      default:
        value = getEnv(key, variable.default);
    }

    if (variable.required && value === undefined) {
      absent.push(key);
    }
    result[key] = value;
  }

  if (absent.length > 0) {
    throw missing(absent);
  }

  return result as EnvResult<T>;
}
