/**
 * @module
 * ArkType schemas for Keyturn request bodies, token claims and configuration,
 * plus helpers that turn ArkType errors into field messages.
 *
 * @example
 * ```typescript
 * import { registerRequest, type } from '@keyturn/types';
 *
 * const input = registerRequest(body);
 * if (input instanceof type.errors) {
 *   return c.json({ details: formatErrors(input) }, 400);
 * }
 * ```
 */

import { type, type Type } from "arktype";

export { type } from "arktype";
export type { Type } from "arktype";

export * from "./common.js";
export * from "./auth.js";

/** Dotted path of an error, "root" when the value itself failed */
function fieldOf(error: type.errors[number]): string {
  return error.path.join(".") || "root";
}

function describeErrors(errors: type.errors): string[] {
  return errors.map((error) => `${fieldOf(error)}: ${error.message}`);
}

/**
 * @throws Error listing one `field: message` line per problem
 */
export function validateWithSchema<T extends Type>(schema: T, data: unknown): T["infer"] {
  const result = schema(data);
  if (result instanceof type.errors) {
    throw new Error(`Validation failed:\n${describeErrors(result).join("\n")}`);
  }
  return result;
}

export function safeValidate<T extends Type>(
  schema: T,
  data: unknown
): { success: true; data: T["infer"] } | { success: false; errors: string[] } {
  const result = schema(data);
  if (result instanceof type.errors) {
    return { success: false, errors: describeErrors(result) };
  }
  return { success: true, data: result };
}

/**
 * Type guard form of a schema check
 *
 * @example
 * ```typescript
 * if (isValid(tokenClaims, payload)) {
 *   payload.sub;
 * }
 * ```
 */
export function isValid<T extends Type>(schema: T, data: unknown): data is T["infer"] {
  return !(schema(data) instanceof type.errors);
}

/**
 * Field path to message, the `details` of a VALIDATION_FAILED response.
 * The first message wins when a field fails more than once.
 */
export function formatErrors(errors: type.errors): Record<string, string> {
  const formatted: Record<string, string> = {};
  for (const error of errors) {
    const field = fieldOf(error);
    formatted[field] ??= error.message;
  }
  return formatted;
}
