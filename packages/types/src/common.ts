/**
 * @module
 * Primitive schemas and the failure envelope every Keyturn endpoint answers with.
 */

import { type } from "arktype";

export const uuid = type("string.uuid");

/** ISO 8601 timestamp string */
export const timestamp = type("string.date.iso");

export const email = type("string.email");

export const nonEmptyString = type("string >= 1");

export const nonNegativeInt = type("number.integer >= 0");

/** "30s", "15m", "1h", "14d" or "2w" */
export const duration = type(/^\d+[smhdw]$/);

/**
 * Body of every failed request. `details` maps field paths to messages
 * and is only present for validation failures.
 */
export const failureResponse = type({
  success: "false",
  error: "string",
  errorCode: "string",
  "details?": "Record<string, string>",
});

export type UUID = typeof uuid.infer;
export type Timestamp = typeof timestamp.infer;
export type Email = typeof email.infer;
export type Duration = typeof duration.infer;
export type FailureResponse = typeof failureResponse.infer;
