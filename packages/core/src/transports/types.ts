/**
 * @keyturn/core - Transport Types
 */

import type { LogEntry } from "../logger.js";

/**
 * Destination for log entries. Entries arrive already filtered by level
 * and redacted.
 */
export interface LogTransport {
  readonly name: string;
  log(entry: LogEntry): void;
}
