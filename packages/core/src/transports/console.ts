/**
 * @keyturn/core - Console Transport
 * Colored single-line output in development, one JSON object per line elsewhere.
 */

import { isDevelopment } from "../env.js";
import type { LogEntry, LogLevelName } from "../logger.js";
import type { LogTransport } from "./types.js";

export interface ConsoleTransportOptions {
  /** Human-readable lines (default: NODE_ENV is development) */
  pretty?: boolean;
  /** ANSI colors in pretty mode (default: stdout is a TTY) */
  colors?: boolean;
}

const COLORS: Record<LogLevelName, string> = {
  TRACE: "\x1b[90m",
  DEBUG: "\x1b[36m",
  INFO: "\x1b[32m",
  WARN: "\x1b[33m",
  ERROR: "\x1b[31m",
  FATAL: "\x1b[35m",
  SILENT: "",
};

const RESET = "\x1b[0m";

/**
 * JSON line with `level`, `time`, `msg`, the context fields and `err`
 */
export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    time: entry.timestamp,
    msg: entry.message,
    ...entry.context,
    ...(entry.error ? { err: entry.error } : {}),
  });
}

/**
 * `[HH:MM:SS] LEVEL message {context}`
 */
export function formatPretty(entry: LogEntry, colors: boolean): string {
  const time = entry.timestamp.slice(11, 19) || entry.timestamp;
  const level = entry.level.padEnd(5);
  const label = colors ? `${COLORS[entry.level]}[${time}] ${level}${RESET}` : `[${time}] ${level}`;
  const context = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
  return `${label} ${entry.message}${context}`;
}

export class ConsoleTransport implements LogTransport {
  readonly name = "console";

  private readonly pretty: boolean;
  private readonly colors: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.pretty = options.pretty ?? isDevelopment();
    this.colors = options.colors ?? process.stdout.isTTY === true;
  }

  log(entry: LogEntry): void {
    if (!this.pretty) {
      console.log(formatJson(entry));
      return;
    }

    const line = formatPretty(entry, this.colors);
    switch (entry.level) {
      case "FATAL":
      case "ERROR":
        console.error(entry.error?.stack ? `${line}\n${entry.error.stack}` : line);
        break;
      case "WARN":
        console.warn(line);
        break;
      case "TRACE":
      case "DEBUG":
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  }
}
