/**
 * @keyturn/core - Transports
 */

export type { LogTransport } from "./types.js";
export {
  ConsoleTransport,
  formatJson,
  formatPretty,
  type ConsoleTransportOptions,
} from "./console.js";
