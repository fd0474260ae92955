/**
 * Storage call timeouts
 */

import { StorageError } from '@keyturn/core';

/** Default bound on a single storage call */
export const DEFAULT_STORAGE_TIMEOUT_MS = 5000;

/**
 * A storage call exceeded its timeout.
 */
export class StorageTimeoutError extends StorageError {
  /** The timeout value in milliseconds that was exceeded */
  readonly timeout: number;

  constructor(timeout: number, operation: string) {
    super(`${operation} timed out after ${timeout}ms`, undefined, { operation, timeout });
    this.name = 'StorageTimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Execute a function with a timeout.
 * The underlying call is not cancelled; its late result is ignored.
 *
 * @param fn - The function to execute
 * @param timeoutMs - Timeout in milliseconds
 * @param operation - Name used in the error message
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number = DEFAULT_STORAGE_TIMEOUT_MS,
  operation = 'Storage call'
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new StorageTimeoutError(timeoutMs, operation));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}
