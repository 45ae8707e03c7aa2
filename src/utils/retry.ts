/**
 * Retry Logic with Exponential Backoff
 *
 * Used around navigation, where resets and gateway errors are transient.
 */

import { logger } from './logger.js';
import { sleep } from './timeouts.js';

const log = logger.create('Retry');

export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /** @default 500 */
  initialDelayMs?: number;

  /** @default 5000 */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs)
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Return true to retry, false to throw immediately.
   * @default Network errors, connection resets and 502/503/504
   */
  retryOn?: (error: Error) => boolean;

  /** Stops retrying once aborted */
  signal?: AbortSignal;
}

export function isTransientError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('net::err_connection') ||
    message.includes('net::err_network') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('socket hang up') ||
    message.includes('503') ||
    message.includes('502') ||
    message.includes('504')
  );
}

/**
 * Execute an async function with automatic retry on failure.
 *
 * @example
 * ```typescript
 * const response = await withRetry(() => page.goto(url), { maxAttempts: 2 });
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? 3;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;
  const retryOn = options.retryOn ?? isTransientError;
  let delay = options.initialDelayMs ?? 500;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxAttempts || options.signal?.aborted || !retryOn(lastError)) {
        throw lastError;
      }

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await sleep(delay);
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
