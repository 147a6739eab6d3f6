/**
 * Retry logic with exponential backoff.
 *
 * Sleeps between attempts are abortable, and a CancelledError is never retried.
 */

import { CancelledError } from './errors.js';
import { sleep, throwIfAborted } from './async-utils.js';
import { createLogger } from './logger.js';

const log = createLogger('retry');

/** Retry options */
export interface RetryOptions {
  /** Maximum number of retries. Default: 3 */
  maxRetries?: number;
  /** Initial delay in ms. Default: 500 */
  initialDelayMs?: number;
  /** Maximum delay in ms. Default: 8000 */
  maxDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Errors to retry on. Default: all errors */
  retryOn?: (error: Error) => boolean;
  /** Abort waiting and further attempts. */
  signal?: AbortSignal;
}

/**
 * Calculate exponential backoff delay.
 */
export function calculateBackoff(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, attempt);
  return Math.min(delay, maxDelayMs);
}

/**
 * Execute a function with retry logic.
 *
 * @param operation - Name used in log lines
 * @param fn - Receives the zero-based attempt number
 * @throws The last error once retries are exhausted or `retryOn` declines it
 */
export async function withRetry<T>(
  operation: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 500,
    maxDelayMs = 8000,
    backoffFactor = 2,
    retryOn = () => true,
    signal,
  } = options;

  let lastError: Error = new Error(`${operation} did not run`);

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      const delay = calculateBackoff(attempt - 1, initialDelayMs, maxDelayMs, backoffFactor);
      log.info(`Retrying ${operation}`, { attempt, delay, maxRetries });
      await sleep(delay, signal);
    }
    throwIfAborted(signal);

    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (lastError instanceof CancelledError || !retryOn(lastError)) {
        throw lastError;
      }

      log.warn(`${operation} failed`, {
        attempt,
        maxRetries,
        error: lastError.message,
      });
    }
  }

  log.error(`${operation} retries exhausted`, { maxRetries, error: lastError.message });
  throw lastError;
}
