/**
 * Timeouts and bounded retries for upstream calls
 *
 * Every external call in the core (embeddings, generation) runs inside
 * withTimeout; transient failures are retried by the component that issued
 * the call with exponential backoff and jitter, then surface.
 */

import { isTransient, errorMessage } from '../errors.js';
import { logWarn, type LogContext } from './logger.js';

export interface RetryConfig {
  /** Total attempts including the first call */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  attempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

/**
 * Race a promise against a timer
 *
 * The timer is cleared as soon as the promise settles, so nothing is left
 * pending once the caller has its result.
 *
 * @param onTimeout - Builds the error thrown on expiry (a transient kind)
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/**
 * Calculate exponential backoff delay with jitter
 *
 * Formula: min(baseMs * 2^attempt, maxMs) + 0-20% random jitter
 *
 * Example progression (base 500ms):
 * - Attempt 0: 500-600ms
 * - Attempt 1: 1000-1200ms
 * - Attempt 2: 2000-2400ms
 *
 * @param attempt - Zero-indexed retry number (0 = first retry)
 */
export function calculateBackoffWithJitter(attempt: number, baseMs: number, maxMs: number): number {
  const exponentialDelay = Math.min(baseMs * Math.pow(2, attempt), maxMs);
  const jitter = exponentialDelay * 0.2 * Math.random();
  return Math.floor(exponentialDelay + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Label used in log lines, e.g. "embed" or "generate" */
  operation: string;
  /** Decides whether an error is retried (default: transient OutreachError kinds) */
  shouldRetry?: (error: unknown) => boolean;
  logContext?: LogContext;
}

/**
 * Run an async operation with bounded retries
 *
 * Non-retryable errors are re-thrown immediately; retryable ones are retried
 * until `attempts` is exhausted, after which the last error is re-thrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransient;
  const attempts = Math.max(1, config.attempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || attempt === attempts - 1) {
        throw error;
      }
      const backoffMs = calculateBackoffWithJitter(attempt, config.baseDelayMs, config.maxDelayMs);
      logWarn('Transient upstream error, retrying', {
        ...options.logContext,
        operation: options.operation,
        attempt: attempt + 1,
        max_attempts: attempts,
        backoff_ms: backoffMs,
        error: errorMessage(error),
      });
      await sleep(backoffMs);
    }
  }

  // Unreachable: the loop either returns or throws
  throw lastError;
}
