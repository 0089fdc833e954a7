/**
 * Exponential backoff for page loads
 */

import { setTimeout as delay } from 'timers/promises';
import { FetchError, errorDetails } from './errors.js';

// Matched case-insensitively against the error and its causes
const TRANSIENT_ERROR_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'TimeoutError',
  'socket hang up',
].map(pattern => pattern.toLowerCase());

/**
 * Network and timeout failures, and 5xx responses. A 4xx will not change on retry.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error instanceof FetchError && error.status !== undefined) {
    return error.status >= 500;
  }

  const details = errorDetails(error).toLowerCase();
  return TRANSIENT_ERROR_PATTERNS.some(pattern => details.includes(pattern));
}

export interface RetryOptions {
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** First backoff delay, doubled on each retry (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default: 30000) */
  maxDelayMs?: number;
  /** Defaults to isTransientError */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Run `fn`, retrying while `shouldRetry` accepts the failure.
 * The last error is rethrown once retries run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldRetry = isTransientError,
    onRetry,
  } = options;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (attempt >= maxRetries || !shouldRetry(err)) {
        throw err;
      }

      const delayMs = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
      attempt++;
      onRetry?.(attempt, err, delayMs);
      await delay(delayMs);
    }
  }
}
