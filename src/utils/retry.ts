/**
 * Retry Logic with Exponential Backoff
 *
 * Wikipedia answers bursts with 429 and the odd 5xx; both clear up after a
 * short wait, so transient failures are retried with growing delays.
 */

import { logger } from './logger.js';

const log = logger.retry;

/**
 * Status codes that are worth another attempt
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

/**
 * Thrown when a response carries a retryable status code
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string
  ) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Base of the exponential backoff, in seconds.
   * delay = backoffBase^attempt seconds + jitter
   * @default 1.6
   */
  backoffBase?: number;

  /**
   * Upper bound of the random jitter added to every delay, in milliseconds.
   * @default 500
   */
  maxJitterMs?: number;

  /**
   * Cap on a single delay, in milliseconds.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * Decides whether an error should trigger a retry.
   * @default Retries HttpStatusError with a retryable status, network errors and timeouts
   */
  retryOn?: (error: Error) => boolean;

  /**
   * Callback invoked before each retry attempt.
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;

  /** Random source in [0, 1), replaceable for deterministic tests */
  random?: () => number;

  /** Sleep implementation, replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default retry predicate
 */
export function isTransientError(error: Error): boolean {
  if (error instanceof HttpStatusError) {
    return RETRYABLE_STATUS_CODES.includes(error.status);
  }
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }
  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('fetch failed') ||
    message.includes('network') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('socket hang up')
  );
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  backoffBase: 1.6,
  maxJitterMs: 500,
  maxDelayMs: 30000,
  retryOn: isTransientError,
  onRetry: () => {},
  random: Math.random,
  sleep,
};

/**
 * Delay before the retry that follows a failed attempt (1-based).
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'backoffBase' | 'maxJitterMs' | 'maxDelayMs' | 'random'> = {}
): number {
  const base = options.backoffBase ?? DEFAULT_OPTIONS.backoffBase;
  const maxJitter = options.maxJitterMs ?? DEFAULT_OPTIONS.maxJitterMs;
  const maxDelay = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  const random = options.random ?? DEFAULT_OPTIONS.random;

  const delay = Math.pow(base, attempt) * 1000 + random() * maxJitter;
  return Math.min(Math.round(delay), maxDelay);
}

/**
 * Execute an async function with automatic retry on failure.
 *
 * @throws Last error if all attempts fail or the error is not retryable
 *
 * @example
 * ```typescript
 * const response = await withRetry(
 *   () => fetchOk(url),
 *   { maxAttempts: 3, backoffBase: 1.6 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryOn(lastError)) {
        throw lastError;
      }

      const delay = computeBackoffDelay(attempt, opts);
      opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        error: lastError.message,
        retryDelayMs: delay,
      });

      await opts.sleep(delay);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
