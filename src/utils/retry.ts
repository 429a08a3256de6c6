/**
 * Retry with exponential backoff and jitter for transport-level calls made by
 * generation backends. The summarizer itself never retries.
 *
 * @module utils/retry
 */

import { logger } from './logger';
import { AppError, ErrorCode, isCancellationError, throwIfCancelled } from './errors';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Base delay in milliseconds before first retry (default: 250) */
  baseDelayMs?: number;
  /** Maximum delay cap in milliseconds (default: 5000) */
  maxDelayMs?: number;
  /** Predicate to decide if an error is retryable. Return true to retry. */
  retryOn?: (error: unknown) => boolean;
  /** Stops retrying as soon as the signal fires. */
  signal?: AbortSignal;
}

/**
 * Default retry predicate: network failures, timeouts and HTTP 5xx/429.
 * Cancellations and other 4xx responses are final.
 */
export function defaultRetryOn(error: unknown): boolean {
  if (isCancellationError(error)) {
    return false;
  }

  if (error instanceof AppError) {
    if (error.code === ErrorCode.TIMEOUT) {
      return true;
    }
    if (error.code !== ErrorCode.DEPENDENCY_ERROR) {
      return false;
    }
  }

  if (error instanceof Error) {
    if ('status' in error && typeof error.status === 'number') {
      const status = error.status;
      if (status === 429) return true;
      if (status >= 500 && status < 600) return true;
      if (status >= 400 && status < 500) return false;
    }

    const networkErrorPatterns = [
      'ECONNREFUSED',
      'ECONNRESET',
      'ENOTFOUND',
      'ETIMEDOUT',
      'EAI_AGAIN',
      'UND_ERR',
      'fetch failed',
      'socket hang up',
    ];
    const msg = error.message.toLowerCase();
    return networkErrorPatterns.some((p) => msg.includes(p.toLowerCase()));
  }

  return false;
}

/**
 * Formula: min(baseDelay * 2^attempt + random_jitter, maxDelay)
 */
export function computeDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return Math.min(exponentialDelay + jitter, maxDelayMs);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Execute `fn` with retry logic and exponential backoff.
 *
 * @throws The last error encountered after all retries are exhausted
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? 2;
  const baseDelayMs = options.baseDelayMs ?? 250;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const retryOn = options.retryOn ?? defaultRetryOn;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    throwIfCancelled(options.signal);
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= maxRetries || !retryOn(error)) {
        break;
      }

      const delay = computeDelay(attempt, baseDelayMs, maxDelayMs);

      logger.warn('Retrying after transient error', {
        attempt: attempt + 1,
        maxRetries,
        delayMs: Math.round(delay),
        error: error instanceof Error ? error.message : String(error),
      });

      await sleep(delay, options.signal);
    }
  }

  throw lastError;
}
