/**
 * Retry with exponential backoff.
 *
 * Shared by the response generator (model calls) and the orchestrator
 * (conversation persistence). Attempts stop early when the caller's signal
 * aborts.
 */

import { createLogger, type Logger } from './logger.js';

const log = createLogger('retry');

/** Retry options */
export interface RetryOptions {
  /** Total attempts including the first. Default: 3 */
  maxAttempts?: number;
  /** Delay before the second attempt in ms. Default: 500 */
  initialDelayMs?: number;
  /** Maximum delay in ms. Default: 10000 */
  maxDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Stops further attempts (and the backoff sleep) when aborted */
  signal?: AbortSignal;
  /** Receives the retry lines; pass a child logger to tag them. Default: the `retry` logger */
  logger?: Logger;
}

/** Outcome of a retried call that succeeded */
export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Raised when every attempt failed. Carries the last error and the count.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: Error;

  constructor(label: string, attempts: number, lastError: Error) {
    super(`${label} failed after ${attempts} attempt(s): ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Calculate exponential backoff delay for a zero-based retry index.
 */
export function calculateBackoff(
  retryIndex: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffFactor: number,
): number {
  const delay = initialDelayMs * Math.pow(backoffFactor, retryIndex);
  return Math.min(delay, maxDelayMs);
}

/**
 * Sleep for a duration. Resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
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
 * Execute a function with retry logic.
 *
 * The function receives the 1-based attempt number.
 */
export async function withRetry<T>(
  label: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const {
    maxAttempts = 3,
    initialDelayMs = 500,
    maxDelayMs = 10_000,
    backoffFactor = 2,
    signal,
    logger = log,
  } = options;

  let lastError: Error = new Error(`${label} was not attempted`);
  let attempts = 0;

  for (let attempt = 1; attempt <= Math.max(1, maxAttempts); attempt++) {
    if (signal?.aborted) break;

    if (attempt > 1) {
      const delay = calculateBackoff(attempt - 2, initialDelayMs, maxDelayMs, backoffFactor);
      logger.debug(`${label}: retrying`, { attempt, delay });
      await sleep(delay, signal);
      if (signal?.aborted) break;
    }

    attempts = attempt;
    try {
      return { value: await fn(attempt), attempts };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      logger.warn(`${label}: attempt ${attempt}/${maxAttempts} failed`, { error: lastError.message });
    }
  }

  throw new RetryExhaustedError(label, attempts, lastError);
}
