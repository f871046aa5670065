/**
 * Retry helpers.
 *
 * `withRetry` wraps transient network calls (embeddings) with exponential
 * backoff. `retryBounded` drives the drill pipelines: each attempt reports
 * success or a retryable failure as a value, the loop is strictly sequential,
 * and the attempt count and last failure come back to the caller explicitly.
 */

import { OperationCancelledError } from '../core/errors.js';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: string[];
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * Execute a function with exponential backoff retry logic
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    retryableErrors = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'fetch failed', 'network', '429', '502', '503', '504'],
    onRetry,
  } = options;

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries) {
        throw lastError;
      }

      const errorMessage = lastError.message.toLowerCase();
      const isRetryable = retryableErrors.some(
        errPattern => errorMessage.includes(errPattern.toLowerCase())
      );

      if (!isRetryable) {
        throw lastError;
      }

      onRetry?.(attempt + 1, lastError, delay);

      await sleep(delay);

      // 0-30% jitter
      const jitter = Math.random() * 0.3 * delay;
      delay = Math.min(delay * backoffMultiplier + jitter, maxDelayMs);
    }
  }

  throw lastError ?? new Error('Unknown error during retry');
}

export interface AttemptFailure {
  reason: string;
  error?: unknown;
  /** Raw model output seen by this attempt, if it got that far */
  raw?: string;
}

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | ({ ok: false } & AttemptFailure);

export type BoundedRetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; failures: AttemptFailure[]; lastFailure: AttemptFailure };

export interface BoundedRetryOptions {
  /** Label used in cancellation errors */
  operation: string;
  maxAttempts: number;
  delayMs?: number;
  signal?: AbortSignal;
  onFailure?: (attempt: number, failure: AttemptFailure) => void;
}

/**
 * Run `attempt` until it succeeds or `maxAttempts` is reached.
 *
 * Errors thrown by `attempt` are fatal and propagate unchanged; only
 * `{ ok: false }` outcomes consume the budget. Cancellation rejects with
 * OperationCancelledError.
 */
export async function retryBounded<T>(
  attempt: (attemptNumber: number, previous: AttemptFailure | undefined) => Promise<AttemptOutcome<T>>,
  options: BoundedRetryOptions
): Promise<BoundedRetryResult<T>> {
  const { operation, maxAttempts, delayMs = 0, signal, onFailure } = options;

  if (maxAttempts < 1) {
    throw new Error(`maxAttempts must be at least 1, got ${maxAttempts}`);
  }

  const failures: AttemptFailure[] = [];

  for (let n = 1; n <= maxAttempts; n++) {
    if (signal?.aborted) {
      throw new OperationCancelledError(operation);
    }

    const outcome = await attempt(n, failures[failures.length - 1]);
    if (outcome.ok) {
      return { ok: true, value: outcome.value, attempts: n };
    }

    const failure: AttemptFailure = { reason: outcome.reason, error: outcome.error, raw: outcome.raw };
    failures.push(failure);
    onFailure?.(n, failure);

    if (n < maxAttempts && delayMs > 0) {
      await sleep(delayMs, signal, operation);
    }
  }

  const lastFailure = failures[failures.length - 1] ?? { reason: 'no attempts made' };
  return { ok: false, attempts: maxAttempts, failures, lastFailure };
}

/**
 * Sleep for specified milliseconds, waking early with OperationCancelledError
 * if the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal, operation = 'Operation'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError(operation));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new OperationCancelledError(operation));
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
