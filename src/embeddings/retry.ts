/**
 * Retry Policy
 *
 * Retries retryable embedding failures (ProviderUnavailableError,
 * RateLimitError) with exponential backoff. Everything else propagates on
 * the first occurrence.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';

import { CancelledError, EmbeddingError, RetryExhaustedError } from '../errors/index.js';

/** Waits `ms`, rejecting early when `signal` aborts */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  /** Additional attempts after the first call (total calls = 1 + maxRetries) */
  maxRetries: number;
  /** Delay before the first retry; doubles on every further retry */
  backoffMs: number;
  /** Cuts a backoff wait short and gives up when this aborts */
  signal?: AbortSignal;
  /** Called before each retry with the 1-based retry number */
  onRetry?: (error: EmbeddingError, retry: number, delayMs: number) => void;
  /** Injectable for tests; must honour the signal */
  sleep?: Sleep;
}

export const DEFAULT_RETRY_OPTIONS: Pick<RetryOptions, 'maxRetries' | 'backoffMs'> = {
  maxRetries: 3,
  backoffMs: 1000,
};

/**
 * Delay before retry number `retry` (1-based): backoffMs * 2^(retry - 1).
 */
export function backoffDelay(backoffMs: number, retry: number): number {
  return backoffMs * 2 ** (retry - 1);
}

const defaultSleep: Sleep = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

/**
 * Run `fn`, retrying retryable failures.
 *
 * @throws RetryExhaustedError once `1 + maxRetries` calls have failed
 * @throws CancelledError when `signal` aborts, including mid-backoff
 * @throws the original error, unchanged, when it is not a retryable EmbeddingError
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxRetries, backoffMs, signal, onRetry, sleep = defaultSleep } = options;
  const attempts = Math.max(0, maxRetries) + 1;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof EmbeddingError) || !error.retryable) {
        throw error;
      }
      if (attempt >= attempts) {
        throw new RetryExhaustedError(attempts, error);
      }

      const delayMs = backoffDelay(backoffMs, attempt);
      onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) {
        await waitOrCancel(sleep, delayMs, signal);
      }
    }
  }
}

async function waitOrCancel(sleep: Sleep, ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    throw error;
  }
}
