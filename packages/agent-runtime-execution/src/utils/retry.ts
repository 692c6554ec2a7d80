/**
 * Retry Utilities
 *
 * Exponential backoff with jitter for model and tool calls that fail for
 * transient reasons.
 */

import { CancelledError, isTransientError } from "@warden/agent-runtime-core";

export interface RetryOptions {
  /** Maximum number of attempts (including first try) */
  maxAttempts?: number;

  /** Initial delay in milliseconds */
  initialDelayMs?: number;

  /** Maximum delay in milliseconds */
  maxDelayMs?: number;

  /** Backoff multiplier (default: 2 for exponential) */
  backoffMultiplier?: number;

  /** Add up to 25% random jitter to each delay */
  jitter?: boolean;

  /** Predicate to determine if error is retryable */
  isRetryable?: (error: unknown) => boolean;

  /** Callback on each retry attempt */
  onRetry?: (attempt: number, error: unknown, nextDelayMs: number) => void;

  /** Abort signal for cancellation */
  signal?: AbortSignal;
}

export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalTimeMs: number }
  | { success: false; error: unknown; attempts: number; totalTimeMs: number };

/**
 * Run `fn` until it succeeds, fails with a non-retryable error, or the
 * attempts run out. `fn` receives the 1-based attempt number.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30_000,
    backoffMultiplier = 2,
    jitter = true,
    isRetryable = isTransientError,
    onRetry,
    signal,
  } = options;

  const startTime = Date.now();
  let lastError: unknown;
  let currentDelay = initialDelayMs;
  let attempt = 0;

  while (attempt < maxAttempts) {
    attempt++;

    if (signal?.aborted) {
      return {
        success: false,
        error: new CancelledError(),
        attempts: attempt - 1,
        totalTimeMs: Date.now() - startTime,
      };
    }

    try {
      const result = await fn(attempt);
      return { success: true, result, attempts: attempt, totalTimeMs: Date.now() - startTime };
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !isRetryable(error) || signal?.aborted) {
        break;
      }

      let delay = Math.min(currentDelay, maxDelayMs);
      if (jitter) {
        delay = delay + Math.random() * delay * 0.25;
      }

      onRetry?.(attempt, error, delay);

      try {
        await sleep(delay, signal);
      } catch (sleepError) {
        lastError = sleepError;
        break;
      }

      currentDelay = currentDelay * backoffMultiplier;
    }
  }

  return { success: false, error: lastError, attempts: attempt, totalTimeMs: Date.now() - startTime };
}

/**
 * Sleep for a duration, rejecting with CancelledError when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeout);
      reject(new CancelledError());
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
