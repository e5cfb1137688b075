import { delay } from './delay.js';
import { getErrorMessage, TransportError } from './errors.js';

export type BackoffStrategy = 'exponential' | 'fixed';

export interface RetryOptions {
  /** Operation name used in the final error message */
  label: string;
  /** Retries after the first attempt; `Infinity` retries until success */
  retries: number;
  initialDelayMs: number;
  backoff: BackoffStrategy;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Calculate the wait before the next attempt
 * Formula: exponential = initialDelay * 2^attemptNumber, fixed = initialDelay
 * @param attemptNumber - Zero-based attempt number (0 = first retry)
 */
export function calculateBackoffDelay(
  attemptNumber: number,
  initialDelayMs: number,
  backoff: BackoffStrategy
): number {
  if (backoff === 'fixed') {
    return initialDelayMs;
  }
  return initialDelayMs * Math.pow(2, attemptNumber);
}

/**
 * Run `operation` until it resolves or the retry budget is spent.
 *
 * The operation receives the one-based attempt number. When every attempt has
 * failed a {@link TransportError} is thrown with the last failure as `cause`.
 * An aborted `signal` stops retrying and rethrows the abort reason.
 *
 * @example
 * await retryWithBackoff(() => producer.connect(), {
 *   label: 'Kafka connect',
 *   retries: 5,
 *   initialDelayMs: 1000,
 *   backoff: 'exponential',
 * });
 */
export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  {
    label,
    retries,
    initialDelayMs,
    backoff,
    signal,
    onRetry,
  }: RetryOptions
): Promise<T> {
  let attemptNumber = 0;

  for (;;) {
    try {
      return await operation(attemptNumber + 1);
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }

      if (attemptNumber >= retries) {
        throw new TransportError(
          `${label} failed after ${attemptNumber + 1} attempts: ${getErrorMessage(error)}`,
          attemptNumber + 1,
          { cause: error }
        );
      }

      const delayMs = calculateBackoffDelay(
        attemptNumber,
        initialDelayMs,
        backoff
      );
      onRetry?.(error, attemptNumber + 1, delayMs);

      await delay(delayMs, signal);
      attemptNumber++;
    }
  }
}
