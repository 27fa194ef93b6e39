/**
 * Bounded retry with exponential backoff
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the second attempt in ms */
  initialDelay?: number;
  /** Upper bound for any single delay in ms */
  maxDelay?: number;
  /** Multiplier applied to the delay after each failed attempt */
  factor?: number;
  /** Return false to stop retrying and rethrow immediately */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Aborting stops the loop at the next sleep or attempt boundary */
  signal?: AbortSignal;
}

/**
 * Thrown when every attempt failed. `lastError` is what the final attempt threw.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly errors: unknown[];

  constructor(attempts: number, errors: unknown[]) {
    const lastError = errors[errors.length - 1];
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${reason}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.errors = errors;
  }

  get lastError(): unknown {
    return this.errors[this.errors.length - 1];
  }
}

/**
 * Compute the delay that precedes attempt `attempt + 1`
 */
export function backoffDelay(attempt: number, initialDelay: number, maxDelay: number, factor = 2): number {
  return Math.min(initialDelay * factor ** (attempt - 1), maxDelay);
}

/**
 * Run `operation` up to `maxAttempts` times.
 *
 * Errors rejected by `shouldRetry` and aborts propagate unchanged; running
 * out of attempts throws a RetryExhaustedError carrying every attempt's error.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    initialDelay = 1000,
    maxDelay = 30000,
    factor = 2,
    shouldRetry = () => true,
    onRetry,
    signal,
  } = options;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  const failures: unknown[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      if (signal?.aborted || !shouldRetry(error, attempt)) {
        throw error;
      }

      failures.push(error);
      if (attempt === maxAttempts) break;

      const wait = backoffDelay(attempt, initialDelay, maxDelay, factor);
      onRetry?.(error, attempt, wait);
      if (wait > 0) {
        await delay(wait, undefined, { signal });
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, failures);
}
