import { isTransient } from "./errors.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  /** Retries after the first attempt; 3 means at most 4 calls */
  maxRetries: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: Sleep;
}

export function backoffDelayMs(
  attempt: number,
  baseDelayMs: number,
  backoffFactor: number,
): number {
  return baseDelayMs * Math.pow(backoffFactor, attempt - 1);
}

/**
 * Run `fn` until it resolves or fails with a non-retryable error.
 * Delays grow as base, base*factor, base*factor^2, ...
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxRetries,
    baseDelayMs = 1_000,
    backoffFactor = 2,
    isRetryable = isTransient,
    onRetry,
    sleep: wait = sleep,
  } = options;

  const maxAttempts = Math.max(0, maxRetries) + 1;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!isRetryable(error) || attempt >= maxAttempts) throw error;
      const delay = backoffDelayMs(attempt, baseDelayMs, backoffFactor);
      onRetry?.(attempt, delay, error);
      await wait(delay);
    }
  }
}
