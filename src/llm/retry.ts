import { setTimeout as delay } from "node:timers/promises";
import { TransportError } from "../errors.js";

export interface RetryOptions {
  attempts: number;
  backoff: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

const defaultOptions: RetryOptions = {
  attempts: 3,
  backoff: 100,
};

export const sleep = (ms: number): Promise<void> => (ms > 0 ? delay(ms) : Promise.resolve());

export const isRetryableTransport = (error: unknown): boolean =>
  error instanceof TransportError && error.retryable;

/**
 * Retry an async function with exponential backoff.
 * Throws the last error once attempts run out, or at once when `retryOn` says no.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (opts.retryOn && !opts.retryOn(error)) throw error;
      if (attempt < opts.attempts) {
        opts.onRetry?.(error, attempt);
        await sleep(opts.backoff * 2 ** (attempt - 1));
      }
    }
  }

  throw lastError;
}
