import type { RetryConfig } from "../config/types.js";
import { ProviderError, ProviderUnavailableError } from "../infra/errors.js";

/**
 * Backoff policy for blocking provider requests, driven by the engine's
 * `retry` config. Only ProviderErrors are ever retried.
 */

/** Called before each wait with the failure, the 1-based retry number and the delay. */
export type RetryListener = (error: ProviderError, retry: number, delayMs: number) => void;

/**
 * A response with a status from `retryableStatusCodes`, or a request that
 * never reached the provider.
 */
export function isRetryable(err: unknown, policy: RetryConfig): err is ProviderError {
  if (!(err instanceof ProviderError)) return false;
  if (err.statusCode === undefined) return err instanceof ProviderUnavailableError;
  return policy.retryableStatusCodes.includes(err.statusCode);
}

export function retryDelay(err: ProviderError, retry: number, policy: RetryConfig): number {
  const delay =
    err.retryAfterMs ?? policy.initialDelayMs * policy.backoffMultiplier ** (retry - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryConfig,
  onRetry?: RetryListener,
): Promise<T> {
  let retries = 0;
  for (;;) {
    try {
      return await operation(retries);
    } catch (err) {
      if (retries >= policy.maxRetries || !isRetryable(err, policy)) throw err;

      retries++;
      const delayMs = retryDelay(err, retries, policy);
      onRetry?.(err, retries, delayMs);
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
    }
  }
}

/**
 * Read a Retry-After header: delta seconds or an HTTP date. Dates in the
 * past and unparseable values give undefined.
 */
export function parseRetryAfter(value: string, now: number = Date.now()): number | undefined {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date) || date <= now) return undefined;
  return date - now;
}
