/**
 * Retry with exponential backoff for calls to the embedding service, the vector
 * index and the language model.
 *
 * Only transient failures (see `isTransientError`) are retried. Fatal errors are
 * rethrown on the first attempt; exhausting the budget rethrows the last transient
 * failure wrapped in `UpstreamUnavailableError`. A Retry-After hint is a floor on
 * the wait; a hint longer than `maxDelayMs` ends the retries instead.
 */

import {
  OperationCancelledError,
  RateLimitedError,
  UpstreamUnavailableError,
  errorMessage,
  isTransientError,
} from "../domain/errors.js";
import { sleep } from "./abort.js";
import { logger } from "./logger.js";

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface RetryOptions {
  operation: string;
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
  backoffMultiplier: 2,
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let delay = policy.initialDelayMs;

  for (let attempt = 1; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw new OperationCancelledError(options.operation);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      if (error instanceof OperationCancelledError || !isTransientError(error)) {
        throw error;
      }
      const retryAfterMs = readRetryAfter(error);
      if (attempt >= maxAttempts || (retryAfterMs !== null && retryAfterMs > policy.maxDelayMs)) {
        throw new UpstreamUnavailableError(options.operation, attempt, error);
      }

      const waitMs = Math.max(retryAfterMs ?? 0, delay);
      logger.warn(
        { operation: options.operation, attempt, delayMs: waitMs, error: errorMessage(error) },
        "Retrying operation",
      );

      await sleep(waitMs, options.signal);
      delay = Math.min(delay * policy.backoffMultiplier, policy.maxDelayMs);
    }
  }
}

function readRetryAfter(error: unknown): number | null {
  return error instanceof RateLimitedError ? error.retryAfterMs : null;
}
