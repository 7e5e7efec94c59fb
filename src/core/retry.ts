/**
 * Retry policy for backend calls.
 *
 * Provides exponential backoff with jitter to handle transient failures
 * like rate limits (429), server errors (5xx), and connection issues.
 */

import pRetry from "p-retry";
import type { ILogObj, Logger } from "tslog";
import { sleep } from "../utils/timing.js";
import {
  BackendFatalError,
  BackendTransientError,
  CancelledError,
  CircuitOpenError,
  isAbortError,
  LoopwrightError,
  RetryExhaustedError,
} from "./errors.js";

/**
 * Configuration options for retry behavior.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(backend)
 *   .withRetry({
 *     maxRetries: 5,
 *     initialDelayMs: 2000,
 *     onRetry: (error, attempt) => console.log(`Retry ${attempt}`),
 *   })
 *   .build();
 * ```
 */
export interface RetryPolicy {
  /**
   * Maximum number of retries after the first attempt.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Delay before the first retry in milliseconds.
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Upper bound on the backoff delay (before jitter) in milliseconds.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * Exponential base for backoff calculation.
   * @default 2
   */
  factor?: number;

  /**
   * Whether to add uniform random jitter in `[0, delay)` to each backoff.
   * @default true
   */
  jitter?: boolean;

  /**
   * Called before each retry attempt.
   */
  onRetry?: (error: Error, attempt: number) => void;

  /**
   * Called when all retries are exhausted. The error is still thrown after
   * this callback.
   */
  onRetriesExhausted?: (error: Error, attempts: number) => void;

  /**
   * Custom classification. Defaults to {@link isRetryableError}.
   */
  shouldRetry?: (error: Error) => boolean;
}

export interface ResolvedRetryPolicy {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: boolean;
  onRetry?: (error: Error, attempt: number) => void;
  onRetriesExhausted?: (error: Error, attempts: number) => void;
  shouldRetry?: (error: Error) => boolean;
}

export const DEFAULT_RETRY_POLICY: Omit<
  ResolvedRetryPolicy,
  "onRetry" | "onRetriesExhausted" | "shouldRetry"
> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
  jitter: true,
};

/**
 * Resolves a partial retry policy by applying defaults.
 */
export function resolveRetryPolicy(policy?: RetryPolicy): ResolvedRetryPolicy {
  if (!policy) {
    return { ...DEFAULT_RETRY_POLICY };
  }

  return {
    maxRetries: policy.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    initialDelayMs: policy.initialDelayMs ?? DEFAULT_RETRY_POLICY.initialDelayMs,
    maxDelayMs: policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    factor: policy.factor ?? DEFAULT_RETRY_POLICY.factor,
    jitter: policy.jitter ?? DEFAULT_RETRY_POLICY.jitter,
    onRetry: policy.onRetry,
    onRetriesExhausted: policy.onRetriesExhausted,
    shouldRetry: policy.shouldRetry,
  };
}

/**
 * Deterministic part of the backoff before retry number `retryIndex`
 * (0-based): `min(maxDelayMs, initialDelayMs * factor^retryIndex)`.
 */
export function computeBackoffDelay(retryIndex: number, policy: ResolvedRetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.initialDelayMs * policy.factor ** retryIndex);
}

/**
 * Determines if an error is retryable.
 *
 * Classified errors decide for themselves: `BackendTransientError` retries,
 * `BackendFatalError`, `CircuitOpenError` and cancellations do not. Anything
 * else falls back to the common API error patterns:
 * - Rate limits (429), server errors (5xx), overload
 * - Timeouts and connection errors
 * - SDK error names such as `RateLimitError` or `APIConnectionError`
 *
 * Authentication, bad request and not-found errors are never retried, and
 * unknown errors default to not retryable.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof BackendTransientError) return true;
  if (isAbortError(error)) return false;
  if (error instanceof LoopwrightError) return false;

  const message = error.message.toLowerCase();
  const name = error.name;

  if (
    name === "AuthenticationError" ||
    name === "BadRequestError" ||
    name === "NotFoundError" ||
    name === "PermissionDeniedError" ||
    name === "UnprocessableEntityError"
  ) {
    return false;
  }

  if (
    name === "APIConnectionError" ||
    name === "RateLimitError" ||
    name === "InternalServerError" ||
    name === "APITimeoutError"
  ) {
    return true;
  }

  // Rate limits (429)
  if (message.includes("429") || message.includes("rate limit") || message.includes("rate_limit")) {
    return true;
  }

  // Server errors (5xx)
  if (
    message.includes("500") ||
    message.includes("502") ||
    message.includes("503") ||
    message.includes("504") ||
    message.includes("internal server error") ||
    message.includes("bad gateway") ||
    message.includes("service unavailable") ||
    message.includes("gateway timeout")
  ) {
    return true;
  }

  if (
    message.includes("timeout") ||
    message.includes("etimedout") ||
    message.includes("timed out")
  ) {
    return true;
  }

  if (
    message.includes("econnreset") ||
    message.includes("econnrefused") ||
    message.includes("enotfound") ||
    message.includes("socket hang up") ||
    message.includes("network")
  ) {
    return true;
  }

  if (message.includes("overloaded") || message.includes("capacity")) {
    return true;
  }

  return false;
}

export interface RetryOptions {
  signal?: AbortSignal;
  logger?: Logger<ILogObj>;
  /** Source of jitter, `Math.random` by default */
  random?: () => number;
}

/**
 * Run `operation` under a retry policy.
 *
 * - Success after `k` failures returns the value after exactly `k + 1` attempts.
 * - Non-retryable failures are rethrown immediately (unclassified errors are
 *   wrapped in `BackendFatalError`).
 * - Running out of attempts on a retryable failure throws `RetryExhaustedError`.
 * - Aborting `signal` throws `CancelledError`.
 *
 * @example
 * ```typescript
 * const response = await retryWithBackoff(
 *   (attempt) => backend.complete(request, signal),
 *   resolveRetryPolicy({ maxRetries: 2 }),
 *   { signal },
 * );
 * ```
 */
export async function retryWithBackoff<T>(
  operation: (attemptNumber: number) => Promise<T>,
  policy: ResolvedRetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const { signal, logger } = options;
  const random = options.random ?? Math.random;
  const classify = policy.shouldRetry ?? isRetryableError;
  let attempts = 0;

  try {
    return await pRetry(
      async (attemptNumber) => {
        attempts = attemptNumber;
        return operation(attemptNumber);
      },
      {
        retries: policy.maxRetries,
        // p-retry computes min(maxTimeout, minTimeout * factor^(attempt - 1)),
        // jitter is added separately in onFailedAttempt
        minTimeout: policy.initialDelayMs,
        maxTimeout: policy.maxDelayMs,
        factor: policy.factor,
        randomize: false,
        signal,
        onFailedAttempt: async (context) => {
          const { error, attemptNumber, retriesLeft } = context;
          if (retriesLeft <= 0 || signal?.aborted || !classify(error)) {
            return;
          }

          logger?.warn(
            `Backend call failed (attempt ${attemptNumber}/${attemptNumber + retriesLeft}), retrying`,
            { error: error.message, retriesLeft },
          );
          policy.onRetry?.(error, attemptNumber);

          // p-retry waits `delay` after this returns; jitter and any
          // server-requested wait beyond it are slept here
          const delay = computeBackoffDelay(attemptNumber - 1, policy);
          let extra = policy.jitter ? Math.floor(random() * delay) : 0;
          if (error instanceof BackendTransientError && error.retryAfterMs !== undefined) {
            extra = Math.max(extra, Math.min(error.retryAfterMs, policy.maxDelayMs) - delay);
          }
          if (extra > 0) {
            await sleep(extra, signal);
          }
        },
        shouldRetry: (context) => !signal?.aborted && classify(context.error),
      },
    );
  } catch (error) {
    if (signal?.aborted || isAbortError(error)) {
      throw error instanceof CancelledError ? error : new CancelledError();
    }

    const err = error instanceof Error ? error : new Error(String(error));

    if (err instanceof CircuitOpenError || err instanceof BackendFatalError) {
      throw err;
    }

    if (classify(err)) {
      logger?.error(`Backend call failed after ${attempts} attempts`, { error: err.message });
      policy.onRetriesExhausted?.(err, attempts);
      throw new RetryExhaustedError(attempts, err);
    }

    throw new BackendFatalError(err.message, { cause: err });
  }
}
