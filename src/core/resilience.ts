import type { ILogObj, Logger } from "tslog";
import type { BackendClient } from "../backends/backend.js";
import { withTimeout } from "../utils/timing.js";
import type { CircuitBreaker } from "./circuit-breaker.js";
import { BackendTransientError } from "./errors.js";
import { type ResolvedRetryPolicy, type RetryPolicy, resolveRetryPolicy, retryWithBackoff } from "./retry.js";

/**
 * A single logical remote call. The signal it receives is aborted when the
 * run is cancelled or the attempt times out.
 */
export type RemoteOperation<T> = (signal: AbortSignal) => Promise<T>;

export interface ResilienceOptions {
  /** Retry policy; pass `{ maxRetries: 0 }` to disable retries */
  retry?: RetryPolicy | ResolvedRetryPolicy;
  /** Shared breaker guarding the endpoint, consulted on every attempt */
  breaker?: CircuitBreaker;
  /** Upper bound on a single attempt; a timed-out attempt is retryable */
  attemptTimeoutMs?: number;
  logger?: Logger<ILogObj>;
  /** Jitter source for tests */
  random?: () => number;
}

/**
 * Wrap `operation` with per-attempt timeout, circuit breaker and retry.
 *
 * Order, from the outside in: retry loop, then the breaker (so an open
 * breaker ends the retry loop with `CircuitOpenError`), then the attempt
 * timeout, then the operation.
 *
 * Errors surfaced: `RetryExhaustedError`, `CircuitOpenError`,
 * `BackendFatalError` or `CancelledError`.
 *
 * @example
 * ```typescript
 * const fetchStatus = withResilience((signal) => client.status({ signal }), {
 *   retry: { maxRetries: 2, initialDelayMs: 500 },
 *   breaker,
 *   attemptTimeoutMs: 10_000,
 * });
 * const status = await fetchStatus(runSignal);
 * ```
 */
export function withResilience<T>(
  operation: RemoteOperation<T>,
  options: ResilienceOptions = {},
): (signal?: AbortSignal) => Promise<T> {
  const policy = resolveRetryPolicy(options.retry);
  const { breaker, attemptTimeoutMs, logger, random } = options;

  const attempt = (signal: AbortSignal | undefined): Promise<T> =>
    withTimeout(operation, {
      timeoutMs: attemptTimeoutMs,
      signal,
      onTimeout: (ms) => new BackendTransientError(`Backend call timed out after ${ms}ms`),
    });

  return (signal?: AbortSignal) =>
    retryWithBackoff(
      () => (breaker ? breaker.execute(() => attempt(signal)) : attempt(signal)),
      policy,
      { signal, logger, random },
    );
}

/**
 * Apply {@link withResilience} to every `complete` call of a backend.
 */
export function resilientBackend(backend: BackendClient, options: ResilienceOptions = {}): BackendClient {
  return {
    name: backend.name,
    complete: (request, signal) =>
      withResilience((attemptSignal) => backend.complete(request, attemptSignal), options)(signal),
  };
}
