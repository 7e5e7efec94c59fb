/**
 * Circuit breaker for backend endpoints.
 *
 * States:
 * - CLOSED: calls pass through, consecutive failures are counted
 * - OPEN: calls are rejected with `CircuitOpenError` until the recovery timeout elapses
 * - HALF_OPEN: exactly one trial call is admitted; its outcome closes or reopens the circuit
 *
 * A breaker is a plain object meant to be injected, so one instance can guard
 * a backend across many runs. Every state change goes through
 * `transitionTo`, and admission plus bookkeeping run synchronously around the
 * awaited call, so concurrent callers on the event loop cannot interleave a
 * check with a transition.
 *
 * @example
 * ```typescript
 * const breaker = new CircuitBreaker({ failureThreshold: 5, recoveryTimeoutMs: 30_000 });
 * const response = await breaker.execute(() => backend.complete(request));
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import { DEFAULT_FAILURE_THRESHOLD, DEFAULT_RECOVERY_TIMEOUT_MS } from "./constants.js";
import { CircuitOpenError, isAbortError } from "./errors.js";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitStateChange {
  from: CircuitState;
  to: CircuitState;
  reason: string;
  at: number;
}

export interface CircuitBreakerOptions {
  /** Consecutive failures that open the circuit (default: 5) */
  failureThreshold?: number;
  /** Time in ms an open circuit waits before admitting a trial call (default: 30000) */
  recoveryTimeoutMs?: number;
  /** Clock, `Date.now` by default */
  now?: () => number;
  /** Decides whether an error counts against the breaker (default: every non-abort error) */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: (change: CircuitStateChange) => void;
  logger?: Logger<ILogObj>;
}

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  trialInFlight: boolean;
  totalCalls: number;
  totalFailures: number;
  totalRejections: number;
}

type Permit = "normal" | "trial";

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private consecutiveFailures = 0;
  private openedAt?: number;
  private trialInFlight = false;
  private totalCalls = 0;
  private totalFailures = 0;
  private totalRejections = 0;

  private readonly failureThreshold: number;
  private readonly recoveryTimeoutMs: number;
  private readonly now: () => number;
  private readonly isFailure: (error: unknown) => boolean;
  private readonly onStateChange?: (change: CircuitStateChange) => void;
  private readonly logger?: Logger<ILogObj>;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = Math.max(1, options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD);
    this.recoveryTimeoutMs = options.recoveryTimeoutMs ?? DEFAULT_RECOVERY_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.isFailure = options.isFailure ?? ((error) => !isAbortError(error));
    this.onStateChange = options.onStateChange;
    this.logger = options.logger;
  }

  getState(): CircuitState {
    this.refreshState();
    return this.state;
  }

  getSnapshot(): CircuitBreakerSnapshot {
    this.refreshState();
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
      totalRejections: this.totalRejections,
    };
  }

  /**
   * Execute `fn` under the breaker. Rejects with `CircuitOpenError` without
   * calling `fn` while the circuit is open or a half-open trial is running.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const permit = this.admit();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.settleFailure(permit, error);
      throw error;
    }
    this.settleSuccess(permit);
    return result;
  }

  /**
   * Force the circuit closed and clear the failure counter.
   */
  reset(): void {
    this.consecutiveFailures = 0;
    this.trialInFlight = false;
    this.openedAt = undefined;
    this.transitionTo("CLOSED", "manual reset");
  }

  private admit(): Permit {
    this.refreshState();

    if (this.state === "OPEN") {
      this.totalRejections++;
      const retryAfterMs = Math.max(0, (this.openedAt ?? 0) + this.recoveryTimeoutMs - this.now());
      throw new CircuitOpenError(
        `Circuit breaker is open; next trial call in ${retryAfterMs}ms`,
        retryAfterMs,
      );
    }

    if (this.state === "HALF_OPEN") {
      if (this.trialInFlight) {
        this.totalRejections++;
        throw new CircuitOpenError("Circuit breaker is half-open; trial call in progress", 0);
      }
      this.trialInFlight = true;
      this.totalCalls++;
      return "trial";
    }

    this.totalCalls++;
    return "normal";
  }

  private settleSuccess(permit: Permit): void {
    if (permit === "trial") {
      this.trialInFlight = false;
      this.consecutiveFailures = 0;
      this.transitionTo("CLOSED", "trial call succeeded");
      return;
    }
    if (this.state === "CLOSED") {
      this.consecutiveFailures = 0;
    }
  }

  private settleFailure(permit: Permit, error: unknown): void {
    if (!this.isFailure(error)) {
      if (permit === "trial") {
        // the slot is free again, the circuit stays half-open
        this.trialInFlight = false;
      }
      return;
    }

    this.totalFailures++;

    if (permit === "trial") {
      this.trialInFlight = false;
      this.open("trial call failed");
      return;
    }

    if (this.state === "CLOSED") {
      this.consecutiveFailures++;
      if (this.consecutiveFailures >= this.failureThreshold) {
        this.open(`failure threshold reached (${this.consecutiveFailures})`);
      }
    }
  }

  private open(reason: string): void {
    this.openedAt = this.now();
    this.transitionTo("OPEN", reason);
  }

  private refreshState(): void {
    if (
      this.state === "OPEN" &&
      this.openedAt !== undefined &&
      this.now() - this.openedAt >= this.recoveryTimeoutMs
    ) {
      this.transitionTo("HALF_OPEN", "recovery timeout elapsed");
    }
  }

  private transitionTo(to: CircuitState, reason: string): void {
    const from = this.state;
    if (from === to && to !== "OPEN") {
      return;
    }
    this.state = to;

    const change: CircuitStateChange = { from, to, reason, at: this.now() };
    this.logger?.warn(`Circuit breaker ${from} -> ${to}: ${reason}`);
    try {
      this.onStateChange?.(change);
    } catch (error) {
      this.logger?.error("Circuit breaker state listener threw", error);
    }
  }
}
