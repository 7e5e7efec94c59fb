/**
 * Timing utilities shared by the dispatcher and the resilience layer.
 *
 * @module utils/timing
 */

import { CancelledError } from "../core/errors.js";

/**
 * Sleep for `ms` milliseconds, rejecting with `CancelledError` if the signal
 * aborts first.
 *
 * @example
 * ```typescript
 * await sleep(250, controller.signal);
 * ```
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new CancelledError());
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Create an AbortController that aborts when `parent` aborts, with the same
 * reason. Call `dispose` once the child is no longer needed so the listener
 * does not outlive it.
 */
export function createLinkedAbortController(parent?: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => {} };
  }
  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => {} };
  }

  const onAbort = () => controller.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener("abort", onAbort),
  };
}

export interface TimeoutOptions {
  /** Timeout in milliseconds; `undefined` or `0` disables it */
  timeoutMs?: number;
  /** Parent signal; aborting it rejects with `CancelledError` */
  signal?: AbortSignal;
  /** Builds the rejection used when the timeout fires */
  onTimeout: (timeoutMs: number) => Error;
}

/**
 * Execute an async function with a timeout and a parent abort signal.
 *
 * The function receives its own signal, which is aborted when the timeout
 * fires or the parent aborts, so well-behaved work can stop early. The
 * returned promise settles as soon as either happens, whether or not the
 * function honours its signal.
 *
 * @example
 * ```typescript
 * const body = await withTimeout((signal) => fetch(url, { signal }).then((r) => r.text()), {
 *   timeoutMs: 5000,
 *   signal: runSignal,
 *   onTimeout: (ms) => new Error(`fetch timed out after ${ms}ms`),
 * });
 * ```
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T> | T,
  options: TimeoutOptions,
): Promise<T> {
  const { timeoutMs, signal, onTimeout } = options;
  const { controller, dispose } = createLinkedAbortController(signal);

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      dispose();
      reject(new CancelledError());
      return;
    }

    let settled = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const finish = () => {
      settled = true;
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId);
      }
      signal?.removeEventListener("abort", onParentAbort);
      dispose();
    };

    const onParentAbort = () => {
      if (settled) return;
      finish();
      reject(new CancelledError());
    };
    signal?.addEventListener("abort", onParentAbort, { once: true });

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        if (settled) return;
        const error = onTimeout(timeoutMs);
        controller.abort(error);
        finish();
        reject(error);
      }, timeoutMs);
    }

    void Promise.resolve()
      .then(() => fn(controller.signal))
      .then(
        (value) => {
          if (settled) return;
          finish();
          resolve(value);
        },
        (error: unknown) => {
          if (settled) return;
          finish();
          reject(error);
        },
      );
  });
}

/**
 * Signal that aborts when any of `signals` does. Missing signals are
 * ignored; with a single one it is returned as is.
 */
export function combineSignals(...signals: (AbortSignal | undefined)[]): {
  signal?: AbortSignal;
  dispose: () => void;
} {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length <= 1) {
    return { signal: present[0], dispose: () => {} };
  }

  const controller = new AbortController();
  const onAbort = (event: Event) => {
    if (event.target instanceof AbortSignal) controller.abort(event.target.reason);
  };
  const dispose = () => {
    for (const parent of present) parent.removeEventListener("abort", onAbort);
  };

  const aborted = present.find((parent) => parent.aborted);
  if (aborted) {
    controller.abort(aborted.reason);
    return { signal: controller.signal, dispose: () => {} };
  }
  for (const parent of present) {
    parent.addEventListener("abort", onAbort, { once: true });
  }
  return { signal: controller.signal, dispose };
}
