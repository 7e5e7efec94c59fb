import {
  BackendFatalError,
  BackendTransientError,
  isAbortError,
  LoopwrightError,
} from "../core/errors.js";
import type { ActionRequest, ConversationMessage } from "../core/messages.js";
import { isRetryableError } from "../core/retry.js";
import type { ToolDescriptor } from "../tools/registry.js";

export interface GenerationParams {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface BackendRequest {
  messages: readonly ConversationMessage[];
  tools: readonly ToolDescriptor[];
  params: GenerationParams;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Why the backend stopped generating. `tool_use` means the response carries
 * action requests; anything else with no actions ends the run.
 */
export type FinishReason = "stop" | "tool_use" | "max_tokens" | "content_filter" | "unknown";

export interface BackendResponse {
  /** Assistant text, possibly empty */
  text: string;
  /** Requested actions in the order the model issued them */
  actions: ActionRequest[];
  usage: TokenUsage;
  finishReason: FinishReason;
}

/**
 * Minimal contract with a remote inference service. Transport, auth and
 * serialization belong to the implementation.
 */
export interface BackendClient {
  readonly name: string;
  complete(request: BackendRequest, signal?: AbortSignal): Promise<BackendResponse>;
}

export const EMPTY_USAGE: TokenUsage = Object.freeze({ inputTokens: 0, outputTokens: 0, totalTokens: 0 });

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

/**
 * Decodes the JSON arguments of a native tool call. Arguments that are not
 * a JSON object come back empty with `parseError` set, for the dispatcher to
 * report.
 */
export function decodeActionArguments(raw: unknown): Pick<ActionRequest, "arguments" | "parseError"> {
  let value = raw;
  if (typeof raw === "string") {
    if (raw.trim() === "") {
      return { arguments: {} };
    }
    try {
      value = JSON.parse(raw);
    } catch (error) {
      return {
        arguments: {},
        parseError: `arguments are not valid JSON (${error instanceof Error ? error.message : String(error)})`,
      };
    }
  }
  if (isPlainObject(value)) {
    return { arguments: value };
  }
  return { arguments: {}, parseError: "arguments must be a JSON object" };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function statusOf(error: Error): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

/**
 * Server-requested wait from `retry-after-ms` or `retry-after` (seconds or an
 * HTTP date), when the SDK error carries response headers.
 */
export function retryAfterOf(error: Error, now: number = Date.now()): number | undefined {
  const headers = "headers" in error ? error.headers : undefined;
  if (!(headers instanceof Headers)) {
    return undefined;
  }
  const millis = Number.parseFloat(headers.get("retry-after-ms") ?? "");
  if (Number.isFinite(millis) && millis >= 0) {
    return Math.round(millis);
  }

  const value = headers.get("retry-after");
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

/**
 * Translates an SDK error into the runtime's taxonomy. Timeouts, rate
 * limits, conflicts and server errors are transient; other HTTP statuses are
 * fatal. Aborts and already classified errors pass through unchanged.
 * A `retry-after` header on a transient error becomes `retryAfterMs`.
 */
export function toBackendError(error: unknown, backendName: string): unknown {
  if (isAbortError(error) || error instanceof LoopwrightError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new BackendFatalError(`${backendName} request failed: ${String(error)}`, { cause: error });
  }

  const message = `${backendName} request failed: ${error.message}`;
  const status = statusOf(error);
  if (status === undefined) {
    return isRetryableError(error)
      ? new BackendTransientError(message, { cause: error })
      : new BackendFatalError(message, { cause: error });
  }
  if (status === 408 || status === 409 || status === 429 || status >= 500) {
    return new BackendTransientError(message, { status, cause: error, retryAfterMs: retryAfterOf(error) });
  }
  return new BackendFatalError(message, { status, cause: error });
}
