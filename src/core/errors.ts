/**
 * Error taxonomy for the runtime.
 *
 * Tool-level failures never escape the dispatcher: they are folded into
 * action results. Backend, budget and cancellation failures are turned into
 * terminal reasons by the agent loop, so callers only ever see these classes
 * when using the lower-level building blocks directly.
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "TOOL_NOT_FOUND"
  | "TOOL_EXECUTION_ERROR"
  | "BACKEND_TRANSIENT"
  | "BACKEND_FATAL"
  | "RETRY_EXHAUSTED"
  | "CIRCUIT_OPEN"
  | "BUDGET_EXCEEDED"
  | "CANCELLED"
  | "CONFIGURATION_ERROR";

/**
 * Individual validation issue with path and message.
 */
export interface ValidationIssue {
  /** Dot-separated path to the invalid field (e.g., "user.email") */
  path: string;
  /** Human-readable error message */
  message: string;
}

export class LoopwrightError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LoopwrightError";
    this.code = code;
  }
}

/**
 * Arguments of an action request do not satisfy the tool's schema.
 */
export class ValidationError extends LoopwrightError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super("VALIDATION_ERROR", message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class ToolNotFoundError extends LoopwrightError {
  public readonly toolName: string;
  public readonly availableTools: string[];

  constructor(toolName: string, availableTools: string[]) {
    const available = availableTools.length > 0 ? availableTools.join(", ") : "(none)";
    super("TOOL_NOT_FOUND", `Tool '${toolName}' not found. Available tools: ${available}`);
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
    this.availableTools = availableTools;
  }
}

/**
 * A tool handler threw, or did not finish within its timeout.
 */
export class ToolExecutionError extends LoopwrightError {
  public readonly toolName: string;
  public readonly timedOut: boolean;

  constructor(toolName: string, message: string, options: { cause?: unknown; timedOut?: boolean } = {}) {
    super("TOOL_EXECUTION_ERROR", message, { cause: options.cause });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
    this.timedOut = options.timedOut ?? false;
  }
}

interface BackendErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * Backend failure that is expected to go away on its own (rate limits, 5xx,
 * dropped connections, attempt timeouts). Retried by the resilience layer.
 */
export class BackendTransientError extends LoopwrightError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(message: string, options: BackendErrorOptions & { retryAfterMs?: number } = {}) {
    super("BACKEND_TRANSIENT", message, { cause: options.cause });
    this.name = "BackendTransientError";
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Backend failure that retrying cannot fix (authentication, malformed request).
 */
export class BackendFatalError extends LoopwrightError {
  public readonly status?: number;

  constructor(message: string, options: BackendErrorOptions = {}, code: ErrorCode = "BACKEND_FATAL") {
    super(code, message, { cause: options.cause });
    this.name = "BackendFatalError";
    this.status = options.status;
  }
}

export class RetryExhaustedError extends BackendFatalError {
  public readonly attempts: number;
  public readonly lastError: Error;

  constructor(attempts: number, lastError: Error) {
    super(
      `Backend call failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${lastError.message}`,
      { cause: lastError },
      "RETRY_EXHAUSTED",
    );
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class CircuitOpenError extends LoopwrightError {
  /** Milliseconds until the breaker admits a trial call (0 while a trial is in flight) */
  public readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super("CIRCUIT_OPEN", message);
    this.name = "CircuitOpenError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type BudgetKind = "steps" | "tokens";

export class BudgetExceededError extends LoopwrightError {
  public readonly kind: BudgetKind;
  public readonly limit: number;
  public readonly used: number;

  constructor(kind: BudgetKind, limit: number, used: number) {
    super(
      "BUDGET_EXCEEDED",
      kind === "steps"
        ? `Step limit of ${limit} reached`
        : `Token budget of ${limit} exhausted (${used} used)`,
    );
    this.name = "BudgetExceededError";
    this.kind = kind;
    this.limit = limit;
    this.used = used;
  }
}

export class CancelledError extends LoopwrightError {
  constructor(message?: string) {
    super("CANCELLED", message ?? "Run was cancelled");
    this.name = "CancelledError";
  }
}

export class ConfigurationError extends LoopwrightError {
  public readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(
      "CONFIGURATION_ERROR",
      `Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Detects if an error is an abort/cancellation error from any source.
 *
 * Different sources throw different error types when a request is aborted:
 * - Standard: `AbortError` (name) - from fetch/AbortController
 * - Anthropic SDK: `APIConnectionAbortedError`
 * - OpenAI SDK: `APIUserAbortError`
 * - This package: `CancelledError`
 *
 * Only the type and name count; a message that mentions an abort does not.
 *
 * @example
 * ```typescript
 * try {
 *   await backend.complete(request, controller.signal);
 * } catch (error) {
 *   if (isAbortError(error)) {
 *     return; // cancelled by the caller
 *   }
 *   throw error;
 * }
 * ```
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof CancelledError) return true;
  if (!(error instanceof Error)) return false;

  if (error.name === "AbortError") return true;
  if (error.name === "APIConnectionAbortedError") return true;
  return error.name === "APIUserAbortError";
}

/**
 * Formats a backend error into a short, single-line message suitable for a
 * run result.
 */
export function formatBackendError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error instanceof LoopwrightError) {
    return error.message;
  }

  const message = error.message;
  const lower = message.toLowerCase();

  if (message.includes("429") || lower.includes("rate limit")) {
    return "Rate limit exceeded (429)";
  }
  if (message.includes("401") || lower.includes("unauthorized") || error.name === "AuthenticationError") {
    return "Authentication failed - check your API key";
  }
  if (lower.includes("overloaded")) {
    return "API overloaded - retry later";
  }

  if (message.length > 200) {
    return `${message.slice(0, 150).trim()}...`;
  }
  return message;
}
