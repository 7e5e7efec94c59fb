import type { ILogObj, Logger } from "tslog";
import { DEFAULT_TOOL_CONCURRENCY, DEFAULT_TOOL_TIMEOUT_MS } from "../core/constants.js";
import { CancelledError, ToolExecutionError, ToolNotFoundError } from "../core/errors.js";
import type { ActionErrorKind, ActionRequest, ActionResult } from "../core/messages.js";
import { componentLogger } from "../logging/logger.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { withTimeout } from "../utils/timing.js";
import { AbortException, TimeoutException } from "./exceptions.js";
import type { ToolRegistry } from "./registry.js";
import type { ToolExecuteReturn } from "./tool.js";
import { validateToolParams } from "./validation.js";

export interface ToolDispatcherOptions {
  /** Timeout for tools that do not declare one (default: 60000, 0 disables) */
  defaultTimeoutMs?: number;
  /** Sibling requests running at once in `dispatchAll` (default: 4) */
  maxConcurrency?: number;
  logger?: Logger<ILogObj>;
  /** Clock used for `elapsedMs`, `performance.now` by default */
  now?: () => number;
}

/**
 * Turns action requests into action results.
 *
 * `dispatch` never rejects. Checks run in a fixed order: the tool must exist
 * (`ToolNotFound`), the arguments must decode and satisfy the schema
 * (`InvalidArguments`), then the handler runs under its timeout; a timeout,
 * a thrown error or a cancellation becomes `ToolExecutionError`.
 */
export class ToolDispatcher {
  private readonly logger: Logger<ILogObj>;
  private readonly defaultTimeoutMs: number;
  private readonly maxConcurrency: number;
  private readonly now: () => number;

  constructor(
    private readonly registry: ToolRegistry,
    options: ToolDispatcherOptions = {},
  ) {
    this.logger = componentLogger("loopwright:dispatcher", options.logger);
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_TOOL_CONCURRENCY);
    this.now = options.now ?? (() => performance.now());
  }

  async dispatch(request: ActionRequest, signal?: AbortSignal): Promise<ActionResult> {
    const startTime = this.now();
    const finish = (
      outcome: { output: string } | { kind: ActionErrorKind; message: string; timedOut?: boolean },
    ): ActionResult => {
      const elapsedMs = Math.max(0, Math.round(this.now() - startTime));
      if ("output" in outcome) {
        return { requestId: request.id, toolName: request.toolName, success: true, output: outcome.output, elapsedMs };
      }
      const { kind, message, timedOut } = outcome;
      return {
        requestId: request.id,
        toolName: request.toolName,
        success: false,
        error: timedOut ? { kind, message, timedOut } : { kind, message },
        elapsedMs,
      };
    };

    this.logger.debug("Dispatching action", { requestId: request.id, toolName: request.toolName });

    const tool = this.registry.get(request.toolName);
    if (!tool) {
      const message = new ToolNotFoundError(request.toolName, this.registry.getNames()).message;
      this.logger.error("Tool not found", { toolName: request.toolName });
      return finish({ kind: "ToolNotFound", message });
    }

    if (request.parseError) {
      this.logger.error("Action arguments could not be decoded", {
        toolName: request.toolName,
        parseError: request.parseError,
      });
      return finish({ kind: "InvalidArguments", message: `Invalid parameters: ${request.parseError}` });
    }

    const validation = validateToolParams(tool, request.arguments);
    if (!validation.success) {
      this.logger.error("Action arguments failed validation", {
        toolName: request.toolName,
        error: validation.error,
      });
      return finish({ kind: "InvalidArguments", message: validation.error });
    }

    const toolName = tool.getName();
    const timeoutMs = tool.timeoutMs ?? this.defaultTimeoutMs;

    try {
      const output = await withTimeout(
        (toolSignal) =>
          tool.execute(validation.data, { signal: toolSignal, requestId: request.id, logger: this.logger }),
        {
          timeoutMs,
          signal,
          onTimeout: (ms) => new TimeoutException(toolName, ms),
        },
      );

      this.logger.info("Tool executed successfully", { toolName, requestId: request.id });
      return finish({ output: stringifyOutput(output) });
    } catch (error) {
      const failure = toExecutionError(toolName, error);
      if (failure.timedOut) {
        this.logger.error("Tool execution timed out", { toolName, timeoutMs });
      } else if (failure.cause instanceof CancelledError || failure.cause instanceof AbortException) {
        this.logger.info("Tool execution was aborted", { toolName });
      } else {
        this.logger.error("Tool execution failed", { toolName, error: failure.message });
      }
      return finish({ kind: "ToolExecutionError", message: failure.message, timedOut: failure.timedOut });
    }
  }

  /**
   * Dispatch sibling requests with bounded concurrency. Results come back in
   * request order whatever order the tools finish in.
   */
  dispatchAll(requests: readonly ActionRequest[], signal?: AbortSignal): Promise<ActionResult[]> {
    return mapWithConcurrency(requests, this.maxConcurrency, (request) => this.dispatch(request, signal));
  }
}

function toExecutionError(toolName: string, error: unknown): ToolExecutionError {
  if (error instanceof TimeoutException) {
    return new ToolExecutionError(toolName, error.message, { cause: error, timedOut: true });
  }
  if (error instanceof CancelledError || error instanceof AbortException) {
    return new ToolExecutionError(toolName, `Tool '${toolName}' was cancelled`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ToolExecutionError(toolName, `Tool '${toolName}' failed: ${message}`, { cause: error });
}

function stringifyOutput(output: ToolExecuteReturn): string {
  if (typeof output === "string") {
    return output;
  }
  return JSON.stringify(output) ?? String(output);
}
