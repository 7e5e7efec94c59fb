import type { ILogObj, Logger } from "tslog";
import type { ZodType } from "zod";
import { AbortException } from "./exceptions.js";

/**
 * What a tool receives besides its arguments. Tools never see the
 * conversation or the run state; they return a value and nothing else.
 */
export interface ToolContext {
  /** Aborted on timeout or when the run is cancelled */
  signal: AbortSignal;
  /** Id of the action request being served */
  requestId: string;
  logger: Logger<ILogObj>;
}

/**
 * Strings are passed to the model as is, anything else is JSON-encoded.
 */
export type ToolExecuteReturn = string | number | boolean | object;

/**
 * Abstract base class for tools. Most users should use the `Tool()` factory
 * or `createTool()` function instead, as they infer parameter types from the
 * schema.
 */
export abstract class BaseTool {
  /**
   * The name the model calls the tool by. Defaults to the class name.
   */
  name?: string;

  /**
   * Human-readable description of what the tool does.
   */
  abstract description: string;

  /**
   * Zod object schema for the arguments. Validated (with defaults applied)
   * before `execute` runs and rendered to JSON Schema for the backend.
   * Without a schema any argument object is accepted.
   */
  parameterSchema?: ZodType;

  /**
   * Per-call timeout in milliseconds. Falls back to the dispatcher default;
   * `0` disables the timeout for this tool.
   */
  timeoutMs?: number;

  abstract execute(
    params: Record<string, unknown>,
    ctx: ToolContext,
  ): ToolExecuteReturn | Promise<ToolExecuteReturn>;

  /**
   * Throws an AbortException if the execution has been aborted.
   *
   * Call this at checkpoints in long-running tools so they stop doing work
   * nobody will read.
   *
   * @example
   * ```typescript
   * async execute(params: this["params"], ctx: ToolContext): Promise<string> {
   *   for (const file of params.files) {
   *     this.throwIfAborted(ctx);
   *     await index(file);
   *   }
   *   return "indexed";
   * }
   * ```
   */
  throwIfAborted(ctx: ToolContext): void {
    if (ctx.signal.aborted) {
      throw new AbortException();
    }
  }

  /**
   * Register a cleanup function to run when execution is aborted (timeout or
   * cancellation). Runs immediately if the signal is already aborted.
   * Cleanup failures are logged through the context logger.
   *
   * @example
   * ```typescript
   * async execute(params: this["params"], ctx: ToolContext): Promise<string> {
   *   const child = spawn("make", [params.target]);
   *   this.onAbort(ctx, () => child.kill());
   *   return waitForExit(child);
   * }
   * ```
   */
  onAbort(ctx: ToolContext, cleanup: () => void | Promise<void>): void {
    const runCleanup = () => {
      void Promise.resolve()
        .then(cleanup)
        .catch((error: unknown) => {
          ctx.logger.warn(`Cleanup for tool '${this.getName()}' failed`, error);
        });
    };

    if (ctx.signal.aborted) {
      runCleanup();
      return;
    }
    ctx.signal.addEventListener("abort", runCleanup, { once: true });
  }

  getName(): string {
    return this.name ?? this.constructor.name;
  }
}
