/**
 * Thrown by the dispatcher when a tool runs past its timeout.
 *
 * The tool's `ctx.signal` is aborted with this exception as the reason before
 * the dispatcher turns it into a `ToolExecutionError` result.
 *
 * @example
 * ```typescript
 * class SlowApi extends Tool({
 *   name: "SlowApi",
 *   description: "Calls a slow external API",
 *   timeoutMs: 5000,
 *   schema: z.object({ endpoint: z.string() }),
 * }) {
 *   async execute(params: this["params"], ctx: ToolContext): Promise<string> {
 *     const response = await fetch(params.endpoint, { signal: ctx.signal });
 *     return response.text();
 *   }
 * }
 * ```
 */
export class TimeoutException extends Error {
  public readonly timeoutMs: number;
  public readonly toolName: string;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' execution exceeded timeout of ${timeoutMs}ms`);
    this.name = "TimeoutException";
    this.toolName = toolName;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown by tools that notice their signal was aborted, typically through
 * `BaseTool.throwIfAborted()`.
 */
export class AbortException extends Error {
  constructor(message?: string) {
    super(message || "Tool execution was aborted");
    this.name = "AbortException";
  }
}
