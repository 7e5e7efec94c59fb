/**
 * Function-based tool creation helper.
 *
 * For simple tools, use createTool() instead of defining a class.
 * Parameters are automatically typed from the Zod schema.
 */

import type { ZodType } from "zod";
import { BaseTool, type ToolContext, type ToolExecuteReturn } from "./tool.js";

type InferSchema<T> = T extends ZodType<infer U> ? U : never;

export interface CreateToolConfig<TSchema extends ZodType> {
  /** Name the model calls the tool by */
  name: string;

  /** Human-readable description of what the tool does */
  description: string;

  /** Zod object schema for parameter validation */
  schema: TSchema;

  /**
   * Execution function with typed, already validated parameters.
   */
  execute: (
    params: InferSchema<TSchema>,
    ctx: ToolContext,
  ) => ToolExecuteReturn | Promise<ToolExecuteReturn>;

  /** Optional timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Creates a tool from a function (simpler than the class-based approach).
 *
 * @example
 * ```typescript
 * import { z } from "zod";
 * import { createTool } from "loopwright";
 *
 * const calculator = createTool({
 *   name: "Calculator",
 *   description: "Performs arithmetic operations",
 *   schema: z.object({
 *     operation: z.enum(["add", "subtract", "multiply", "divide"]),
 *     a: z.number().describe("First number"),
 *     b: z.number().describe("Second number"),
 *   }),
 *   execute: ({ operation, a, b }) => {
 *     switch (operation) {
 *       case "add": return String(a + b);
 *       case "subtract": return String(a - b);
 *       case "multiply": return String(a * b);
 *       case "divide": return String(a / b);
 *     }
 *   },
 * });
 * ```
 *
 * @example
 * ```typescript
 * // Async tool honouring cancellation
 * const fetchPage = createTool({
 *   name: "FetchPage",
 *   description: "Downloads a web page as text",
 *   schema: z.object({ url: z.string().url() }),
 *   timeoutMs: 10_000,
 *   execute: async ({ url }, ctx) => {
 *     const response = await fetch(url, { signal: ctx.signal });
 *     return response.text();
 *   },
 * });
 * ```
 */
export function createTool<TSchema extends ZodType>(config: CreateToolConfig<TSchema>): BaseTool {
  class FunctionTool extends BaseTool {
    name = config.name;
    description = config.description;
    parameterSchema: ZodType = config.schema;
    timeoutMs = config.timeoutMs;

    execute(
      params: Record<string, unknown>,
      ctx: ToolContext,
    ): ToolExecuteReturn | Promise<ToolExecuteReturn> {
      // params were produced by config.schema in the dispatcher
      return config.execute(params as InferSchema<TSchema>, ctx);
    }
  }

  return new FunctionTool();
}
