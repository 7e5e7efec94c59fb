/**
 * Type-safe tool factory with automatic parameter inference.
 *
 * The base class returned by `Tool()` knows the schema's type, so subclasses
 * declare `execute(params: this["params"])` and get fully typed arguments.
 *
 * @example
 * ```typescript
 * class ReadFile extends Tool({
 *   name: "ReadFile",
 *   description: "Reads a UTF-8 text file",
 *   schema: z.object({
 *     path: z.string().describe("Path relative to the workspace"),
 *     maxBytes: z.number().int().positive().default(65536),
 *   }),
 *   timeoutMs: 5000,
 * }) {
 *   async execute(params: this["params"]): Promise<string> {
 *     const text = await readFile(params.path, "utf8");
 *     return text.slice(0, params.maxBytes);
 *   }
 * }
 * ```
 */

import type { ZodType } from "zod";
import { BaseTool, type ToolContext, type ToolExecuteReturn } from "./tool.js";

type InferSchema<T> = T extends ZodType<infer U> ? U : never;

export interface ToolConfig<TSchema extends ZodType> {
  /** Human-readable description of what the tool does */
  description: string;

  /** Zod object schema for parameter validation */
  schema: TSchema;

  /** Optional custom name (defaults to class name) */
  name?: string;

  /** Optional timeout in milliseconds */
  timeoutMs?: number;
}

export function Tool<TSchema extends ZodType>(config: ToolConfig<TSchema>) {
  abstract class ToolBase extends BaseTool {
    description = config.description;
    parameterSchema: ZodType = config.schema;
    name = config.name;
    timeoutMs = config.timeoutMs;

    /**
     * Type helper for the inferred parameter type, used as
     * `execute(params: this["params"])`. Never assigned at run time.
     */
    readonly params!: InferSchema<TSchema>;

    abstract execute(
      params: Record<string, unknown>,
      ctx: ToolContext,
    ): ToolExecuteReturn | Promise<ToolExecuteReturn>;
  }

  return ToolBase as {
    new (): ToolBase & { params: InferSchema<TSchema> };
  };
}
