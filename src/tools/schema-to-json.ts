import type { ZodType } from "zod";
import * as z from "zod";

/**
 * Convert a Zod schema to the JSON Schema sent to backends in tool descriptors.
 *
 * @example
 * ```typescript
 * schemaToJSONSchema(z.object({ path: z.string().describe("File to read") }));
 * // { $schema: "http://json-schema.org/draft-07/schema#", type: "object",
 * //   properties: { path: { type: "string", description: "File to read" } },
 * //   required: ["path"], additionalProperties: false }
 * ```
 */
export function schemaToJSONSchema(schema: ZodType): Record<string, unknown> {
  return z.toJSONSchema(schema, { target: "draft-7" });
}

/**
 * Checks that a tool schema describes an object and can be rendered as JSON
 * Schema. Throws with the tool name otherwise.
 */
export function validateToolSchema(schema: ZodType, toolName: string): void {
  if (!(schema instanceof z.ZodObject)) {
    throw new Error(`Tool "${toolName}" must use a z.object() schema for its parameters`);
  }

  try {
    schemaToJSONSchema(schema);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Tool "${toolName}" has a schema that cannot be serialized to JSON Schema: ${errorMessage}`,
      { cause: error },
    );
  }
}
