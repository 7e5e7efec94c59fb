import { describe, expect, it } from "vitest";
import { z } from "zod";
import { createTool } from "./create-tool.js";
import { schemaToJSONSchema, validateToolSchema } from "./schema-to-json.js";
import { BaseTool } from "./tool.js";
import { validateAndApplyDefaults, validateToolParams } from "./validation.js";

const schema = z.object({
  path: z.string().min(1, "path must not be empty"),
  limit: z.number().int().default(10),
  options: z.object({ recursive: z.boolean({ error: "recursive must be a boolean" }) }).optional(),
});

describe("validateAndApplyDefaults", () => {
  it("should apply defaults", () => {
    const result = validateAndApplyDefaults(schema, { path: "/tmp" });

    expect(result).toEqual({ success: true, data: { path: "/tmp", limit: 10 } });
  });

  it("should report every issue with its path", () => {
    const result = validateAndApplyDefaults(schema, { path: "", options: { recursive: "yes" } });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.issues).toEqual([
      { path: "path", message: "path must not be empty" },
      { path: "options.recursive", message: "recursive must be a boolean" },
    ]);
    expect(result.error).toBe(
      "Invalid parameters: path: path must not be empty; options.recursive: recursive must be a boolean",
    );
  });

  it("should not mutate the input", () => {
    const input = { path: "/tmp" };

    validateAndApplyDefaults(schema, input);

    expect(input).toEqual({ path: "/tmp" });
  });
});

describe("validateToolParams", () => {
  it("should pass arguments through for tools without a schema", () => {
    class Free extends BaseTool {
      description = "Accepts anything";
      execute(): string {
        return "";
      }
    }

    expect(validateToolParams(new Free(), { anything: 1 })).toEqual({ success: true, data: { anything: 1 } });
  });

  it("should use the tool's schema", () => {
    const tool = createTool({ name: "List", description: "Lists a directory", schema, execute: () => "" });

    expect(validateToolParams(tool, { path: "/srv" })).toEqual({
      success: true,
      data: { path: "/srv", limit: 10 },
    });
  });
});

describe("schemaToJSONSchema", () => {
  it("should render descriptions and required fields", () => {
    const json = schemaToJSONSchema(
      z.object({ query: z.string().describe("Search terms"), page: z.number().optional() }),
    );

    expect(json).toMatchObject({
      type: "object",
      properties: {
        query: { type: "string", description: "Search terms" },
        page: { type: "number" },
      },
      required: ["query"],
    });
  });

  it("should accept object schemas and reject the rest", () => {
    expect(() => validateToolSchema(schema, "List")).not.toThrow();
    expect(() => validateToolSchema(z.array(z.string()), "Tags")).toThrow(
      'Tool "Tags" must use a z.object() schema for its parameters',
    );
  });
});
