import { describe, expect, it } from "vitest";
import { z } from "zod";
import { createTool } from "./create-tool.js";
import { ToolRegistry } from "./registry.js";
import { BaseTool } from "./tool.js";
import { Tool } from "./typed-tool.js";

class Echo extends Tool({
  description: "Returns its input",
  schema: z.object({ text: z.string().describe("Text to echo") }),
  timeoutMs: 500,
}) {
  execute(params: this["params"]): string {
    return params.text;
  }
}

class Ping extends BaseTool {
  description = "Replies pong";

  execute(): string {
    return "pong";
  }
}

describe("ToolRegistry", () => {
  it("should register classes under their class name", () => {
    const registry = ToolRegistry.from([Echo, Ping]);

    expect(registry.getNames()).toEqual(["Echo", "Ping"]);
    expect(registry.size).toBe(2);
  });

  it("should look tools up case-insensitively", () => {
    const registry = ToolRegistry.from([Echo]);

    expect(registry.get("echo")).toBeInstanceOf(Echo);
    expect(registry.has("ECHO")).toBe(true);
    expect(registry.get("missing")).toBeUndefined();
  });

  it("should register aliases from an object", () => {
    const registry = ToolRegistry.from({ say: Echo, ping: new Ping() });

    expect(registry.getNames()).toEqual(["say", "ping"]);
    expect(registry.get("say")).toBeInstanceOf(Echo);
  });

  it("should reject duplicate names regardless of case", () => {
    const registry = ToolRegistry.from([Echo]);

    expect(() => registry.register("ECHO", new Ping())).toThrow("Tool 'ECHO' is already registered");
  });

  it("should reject non-object schemas", () => {
    const bad = createTool({
      name: "Bad",
      description: "Takes a bare string",
      schema: z.string(),
      execute: (value) => value,
    });

    expect(() => new ToolRegistry().registerByClass(bad)).toThrow(
      'Tool "Bad" must use a z.object() schema for its parameters',
    );
  });

  it("should describe tools for the backend", () => {
    const registry = ToolRegistry.from([Echo, Ping]);
    const [echo, ping] = registry.getDescriptors();

    expect(echo).toMatchObject({
      name: "Echo",
      description: "Returns its input",
      timeoutMs: 500,
      inputSchema: {
        type: "object",
        properties: { text: { type: "string", description: "Text to echo" } },
        required: ["text"],
      },
    });
    expect(ping).toEqual({
      name: "Ping",
      description: "Replies pong",
      inputSchema: { type: "object", properties: {} },
    });
    expect(Object.isFrozen(echo)).toBe(true);
  });

  it("should refuse changes once sealed", () => {
    const registry = ToolRegistry.from([Echo]).seal();

    expect(registry.isSealed()).toBe(true);
    expect(() => registry.registerByClass(new Ping())).toThrow(
      "Tool registry is sealed and can no longer be modified",
    );
    expect(() => registry.unregister("Echo")).toThrow("Tool registry is sealed and can no longer be modified");
    expect(() => registry.clear()).toThrow("Tool registry is sealed and can no longer be modified");
    expect(registry.size).toBe(1);
  });

  it("should unregister and clear while writable", () => {
    const registry = ToolRegistry.from([Echo, Ping]);

    expect(registry.unregister("echo")).toBe(true);
    expect(registry.unregister("echo")).toBe(false);
    registry.clear();
    expect(registry.size).toBe(0);
  });
});
