import { describe, expect, it } from "vitest";
import { z } from "zod";
import type { ActionRequest } from "../core/messages.js";
import { sleep } from "../utils/timing.js";
import { createTool } from "./create-tool.js";
import { ToolDispatcher } from "./dispatcher.js";
import { ToolRegistry } from "./registry.js";

const echo = createTool({
  name: "Echo",
  description: "Returns its input",
  schema: z.object({ text: z.string({ error: "text must be a string" }) }),
  execute: ({ text }) => text,
});

const add = createTool({
  name: "Add",
  description: "Adds two numbers",
  schema: z.object({ a: z.number(), b: z.number().default(1) }),
  execute: ({ a, b }) => ({ sum: a + b }),
});

const slow = createTool({
  name: "Slow",
  description: "Waits until it is interrupted",
  schema: z.object({}),
  timeoutMs: 20,
  execute: (_params, ctx) => sleep(60_000, ctx.signal).then(() => "never"),
});

const broken = createTool({
  name: "Broken",
  description: "Always fails",
  schema: z.object({}),
  execute: () => {
    throw new Error("disk full");
  },
});

const registry = ToolRegistry.from([echo, add, slow, broken]).seal();

function request(id: string, toolName: string, args: Record<string, unknown> = {}): ActionRequest {
  return { id, toolName, arguments: args };
}

describe("ToolDispatcher", () => {
  it("should run the tool and return its output", async () => {
    const dispatcher = new ToolDispatcher(registry, { now: () => 0 });

    const result = await dispatcher.dispatch(request("a", "echo", { text: "hello" }));

    expect(result).toEqual({ requestId: "a", toolName: "echo", success: true, output: "hello", elapsedMs: 0 });
  });

  it("should apply schema defaults and JSON-encode object output", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch(request("a", "Add", { a: 2 }));

    expect(result.output).toBe('{"sum":3}');
  });

  it("should report unknown tools", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch(request("x", "Search"));

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      kind: "ToolNotFound",
      message: "Tool 'Search' not found. Available tools: Echo, Add, Slow, Broken",
    });
  });

  it("should report arguments that failed to decode", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch({
      ...request("p", "Echo"),
      parseError: "arguments are not valid JSON (Unexpected end of JSON input)",
    });

    expect(result.error).toEqual({
      kind: "InvalidArguments",
      message: "Invalid parameters: arguments are not valid JSON (Unexpected end of JSON input)",
    });
  });

  it("should report schema violations", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch(request("v", "Echo", { text: 42 }));

    expect(result.error).toEqual({
      kind: "InvalidArguments",
      message: "Invalid parameters: text: text must be a string",
    });
  });

  it("should check the tool exists before the arguments", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch({ ...request("q", "Search"), parseError: "bad" });

    expect(result.error?.kind).toBe("ToolNotFound");
  });

  it("should turn thrown errors into execution errors", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch(request("b", "Broken"));

    expect(result.error).toEqual({ kind: "ToolExecutionError", message: "Tool 'Broken' failed: disk full" });
  });

  it("should time out slow tools", async () => {
    const dispatcher = new ToolDispatcher(registry);

    const result = await dispatcher.dispatch(request("s", "Slow"));

    expect(result.error).toEqual({
      kind: "ToolExecutionError",
      message: "Tool 'Slow' execution exceeded timeout of 20ms",
      timedOut: true,
    });
  });

  it("should report cancellation as an execution error", async () => {
    const dispatcher = new ToolDispatcher(registry, { defaultTimeoutMs: 0 });
    const controller = new AbortController();
    const pending = dispatcher.dispatch(request("s", "Slow"), controller.signal);
    controller.abort();

    const result = await pending;

    expect(result.error).toEqual({ kind: "ToolExecutionError", message: "Tool 'Slow' was cancelled" });
  });

  it("should return one result per sibling in request order", async () => {
    const dispatcher = new ToolDispatcher(registry, { maxConcurrency: 3 });

    const results = await dispatcher.dispatchAll([
      request("1", "Echo", { text: "first" }),
      request("2", "Slow"),
      request("3", "Echo", { text: "third" }),
    ]);

    expect(results.map((r) => r.requestId)).toEqual(["1", "2", "3"]);
    expect(results.map((r) => r.success)).toEqual([true, false, true]);
    expect(results[0].output).toBe("first");
    expect(results[1].error?.timedOut).toBe(true);
    expect(results[2].output).toBe("third");
  });

  it("should produce identical results for identical requests", async () => {
    const dispatcher = new ToolDispatcher(registry, { now: () => 0 });
    const same = request("r", "Add", { a: 1, b: 2 });

    const first = await dispatcher.dispatch(same);
    const second = await dispatcher.dispatch(same);

    expect(second).toEqual(first);
  });
});
