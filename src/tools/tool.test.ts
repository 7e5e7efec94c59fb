import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { createLogger } from "../logging/logger.js";
import { createTool } from "./create-tool.js";
import { AbortException } from "./exceptions.js";
import type { ToolContext } from "./tool.js";
import { Tool } from "./typed-tool.js";

function context(signal: AbortSignal = new AbortController().signal): ToolContext {
  return { signal, requestId: "req-1", logger: createLogger({ type: "hidden" }) };
}

class Multiply extends Tool({
  name: "Multiply",
  description: "Multiplies two numbers",
  schema: z.object({ a: z.number(), b: z.number() }),
  timeoutMs: 1000,
}) {
  execute(params: this["params"]): string {
    return String(params.a * params.b);
  }
}

describe("Tool factory", () => {
  it("should carry the configuration onto the class", () => {
    const tool = new Multiply();

    expect(tool.getName()).toBe("Multiply");
    expect(tool.description).toBe("Multiplies two numbers");
    expect(tool.timeoutMs).toBe(1000);
    expect(tool.execute({ a: 6, b: 7 })).toBe("42");
  });

  it("should fall back to the class name", () => {
    class Shout extends Tool({ description: "Upper-cases text", schema: z.object({ text: z.string() }) }) {
      execute(params: this["params"]): string {
        return params.text.toUpperCase();
      }
    }

    expect(new Shout().getName()).toBe("Shout");
  });
});

describe("createTool", () => {
  it("should pass parameters and context to the function", async () => {
    const execute = vi.fn(({ city }: { city: string }, ctx: ToolContext) => `${city}:${ctx.requestId}`);
    const weather = createTool({
      name: "Weather",
      description: "Looks up the weather",
      schema: z.object({ city: z.string() }),
      execute,
    });

    await expect(Promise.resolve(weather.execute({ city: "Oslo" }, context()))).resolves.toBe("Oslo:req-1");
    expect(weather.getName()).toBe("Weather");
    expect(weather.timeoutMs).toBeUndefined();
  });
});

describe("BaseTool helpers", () => {
  it("should throw once the signal is aborted", () => {
    const tool = new Multiply();
    const controller = new AbortController();

    expect(() => tool.throwIfAborted(context(controller.signal))).not.toThrow();
    controller.abort();
    expect(() => tool.throwIfAborted(context(controller.signal))).toThrow(AbortException);
  });

  it("should run abort cleanups", async () => {
    const tool = new Multiply();
    const controller = new AbortController();
    const cleanup = vi.fn();

    tool.onAbort(context(controller.signal), cleanup);
    expect(cleanup).not.toHaveBeenCalled();
    controller.abort();
    await Promise.resolve();
    await Promise.resolve();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it("should run the cleanup at once when already aborted", async () => {
    const cleanup = vi.fn();

    new Multiply().onAbort(context(AbortSignal.abort()), cleanup);
    await Promise.resolve();
    await Promise.resolve();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });
});
