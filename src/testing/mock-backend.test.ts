import { describe, expect, it } from "vitest";
import { z } from "zod";
import { CancelledError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { MockBackend } from "./mock-backend.js";
import { createMockTool } from "./mock-tool.js";

const request = { messages: [], tools: [], params: {} };

describe("MockBackend", () => {
  it("should replay the script in order and fill in defaults", async () => {
    const backend = new MockBackend([{ actions: [{ toolName: "Echo" }, { id: "own", toolName: "Echo" }] }]);
    backend.enqueue({ text: "done", usage: { inputTokens: 7 } });

    const first = await backend.complete(request);
    const second = await backend.complete(request);

    expect(first).toEqual({
      text: "",
      actions: [
        { id: "call_1_0", toolName: "Echo", arguments: {} },
        { id: "own", toolName: "Echo", arguments: {} },
      ],
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
      finishReason: "tool_use",
    });
    expect(second).toMatchObject({
      text: "done",
      usage: { inputTokens: 7, outputTokens: 0, totalTokens: 7 },
      finishReason: "stop",
    });
  });

  it("should throw scripted errors and run scripted functions", async () => {
    const backend = new MockBackend([
      new Error("scripted failure"),
      (_request, callNumber) => ({ text: `call ${callNumber}` }),
    ]);

    await expect(backend.complete(request)).rejects.toThrow("scripted failure");
    await expect(backend.complete(request)).resolves.toMatchObject({ text: "call 2" });
  });

  it("should fail once the script runs out without a fallback", async () => {
    const backend = new MockBackend();

    await expect(backend.complete(request)).rejects.toThrow("MockBackend has no scripted response for call 1");
  });

  it("should record requests until reset", async () => {
    const backend = new MockBackend([], { fallback: { text: "ok" } });
    await backend.complete(request);
    await backend.complete({ ...request, params: { model: "m" } });

    expect(backend.getCallCount()).toBe(2);
    expect(backend.getLastRequest()?.params).toEqual({ model: "m" });

    backend.reset();
    expect(backend.getRequests()).toEqual([]);
  });

  it("should honour the signal while delayed", async () => {
    const backend = new MockBackend([{ text: "late" }], { delayMs: 60_000 });
    const controller = new AbortController();

    const pending = backend.complete(request, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("createMockTool", () => {
  const ctx = () => ({
    signal: new AbortController().signal,
    requestId: "req-7",
    logger: createLogger({ type: "hidden" }),
  });

  it("should record calls and return the configured result", async () => {
    const tool = createMockTool({ name: "Lookup", schema: z.object({ key: z.string() }), result: "value" });

    await expect(tool.execute({ key: "a" }, ctx())).resolves.toBe("value");
    expect(tool.getCallCount()).toBe(1);
    expect(tool.wasCalledWith({ key: "a" })).toBe(true);
    expect(tool.wasCalledWith({ key: "b" })).toBe(false);
    expect(tool.getLastCall()).toMatchObject({ params: { key: "a" }, requestId: "req-7" });
    expect(tool.description).toBe("Mock tool: Lookup");

    tool.resetCalls();
    expect(tool.getCalls()).toEqual([]);
  });

  it("should compute results or throw", async () => {
    const computed = createMockTool({ name: "Upper", resultFn: (params) => String(params.text).toUpperCase() });
    const failing = createMockTool({ name: "Fail", error: "exploded" });

    await expect(computed.execute({ text: "hi" }, ctx())).resolves.toBe("HI");
    await expect(failing.execute({}, ctx())).rejects.toThrow("exploded");
  });
});
