import { describe, expect, it } from "vitest";
import { CircuitBreaker } from "../core/circuit-breaker.js";
import { BackendTransientError, ConfigurationError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { MockBackend } from "../testing/mock-backend.js";
import { createMockTool } from "../testing/mock-tool.js";
import { ToolRegistry } from "../tools/registry.js";
import { AgentBuilder } from "./builder.js";

const logger = createLogger({ type: "hidden" });

describe("AgentBuilder", () => {
  it("should require a backend", () => {
    expect(() => new AgentBuilder().build()).toThrow(
      new ConfigurationError([{ path: "backend", message: "A backend is required; call withBackend()" }]),
    );
  });

  it("should pass generation settings and the system prompt to requests", async () => {
    const backend = new MockBackend([{ text: "ok" }]);
    const agent = new AgentBuilder()
      .withBackend(backend)
      .withLogger(logger)
      .withSystem("Be brief.")
      .withModel("test-model")
      .withTemperature(0.5)
      .withMaxTokens(256)
      .build();

    await agent.run("Hi");

    const request = backend.getLastRequest();
    expect(request?.params).toEqual({ model: "test-model", temperature: 0.5, maxTokens: 256 });
    expect(request?.messages.map((m) => m.role)).toEqual(["system", "user"]);
  });

  it("should register tools into a sealed registry", () => {
    const registry = ToolRegistry.from([createMockTool({ name: "Existing" })]);
    const agent = new AgentBuilder()
      .withBackend(new MockBackend())
      .withRegistry(registry)
      .withTools(createMockTool({ name: "Added" }))
      .build();

    expect(agent.getRegistry()).toBe(registry);
    expect(registry.getNames()).toEqual(["Existing", "Added"]);
    expect(registry.isSealed()).toBe(true);
  });

  it("should apply the step limit", async () => {
    const backend = new MockBackend([], { fallback: { actions: [{ toolName: "Missing" }] } });

    const result = await new AgentBuilder().withBackend(backend).withLogger(logger).withMaxSteps(2).build().run("Go");

    expect(result.reason).toBe("step_limit_exceeded");
    expect(backend.getCallCount()).toBe(2);
  });

  it("should merge retry settings", async () => {
    const backend = new MockBackend([new BackendTransientError("busy"), new BackendTransientError("busy"), { text: "ok" }]);
    const agent = new AgentBuilder()
      .withBackend(backend)
      .withLogger(logger)
      .withRetry({ maxRetries: 2 })
      .withRetry({ initialDelayMs: 0, jitter: false })
      .build();

    const result = await agent.run("Hi");

    expect(result.reason).toBe("completed");
    expect(backend.getCallCount()).toBe(3);
  });

  it("should share a breaker instance", () => {
    const breaker = new CircuitBreaker();
    const agent = new AgentBuilder().withBackend(new MockBackend()).withCircuitBreaker(breaker).build();

    expect(agent.getCircuitBreaker()).toBe(breaker);
  });

  it("should configure or disable compaction", () => {
    const configured = new AgentBuilder()
      .withBackend(new MockBackend())
      .withCompaction({ contextLimit: 1000 })
      .withCompaction({ headroomFraction: 0.2 })
      .build();
    const disabled = new AgentBuilder().withBackend(new MockBackend()).withoutCompaction().build();

    expect(configured.getCompactionStats()?.budgetTokens).toBe(800);
    expect(disabled.getCompactionStats()).toBeNull();
  });

  describe("withConfig", () => {
    it("should apply a validated configuration", async () => {
      const backend = new MockBackend([new BackendTransientError("busy"), { text: "ok" }]);
      const agent = new AgentBuilder()
        .withBackend(backend)
        .withLogger(logger)
        .withConfig({
          model: "configured-model",
          retry: { maxRetries: 1, initialDelayMs: 0, jitter: false },
          compaction: { contextLimit: 2000, headroomFraction: 0.5 },
        })
        .build();

      const result = await agent.run("Hi");

      expect(result.reason).toBe("completed");
      expect(backend.getCallCount()).toBe(2);
      expect(backend.getLastRequest()?.params).toEqual({ model: "configured-model" });
      expect(agent.getCompactionStats()?.budgetTokens).toBe(1000);
    });

    it("should let later calls override the configuration", async () => {
      const backend = new MockBackend([], { fallback: { actions: [{ toolName: "Missing" }] } });

      await new AgentBuilder()
        .withBackend(backend)
        .withLogger(logger)
        .withConfig({ maxSteps: 5 })
        .withMaxSteps(1)
        .build()
        .run("Go");

      expect(backend.getCallCount()).toBe(1);
    });

    it("should reject invalid configuration", () => {
      expect(() => new AgentBuilder().withConfig({ maxSteps: -1 })).toThrow(ConfigurationError);
    });
  });
});
