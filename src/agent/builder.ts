/**
 * Fluent builder for agents.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(new OpenAIBackend(new OpenAI()))
 *   .withModel("gpt-4o-mini")
 *   .withSystem("You are a helpful assistant")
 *   .withTools(Calculator, Weather)
 *   .withMaxSteps(10)
 *   .build();
 *
 * const result = await agent.run("What's the weather in Paris?");
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import type { BackendClient, GenerationParams } from "../backends/backend.js";
import { CircuitBreaker, type CircuitBreakerOptions } from "../core/circuit-breaker.js";
import { type RuntimeConfigInput, resolveRuntimeConfig } from "../core/config.js";
import { ConfigurationError } from "../core/errors.js";
import type { RetryPolicy } from "../core/retry.js";
import { ToolRegistry, type ToolOrClass } from "../tools/registry.js";
import { Agent, type AgentOptions } from "./agent.js";
import type { CompactionConfig } from "./compaction/config.js";

export class AgentBuilder {
  private backend?: BackendClient;
  private systemPrompt?: string;
  private params: GenerationParams = {};
  private maxSteps?: number;
  private tokenBudget?: number;
  private tools: ToolOrClass[] = [];
  private registry?: ToolRegistry;
  private retry?: RetryPolicy;
  private attemptTimeoutMs?: number;
  private circuitBreaker?: CircuitBreaker | CircuitBreakerOptions;
  private compaction?: CompactionConfig | false;
  private toolOptions: NonNullable<AgentOptions["tools"]> = {};
  private signal?: AbortSignal;
  private logger?: Logger<ILogObj>;
  private random?: () => number;

  withBackend(backend: BackendClient): this {
    this.backend = backend;
    return this;
  }

  withSystem(prompt: string): this {
    this.systemPrompt = prompt;
    return this;
  }

  /**
   * Model name passed through to the backend adapter.
   */
  withModel(model: string): this {
    this.params = { ...this.params, model };
    return this;
  }

  withTemperature(temperature: number): this {
    this.params = { ...this.params, temperature };
    return this;
  }

  withMaxTokens(maxTokens: number): this {
    this.params = { ...this.params, maxTokens };
    return this;
  }

  /**
   * Maximum tool rounds before the run ends with `step_limit_exceeded`.
   *
   * @default 20
   */
  withMaxSteps(max: number): this {
    this.maxSteps = max;
    return this;
  }

  /**
   * Cumulative token ceiling across all backend calls of a run.
   */
  withTokenBudget(tokens: number): this {
    this.tokenBudget = tokens;
    return this;
  }

  /**
   * Add tools (classes or instances).
   *
   * @example
   * ```typescript
   * .withTools(ReadFile, new Shell({ cwd: "/srv" }))
   * ```
   */
  withTools(...tools: ToolOrClass[]): this {
    this.tools.push(...tools);
    return this;
  }

  /**
   * Use an existing registry. Tools added with `withTools` are registered
   * into it on `build()`, after which it is sealed.
   */
  withRegistry(registry: ToolRegistry): this {
    this.registry = registry;
    return this;
  }

  /**
   * Configure retry for backend calls.
   *
   * @example
   * ```typescript
   * .withRetry({ maxRetries: 5, initialDelayMs: 2000 })
   * .withRetry({ maxRetries: 0 }) // no retries
   * ```
   */
  withRetry(policy: RetryPolicy): this {
    this.retry = { ...this.retry, ...policy };
    return this;
  }

  withAttemptTimeout(timeoutMs: number): this {
    this.attemptTimeoutMs = timeoutMs;
    return this;
  }

  /**
   * Share a circuit breaker between agents, or configure one for this agent.
   *
   * @example
   * ```typescript
   * const breaker = new CircuitBreaker({ failureThreshold: 3 });
   * const a = new AgentBuilder().withBackend(backend).withCircuitBreaker(breaker).build();
   * const b = new AgentBuilder().withBackend(backend).withCircuitBreaker(breaker).build();
   * ```
   */
  withCircuitBreaker(breaker: CircuitBreaker | CircuitBreakerOptions): this {
    this.circuitBreaker = breaker;
    return this;
  }

  withCompaction(config: CompactionConfig): this {
    this.compaction = { ...(this.compaction || {}), ...config };
    return this;
  }

  withoutCompaction(): this {
    this.compaction = false;
    return this;
  }

  withToolConcurrency(maxConcurrency: number): this {
    this.toolOptions = { ...this.toolOptions, maxConcurrency };
    return this;
  }

  /**
   * Timeout for tools that do not declare their own. `0` disables it.
   *
   * @default 60000
   */
  withDefaultToolTimeout(timeoutMs: number): this {
    this.toolOptions = { ...this.toolOptions, defaultTimeoutMs: timeoutMs };
    return this;
  }

  /**
   * Abort signal that cancels every run of the built agent.
   */
  withSignal(signal: AbortSignal): this {
    this.signal = signal;
    return this;
  }

  withLogger(logger: Logger<ILogObj>): this {
    this.logger = logger;
    return this;
  }

  /**
   * Deterministic jitter source, mostly for tests.
   */
  withRandom(random: () => number): this {
    this.random = random;
    return this;
  }

  /**
   * Apply a runtime configuration object. Missing fields take their
   * defaults; settings made afterwards override it.
   *
   * @throws {ConfigurationError} if the configuration is invalid
   */
  withConfig(input: RuntimeConfigInput): this {
    const config = resolveRuntimeConfig(input);
    const { attemptTimeoutMs, ...retry } = config.retry;

    this.maxSteps = config.maxSteps;
    this.tokenBudget = config.tokenBudget;
    this.params = {
      ...this.params,
      ...(config.model !== undefined ? { model: config.model } : {}),
      ...(config.maxTokens !== undefined ? { maxTokens: config.maxTokens } : {}),
      ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
    };
    this.retry = { ...this.retry, ...retry };
    this.attemptTimeoutMs = attemptTimeoutMs;
    if (!(this.circuitBreaker instanceof CircuitBreaker)) {
      this.circuitBreaker = { ...this.circuitBreaker, ...config.circuitBreaker };
    }
    this.compaction = { ...(this.compaction || {}), ...config.compaction };
    this.toolOptions = { ...this.toolOptions, ...config.tools };
    return this;
  }

  /**
   * @throws {ConfigurationError} if no backend was set
   */
  build(): Agent {
    if (!this.backend) {
      throw new ConfigurationError([{ path: "backend", message: "A backend is required; call withBackend()" }]);
    }

    const registry = this.registry ?? new ToolRegistry();
    registry.registerMany(this.tools);

    return new Agent({
      backend: this.backend,
      registry,
      systemPrompt: this.systemPrompt,
      maxSteps: this.maxSteps,
      tokenBudget: this.tokenBudget,
      params: this.params,
      retry: this.retry,
      circuitBreaker: this.circuitBreaker,
      attemptTimeoutMs: this.attemptTimeoutMs,
      compaction: this.compaction,
      tools: this.toolOptions,
      signal: this.signal,
      logger: this.logger,
      random: this.random,
    });
  }
}
