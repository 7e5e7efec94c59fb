/**
 * Agent: the bounded control loop that alternates between the backend and
 * the tool dispatcher until the model stops asking for actions or a budget
 * runs out.
 *
 * Each iteration checks cancellation, then the step and token ceilings, then
 * the context budget, and only then calls the backend through the resilience
 * layer. Requested actions are dispatched together and merged back into the
 * conversation with their assistant message in one step.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(new AnthropicBackend(new Anthropic()))
 *   .withSystem("You are a careful file assistant.")
 *   .withTools(ReadFile, ListDirectory)
 *   .withMaxSteps(10)
 *   .build();
 *
 * const result = await agent.run("Summarize the README");
 * console.log(result.reason, result.text);
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import {
  addUsage,
  type BackendClient,
  type BackendRequest,
  type BackendResponse,
  EMPTY_USAGE,
  type GenerationParams,
} from "../backends/backend.js";
import { CircuitBreaker, type CircuitBreakerOptions } from "../core/circuit-breaker.js";
import { DEFAULT_MAX_STEPS } from "../core/constants.js";
import {
  BackendFatalError,
  BudgetExceededError,
  CancelledError,
  CircuitOpenError,
  formatBackendError,
  isAbortError,
} from "../core/errors.js";
import {
  assistantMessage,
  type ConversationMessage,
  systemMessage,
  userMessage,
} from "../core/messages.js";
import { resilientBackend } from "../core/resilience.js";
import type { RetryPolicy } from "../core/retry.js";
import { componentLogger } from "../logging/logger.js";
import { ToolDispatcher, type ToolDispatcherOptions } from "../tools/dispatcher.js";
import { ToolRegistry } from "../tools/registry.js";
import { combineSignals } from "../utils/timing.js";
import type { CompactionConfig, CompactionStats } from "./compaction/config.js";
import { CompactionManager } from "./compaction/manager.js";
import { Conversation } from "./conversation.js";
import type { AgentEvent, AgentRunResult, RunState, TerminalReason } from "./events.js";

export interface AgentOptions {
  backend: BackendClient;
  registry?: ToolRegistry;
  /** Prepended to the conversation as a system message */
  systemPrompt?: string;
  /** Tool rounds allowed before the run ends with `step_limit_exceeded` (default: 20) */
  maxSteps?: number;
  /** Cumulative backend tokens allowed before the run ends with `resource_budget_exhausted` */
  tokenBudget?: number;
  params?: GenerationParams;
  retry?: RetryPolicy;
  /** Breaker instance to share, or options for a breaker owned by this agent */
  circuitBreaker?: CircuitBreaker | CircuitBreakerOptions;
  /** Upper bound on a single backend attempt */
  attemptTimeoutMs?: number;
  /** Compaction settings, or `false` to never compact */
  compaction?: CompactionConfig | false;
  tools?: Pick<ToolDispatcherOptions, "defaultTimeoutMs" | "maxConcurrency" | "now">;
  /** Cancels every run of this agent */
  signal?: AbortSignal;
  logger?: Logger<ILogObj>;
  /** Jitter source for retry backoff */
  random?: () => number;
}

export type AgentInput = string | readonly ConversationMessage[];

export class Agent {
  private readonly backend: BackendClient;
  private readonly registry: ToolRegistry;
  private readonly dispatcher: ToolDispatcher;
  private readonly breaker: CircuitBreaker;
  private readonly compactionManager?: CompactionManager;
  private readonly logger: Logger<ILogObj>;
  private readonly systemPrompt?: string;
  private readonly maxSteps: number;
  private readonly tokenBudget?: number;
  private readonly params: GenerationParams;
  private readonly signal?: AbortSignal;

  constructor(options: AgentOptions) {
    this.logger = componentLogger("loopwright:agent", options.logger);
    this.registry = (options.registry ?? new ToolRegistry()).seal();
    this.systemPrompt = options.systemPrompt;
    this.maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
    this.tokenBudget = options.tokenBudget;
    this.params = options.params ?? {};
    this.signal = options.signal;

    this.breaker =
      options.circuitBreaker instanceof CircuitBreaker
        ? options.circuitBreaker
        : new CircuitBreaker({ logger: this.logger, ...options.circuitBreaker });

    this.backend = resilientBackend(options.backend, {
      retry: options.retry,
      breaker: this.breaker,
      attemptTimeoutMs: options.attemptTimeoutMs,
      logger: this.logger,
      random: options.random,
    });

    this.dispatcher = new ToolDispatcher(this.registry, { ...options.tools, logger: this.logger });

    if (options.compaction !== false) {
      const manager = new CompactionManager(options.compaction ?? {}, this.logger);
      if (manager.isEnabled()) {
        this.compactionManager = manager;
      }
    }
  }

  getRegistry(): ToolRegistry {
    return this.registry;
  }

  getCircuitBreaker(): CircuitBreaker {
    return this.breaker;
  }

  /**
   * @returns CompactionStats if compaction is enabled, null otherwise
   */
  getCompactionStats(): CompactionStats | null {
    return this.compactionManager?.getStats() ?? null;
  }

  /**
   * Run to completion and return the result. Never rejects.
   */
  async run(input: AgentInput, signal?: AbortSignal): Promise<AgentRunResult> {
    const events = this.execute(input, signal);
    let next = await events.next();
    while (!next.done) {
      next = await events.next();
    }
    return next.value;
  }

  /**
   * The agent loop as a stream of events. The generator's return value is
   * the run result.
   *
   * @example
   * ```typescript
   * const events = agent.execute("Find TODOs in src/");
   * let next = await events.next();
   * while (!next.done) {
   *   if (next.value.type === "action_call") console.log("->", next.value.request.toolName);
   *   next = await events.next();
   * }
   * console.log(next.value.reason);
   * ```
   */
  async *execute(input: AgentInput, signal?: AbortSignal): AsyncGenerator<AgentEvent, AgentRunResult> {
    const { signal: runSignal, dispose } = combineSignals(this.signal, signal);
    const tools = this.registry.getDescriptors();
    const state: RunState = {
      step: 0,
      tokensUsed: 0,
      usage: EMPTY_USAGE,
      phase: "AWAITING_MODEL",
      breakerState: this.breaker.getState(),
      lastText: "",
    };

    let conversation: Conversation;
    try {
      conversation = new Conversation(this.initialMessages(input));
    } catch (error) {
      dispose();
      return this.finish(state, "fatal_error", toRunError(error));
    }

    this.logger.info("Starting agent run", {
      backend: this.backend.name,
      maxSteps: this.maxSteps,
      tokenBudget: this.tokenBudget,
      tools: tools.length,
    });

    try {
      while (true) {
        if (runSignal?.aborted) {
          return this.finish(state, "cancelled", new CancelledError());
        }
        if (state.step >= this.maxSteps) {
          return this.finish(
            state,
            "step_limit_exceeded",
            new BudgetExceededError("steps", this.maxSteps, state.step),
          );
        }
        if (this.tokenBudget !== undefined && state.tokensUsed >= this.tokenBudget) {
          return this.finish(
            state,
            "resource_budget_exhausted",
            new BudgetExceededError("tokens", this.tokenBudget, state.tokensUsed),
          );
        }

        yield { type: "step_start", step: state.step };

        if (this.compactionManager?.shouldCompact(conversation)) {
          state.phase = "COMPRESSING";
          const event = await this.compactionManager.compact(conversation, state.step, runSignal);
          state.phase = "AWAITING_MODEL";
          if (event) {
            yield { type: "compaction", event };
          }
        }

        this.logger.debug("Calling backend", {
          step: state.step,
          messages: conversation.getMessages().length,
        });

        const response = await this.complete(
          { messages: conversation.getMessages(), tools, params: this.params },
          state,
          runSignal,
        );

        state.usage = addUsage(state.usage, response.usage);
        state.tokensUsed = state.usage.totalTokens;
        if (response.text) {
          state.lastText = response.text;
          yield { type: "text", step: state.step, content: response.text };
        }

        const assistant = assistantMessage(response.text, response.actions);

        if (assistant.actions.length === 0) {
          conversation.appendTurn(assistant, []);
          return this.finish(state, "completed");
        }

        state.phase = "AWAITING_TOOLS";
        for (const request of assistant.actions) {
          yield { type: "action_call", step: state.step, request };
        }

        const results = await this.dispatcher.dispatchAll(assistant.actions, runSignal);

        // Results that arrive after cancellation are discarded with their turn
        if (runSignal?.aborted) {
          return this.finish(state, "cancelled", new CancelledError());
        }

        conversation.appendTurn(assistant, results);
        for (const result of results) {
          yield { type: "action_result", step: state.step, result };
        }

        state.step++;
        state.phase = "AWAITING_MODEL";
      }
    } catch (error) {
      if (runSignal?.aborted || error instanceof CancelledError) {
        return this.finish(state, "cancelled", error instanceof CancelledError ? error : new CancelledError());
      }
      if (isAbortError(error)) {
        return this.finish(state, "cancelled", new CancelledError());
      }
      return this.finish(state, "fatal_error", toRunError(error));
    } finally {
      dispose();
    }
  }

  private async complete(
    request: BackendRequest,
    state: RunState,
    signal: AbortSignal | undefined,
  ): Promise<BackendResponse> {
    try {
      return await this.backend.complete(request, signal);
    } finally {
      state.breakerState = this.breaker.getState();
    }
  }

  private initialMessages(input: AgentInput): ConversationMessage[] {
    const messages: ConversationMessage[] = [];
    if (this.systemPrompt) {
      messages.push(systemMessage(this.systemPrompt));
    }
    if (typeof input === "string") {
      messages.push(userMessage(input));
    } else {
      messages.push(...input);
    }
    return messages;
  }

  private finish(state: RunState, reason: TerminalReason, error?: Error): AgentRunResult {
    state.phase = "TERMINATED";
    state.terminal = reason;

    const logData = { reason, steps: state.step, tokensUsed: state.tokensUsed };
    if (reason === "completed") {
      this.logger.info("Agent run completed", logData);
    } else if (reason === "fatal_error") {
      this.logger.error("Agent run failed", {
        ...logData,
        error: error ? formatBackendError(error) : undefined,
      });
    } else {
      this.logger.warn("Agent run ended early", logData);
    }

    return {
      text: state.lastText,
      reason,
      steps: state.step,
      usage: state.usage,
      ...(error ? { error } : {}),
    };
  }
}

function toRunError(error: unknown): Error {
  if (error instanceof BackendFatalError || error instanceof CircuitOpenError) {
    return error;
  }
  return error instanceof Error ? error : new Error(String(error));
}
