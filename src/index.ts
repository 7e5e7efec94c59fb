// Re-export Zod's z for tool schemas
// Using the same zod instance keeps .describe() metadata in the JSON schemas
export { z } from "zod";

// Agent loop
export { Agent, type AgentInput, type AgentOptions } from "./agent/agent.js";
export { AgentBuilder } from "./agent/builder.js";
export { Conversation } from "./agent/conversation.js";
export type {
  AgentEvent,
  AgentRunResult,
  RunPhase,
  RunState,
  TerminalReason,
} from "./agent/events.js";
export type { IConversation } from "./agent/interfaces.js";

// Context compaction
export {
  type BackendSummarizerOptions,
  CharacterTokenEstimator,
  type CompactionConfig,
  type CompactionContext,
  type CompactionEvent,
  CompactionManager,
  type CompactionResult,
  type CompactionStats,
  type CompactionStrategy,
  type ContextInput,
  type ContextSelectionRequest,
  ContextSelector,
  type ContextSelectorOptions,
  contextInputsFromMessages,
  createBackendSummarizer,
  DEFAULT_COMPACTION_CONFIG,
  DEFAULT_SUMMARIZATION_PROMPT,
  type MessageTurn,
  type ResolvedCompactionConfig,
  type SelectedContext,
  SummarizationStrategy,
  type Summarizer,
  TiktokenEstimator,
  type TokenEstimator,
  ToolOutputPruningStrategy,
  TruncationStrategy,
} from "./agent/compaction/index.js";

// Backends
export {
  ANTHROPIC_DEFAULT_MODEL,
  AnthropicBackend,
  type AnthropicBackendOptions,
  type AnthropicMessagesClient,
} from "./backends/anthropic.js";
export {
  addUsage,
  type BackendClient,
  type BackendRequest,
  type BackendResponse,
  decodeActionArguments,
  EMPTY_USAGE,
  type FinishReason,
  type GenerationParams,
  retryAfterOf,
  type TokenUsage,
  toBackendError,
} from "./backends/backend.js";
export {
  OPENAI_DEFAULT_MODEL,
  OpenAIBackend,
  type OpenAIBackendOptions,
  type OpenAIChatClient,
} from "./backends/openai.js";

// Resilience
export {
  CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitBreakerSnapshot,
  type CircuitState,
  type CircuitStateChange,
} from "./core/circuit-breaker.js";
export { type RemoteOperation, type ResilienceOptions, resilientBackend, withResilience } from "./core/resilience.js";
export {
  computeBackoffDelay,
  DEFAULT_RETRY_POLICY,
  isRetryableError,
  type ResolvedRetryPolicy,
  type RetryPolicy,
  resolveRetryPolicy,
  retryWithBackoff,
} from "./core/retry.js";

// Configuration
export {
  type RuntimeConfig,
  type RuntimeConfigInput,
  resolveRuntimeConfig,
  runtimeConfigSchema,
} from "./core/config.js";
export * from "./core/constants.js";

// Errors
export {
  BackendFatalError,
  BackendTransientError,
  BudgetExceededError,
  type BudgetKind,
  CancelledError,
  CircuitOpenError,
  ConfigurationError,
  type ErrorCode,
  formatBackendError,
  isAbortError,
  LoopwrightError,
  RetryExhaustedError,
  ToolExecutionError,
  ToolNotFoundError,
  ValidationError,
  type ValidationIssue,
} from "./core/errors.js";

// Messages
export {
  type ActionError,
  type ActionErrorKind,
  type ActionRequest,
  type ActionResult,
  type AssistantMessage,
  assistantMessage,
  type ConversationMessage,
  isConversationMessage,
  MessageBuilder,
  type MessageRole,
  renderActionResult,
  type SystemMessage,
  systemMessage,
  type ToolMessage,
  toolMessage,
  type UserMessage,
  userMessage,
} from "./core/messages.js";

// Logging
export { componentLogger, createLogger, defaultLogger, type LoggerOptions } from "./logging/logger.js";

// Tools
export { createTool, type CreateToolConfig } from "./tools/create-tool.js";
export { ToolDispatcher, type ToolDispatcherOptions } from "./tools/dispatcher.js";
export { AbortException, TimeoutException } from "./tools/exceptions.js";
export { type ToolClass, type ToolDescriptor, type ToolOrClass, ToolRegistry } from "./tools/registry.js";
export { BaseTool, type ToolContext, type ToolExecuteReturn } from "./tools/tool.js";
export { Tool, type ToolConfig } from "./tools/typed-tool.js";
export { validateAndApplyDefaults, validateToolParams, type ValidationResult } from "./tools/validation.js";
