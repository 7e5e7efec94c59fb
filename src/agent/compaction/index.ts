/**
 * Context compaction.
 *
 * Keeps long agent runs inside the backend's context window by pruning old
 * tool outputs, summarizing older turns and, as a last resort, truncating.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(backend)
 *   .withCompaction({ contextLimit: 128_000, preserveRecentTurns: 6 })
 *   .build();
 * ```
 */

export {
  budgetTokens,
  type CompactionConfig,
  type CompactionEvent,
  type CompactionStats,
  DEFAULT_COMPACTION_CONFIG,
  DEFAULT_SUMMARIZATION_PROMPT,
  perMessageTokenLimit,
  type ResolvedCompactionConfig,
  resolveCompactionConfig,
  type Summarizer,
  targetTokens,
} from "./config.js";
export {
  CharacterTokenEstimator,
  messagePayload,
  TiktokenEstimator,
  type TokenEstimator,
} from "./estimator.js";
export { CompactionManager } from "./manager.js";
export {
  type ContextInput,
  type ContextScoreWeights,
  type ContextSelectionRequest,
  ContextSelector,
  type ContextSelectorOptions,
  type ContextSource,
  contextInputsFromMessages,
  DEFAULT_CONTEXT_SCORE_WEIGHTS,
  lexicalOverlap,
  type SelectedContext,
} from "./selector.js";
export {
  type BackendSummarizerOptions,
  createBackendSummarizer,
  excerptSummary,
  pruneText,
  SummarizationStrategy,
  summaryHeader,
  ToolOutputPruningStrategy,
  TruncationStrategy,
  truncationMarker,
} from "./strategies/index.js";
export {
  type CompactionContext,
  type CompactionResult,
  type CompactionStrategy,
  groupIntoTurns,
  type HistoryLayout,
  layoutHistory,
  type MessageTurn,
} from "./strategy.js";
