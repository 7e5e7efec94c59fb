/**
 * Configuration types for the context budget manager.
 *
 * The manager keeps the estimated size of the conversation under
 * `contextLimit * (1 - headroomFraction)`, with `safetyMarginTokens` of slack
 * for the response framing the estimate cannot see.
 */

import {
  DEFAULT_CONTEXT_LIMIT,
  DEFAULT_HEADROOM_FRACTION,
  DEFAULT_PRESERVE_RECENT_TURNS,
  DEFAULT_SAFETY_MARGIN_TOKENS,
} from "../../core/constants.js";
import type { ConversationMessage } from "../../core/messages.js";
import { CharacterTokenEstimator, type TokenEstimator } from "./estimator.js";

/**
 * Event emitted when compaction occurs.
 */
export interface CompactionEvent {
  /** Strategies that changed the conversation, in the order they ran */
  strategies: string[];
  /** Token estimate before compaction */
  tokensBefore: number;
  /** Token estimate after compaction */
  tokensAfter: number;
  /** Number of messages before compaction */
  messagesBefore: number;
  /** Number of messages after compaction */
  messagesAfter: number;
  /** Summary text if a span was summarized */
  summary?: string;
  /** Whether the conversation now fits the budget */
  withinBudget: boolean;
  /** Agent step when compaction occurred */
  step: number;
}

/**
 * Statistics about compaction activity.
 */
export interface CompactionStats {
  totalCompactions: number;
  totalTokensSaved: number;
  /** Most recent estimate taken by `shouldCompact` or `compact` */
  lastEstimate?: number;
  /** Token ceiling the conversation is kept under */
  budgetTokens: number;
}

/**
 * Produces the text of a summary message for a span of older messages.
 */
export type Summarizer = (
  messages: readonly ConversationMessage[],
  signal?: AbortSignal,
) => Promise<string>;

/**
 * Configuration for the context budget manager.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(backend)
 *   .withCompaction({
 *     contextLimit: 200_000,
 *     preserveRecentTurns: 6,
 *     summarizer: createBackendSummarizer(backend),
 *   })
 *   .build();
 * ```
 */
export interface CompactionConfig {
  /**
   * Enable or disable compaction.
   * @default true
   */
  enabled?: boolean;

  /**
   * Context window of the backend model, in tokens.
   * @default 65536
   */
  contextLimit?: number;

  /**
   * Tokens added to the estimate before comparing it with the budget.
   * @default 512
   */
  safetyMarginTokens?: number;

  /**
   * Fraction of the context window reserved for the response.
   * @default 0.1
   */
  headroomFraction?: number;

  /**
   * Number of most recent turns that are never pruned, summarized or cut.
   * @default 4
   */
  preserveRecentTurns?: number;

  /**
   * Keep the first user message (usually the task) out of summaries and truncation.
   * @default true
   */
  keepInitialTask?: boolean;

  /**
   * Characters of a tool output kept when it is pruned.
   * @default 200
   */
  prunedOutputChars?: number;

  /**
   * Characters of each message quoted in an excerpt summary.
   * @default 400
   */
  summaryExcerptChars?: number;

  /**
   * Summarizer for the summarization step. Defaults to excerpts, which
   * needs no model call.
   */
  summarizer?: Summarizer;

  /**
   * Token estimator.
   * @default CharacterTokenEstimator
   */
  estimator?: TokenEstimator;

  /**
   * Callback invoked after each compaction.
   */
  onCompaction?: (event: CompactionEvent) => void;
}

export interface ResolvedCompactionConfig {
  enabled: boolean;
  contextLimit: number;
  safetyMarginTokens: number;
  headroomFraction: number;
  preserveRecentTurns: number;
  keepInitialTask: boolean;
  prunedOutputChars: number;
  summaryExcerptChars: number;
  summarizer?: Summarizer;
  estimator: TokenEstimator;
  onCompaction?: (event: CompactionEvent) => void;
}

export const DEFAULT_COMPACTION_CONFIG = {
  enabled: true,
  contextLimit: DEFAULT_CONTEXT_LIMIT,
  safetyMarginTokens: DEFAULT_SAFETY_MARGIN_TOKENS,
  headroomFraction: DEFAULT_HEADROOM_FRACTION,
  preserveRecentTurns: DEFAULT_PRESERVE_RECENT_TURNS,
  keepInitialTask: true,
  prunedOutputChars: 200,
  summaryExcerptChars: 400,
} as const;

/**
 * Default prompt used by {@link createBackendSummarizer}.
 */
export const DEFAULT_SUMMARIZATION_PROMPT = `Summarize this conversation history concisely, preserving:
1. Key decisions made and their rationale
2. Important facts and data discovered
3. Errors encountered and how they were resolved
4. Current task context and goals

Format as a brief narrative paragraph, not bullet points.`;

export function resolveCompactionConfig(config: CompactionConfig = {}): ResolvedCompactionConfig {
  return {
    enabled: config.enabled ?? DEFAULT_COMPACTION_CONFIG.enabled,
    contextLimit: config.contextLimit ?? DEFAULT_COMPACTION_CONFIG.contextLimit,
    safetyMarginTokens: config.safetyMarginTokens ?? DEFAULT_COMPACTION_CONFIG.safetyMarginTokens,
    headroomFraction: config.headroomFraction ?? DEFAULT_COMPACTION_CONFIG.headroomFraction,
    preserveRecentTurns: config.preserveRecentTurns ?? DEFAULT_COMPACTION_CONFIG.preserveRecentTurns,
    keepInitialTask: config.keepInitialTask ?? DEFAULT_COMPACTION_CONFIG.keepInitialTask,
    prunedOutputChars: config.prunedOutputChars ?? DEFAULT_COMPACTION_CONFIG.prunedOutputChars,
    summaryExcerptChars: config.summaryExcerptChars ?? DEFAULT_COMPACTION_CONFIG.summaryExcerptChars,
    summarizer: config.summarizer,
    estimator: config.estimator ?? new CharacterTokenEstimator(),
    onCompaction: config.onCompaction,
  };
}

/**
 * Token ceiling for the whole conversation: the context window minus the
 * reserved headroom.
 */
export function budgetTokens(config: ResolvedCompactionConfig): number {
  return Math.floor(config.contextLimit * (1 - config.headroomFraction));
}

/**
 * Estimate the conversation must reach for compaction to count as a fit.
 */
export function targetTokens(config: ResolvedCompactionConfig): number {
  return Math.max(0, budgetTokens(config) - config.safetyMarginTokens);
}

/**
 * Longest single message, in tokens, allowed outside the protected turns.
 */
export function perMessageTokenLimit(config: ResolvedCompactionConfig): number {
  return Math.min(8192, Math.max(512, Math.floor(targetTokens(config) / 8)));
}
