/**
 * Relevance-ranked selection of context pieces under a token budget.
 *
 * Documents, messages and tool outputs are scored against a query and taken
 * best first until the budget is spent. A highly relevant piece that does
 * not fit whole is cut down to the words that do.
 *
 * @example
 * ```typescript
 * const selector = new ContextSelector();
 * const picked = selector.select({
 *   query: "why did the deploy fail",
 *   documents: [{ text: runbook, weight: 1 }],
 *   messages: contextInputsFromMessages(conversation.getHistoryMessages()),
 *   toolOutputs: [buildLog],
 *   tokenBudget: 1500,
 * });
 * ```
 */

import type { ILogObj, Logger } from "tslog";
import type { ConversationMessage } from "../../core/messages.js";
import { componentLogger } from "../../logging/logger.js";
import { CharacterTokenEstimator, messagePayload, type TokenEstimator } from "./estimator.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export type ContextSource = "document" | "message" | "tool";

export interface ContextInput {
  text: string;
  /** Epoch milliseconds; newer pieces score higher */
  timestamp?: number;
  /** Caller-assigned importance, usually 0 to 1 */
  weight?: number;
  metadata?: Record<string, unknown>;
}

export interface SelectedContext extends ContextInput {
  source: ContextSource;
  score: number;
  estimatedTokens: number;
  /** The text was cut to fit the remaining budget */
  truncated: boolean;
}

export interface ContextSelectionRequest {
  query: string;
  documents?: ReadonlyArray<string | ContextInput>;
  messages?: ReadonlyArray<string | ContextInput>;
  toolOutputs?: ReadonlyArray<string | ContextInput>;
  tokenBudget: number;
}

export interface ContextScoreWeights {
  lexical: number;
  recency: number;
  importance: number;
}

export interface ContextSelectorOptions {
  estimator?: TokenEstimator;
  weights?: Partial<ContextScoreWeights>;
  /** Minimum score for a piece to be cut down rather than skipped (default: 0.6) */
  partialThreshold?: number;
  now?: () => number;
  logger?: Logger<ILogObj>;
}

export const DEFAULT_CONTEXT_SCORE_WEIGHTS: ContextScoreWeights = {
  lexical: 0.7,
  recency: 0.2,
  importance: 0.1,
};

interface Candidate extends ContextInput {
  source: ContextSource;
  score: number;
}

export class ContextSelector {
  private readonly estimator: TokenEstimator;
  private readonly weights: ContextScoreWeights;
  private readonly partialThreshold: number;
  private readonly now: () => number;
  private readonly logger: Logger<ILogObj>;

  constructor(options: ContextSelectorOptions = {}) {
    this.estimator = options.estimator ?? new CharacterTokenEstimator();
    this.weights = { ...DEFAULT_CONTEXT_SCORE_WEIGHTS, ...options.weights };
    this.partialThreshold = options.partialThreshold ?? 0.6;
    this.now = options.now ?? Date.now;
    this.logger = componentLogger("loopwright:context-selector", options.logger);
  }

  /**
   * Weighted sum of query overlap, recency and importance.
   */
  score(input: ContextInput, query: string): number {
    return (
      this.weights.lexical * lexicalOverlap(query, input.text) +
      this.weights.recency * this.recency(input.timestamp) +
      this.weights.importance * (input.weight ?? 0)
    );
  }

  select(request: ContextSelectionRequest): SelectedContext[] {
    const { query, tokenBudget } = request;
    const candidates: Candidate[] = [
      ...this.candidates("document", request.documents, query),
      ...this.candidates("message", request.messages, query),
      ...this.candidates("tool", request.toolOutputs, query),
    ];
    // Best score first; among equals the shorter text
    candidates.sort((a, b) => b.score - a.score || a.text.length - b.text.length);

    const selected: SelectedContext[] = [];
    let used = 0;

    for (const candidate of candidates) {
      if (used >= tokenBudget) break;

      const estimate = this.estimator.estimateText(candidate.text);
      if (used + estimate <= tokenBudget) {
        selected.push({ ...candidate, estimatedTokens: estimate, truncated: false });
        used += estimate;
        continue;
      }

      if (candidate.score < this.partialThreshold) continue;
      const cut = this.fitWords(candidate.text, tokenBudget - used);
      if (cut) {
        selected.push({ ...candidate, text: cut.text, estimatedTokens: cut.tokens, truncated: true });
        used += cut.tokens;
      }
    }

    this.logger.debug("Selected context", {
      candidates: candidates.length,
      selected: selected.length,
      tokens: used,
      tokenBudget,
    });
    return selected;
  }

  private candidates(
    source: ContextSource,
    inputs: ReadonlyArray<string | ContextInput> | undefined,
    query: string,
  ): Candidate[] {
    return (inputs ?? []).map((entry) => {
      const input = typeof entry === "string" ? { text: entry } : entry;
      return { ...input, source, score: this.score(input, query) };
    });
  }

  private recency(timestamp: number | undefined): number {
    if (timestamp === undefined) return 0;
    const days = Math.max(0, this.now() - timestamp) / DAY_MS;
    return 1 / (1 + days);
  }

  // Longest leading run of words that fits
  private fitWords(text: string, budget: number): { text: string; tokens: number } | undefined {
    const words = text.split(/\s+/).filter(Boolean);
    let low = 0;
    let high = words.length;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.estimator.estimateText(words.slice(0, mid).join(" ")) <= budget) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    if (low === 0) return undefined;
    const cut = words.slice(0, low).join(" ");
    return { text: cut, tokens: this.estimator.estimateText(cut) };
  }
}

/**
 * Share of the query's distinct words (case-insensitive) found in `text`.
 */
export function lexicalOverlap(query: string, text: string): number {
  const queryWords = wordSet(query);
  const textWords = wordSet(text);
  if (queryWords.size === 0 || textWords.size === 0) return 0;

  let shared = 0;
  for (const word of queryWords) {
    if (textWords.has(word)) shared++;
  }
  return shared / queryWords.size;
}

function wordSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

/**
 * Selector inputs for conversation messages, with the role kept in metadata.
 */
export function contextInputsFromMessages(messages: readonly ConversationMessage[]): ContextInput[] {
  return messages.map((message) => ({ text: messagePayload(message), metadata: { role: message.role } }));
}
