/**
 * Strategy interface for context compaction.
 *
 * Strategies receive the conversation history (system messages are held
 * apart and never reach them) and return a rewritten history. The manager
 * runs them in escalating order and stops at the first that fits the budget.
 */

import type { ILogObj, Logger } from "tslog";
import {
  assistantMessage,
  type ConversationMessage,
  type ToolMessage,
  toolMessage,
  userMessage,
} from "../../core/messages.js";
import type { ResolvedCompactionConfig } from "./config.js";
import type { TokenEstimator } from "./estimator.js";

/**
 * Context provided to compaction strategies.
 */
export interface CompactionContext {
  /** Tokens taken by the system messages, which strategies cannot touch */
  baseTokens: number;
  /** Estimate the whole conversation should get down to */
  targetTokens: number;
  /** Longest message allowed outside protected turns */
  perMessageTokenLimit: number;
  estimator: TokenEstimator;
  logger: Logger<ILogObj>;
  signal?: AbortSignal;
}

/**
 * Result of a compaction operation.
 */
export interface CompactionResult {
  /** Messages to replace history with */
  messages: ConversationMessage[];
  /** False when the strategy had nothing to do */
  changed: boolean;
  /** Summary text if a span was summarized */
  summary?: string;
}

export interface CompactionStrategy {
  readonly name: string;

  compact(
    history: readonly ConversationMessage[],
    config: ResolvedCompactionConfig,
    context: CompactionContext,
  ): Promise<CompactionResult>;
}

/**
 * A user message on its own, or an assistant message with the tool results
 * that answer it. Turns are the unit strategies keep or drop, so an action
 * request never loses its result.
 */
export interface MessageTurn {
  messages: ConversationMessage[];
}

export function groupIntoTurns(history: readonly ConversationMessage[]): MessageTurn[] {
  const turns: MessageTurn[] = [];

  for (const message of history) {
    const current = turns[turns.length - 1];
    if (message.role === "tool" && current && current.messages[0]?.role === "assistant") {
      current.messages.push(message);
    } else {
      turns.push({ messages: [message] });
    }
  }

  return turns;
}

export function flattenTurns(turns: readonly MessageTurn[]): ConversationMessage[] {
  return turns.flatMap((turn) => turn.messages);
}

/**
 * Splits history into the pinned head (the initial task when configured),
 * the compactable middle, and the protected recent tail.
 */
export interface HistoryLayout {
  pinned: MessageTurn[];
  middle: MessageTurn[];
  recent: MessageTurn[];
}

export function layoutHistory(
  history: readonly ConversationMessage[],
  config: ResolvedCompactionConfig,
): HistoryLayout {
  const turns = groupIntoTurns(history);
  const pinnedCount = config.keepInitialTask && turns[0]?.messages[0]?.role === "user" ? 1 : 0;
  const recentCount = Math.min(Math.max(0, config.preserveRecentTurns), turns.length - pinnedCount);

  return {
    pinned: turns.slice(0, pinnedCount),
    middle: turns.slice(pinnedCount, turns.length - recentCount),
    recent: turns.slice(turns.length - recentCount),
  };
}

export function totalTokens(
  history: readonly ConversationMessage[],
  context: CompactionContext,
): number {
  return context.baseTokens + context.estimator.estimateMessages(history);
}

/**
 * Shortens `text` to roughly `maxTokens` tokens, keeping the head and noting
 * how much was cut. Returns the text unchanged if it already fits.
 */
export function truncateText(text: string, maxTokens: number, estimator: TokenEstimator): string {
  const tokens = estimator.estimateText(text);
  if (tokens <= maxTokens) {
    return text;
  }
  const keepChars = Math.max(0, Math.floor((text.length * maxTokens) / tokens) - 64);
  return `${text.slice(0, keepChars)}\n[... ${text.length - keepChars} characters truncated ...]`;
}

/**
 * Caps the text of a single message at `maxTokens`. Tool messages keep their
 * result (and so their pairing with the request); only the text shrinks.
 * Returns the same object when nothing had to change.
 */
export function capMessage(
  message: ConversationMessage,
  maxTokens: number,
  estimator: TokenEstimator,
): ConversationMessage {
  switch (message.role) {
    case "system":
      return message;
    case "user": {
      const content = truncateText(message.content, maxTokens, estimator);
      return content === message.content ? message : userMessage(content);
    }
    case "assistant": {
      const content = truncateText(message.content, maxTokens, estimator);
      return content === message.content ? message : assistantMessage(content, message.actions);
    }
    case "tool":
      return rewriteToolText(message, (text) => truncateText(text, maxTokens, estimator));
  }
}

/**
 * Applies `rewrite` to a tool result's output (or error message) and rebuilds
 * the message. Returns the same object when the text is unchanged.
 */
export function rewriteToolText(message: ToolMessage, rewrite: (text: string) => string): ToolMessage {
  const { result } = message;
  if (result.success) {
    const output = result.output ?? "";
    const next = rewrite(output);
    return next === output ? message : toolMessage({ ...result, output: next });
  }
  if (!result.error) {
    return message;
  }
  const next = rewrite(result.error.message);
  return next === result.error.message
    ? message
    : toolMessage({ ...result, error: { ...result.error, message: next } });
}
