/**
 * Truncation Strategy
 *
 * Last resort. Drops the oldest turns (an assistant message always leaves
 * together with its tool results) until the conversation fits, leaving a
 * visible marker where they were. The newest turn is never dropped; if the
 * conversation still does not fit, every remaining message is capped at the
 * per-message limit.
 */

import { type ConversationMessage, userMessage } from "../../../core/messages.js";
import type { ResolvedCompactionConfig } from "../config.js";
import {
  type CompactionContext,
  type CompactionResult,
  type CompactionStrategy,
  capMessage,
  flattenTurns,
  layoutHistory,
  totalTokens,
} from "../strategy.js";

export function truncationMarker(removedCount: number): string {
  return `[Earlier conversation truncated: ${removedCount} message(s) removed to fit the context budget]`;
}

export class TruncationStrategy implements CompactionStrategy {
  readonly name = "truncation";

  async compact(
    history: readonly ConversationMessage[],
    config: ResolvedCompactionConfig,
    context: CompactionContext,
  ): Promise<CompactionResult> {
    const layout = layoutHistory(history, config);
    const pinned = flattenTurns(layout.pinned);
    const droppable = [...layout.middle, ...layout.recent];

    let dropped = 0;
    let removedCount = 0;
    const build = (): ConversationMessage[] =>
      removedCount === 0
        ? [...history]
        : [...pinned, userMessage(truncationMarker(removedCount)), ...flattenTurns(droppable.slice(dropped))];

    let messages = build();
    while (totalTokens(messages, context) > context.targetTokens && dropped < droppable.length - 1) {
      removedCount += droppable[dropped].messages.length;
      dropped++;
      messages = build();
    }

    let changed = removedCount > 0;

    if (totalTokens(messages, context) > context.targetTokens) {
      messages = messages.map((message, index) => {
        if (index < pinned.length) return message;
        const capped = capMessage(message, context.perMessageTokenLimit, context.estimator);
        if (capped !== message) changed = true;
        return capped;
      });
    }

    if (changed) {
      context.logger.debug("Truncated conversation", { removedCount, remaining: messages.length });
    }
    return { messages, changed };
  }
}
