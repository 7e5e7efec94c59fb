/**
 * Tool Output Pruning Strategy
 *
 * The cheapest step: tool results are usually the largest and least dense
 * messages, so the oldest ones outside the protected turns are cut down to a
 * short head with a marker. The tool message itself stays, keeping every
 * action request paired with its result. Oversized user and assistant
 * messages in the same range are then capped at the per-message limit.
 */

import type { ConversationMessage } from "../../../core/messages.js";
import type { ResolvedCompactionConfig } from "../config.js";
import {
  type CompactionContext,
  type CompactionResult,
  type CompactionStrategy,
  capMessage,
  flattenTurns,
  layoutHistory,
  rewriteToolText,
  totalTokens,
} from "../strategy.js";

// Room for the marker, so an already pruned output is not pruned again
const MARKER_ALLOWANCE = 64;

export function pruneText(text: string, keepChars: number): string {
  if (text.length <= keepChars + MARKER_ALLOWANCE) {
    return text;
  }
  return `${text.slice(0, keepChars)}\n[... ${text.length - keepChars} characters pruned ...]`;
}

export class ToolOutputPruningStrategy implements CompactionStrategy {
  readonly name = "tool-output-pruning";

  async compact(
    history: readonly ConversationMessage[],
    config: ResolvedCompactionConfig,
    context: CompactionContext,
  ): Promise<CompactionResult> {
    const layout = layoutHistory(history, config);
    const start = flattenTurns(layout.pinned).length;
    const end = history.length - flattenTurns(layout.recent).length;
    const messages = [...history];
    let changed = false;

    const fits = () => totalTokens(messages, context) <= context.targetTokens;

    // Oldest tool outputs first
    for (let i = start; i < end && !fits(); i++) {
      const message = messages[i];
      if (message.role !== "tool") continue;
      const pruned = rewriteToolText(message, (text) => pruneText(text, config.prunedOutputChars));
      if (pruned !== message) {
        messages[i] = pruned;
        changed = true;
      }
    }

    for (let i = start; i < end && !fits(); i++) {
      const message = messages[i];
      const capped = capMessage(message, context.perMessageTokenLimit, context.estimator);
      if (capped !== message) {
        messages[i] = capped;
        changed = true;
      }
    }

    return { messages, changed };
  }
}
