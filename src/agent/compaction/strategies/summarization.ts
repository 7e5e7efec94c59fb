/**
 * Summarization Compaction Strategy
 *
 * Collapses the contiguous span of older messages (between the pinned
 * initial task and the protected recent turns) into one user message. The
 * summary text comes from the configured summarizer, or from per-message
 * excerpts when there is none or it fails.
 */

import type { BackendClient, GenerationParams } from "../../../backends/backend.js";
import { isAbortError } from "../../../core/errors.js";
import {
  type ConversationMessage,
  systemMessage,
  userMessage,
} from "../../../core/messages.js";
import { DEFAULT_SUMMARIZATION_PROMPT, type ResolvedCompactionConfig, type Summarizer } from "../config.js";
import { messagePayload } from "../estimator.js";
import {
  type CompactionContext,
  type CompactionResult,
  type CompactionStrategy,
  flattenTurns,
  layoutHistory,
} from "../strategy.js";

export function summaryHeader(count: number): string {
  return `[Conversation summary: ${count} earlier message(s) condensed]`;
}

function roleLabel(message: ConversationMessage): string {
  return message.role === "tool" ? `tool:${message.result.toolName}` : message.role;
}

/**
 * Summary built from the first `excerptChars` characters of each message,
 * formatted as `[role] excerpt` blocks separated by `---` lines.
 *
 * @example
 * ```typescript
 * excerptSummary([userMessage("Find the bug"), assistantMessage("Looking at parser.ts")], 400);
 * // "[user] Find the bug\n---\n[assistant] Looking at parser.ts"
 * ```
 */
export function excerptSummary(messages: readonly ConversationMessage[], excerptChars: number): string {
  return messages
    .map((message) => {
      const text = messagePayload(message).replace(/\s+/g, " ").trim();
      const excerpt = text.length > excerptChars ? `${text.slice(0, excerptChars)}...` : text;
      return `[${roleLabel(message)}] ${excerpt}`;
    })
    .join("\n---\n");
}

export interface BackendSummarizerOptions {
  params?: GenerationParams;
  prompt?: string;
}

/**
 * Summarizer that asks a backend to condense the span.
 *
 * @example
 * ```typescript
 * const agent = new AgentBuilder()
 *   .withBackend(backend)
 *   .withCompaction({ summarizer: createBackendSummarizer(backend, { params: { temperature: 0.3 } }) })
 *   .build();
 * ```
 */
export function createBackendSummarizer(
  backend: BackendClient,
  options: BackendSummarizerOptions = {},
): Summarizer {
  const prompt = options.prompt ?? DEFAULT_SUMMARIZATION_PROMPT;

  return async (messages, signal) => {
    const transcript = messages
      .map((message) => `${roleLabel(message)}: ${messagePayload(message)}`)
      .join("\n\n");

    const response = await backend.complete(
      {
        messages: [systemMessage(prompt), userMessage(transcript)],
        tools: [],
        params: options.params ?? {},
      },
      signal,
    );

    const summary = response.text.trim();
    if (!summary) {
      throw new Error("Summarizer returned no text");
    }
    return summary;
  };
}

export class SummarizationStrategy implements CompactionStrategy {
  readonly name = "summarization";

  async compact(
    history: readonly ConversationMessage[],
    config: ResolvedCompactionConfig,
    context: CompactionContext,
  ): Promise<CompactionResult> {
    const layout = layoutHistory(history, config);
    const span = flattenTurns(layout.middle);

    // A single message is not worth a summary of itself
    if (span.length < 2) {
      return { messages: [...history], changed: false };
    }

    const summary = await this.summarize(span, config, context);
    const messages = [
      ...flattenTurns(layout.pinned),
      userMessage(`${summaryHeader(span.length)}\n${summary}`),
      ...flattenTurns(layout.recent),
    ];

    return { messages, changed: true, summary };
  }

  private async summarize(
    span: readonly ConversationMessage[],
    config: ResolvedCompactionConfig,
    context: CompactionContext,
  ): Promise<string> {
    if (config.summarizer) {
      try {
        return await config.summarizer(span, context.signal);
      } catch (error) {
        if (isAbortError(error) || context.signal?.aborted) {
          throw error;
        }
        context.logger.warn("Summarizer failed, falling back to excerpts", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return excerptSummary(span, config.summaryExcerptChars);
  }
}
