/**
 * Token estimation for context budgeting.
 *
 * Estimates only need to be monotone and on the high side: overestimating
 * compacts a little early, underestimating gets the request rejected.
 */

import { get_encoding, type Tiktoken } from "tiktoken";
import type { ConversationMessage } from "../../core/messages.js";

export interface TokenEstimator {
  readonly name: string;
  estimateText(text: string): number;
  estimateMessage(message: ConversationMessage): number;
  estimateMessages(messages: readonly ConversationMessage[]): number;
}

/**
 * Text of a message as the backend will see it, including serialized action
 * requests on assistant messages.
 */
export function messagePayload(message: ConversationMessage): string {
  if (message.role !== "assistant" || message.actions.length === 0) {
    return message.content;
  }
  const actions = message.actions.map(
    (action) => `${action.id} ${action.toolName} ${JSON.stringify(action.arguments)}`,
  );
  return [message.content, ...actions].join("\n");
}

/**
 * Shared plumbing: per-message overhead and a cache keyed by the (frozen)
 * message object.
 */
abstract class CachingEstimator implements TokenEstimator {
  abstract readonly name: string;
  private readonly cache = new WeakMap<ConversationMessage, number>();

  constructor(protected readonly perMessageOverhead: number) {}

  abstract estimateText(text: string): number;

  estimateMessage(message: ConversationMessage): number {
    const cached = this.cache.get(message);
    if (cached !== undefined) {
      return cached;
    }
    const estimate = this.perMessageOverhead + this.estimateText(messagePayload(message));
    this.cache.set(message, estimate);
    return estimate;
  }

  estimateMessages(messages: readonly ConversationMessage[]): number {
    let total = 0;
    for (const message of messages) {
      total += this.estimateMessage(message);
    }
    return total;
  }
}

/**
 * Character-count estimator. Three ASCII characters per token overestimates
 * the common BPE tokenizers on English text and code. Everything else is
 * counted by UTF-8 bytes, 1.5 to a token, which keeps CJK text (about one
 * token per character) on the high side too.
 */
export class CharacterTokenEstimator extends CachingEstimator {
  readonly name = "characters";

  constructor(
    private readonly charsPerToken = 3,
    perMessageOverhead = 4,
    private readonly nonAsciiBytesPerToken = 1.5,
  ) {
    super(perMessageOverhead);
  }

  estimateText(text: string): number {
    let ascii = 0;
    let otherBytes = 0;
    for (const char of text) {
      const codePoint = char.codePointAt(0) ?? 0;
      if (codePoint < 0x80) ascii++;
      else if (codePoint < 0x800) otherBytes += 2;
      else if (codePoint < 0x10000) otherBytes += 3;
      else otherBytes += 4;
    }
    return Math.ceil(ascii / this.charsPerToken + otherBytes / this.nonAsciiBytesPerToken);
  }
}

/**
 * tiktoken-backed estimator (cl100k_base by default). Call `free()` when done
 * with it to release the WASM encoder.
 */
export class TiktokenEstimator extends CachingEstimator {
  readonly name = "tiktoken";
  private readonly encoding: Tiktoken;

  constructor(encodingName: "cl100k_base" | "o200k_base" = "cl100k_base", perMessageOverhead = 4) {
    super(perMessageOverhead);
    this.encoding = get_encoding(encodingName);
  }

  /**
   * Special-token text such as `<|endoftext|>` is counted as ordinary text
   * rather than rejected; tool output may contain it.
   */
  estimateText(text: string): number {
    return this.encoding.encode(text, [], []).length;
  }

  free(): void {
    this.encoding.free();
  }
}
