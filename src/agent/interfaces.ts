/**
 * Contracts between the agent loop and the services it composes.
 */

import type { ActionResult, AssistantMessage, ConversationMessage } from "../core/messages.js";

/**
 * Conversation state for one run.
 *
 * System messages form the base, which is sent first on every request and
 * never compacted. Everything else is history.
 */
export interface IConversation {
  addUserMessage(content: string): void;

  /**
   * Appends an assistant message together with the results of its actions.
   * Results must answer the message's action requests one-to-one, in order.
   */
  appendTurn(assistant: AssistantMessage, results: readonly ActionResult[]): void;

  /** Base followed by history, as sent to the backend. */
  getMessages(): ConversationMessage[];

  getHistoryMessages(): ConversationMessage[];

  getBaseMessages(): ConversationMessage[];

  /**
   * Replaces the history after compaction.
   */
  replaceHistory(newHistory: readonly ConversationMessage[]): void;
}
