/**
 * Conversation state for a single agent run.
 */

import { ValidationError } from "../core/errors.js";
import {
  type ActionResult,
  type AssistantMessage,
  type ConversationMessage,
  toolMessage,
  userMessage,
} from "../core/messages.js";
import type { IConversation } from "./interfaces.js";

/**
 * Default implementation of IConversation.
 *
 * System messages from the initial list become the base; the rest is history.
 * An assistant message only enters the history together with the results of
 * all its actions, so the conversation sent to the backend never holds an
 * unanswered request.
 */
export class Conversation implements IConversation {
  private readonly baseMessages: ConversationMessage[] = [];
  private history: ConversationMessage[] = [];

  /**
   * @throws {ValidationError} if the initial history holds an assistant
   * request without its results, or a tool result without its request
   */
  constructor(initialMessages: readonly ConversationMessage[] = []) {
    const history: ConversationMessage[] = [];
    for (const message of initialMessages) {
      if (message.role === "system") {
        this.baseMessages.push(message);
      } else {
        history.push(message);
      }
    }

    let index = 0;
    while (index < history.length) {
      const message = history[index];
      if (message.role === "tool") {
        throw new ValidationError(
          `Tool result for '${message.result.requestId}' at position ${index} does not follow its request`,
        );
      }
      if (message.role !== "assistant" || message.actions.length === 0) {
        this.history.push(message);
        index++;
        continue;
      }

      const results: ActionResult[] = [];
      for (let next = index + 1; next < history.length && results.length < message.actions.length; next++) {
        const candidate = history[next];
        if (candidate.role !== "tool") break;
        results.push(candidate.result);
      }
      this.appendTurn(message, results);
      index += 1 + results.length;
    }
  }

  addUserMessage(content: string): void {
    this.history.push(userMessage(content));
  }

  appendTurn(assistant: AssistantMessage, results: readonly ActionResult[]): void {
    const { actions } = assistant;
    if (actions.length !== results.length) {
      throw new ValidationError(
        `Turn has ${actions.length} action request(s) but ${results.length} result(s)`,
      );
    }

    const issues = actions.flatMap((action, index) =>
      results[index].requestId === action.id
        ? []
        : [{ path: String(index), message: `expected result for '${action.id}', got '${results[index].requestId}'` }],
    );
    if (issues.length > 0) {
      throw new ValidationError("Action results do not match their requests in order", issues);
    }

    this.history.push(assistant, ...results.map((result) => toolMessage(result)));
  }

  getMessages(): ConversationMessage[] {
    return [...this.baseMessages, ...this.history];
  }

  getHistoryMessages(): ConversationMessage[] {
    return [...this.history];
  }

  getBaseMessages(): ConversationMessage[] {
    return [...this.baseMessages];
  }

  replaceHistory(newHistory: readonly ConversationMessage[]): void {
    this.history = newHistory.filter((message) => message.role !== "system");
  }
}
