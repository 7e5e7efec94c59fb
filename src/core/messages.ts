export type MessageRole = "system" | "user" | "assistant" | "tool";

/**
 * A model-issued tool invocation.
 */
export interface ActionRequest {
  /** Unique within the assistant turn that issued it */
  readonly id: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /**
   * Set by backend adapters when the model produced arguments that could not
   * be decoded. The dispatcher reports these as `InvalidArguments`.
   */
  readonly parseError?: string;
}

export type ActionErrorKind = "ToolNotFound" | "InvalidArguments" | "ToolExecutionError";

export interface ActionError {
  readonly kind: ActionErrorKind;
  readonly message: string;
  /** True when the tool was interrupted by its timeout */
  readonly timedOut?: boolean;
}

/**
 * Outcome of exactly one action request.
 */
export interface ActionResult {
  readonly requestId: string;
  readonly toolName: string;
  readonly success: boolean;
  readonly output?: string;
  readonly error?: ActionError;
  readonly elapsedMs: number;
}

export interface SystemMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserMessage {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly actions: readonly ActionRequest[];
}

export interface ToolMessage {
  readonly role: "tool";
  readonly content: string;
  readonly result: ActionResult;
}

export type ConversationMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export function systemMessage(content: string): SystemMessage {
  return Object.freeze({ role: "system", content });
}

export function userMessage(content: string): UserMessage {
  return Object.freeze({ role: "user", content });
}

export function assistantMessage(
  content: string,
  actions: readonly ActionRequest[] = [],
): AssistantMessage {
  return Object.freeze({
    role: "assistant",
    content,
    actions: Object.freeze(actions.map((action) => Object.freeze({ ...action }))),
  });
}

export function toolMessage(result: ActionResult): ToolMessage {
  const frozen = Object.freeze({
    ...result,
    ...(result.error ? { error: Object.freeze({ ...result.error }) } : {}),
  });
  return Object.freeze({ role: "tool", content: renderActionResult(frozen), result: frozen });
}

/**
 * Text the model sees for a tool result.
 *
 * @example
 * ```typescript
 * renderActionResult({ requestId: "a", toolName: "Echo", success: true, output: "hi", elapsedMs: 1 });
 * // "hi"
 * renderActionResult({ requestId: "b", toolName: "Nope", success: false,
 *   error: { kind: "ToolNotFound", message: "Tool 'Nope' not found" }, elapsedMs: 0 });
 * // "Error (ToolNotFound): Tool 'Nope' not found"
 * ```
 */
export function renderActionResult(result: ActionResult): string {
  if (result.success) {
    return result.output ?? "";
  }
  const error = result.error;
  if (!error) {
    return "Error: tool failed without a message";
  }
  return `Error (${error.kind}): ${error.message}`;
}

/**
 * Fluent builder for the initial conversation handed to an agent.
 *
 * @example
 * ```typescript
 * const messages = new MessageBuilder()
 *   .addSystem("You are a careful assistant.")
 *   .addUser("List the files in /tmp")
 *   .build();
 * ```
 */
export class MessageBuilder {
  private readonly messages: ConversationMessage[] = [];

  addSystem(content: string): this {
    this.messages.push(systemMessage(content));
    return this;
  }

  addUser(content: string): this {
    this.messages.push(userMessage(content));
    return this;
  }

  addAssistant(content: string, actions: readonly ActionRequest[] = []): this {
    this.messages.push(assistantMessage(content, actions));
    return this;
  }

  addToolResult(result: ActionResult): this {
    this.messages.push(toolMessage(result));
    return this;
  }

  build(): ConversationMessage[] {
    return [...this.messages];
  }
}

export const isConversationMessage = (value: unknown): value is ConversationMessage => {
  if (value === null || typeof value !== "object") {
    return false;
  }
  if (!("role" in value) || !("content" in value) || typeof value.content !== "string") {
    return false;
  }
  switch (value.role) {
    case "system":
    case "user":
      return true;
    case "assistant":
      return "actions" in value && Array.isArray(value.actions);
    case "tool":
      return "result" in value && typeof value.result === "object" && value.result !== null;
    default:
      return false;
  }
};
