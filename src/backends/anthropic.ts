import type Anthropic from "@anthropic-ai/sdk";
import { DEFAULT_MAX_TOKENS } from "../core/constants.js";
import type { ActionRequest, ConversationMessage } from "../core/messages.js";
import type { ToolDescriptor } from "../tools/registry.js";
import {
  type BackendClient,
  type BackendRequest,
  type BackendResponse,
  decodeActionArguments,
  type FinishReason,
  toBackendError,
} from "./backend.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-sonnet-4-20250514";

/**
 * The slice of a Messages API response the adapter reads.
 */
export type AnthropicMessageResult = Pick<Anthropic.Message, "content" | "stop_reason"> & {
  usage: Pick<Anthropic.Usage, "input_tokens" | "output_tokens">;
};

/**
 * The part of the Anthropic client the adapter uses. An `Anthropic` instance
 * satisfies it; tests pass a fake.
 */
export interface AnthropicMessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): PromiseLike<AnthropicMessageResult>;
  };
}

export interface AnthropicBackendOptions {
  /** Model used when the request does not name one */
  defaultModel?: string;
  /** `max_tokens` used when the request does not set one (the API requires it) */
  defaultMaxTokens?: number;
}

/**
 * Backend over the Anthropic Messages API with native tool use.
 *
 * System messages become the `system` prompt; tool results are sent as
 * `tool_result` blocks in a user turn, consecutive results sharing one turn.
 *
 * @example
 * ```typescript
 * import Anthropic from "@anthropic-ai/sdk";
 *
 * const backend = new AnthropicBackend(new Anthropic({ apiKey: process.env.ANTHROPIC_API_KEY }));
 * ```
 */
export class AnthropicBackend implements BackendClient {
  readonly name = "anthropic";
  private readonly defaultModel: string;
  private readonly defaultMaxTokens: number;

  constructor(
    private readonly client: AnthropicMessagesClient,
    options: AnthropicBackendOptions = {},
  ) {
    this.defaultModel = options.defaultModel ?? ANTHROPIC_DEFAULT_MODEL;
    this.defaultMaxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async complete(request: BackendRequest, signal?: AbortSignal): Promise<BackendResponse> {
    const payload = this.buildRequestPayload(request);

    let message: AnthropicMessageResult;
    try {
      message = await this.client.messages.create(payload, signal ? { signal } : undefined);
    } catch (error) {
      throw toBackendError(error, "Anthropic");
    }

    return parseAnthropicMessage(message);
  }

  buildRequestPayload(request: BackendRequest): Anthropic.MessageCreateParamsNonStreaming {
    const { params } = request;
    const system = request.messages
      .filter((message) => message.role === "system")
      .map((message) => message.content)
      .join("\n\n");

    return {
      model: params.model ?? this.defaultModel,
      max_tokens: params.maxTokens ?? this.defaultMaxTokens,
      messages: toAnthropicMessages(request.messages),
      ...(system ? { system } : {}),
      ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
      ...(request.tools.length > 0 ? { tools: request.tools.map(toAnthropicTool) } : {}),
    };
  }
}

function toAnthropicTool(descriptor: ToolDescriptor): Anthropic.Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    input_schema: { ...descriptor.inputSchema, type: "object" },
  };
}

export function toAnthropicMessages(messages: readonly ConversationMessage[]): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = [];
  let pendingResults: Anthropic.ToolResultBlockParam[] = [];

  const flushResults = () => {
    if (pendingResults.length > 0) {
      result.push({ role: "user", content: pendingResults });
      pendingResults = [];
    }
  };

  for (const message of messages) {
    switch (message.role) {
      case "system":
        break;
      case "tool":
        pendingResults.push({
          type: "tool_result",
          tool_use_id: message.result.requestId,
          content: message.content,
          ...(message.result.success ? {} : { is_error: true }),
        });
        break;
      case "user":
        flushResults();
        result.push({ role: "user", content: message.content });
        break;
      case "assistant": {
        flushResults();
        const content: Anthropic.ContentBlockParam[] = [];
        if (message.content) {
          content.push({ type: "text", text: message.content });
        }
        for (const action of message.actions) {
          content.push({ type: "tool_use", id: action.id, name: action.toolName, input: action.arguments });
        }
        result.push({ role: "assistant", content: content.length > 0 ? content : message.content });
        break;
      }
    }
  }
  flushResults();

  return result;
}

export function parseAnthropicMessage(message: AnthropicMessageResult): BackendResponse {
  const texts: string[] = [];
  const actions: ActionRequest[] = [];

  for (const block of message.content) {
    if (block.type === "text") {
      texts.push(block.text);
    } else if (block.type === "tool_use") {
      actions.push({ id: block.id, toolName: block.name, ...decodeActionArguments(block.input) });
    }
  }

  const inputTokens = message.usage.input_tokens;
  const outputTokens = message.usage.output_tokens;

  return {
    text: texts.join(""),
    actions,
    usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
    finishReason: mapStopReason(message.stop_reason),
  };
}

function mapStopReason(reason: string | null): FinishReason {
  switch (reason) {
    case "end_turn":
    case "stop_sequence":
      return "stop";
    case "tool_use":
      return "tool_use";
    case "max_tokens":
      return "max_tokens";
    case "refusal":
      return "content_filter";
    default:
      return "unknown";
  }
}
