import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { CompletionUsage } from "openai/resources/completions";
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

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

/**
 * The slice of a Chat Completions response the adapter reads.
 */
export interface OpenAIChatResult {
  choices: Array<
    Pick<ChatCompletion.Choice, "finish_reason"> & {
      message: Pick<ChatCompletionMessage, "content" | "tool_calls">;
    }
  >;
  usage?: Pick<CompletionUsage, "prompt_tokens" | "completion_tokens" | "total_tokens">;
}

/**
 * The part of the OpenAI client the adapter uses. An `OpenAI` instance
 * satisfies it; tests pass a fake.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): PromiseLike<OpenAIChatResult>;
    };
  };
}

export interface OpenAIBackendOptions {
  /** Model used when the request does not name one */
  defaultModel?: string;
}

/**
 * Backend over the OpenAI Chat Completions API with function tools.
 *
 * @example
 * ```typescript
 * import OpenAI from "openai";
 *
 * const backend = new OpenAIBackend(new OpenAI({ apiKey: process.env.OPENAI_API_KEY }), {
 *   defaultModel: "gpt-4o",
 * });
 * ```
 */
export class OpenAIBackend implements BackendClient {
  readonly name = "openai";
  private readonly defaultModel: string;

  constructor(
    private readonly client: OpenAIChatClient,
    options: OpenAIBackendOptions = {},
  ) {
    this.defaultModel = options.defaultModel ?? OPENAI_DEFAULT_MODEL;
  }

  async complete(request: BackendRequest, signal?: AbortSignal): Promise<BackendResponse> {
    const payload = this.buildRequestPayload(request);

    let completion: OpenAIChatResult;
    try {
      completion = await this.client.chat.completions.create(payload, signal ? { signal } : undefined);
    } catch (error) {
      throw toBackendError(error, "OpenAI");
    }

    return parseOpenAICompletion(completion);
  }

  buildRequestPayload(request: BackendRequest): ChatCompletionCreateParamsNonStreaming {
    const { params } = request;
    return {
      model: params.model ?? this.defaultModel,
      messages: toOpenAIMessages(request.messages),
      ...(params.maxTokens !== undefined ? { max_completion_tokens: params.maxTokens } : {}),
      ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
      ...(request.tools.length > 0 ? { tools: request.tools.map(toOpenAITool) } : {}),
    };
  }
}

function toOpenAITool(descriptor: ToolDescriptor): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: descriptor.name,
      description: descriptor.description,
      parameters: descriptor.inputSchema,
    },
  };
}

export function toOpenAIMessages(messages: readonly ConversationMessage[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "user":
        return { role: "user", content: message.content };
      case "tool":
        return { role: "tool", tool_call_id: message.result.requestId, content: message.content };
      case "assistant":
        if (message.actions.length === 0) {
          return { role: "assistant", content: message.content };
        }
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.actions.map((action) => ({
            id: action.id,
            type: "function" as const,
            function: { name: action.toolName, arguments: JSON.stringify(action.arguments) },
          })),
        };
    }
  });
}

export function parseOpenAICompletion(completion: OpenAIChatResult): BackendResponse {
  const choice = completion.choices[0];
  const actions: ActionRequest[] = [];

  for (const call of choice?.message.tool_calls ?? []) {
    if (call.type !== "function") continue;
    actions.push({
      id: call.id,
      toolName: call.function.name,
      ...decodeActionArguments(call.function.arguments),
    });
  }

  const inputTokens = completion.usage?.prompt_tokens ?? 0;
  const outputTokens = completion.usage?.completion_tokens ?? 0;

  return {
    text: choice?.message.content ?? "",
    actions,
    usage: {
      inputTokens,
      outputTokens,
      totalTokens: completion.usage?.total_tokens ?? inputTokens + outputTokens,
    },
    finishReason: mapFinishReason(choice?.finish_reason),
  };
}

function mapFinishReason(reason: string | undefined): FinishReason {
  switch (reason) {
    case "stop":
      return "stop";
    case "tool_calls":
    case "function_call":
      return "tool_use";
    case "length":
      return "max_tokens";
    case "content_filter":
      return "content_filter";
    default:
      return "unknown";
  }
}
