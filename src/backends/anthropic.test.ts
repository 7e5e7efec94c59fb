import type Anthropic from "@anthropic-ai/sdk";
import { describe, expect, it } from "vitest";
import { BackendTransientError } from "../core/errors.js";
import {
  assistantMessage,
  systemMessage,
  toolMessage,
  userMessage,
} from "../core/messages.js";
import {
  ANTHROPIC_DEFAULT_MODEL,
  AnthropicBackend,
  type AnthropicMessageResult,
  type AnthropicMessagesClient,
  parseAnthropicMessage,
  toAnthropicMessages,
} from "./anthropic.js";

interface RecordedCall {
  body: Anthropic.MessageCreateParamsNonStreaming;
  signal?: AbortSignal;
}

function fakeClient(respond: () => AnthropicMessageResult) {
  const calls: RecordedCall[] = [];
  const client: AnthropicMessagesClient = {
    messages: {
      create: async (body, options) => {
        calls.push({ body, signal: options?.signal });
        return respond();
      },
    },
  };
  return { client, calls };
}

const toolUseResponse: AnthropicMessageResult = {
  content: [
    { type: "text", text: "Reading the file.", citations: null },
    { type: "tool_use", id: "toolu_1", name: "ReadFile", input: { path: "notes.txt" } },
  ],
  stop_reason: "tool_use",
  usage: { input_tokens: 120, output_tokens: 30 },
};

const conversation = [
  systemMessage("You are careful."),
  systemMessage("Answer in English."),
  userMessage("Summarize notes.txt and todo.txt"),
  assistantMessage("Let me look.", [
    { id: "a", toolName: "ReadFile", arguments: { path: "notes.txt" } },
    { id: "b", toolName: "ReadFile", arguments: { path: "todo.txt" } },
  ]),
  toolMessage({ requestId: "a", toolName: "ReadFile", success: true, output: "buy milk", elapsedMs: 2 }),
  toolMessage({
    requestId: "b",
    toolName: "ReadFile",
    success: false,
    error: { kind: "ToolExecutionError", message: "Tool 'ReadFile' failed: no such file" },
    elapsedMs: 1,
  }),
];

describe("toAnthropicMessages", () => {
  it("should group tool results into one user turn", () => {
    expect(toAnthropicMessages(conversation)).toEqual([
      { role: "user", content: "Summarize notes.txt and todo.txt" },
      {
        role: "assistant",
        content: [
          { type: "text", text: "Let me look." },
          { type: "tool_use", id: "a", name: "ReadFile", input: { path: "notes.txt" } },
          { type: "tool_use", id: "b", name: "ReadFile", input: { path: "todo.txt" } },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", tool_use_id: "a", content: "buy milk" },
          {
            type: "tool_result",
            tool_use_id: "b",
            content: "Error (ToolExecutionError): Tool 'ReadFile' failed: no such file",
            is_error: true,
          },
        ],
      },
    ]);
  });

  it("should send an empty assistant message as a string", () => {
    expect(toAnthropicMessages([assistantMessage("")])).toEqual([{ role: "assistant", content: "" }]);
  });
});

describe("parseAnthropicMessage", () => {
  it("should read text, tool calls and usage", () => {
    expect(parseAnthropicMessage(toolUseResponse)).toEqual({
      text: "Reading the file.",
      actions: [{ id: "toolu_1", toolName: "ReadFile", arguments: { path: "notes.txt" } }],
      usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
      finishReason: "tool_use",
    });
  });

  it("should map stop reasons", () => {
    const withReason = (stop_reason: AnthropicMessageResult["stop_reason"]) =>
      parseAnthropicMessage({ ...toolUseResponse, stop_reason }).finishReason;

    expect(withReason("end_turn")).toBe("stop");
    expect(withReason("stop_sequence")).toBe("stop");
    expect(withReason("max_tokens")).toBe("max_tokens");
    expect(withReason("refusal")).toBe("content_filter");
    expect(withReason(null)).toBe("unknown");
  });
});

describe("AnthropicBackend", () => {
  it("should build the request payload", () => {
    const backend = new AnthropicBackend(fakeClient(() => toolUseResponse).client);

    const payload = backend.buildRequestPayload({
      messages: conversation.slice(0, 3),
      tools: [
        {
          name: "ReadFile",
          description: "Reads a file",
          inputSchema: { type: "object", properties: { path: { type: "string" } }, required: ["path"] },
        },
      ],
      params: { temperature: 0.3 },
    });

    expect(payload).toEqual({
      model: ANTHROPIC_DEFAULT_MODEL,
      max_tokens: 4096,
      system: "You are careful.\n\nAnswer in English.",
      temperature: 0.3,
      messages: [{ role: "user", content: "Summarize notes.txt and todo.txt" }],
      tools: [
        {
          name: "ReadFile",
          description: "Reads a file",
          input_schema: { type: "object", properties: { path: { type: "string" } }, required: ["path"] },
        },
      ],
    });
  });

  it("should call the client with the signal and parse the reply", async () => {
    const { client, calls } = fakeClient(() => toolUseResponse);
    const backend = new AnthropicBackend(client, { defaultModel: "test-model", defaultMaxTokens: 512 });
    const controller = new AbortController();

    const response = await backend.complete(
      { messages: [userMessage("Read notes.txt")], tools: [], params: {} },
      controller.signal,
    );

    expect(response.actions.map((action) => action.toolName)).toEqual(["ReadFile"]);
    expect(calls).toHaveLength(1);
    expect(calls[0].signal).toBe(controller.signal);
    expect(calls[0].body).toEqual({
      model: "test-model",
      max_tokens: 512,
      messages: [{ role: "user", content: "Read notes.txt" }],
    });
  });

  it("should classify client errors", async () => {
    class RateLimitError extends Error {
      readonly status = 429;
    }
    const backend = new AnthropicBackend(
      fakeClient(() => {
        throw new RateLimitError("rate limited");
      }).client,
    );

    const error = await backend
      .complete({ messages: [userMessage("hi")], tools: [], params: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendTransientError);
    expect(error).toMatchObject({ status: 429, message: "Anthropic request failed: rate limited" });
  });
});
