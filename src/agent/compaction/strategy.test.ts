import { describe, expect, it } from "vitest";
import {
  assistantMessage,
  type ConversationMessage,
  toolMessage,
  userMessage,
} from "../../core/messages.js";
import { MockBackend } from "../../testing/mock-backend.js";
import { resolveCompactionConfig } from "./config.js";
import { CharacterTokenEstimator, TiktokenEstimator } from "./estimator.js";
import { createBackendSummarizer, excerptSummary, pruneText, truncationMarker } from "./strategies/index.js";
import { groupIntoTurns, layoutHistory, truncateText } from "./strategy.js";

function turnWithTool(id: string, output: string): ConversationMessage[] {
  return [
    assistantMessage("", [{ id, toolName: "Read", arguments: {} }]),
    toolMessage({ requestId: id, toolName: "Read", success: true, output, elapsedMs: 0 }),
  ];
}

describe("CharacterTokenEstimator", () => {
  it("should round characters up and add the per-message overhead", () => {
    const estimator = new CharacterTokenEstimator();

    expect(estimator.estimateText("abcdefg")).toBe(3);
    expect(estimator.estimateMessage(userMessage("abcdef"))).toBe(6);
    expect(estimator.estimateMessages([userMessage("abcdef"), userMessage("abc")])).toBe(11);
  });

  it("should count serialized action requests", () => {
    const estimator = new CharacterTokenEstimator(1, 0);
    const message = assistantMessage("hi", [{ id: "c1", toolName: "Read", arguments: { path: "a" } }]);

    // "hi\nc1 Read {\"path\":\"a\"}"
    expect(estimator.estimateMessage(message)).toBe(23);
  });

  it("should count non-ASCII text by UTF-8 bytes", () => {
    const estimator = new CharacterTokenEstimator();

    expect(estimator.estimateText("漢字".repeat(525))).toBe(2100);
    expect(estimator.estimateText("abc漢字")).toBe(5);
    expect(estimator.estimateText("😀")).toBe(3);
  });
});

describe("TiktokenEstimator", () => {
  it("should count BPE tokens", () => {
    const estimator = new TiktokenEstimator();

    expect(estimator.estimateText("hello world")).toBe(2);
    expect(estimator.estimateMessage(userMessage("hello world"))).toBe(6);
    estimator.free();
  });

  it("should count special-token text as ordinary text", () => {
    const estimator = new TiktokenEstimator();

    const withMarker = estimator.estimateText("file body <|endoftext|> tail");

    expect(withMarker).toBeGreaterThan(estimator.estimateText("file body  tail"));
    estimator.free();
  });
});

describe("turn layout", () => {
  const history = [
    userMessage("task"),
    ...turnWithTool("a", "first"),
    ...turnWithTool("b", "second"),
    userMessage("next"),
  ];

  it("should keep tool results with their assistant message", () => {
    const turns = groupIntoTurns(history);

    expect(turns.map((turn) => turn.messages.map((m) => m.role))).toEqual([
      ["user"],
      ["assistant", "tool"],
      ["assistant", "tool"],
      ["user"],
    ]);
  });

  it("should pin the task and protect recent turns", () => {
    const layout = layoutHistory(history, resolveCompactionConfig({ preserveRecentTurns: 1 }));

    expect(layout.pinned).toHaveLength(1);
    expect(layout.middle).toHaveLength(2);
    expect(layout.recent.map((turn) => turn.messages[0].content)).toEqual(["next"]);
  });

  it("should leave nothing to compact when every turn is recent", () => {
    const layout = layoutHistory(history, resolveCompactionConfig({ preserveRecentTurns: 10 }));

    expect(layout.middle).toEqual([]);
    expect(layout.recent).toHaveLength(3);
  });

  it("should not pin anything when keepInitialTask is off", () => {
    const layout = layoutHistory(
      history,
      resolveCompactionConfig({ preserveRecentTurns: 1, keepInitialTask: false }),
    );

    expect(layout.pinned).toEqual([]);
    expect(layout.middle).toHaveLength(3);
  });
});

describe("text shortening", () => {
  it("should prune long outputs with a marker", () => {
    expect(pruneText("x".repeat(100), 10)).toBe(`${"x".repeat(10)}\n[... 90 characters pruned ...]`);
    expect(pruneText("x".repeat(70), 10)).toBe("x".repeat(70));
  });

  it("should truncate text to a token limit", () => {
    const estimator = new CharacterTokenEstimator(1, 0);

    expect(truncateText("x".repeat(600), 512, estimator)).toBe(
      `${"x".repeat(448)}\n[... 152 characters truncated ...]`,
    );
    expect(truncateText("short", 512, estimator)).toBe("short");
  });

  it("should word the truncation marker", () => {
    expect(truncationMarker(3)).toBe(
      "[Earlier conversation truncated: 3 message(s) removed to fit the context budget]",
    );
  });
});

describe("summaries", () => {
  it("should build excerpts per message", () => {
    const summary = excerptSummary(
      [userMessage("Find the bug"), assistantMessage("Looking   at\nparser.ts")],
      400,
    );

    expect(summary).toBe("[user] Find the bug\n---\n[assistant] Looking at parser.ts");
  });

  it("should cut excerpts and label tool output", () => {
    const [, tool] = turnWithTool("a", "a very long file body");

    expect(excerptSummary([tool], 6)).toBe("[tool:Read] a very...");
  });

  it("should ask a backend for the summary", async () => {
    const backend = new MockBackend([{ text: "  The user asked for a fix.  " }]);
    const summarize = createBackendSummarizer(backend, { prompt: "Summarize.", params: { temperature: 0 } });

    const summary = await summarize([userMessage("fix it"), ...turnWithTool("a", "patched")]);

    expect(summary).toBe("The user asked for a fix.");
    const request = backend.getLastRequest();
    expect(request?.params).toEqual({ temperature: 0 });
    expect(request?.tools).toEqual([]);
    expect(request?.messages.map((m) => m.content)).toEqual([
      "Summarize.",
      "user: fix it\n\nassistant: \na Read {}\n\ntool:Read: patched",
    ]);
  });

  it("should reject an empty backend summary", async () => {
    const summarize = createBackendSummarizer(new MockBackend([{ text: "   " }]));

    await expect(summarize([userMessage("x"), userMessage("y")])).rejects.toThrow("Summarizer returned no text");
  });
});
