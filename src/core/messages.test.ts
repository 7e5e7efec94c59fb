import { describe, expect, it } from "vitest";
import {
  type ActionResult,
  assistantMessage,
  isConversationMessage,
  MessageBuilder,
  renderActionResult,
  toolMessage,
  userMessage,
} from "./messages.js";

const ok: ActionResult = { requestId: "a", toolName: "Echo", success: true, output: "hi", elapsedMs: 3 };
const notFound: ActionResult = {
  requestId: "b",
  toolName: "Nope",
  success: false,
  error: { kind: "ToolNotFound", message: "Tool 'Nope' not found. Available tools: Echo" },
  elapsedMs: 0,
};

describe("renderActionResult", () => {
  it("should render successful output as is", () => {
    expect(renderActionResult(ok)).toBe("hi");
  });

  it("should render failures with their kind", () => {
    expect(renderActionResult(notFound)).toBe(
      "Error (ToolNotFound): Tool 'Nope' not found. Available tools: Echo",
    );
  });

  it("should render an empty string for output-less successes", () => {
    expect(renderActionResult({ requestId: "c", toolName: "Noop", success: true, elapsedMs: 0 })).toBe("");
  });
});

describe("message factories", () => {
  it("should freeze messages and their actions", () => {
    const message = assistantMessage("calling", [{ id: "1", toolName: "Echo", arguments: { text: "x" } }]);

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.actions)).toBe(true);
    expect(Object.isFrozen(message.actions[0])).toBe(true);
  });

  it("should copy actions so later edits do not leak in", () => {
    const actions = [{ id: "1", toolName: "Echo", arguments: {} }];
    const message = assistantMessage("", actions);

    actions.push({ id: "2", toolName: "Echo", arguments: {} });

    expect(message.actions).toHaveLength(1);
  });

  it("should render tool message content from the result", () => {
    const message = toolMessage(notFound);

    expect(message.role).toBe("tool");
    expect(message.content).toBe("Error (ToolNotFound): Tool 'Nope' not found. Available tools: Echo");
    expect(message.result).toEqual(notFound);
    expect(Object.isFrozen(message.result.error)).toBe(true);
  });
});

describe("MessageBuilder", () => {
  it("should build messages in order", () => {
    const messages = new MessageBuilder()
      .addSystem("Be brief.")
      .addUser("Say hi")
      .addAssistant("", [{ id: "a", toolName: "Echo", arguments: { text: "hi" } }])
      .addToolResult(ok)
      .build();

    expect(messages.map((m) => m.role)).toEqual(["system", "user", "assistant", "tool"]);
    expect(messages[3].content).toBe("hi");
  });

  it("should return a fresh array from each build", () => {
    const builder = new MessageBuilder().addUser("one");
    const first = builder.build();
    builder.addUser("two");

    expect(first).toHaveLength(1);
    expect(builder.build()).toHaveLength(2);
  });
});

describe("isConversationMessage", () => {
  it("should accept well-formed messages", () => {
    expect(isConversationMessage(userMessage("hi"))).toBe(true);
    expect(isConversationMessage(assistantMessage("done"))).toBe(true);
    expect(isConversationMessage(toolMessage(ok))).toBe(true);
  });

  it("should reject other values", () => {
    expect(isConversationMessage(null)).toBe(false);
    expect(isConversationMessage({ role: "user" })).toBe(false);
    expect(isConversationMessage({ role: "assistant", content: "no actions" })).toBe(false);
    expect(isConversationMessage({ role: "developer", content: "x" })).toBe(false);
  });
});
