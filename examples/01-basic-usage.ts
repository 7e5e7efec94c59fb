/**
 * Basic usage: one agent, one tool, one backend.
 *
 * Run: npx tsx examples/01-basic-usage.ts
 */

import Anthropic from "@anthropic-ai/sdk";
import { AgentBuilder, AnthropicBackend, Tool, z } from "../src/index.js";

class Calculator extends Tool({
  description: "Performs arithmetic on two numbers",
  schema: z.object({
    operation: z.enum(["add", "subtract", "multiply", "divide"]).describe("The operation to perform"),
    a: z.number().describe("First operand"),
    b: z.number().describe("Second operand"),
  }),
}) {
  execute(params: this["params"]): string {
    const { operation, a, b } = params;
    switch (operation) {
      case "add":
        return String(a + b);
      case "subtract":
        return String(a - b);
      case "multiply":
        return String(a * b);
      case "divide":
        if (b === 0) throw new Error("Division by zero");
        return String(a / b);
    }
  }
}

async function main() {
  console.log("=== Basic Usage ===\n");

  const agent = new AgentBuilder()
    .withBackend(new AnthropicBackend(new Anthropic()))
    .withSystem("You are a helpful assistant. Use the Calculator for arithmetic.")
    .withTools(Calculator)
    .withMaxSteps(10)
    .build();

  const result = await agent.run("What is (15 * 23) + 47?");

  console.log(`Reason: ${result.reason}`);
  console.log(`Steps:  ${result.steps}`);
  console.log(`Tokens: ${result.usage.totalTokens}`);
  console.log(`\n${result.text}`);
}

main().catch(console.error);
