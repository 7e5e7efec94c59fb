/**
 * Event stream: watch tool calls and results as the run progresses.
 *
 * Run: npx tsx examples/02-event-stream.ts
 */

import OpenAI from "openai";
import { AgentBuilder, OpenAIBackend, Tool, type ToolContext, z } from "../src/index.js";

class Countdown extends Tool({
  description: "Waits the given number of seconds, then reports back",
  schema: z.object({
    seconds: z.number().int().min(1).max(5).describe("How long to wait"),
  }),
  timeoutMs: 10_000,
}) {
  async execute(params: this["params"], ctx: ToolContext): Promise<string> {
    for (let i = params.seconds; i > 0; i--) {
      this.throwIfAborted(ctx);
      await new Promise((resolve) => setTimeout(resolve, 1000));
    }
    return `Waited ${params.seconds}s`;
  }
}

async function main() {
  console.log("=== Event Stream ===\n");

  const agent = new AgentBuilder()
    .withBackend(new OpenAIBackend(new OpenAI()))
    .withModel("gpt-4o-mini")
    .withTools(Countdown)
    .withToolConcurrency(2)
    .build();

  const events = agent.execute("Wait 2 seconds and 3 seconds in parallel, then say how long it all took.");
  let next = await events.next();
  while (!next.done) {
    const event = next.value;
    switch (event.type) {
      case "step_start":
        console.log(`-- step ${event.step}`);
        break;
      case "action_call":
        console.log(`   call   ${event.request.toolName} ${JSON.stringify(event.request.arguments)}`);
        break;
      case "action_result":
        console.log(
          `   result ${event.result.toolName} ${event.result.success ? "ok" : "failed"} (${event.result.elapsedMs}ms)`,
        );
        break;
      case "text":
        console.log(`   text   ${event.content}`);
        break;
      case "compaction":
        console.log(`   compacted ${event.event.tokensBefore} -> ${event.event.tokensAfter} tokens`);
        break;
    }
    next = await events.next();
  }

  console.log(`\nFinished: ${next.value.reason}`);
}

main().catch(console.error);
