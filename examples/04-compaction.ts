/**
 * Context compaction: large tool outputs are pruned once the conversation
 * outgrows the context budget. Needs no API key.
 *
 * Run: npx tsx examples/04-compaction.ts
 */

import { AgentBuilder, Tool, z } from "../src/index.js";
import { MockBackend } from "../src/testing/index.js";

class DumpLog extends Tool({
  description: "Returns the contents of a (very long) log file",
  schema: z.object({ file: z.string() }),
}) {
  execute(params: this["params"]): string {
    return `${params.file}: ${"INFO request served\n".repeat(400)}`;
  }
}

async function main() {
  console.log("=== Compaction ===\n");

  const backend = new MockBackend([
    { actions: [{ toolName: "DumpLog", arguments: { file: "a.log" } }] },
    { actions: [{ toolName: "DumpLog", arguments: { file: "b.log" } }] },
    { actions: [{ toolName: "DumpLog", arguments: { file: "c.log" } }] },
    { text: "All three logs look healthy." },
  ]);

  const agent = new AgentBuilder()
    .withBackend(backend)
    .withTools(DumpLog)
    .withCompaction({ contextLimit: 4_000, preserveRecentTurns: 1 })
    .build();

  const events = agent.execute("Check a.log, b.log and c.log");
  let next = await events.next();
  while (!next.done) {
    if (next.value.type === "compaction") {
      const { strategies, tokensBefore, tokensAfter, withinBudget } = next.value.event;
      console.log(
        `Compacted with ${strategies.join(", ")}: ${tokensBefore} -> ${tokensAfter} tokens (fits: ${withinBudget})`,
      );
    }
    next = await events.next();
  }

  console.log(`\n${next.value.reason}: ${next.value.text}`);
  console.log(agent.getCompactionStats());
}

main().catch(console.error);
