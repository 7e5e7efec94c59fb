/**
 * Retries and the circuit breaker, against a scripted backend that fails.
 * Needs no API key.
 *
 * Run: npx tsx examples/03-resilience.ts
 */

import { AgentBuilder, BackendTransientError, CircuitBreaker } from "../src/index.js";
import { MockBackend } from "../src/testing/index.js";

async function main() {
  console.log("=== Resilience ===\n");

  // Two transient failures, then an answer: retries absorb them
  const flaky = new MockBackend([
    new BackendTransientError("overloaded", { status: 529 }),
    new BackendTransientError("overloaded", { status: 529 }),
    { text: "Recovered after two retries." },
  ]);

  const retrying = new AgentBuilder()
    .withBackend(flaky)
    .withRetry({ maxRetries: 3, initialDelayMs: 200 })
    .build();

  const recovered = await retrying.run("Hello");
  console.log(`1. ${recovered.reason} after ${flaky.getCallCount()} calls: ${recovered.text}`);

  // A breaker shared by two agents opens after repeated failures
  const breaker = new CircuitBreaker({
    failureThreshold: 2,
    recoveryTimeoutMs: 5_000,
    onStateChange: (change) => console.log(`   breaker ${change.from} -> ${change.to} (${change.reason})`),
  });
  const down = new MockBackend([], { fallback: new BackendTransientError("service unavailable", { status: 503 }) });

  for (const name of ["first", "second"]) {
    const agent = new AgentBuilder()
      .withBackend(down)
      .withRetry({ maxRetries: 1, initialDelayMs: 100 })
      .withCircuitBreaker(breaker)
      .build();

    const result = await agent.run("Hello");
    console.log(`2. ${name} agent: ${result.reason} (${result.error?.message})`);
  }

  console.log(`\nBackend calls made: ${down.getCallCount()}`);
  console.log(`Breaker state: ${breaker.getSnapshot().state}`);
}

main().catch(console.error);
