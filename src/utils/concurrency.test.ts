import { describe, expect, it } from "vitest";
import { sleep } from "./timing.js";
import { mapWithConcurrency } from "./concurrency.js";

describe("mapWithConcurrency", () => {
  it("should keep input order whatever order calls finish in", async () => {
    const delays = [30, 5, 15, 0];

    const results = await mapWithConcurrency(delays, 4, async (delay, index) => {
      await sleep(delay);
      return `item-${index}`;
    });

    expect(results).toEqual(["item-0", "item-1", "item-2", "item-3"]);
  });

  it("should never exceed the limit", async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
    });

    expect(peak).toBe(2);
  });

  it("should stop starting calls after a rejection and wait for those in flight", async () => {
    const started: string[] = [];
    let slowFinished = false;

    const mapped = mapWithConcurrency(["fail", "slow", "later"], 2, async (item) => {
      started.push(item);
      if (item === "fail") {
        await sleep(5);
        throw new Error("boom");
      }
      if (item === "slow") {
        await sleep(30);
        slowFinished = true;
      }
      return item;
    });

    await expect(mapped).rejects.toThrow("boom");
    expect(slowFinished).toBe(true);
    expect(started).toEqual(["fail", "slow"]);
  });

  it("should handle an empty list", async () => {
    await expect(mapWithConcurrency([], 3, async () => 1)).resolves.toEqual([]);
  });
});
