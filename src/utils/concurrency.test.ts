import { describe, it, expect } from "vitest";
import { mapWithConcurrency } from "./concurrency.js";

describe("mapWithConcurrency", () => {
  it("keeps input order regardless of completion order", async () => {
    const delays = [30, 5, 15, 0];

    const results = await mapWithConcurrency(delays, 4, async (ms, i) => {
      await new Promise((r) => setTimeout(r, ms));
      return `${i}:${ms}`;
    });

    expect(results).toEqual(["0:30", "1:5", "2:15", "3:0"]);
  });

  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
    });

    expect(peak).toBe(2);
  });

  it("runs sequentially with a limit of one", async () => {
    let release: (value: void) => void = () => {};
    const gate = new Promise<void>((r) => {
      release = r;
    });
    const started: number[] = [];

    const run = mapWithConcurrency([1, 2], 1, async (n) => {
      started.push(n);
      if (n === 1) await gate;
      return n;
    });
    await new Promise((r) => setTimeout(r, 5));
    expect(started).toEqual([1]);

    release();
    expect(await run).toEqual([1, 2]);
  });

  it("returns an empty array for no items", async () => {
    expect(await mapWithConcurrency([], 3, async () => 1)).toEqual([]);
  });
});
