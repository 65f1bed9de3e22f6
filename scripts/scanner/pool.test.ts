import { describe, expect, it } from "vitest";

import { runWorkerPool } from "./pool";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("runWorkerPool", () => {
  it("keeps results in input order and never exceeds the concurrency", async () => {
    let active = 0;
    let peak = 0;
    const seen: Array<[item: number, workerId: number]> = [];

    const results = await runWorkerPool([1, 2, 3, 4, 5], 2, async (item, workerId) => {
      active += 1;
      peak = Math.max(peak, active);
      seen.push([item, workerId]);
      await tick();
      active -= 1;
      return item * 10;
    });

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
    expect(new Set(seen.map(([, workerId]) => workerId))).toEqual(new Set([1, 2]));
  });

  it("starts no more workers than there are items", async () => {
    const workerIds: number[] = [];
    await runWorkerPool(["only"], 8, async (_item, workerId) => {
      workerIds.push(workerId);
    });
    expect(workerIds).toEqual([1]);
  });

  it("reports progress as items settle", async () => {
    const progress: string[] = [];
    await runWorkerPool(
      ["a", "b"],
      1,
      async (item) => item.toUpperCase(),
      (result, index, total) => progress.push(`${index + 1}/${total} ${result}`)
    );
    expect(progress).toEqual(["1/2 A", "2/2 B"]);
  });

  it("returns an empty list for no items", async () => {
    expect(await runWorkerPool([], 4, async () => 1)).toEqual([]);
  });
});
