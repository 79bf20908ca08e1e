import { describe, expect, it } from "vitest";

import { createWorkerPool, effectiveWorkerCount, type WorkerPool } from "../concurrency";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("effectiveWorkerCount", () => {
  it.each([
    [0, 5, 1],
    [1, 5, 1],
    [3, 5, 3],
    [50, 5, 5],
    [50, 0, 1],
    [2.7, 5, 2],
  ])("clamps %s workers for %s targets to %s", (configured, targets, expected) => {
    expect(effectiveWorkerCount(configured, targets)).toBe(expected);
  });
});

describe("createWorkerPool", () => {
  it("respects the pool size", async () => {
    const pool: WorkerPool = createWorkerPool(1);
    const order: number[] = [];

    const results = await Promise.all([
      pool(async () => {
        order.push(1);
        await sleep(10);
        order.push(2);
        return "first";
      }),
      pool(async () => {
        await Promise.resolve();
        order.push(3);
        return "second";
      }),
    ]);

    expect(order).toEqual([1, 2, 3]);
    expect(results).toEqual(["first", "second"]);
    expect(pool.activeCount).toBe(0);
    expect(pool.pendingCount).toBe(0);
  });

  it("never runs more than size tasks at once", async () => {
    const pool = createWorkerPool(3);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        pool(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await sleep(5);
          active -= 1;
        }),
      ),
    );

    expect(peak).toBe(3);
  });

  it("treats a non-positive size as a single worker", async () => {
    const pool = createWorkerPool(0);
    let active = 0;
    let peak = 0;

    await Promise.all(
      [1, 2, 3].map(() =>
        pool(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await sleep(2);
          active -= 1;
        }),
      ),
    );

    expect(peak).toBe(1);
  });
});
