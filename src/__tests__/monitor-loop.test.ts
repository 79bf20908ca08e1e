import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { MonitorLoop } from "../monitor-loop";

describe("MonitorLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the first cycle immediately and then once per interval", async () => {
    const cycles: number[] = [];
    const loop = new MonitorLoop({
      intervalMs: 1_000,
      runCycle: async (cycle) => {
        cycles.push(cycle);
        return cycle;
      },
    });

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(cycles).toEqual([1]);

    await vi.advanceTimersByTimeAsync(999);
    expect(cycles).toEqual([1]);

    await vi.advanceTimersByTimeAsync(1);
    expect(cycles).toEqual([1, 2]);

    await vi.advanceTimersByTimeAsync(1_000);
    expect(cycles).toEqual([1, 2, 3]);

    loop.stop();
    await done;
    expect(loop.isRunning()).toBe(false);
  });

  it("starts the pause only after a slow cycle has finished", async () => {
    const starts: number[] = [];
    const loop = new MonitorLoop({
      intervalMs: 100,
      runCycle: async () => {
        starts.push(Date.now());
        await new Promise((resolve) => setTimeout(resolve, 250));
      },
    });

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(700);
    loop.stop();
    await vi.advanceTimersByTimeAsync(250);
    await done;

    const origin = starts[0] ?? 0;
    expect(starts.map((start) => start - origin)).toEqual([0, 350, 700]);
  });

  it("passes every cycle result to onCycle", async () => {
    const seen: Array<[string, number]> = [];
    const loop = new MonitorLoop({
      intervalMs: 10,
      runCycle: async (cycle) => `report ${cycle}`,
      onCycle: (result, cycle) => {
        seen.push([result, cycle]);
      },
    });

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(10);
    loop.stop();
    await done;

    expect(seen).toEqual([
      ["report 1", 1],
      ["report 2", 2],
    ]);
  });

  it("stops during the pause without waiting for the interval", async () => {
    const runCycle = vi.fn(async () => undefined);
    const loop = new MonitorLoop({ intervalMs: 60_000, runCycle });

    const done = loop.start();
    await vi.advanceTimersByTimeAsync(0);
    loop.stop();
    await done;

    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("rejects the completion promise when a cycle fails", async () => {
    const error = new Error("cycle failed");
    const loop = new MonitorLoop({
      intervalMs: 10,
      runCycle: async () => {
        throw error;
      },
    });

    await expect(loop.start()).rejects.toBe(error);
    expect(loop.isRunning()).toBe(false);
  });

  it("returns the same completion promise while running", async () => {
    const loop = new MonitorLoop({ intervalMs: 10, runCycle: async () => undefined });

    const first = loop.start();
    const second = loop.start();
    loop.stop();
    await first;

    expect(second).toBe(first);
  });

  it("validates the interval", () => {
    expect(() => new MonitorLoop({ intervalMs: -1, runCycle: async () => undefined })).toThrow(
      "intervalMs must be a finite number >= 0",
    );
  });
});
