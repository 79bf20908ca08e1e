import pLimit, { type LimitFunction } from "p-limit";

export type WorkerPool = LimitFunction;

/**
 * Number of workers used for a batch: never more than there is work, never
 * fewer than one.
 */
export function effectiveWorkerCount(configured: number, targetCount: number): number {
  const requested = Number.isFinite(configured) ? Math.floor(configured) : 1;
  return Math.max(1, Math.min(requested, targetCount));
}

/**
 * Creates a fixed-size pool: at most `size` tasks run at once, the rest wait
 * in FIFO order and each queued task is started exactly once.
 */
export function createWorkerPool(size: number): WorkerPool {
  return pLimit(Math.max(1, Math.floor(size)));
}
