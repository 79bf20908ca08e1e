export interface MonitorLoopOptions<T> {
  /**
   * Pause between the end of one cycle and the start of the next, in milliseconds.
   */
  intervalMs: number;
  /**
   * Executes one cycle. A rejected cycle ends the loop with that error.
   */
  runCycle: (cycle: number) => Promise<T>;
  /**
   * Receives every completed cycle before the loop goes to sleep.
   */
  onCycle?: (result: T, cycle: number) => void;
  /**
   * Optional overrides for scheduling functions (mainly for tests).
   */
  setTimeoutFn?: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (handle: ReturnType<typeof setTimeout>) => void;
}

/**
 * Runs cycles back to back with a fixed pause in between. Cycles never
 * overlap: the pause starts only after a cycle has settled.
 */
export class MonitorLoop<T> {
  private readonly intervalMs: number;
  private readonly runCycle: (cycle: number) => Promise<T>;
  private readonly onCycle?: (result: T, cycle: number) => void;
  private readonly setTimeoutFn: (
    callback: () => void,
    delay: number,
  ) => ReturnType<typeof setTimeout>;
  private readonly clearTimeoutFn: (handle: ReturnType<typeof setTimeout>) => void;

  private running = false;
  private completion: Promise<void> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  constructor(options: MonitorLoopOptions<T>) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs < 0) {
      throw new TypeError("intervalMs must be a finite number >= 0");
    }

    this.intervalMs = options.intervalMs;
    this.runCycle = options.runCycle;
    this.onCycle = options.onCycle;
    this.setTimeoutFn = options.setTimeoutFn ?? ((cb, delay) => setTimeout(cb, delay));
    this.clearTimeoutFn = options.clearTimeoutFn ?? ((handle) => clearTimeout(handle));
  }

  /**
   * Starts the loop. The returned promise settles once the loop has stopped:
   * it resolves after stop() and rejects when a cycle fails.
   */
  start(): Promise<void> {
    if (this.completion) {
      return this.completion;
    }

    this.running = true;
    this.completion = this.loop().finally(() => {
      this.running = false;
      this.completion = null;
    });

    return this.completion;
  }

  /** Requests a stop. A cycle in flight finishes; a pending pause ends at once. */
  stop(): void {
    this.running = false;

    if (this.timer !== null) {
      this.clearTimeoutFn(this.timer);
      this.timer = null;
    }

    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  isRunning(): boolean {
    return this.running;
  }

  private async loop(): Promise<void> {
    let cycle = 0;

    while (this.running) {
      cycle += 1;
      const result = await this.runCycle(cycle);
      this.onCycle?.(result, cycle);

      if (!this.running) {
        break;
      }

      await this.pause();
    }
  }

  private pause(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
      this.timer = this.setTimeoutFn(() => {
        this.timer = null;
        this.wake = null;
        resolve();
      }, this.intervalMs);
    });
  }
}
