import { describe, expect, it } from "vitest";

import { createLogger, isLogLevelSetting, type CreateLoggerOptions, type LogEntry } from "../logger";

const FIXED_TIME = new Date("2024-05-01T12:00:00.000Z");

function captureLogger(options: CreateLoggerOptions) {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    ...options,
    now: () => FIXED_TIME,
    write: (entry) => {
      entries.push(entry);
    },
  });

  return { entries, logger };
}

describe("createLogger", () => {
  it("writes structured entries with time, level and message", () => {
    const { entries, logger } = captureLogger({ level: "debug" });

    logger.info("batch started", { targets: 3, workers: 2 });

    expect(entries).toEqual([
      {
        time: "2024-05-01T12:00:00.000Z",
        level: "info",
        msg: "batch started",
        targets: 3,
        workers: 2,
      },
    ]);
  });

  it("drops entries below the configured level", () => {
    const { entries, logger } = captureLogger({ level: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown too");

    expect(entries.map((entry) => entry.level)).toEqual(["warn", "error"]);
  });

  it("writes nothing when silent", () => {
    const { entries, logger } = captureLogger({ level: "silent" });

    logger.error("never");

    expect(entries).toEqual([]);
  });

  it("merges bindings, skips undefined fields and serializes errors", () => {
    const { entries, logger } = captureLogger({ level: "info", bindings: { command: "check" } });

    logger.warn("time source unavailable", {
      error: new TypeError("fetch failed"),
      detail: undefined,
    });

    expect(entries).toEqual([
      {
        time: "2024-05-01T12:00:00.000Z",
        level: "warn",
        msg: "time source unavailable",
        command: "check",
        error: { name: "TypeError", message: "fetch failed" },
      },
    ]);
  });
});

describe("isLogLevelSetting", () => {
  it("accepts known levels only", () => {
    expect(isLogLevelSetting("silent")).toBe(true);
    expect(isLogLevelSetting("debug")).toBe(true);
    expect(isLogLevelSetting("trace")).toBe(false);
  });
});
