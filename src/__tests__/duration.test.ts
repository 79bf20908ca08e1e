import { describe, expect, it } from "vitest";

import {
  DurationParseError,
  formatMillisecondsToDuration,
  parseDurationToMilliseconds,
} from "../duration";

describe("parseDurationToMilliseconds", () => {
  it("parses milliseconds", () => {
    expect(parseDurationToMilliseconds("500ms")).toBe(500);
  });

  it("parses seconds", () => {
    expect(parseDurationToMilliseconds("3s")).toBe(3_000);
  });

  it("parses minutes", () => {
    expect(parseDurationToMilliseconds("2m")).toBe(120_000);
  });

  it("parses hours", () => {
    expect(parseDurationToMilliseconds("1h")).toBe(3_600_000);
  });

  it("ignores surrounding whitespace", () => {
    expect(parseDurationToMilliseconds(" 30s ")).toBe(30_000);
  });

  it("throws for invalid input", () => {
    expect(() => parseDurationToMilliseconds("10seconds")).toThrow(DurationParseError);
    expect(() => parseDurationToMilliseconds("-5s")).toThrow(
      'Invalid duration string: "-5s" (expected e.g. 500ms, 5s, 1m or 1h)',
    );
  });

  it("reports duration errors as usage errors", () => {
    expect(() => parseDurationToMilliseconds("")).toThrow(
      expect.objectContaining({ exitCode: 3 }),
    );
  });
});

describe("formatMillisecondsToDuration", () => {
  it("formats hours when divisible", () => {
    expect(formatMillisecondsToDuration(7_200_000)).toBe("2h");
  });

  it("formats minutes when divisible", () => {
    expect(formatMillisecondsToDuration(120_000)).toBe("2m");
  });

  it("formats seconds when divisible", () => {
    expect(formatMillisecondsToDuration(9_000)).toBe("9s");
  });

  it("falls back to milliseconds", () => {
    expect(formatMillisecondsToDuration(750)).toBe("750ms");
  });

  it("formats zero as milliseconds", () => {
    expect(formatMillisecondsToDuration(0)).toBe("0ms");
  });

  it("throws on invalid milliseconds", () => {
    expect(() => formatMillisecondsToDuration(-1)).toThrow(TypeError);
    expect(() => formatMillisecondsToDuration(Number.NaN)).toThrow(TypeError);
  });
});
