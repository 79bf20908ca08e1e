import { UsageError } from "./errors";

export const DURATION_PATTERN = "^(?:\\d+)(?:ms|s|m|h)$";

const DURATION_REGEX = /^(\d+)(ms|s|m|h)$/;

type DurationUnit = "ms" | "s" | "m" | "h";

const UNIT_MULTIPLIERS: Record<DurationUnit, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const FORMAT_ORDER: readonly DurationUnit[] = ["h", "m", "s"];

function isDurationUnit(value: string): value is DurationUnit {
  return value in UNIT_MULTIPLIERS;
}

export class DurationParseError extends UsageError {
  constructor(value: string) {
    super(`Invalid duration string: "${value}" (expected e.g. 500ms, 5s, 1m or 1h)`);
    this.name = "DurationParseError";
  }
}

export function parseDurationToMilliseconds(value: string): number {
  const match = DURATION_REGEX.exec(value.trim());

  if (!match) {
    throw new DurationParseError(value);
  }

  const [, numeric, unit] = match;
  const amount = Number.parseInt(numeric, 10);

  if (!Number.isSafeInteger(amount) || !isDurationUnit(unit)) {
    throw new DurationParseError(value);
  }

  return amount * UNIT_MULTIPLIERS[unit];
}

export function formatMillisecondsToDuration(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError("Duration must be a non-negative finite number of milliseconds");
  }

  if (value === 0) {
    return "0ms";
  }

  for (const unit of FORMAT_ORDER) {
    if (value % UNIT_MULTIPLIERS[unit] === 0) {
      return `${value / UNIT_MULTIPLIERS[unit]}${unit}`;
    }
  }

  return `${value}ms`;
}
