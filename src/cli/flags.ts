import type { CheckOutputFormat, CliParameters } from "../domain";
import { parseDurationToMilliseconds } from "../duration";
import { isLogLevelSetting, LOG_LEVELS, type LogLevelSetting } from "../logger";
import { CliFlagError } from "./errors";

export const OUTPUT_FORMATS = ["text", "json", "ndjson", "prometheus"] as const;

export const INSECURE_WARNING =
  "Warning: TLS certificate verification is disabled (--insecure). Do not use this option in production.";

function expectValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];

  if (value === undefined || value.startsWith("--")) {
    throw new CliFlagError(flag, { kind: "missing-value" });
  }

  return value;
}

function parseNonNegativeInteger(value: string, flag: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new CliFlagError(flag, { kind: "not-an-integer" });
  }

  return Number.parseInt(value, 10);
}

function parsePositiveInteger(value: string, flag: string): number {
  const numeric = parseNonNegativeInteger(value, flag);

  if (numeric === 0) {
    throw new CliFlagError(flag, { kind: "not-positive" });
  }

  return numeric;
}

function isOutputFormat(value: string): value is CheckOutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === value);
}

function parseOutputFormat(value: string): CheckOutputFormat {
  if (isOutputFormat(value)) {
    return value;
  }

  throw new CliFlagError("--out", { kind: "not-one-of", choices: OUTPUT_FORMATS });
}

function parseLogLevel(value: string): LogLevelSetting {
  if (isLogLevelSetting(value)) {
    return value;
  }

  throw new CliFlagError("--log-level", { kind: "not-one-of", choices: LOG_LEVELS });
}

function parseDurationFlag(value: string, flag: string): number {
  const milliseconds = parseDurationToMilliseconds(value);

  if (flag === "--timeout" && milliseconds === 0) {
    throw new CliFlagError(flag, { kind: "not-positive" });
  }

  return milliseconds;
}

export interface ParseCliFlagsOptions {
  warn?: (message: string) => void;
}

/**
 * Parses command flags. Only values given on the command line are set; the
 * configuration layer supplies defaults for everything else.
 */
export function parseCliFlags(
  argv: readonly string[],
  options: ParseCliFlagsOptions = {},
): CliParameters {
  const warn = options.warn ?? console.warn;
  const result: CliParameters = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    switch (token) {
      case "--config": {
        result.configPath = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "--targets": {
        result.targetsPath = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "--interval": {
        result.intervalMs = parseDurationFlag(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--timeout": {
        result.timeoutMs = parseDurationFlag(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--retries": {
        result.retries = parseNonNegativeInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--workers": {
        result.workers = parseNonNegativeInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--max-body-bytes": {
        result.maxBodyBytes = parsePositiveInteger(expectValue(argv, index, token), token);
        index += 1;
        break;
      }

      case "--allow-http": {
        result.allowHttp = true;
        break;
      }

      case "--proxy": {
        result.proxy = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "--insecure": {
        result.insecure = true;
        break;
      }

      case "--out": {
        result.outputFormat = parseOutputFormat(expectValue(argv, index, token));
        index += 1;
        break;
      }

      case "--log-level": {
        result.logLevel = parseLogLevel(expectValue(argv, index, token));
        index += 1;
        break;
      }

      default: {
        if (token.startsWith("-")) {
          throw new CliFlagError(token, { kind: "unknown-flag" });
        }

        throw new CliFlagError(token, { kind: "unexpected-argument" });
      }
    }
  }

  if (result.insecure) {
    warn(INSECURE_WARNING);
  }

  return result;
}
