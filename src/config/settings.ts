import path from "node:path";

import type { CheckOutputFormat, CliParameters, HeaderRule, RunConfig } from "../domain";
import { parseDurationToMilliseconds } from "../duration";
import type { LogLevelSetting } from "../logger";
import { createRunConfig } from "../run-config";
import { DEFAULT_TIME_API_URL } from "../time-source";
import type { RawSitecheckFile, TimeSourceKind } from "./types";

export const DEFAULT_TARGETS_FILE = "website_list.txt";
export const DEFAULT_INTERVAL_MS = 30_000;

export type TargetSource =
  | { kind: "inline"; targets: readonly string[] }
  | { kind: "file"; path: string };

export interface SitecheckSettings {
  runConfig: RunConfig;
  targetSource: TargetSource;
  intervalMs: number;
  timeSource: TimeSourceKind;
  timeApiUrl: string;
  proxy?: string;
  insecure: boolean;
  requestHeaders: Record<string, string>;
  outputFormat: CheckOutputFormat;
  logLevel: LogLevelSetting;
}

export interface ResolveSettingsOptions {
  /** Directory relative paths in the configuration file are resolved against. */
  configDir?: string;
  /** Working directory for CLI-supplied paths. */
  cwd?: string;
}

function toHeaderRules(record: Record<string, string> | undefined): HeaderRule[] | undefined {
  if (!record) {
    return undefined;
  }

  return Object.entries(record).map(([name, value]) => ({ name, value }));
}

function optionalDuration(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseDurationToMilliseconds(value);
}

function resolveTargetSource(
  file: RawSitecheckFile,
  cli: CliParameters,
  options: ResolveSettingsOptions,
): TargetSource {
  const cwd = options.cwd ?? process.cwd();

  if (cli.targetsPath) {
    return { kind: "file", path: path.resolve(cwd, cli.targetsPath) };
  }

  if (file.targets) {
    return { kind: "inline", targets: Object.freeze([...file.targets]) };
  }

  const baseDir = options.configDir ?? cwd;
  return { kind: "file", path: path.resolve(baseDir, file.targets_file ?? DEFAULT_TARGETS_FILE) };
}

/**
 * Merges defaults, the configuration file and CLI flags (in increasing
 * precedence) into the settings of one sitecheck process.
 */
export function resolveSettings(
  file: RawSitecheckFile | undefined,
  cli: CliParameters,
  options: ResolveSettingsOptions = {},
): SitecheckSettings {
  const raw = file ?? {};
  const validation = raw.validation ?? {};

  const runConfig = createRunConfig({
    httpsRequired: cli.allowHttp ? false : validation.https_required,
    requiredHeaders: validation.required_headers,
    contentTypeAllowlist: validation.content_type_allow,
    headerEquals: toHeaderRules(validation.header_equals),
    headerContains: toHeaderRules(validation.header_contains),
    maxBodyBytes: cli.maxBodyBytes ?? validation.max_body_bytes,
    bodyContainsAll: validation.body_contains_all,
    bodyContainsAny: validation.body_contains_any,
    workerCount: cli.workers ?? raw.workers,
    maxRetries: cli.retries ?? raw.retries,
    requestTimeoutMs: cli.timeoutMs ?? optionalDuration(raw.timeout),
  });

  const settings: SitecheckSettings = {
    runConfig,
    targetSource: resolveTargetSource(raw, cli, options),
    intervalMs: cli.intervalMs ?? optionalDuration(raw.interval) ?? DEFAULT_INTERVAL_MS,
    timeSource: raw.time_source ?? "network",
    timeApiUrl: raw.time_api_url ?? DEFAULT_TIME_API_URL,
    insecure: cli.insecure ?? raw.insecure ?? false,
    requestHeaders: { ...raw.request_headers },
    outputFormat: cli.outputFormat ?? "text",
    logLevel: cli.logLevel ?? "warn",
  };

  const proxy = cli.proxy ?? raw.proxy;
  if (proxy !== undefined) {
    settings.proxy = proxy;
  }

  return settings;
}
