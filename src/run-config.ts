import { ConfigValidationError } from "./config/errors";
import type { HeaderRule, RunConfig } from "./domain";

export const DEFAULT_RUN_CONFIG: RunConfig = Object.freeze({
  httpsRequired: true,
  requiredHeaders: Object.freeze(["Content-Type"]),
  contentTypeAllowlist: Object.freeze(["text/html", "application/json"]),
  headerEquals: Object.freeze([]),
  headerContains: Object.freeze([]),
  maxBodyBytes: 64 * 1024,
  bodyContainsAll: Object.freeze([]),
  bodyContainsAny: Object.freeze([]),
  workerCount: 50,
  maxRetries: 1,
  requestTimeoutMs: 5_000,
});

export type RunConfigInput = Partial<RunConfig>;

function assertInteger(name: string, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new ConfigValidationError(`${name} must be an integer >= ${minimum}, received ${value}`);
  }
}

function uniqueHeaderNames(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const name of names) {
    const key = name.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(name);
    }
  }

  return result;
}

function freezeRules(rules: readonly HeaderRule[]): readonly HeaderRule[] {
  return Object.freeze(rules.map((rule) => Object.freeze({ name: rule.name, value: rule.value })));
}

function freezeList(values: readonly string[]): readonly string[] {
  return Object.freeze([...values]);
}

/**
 * Builds the immutable configuration shared by every worker of a run. Missing
 * fields take the defaults; the returned object and its lists are frozen.
 */
export function createRunConfig(input: RunConfigInput = {}): RunConfig {
  const merged: RunConfig = {
    httpsRequired: input.httpsRequired ?? DEFAULT_RUN_CONFIG.httpsRequired,
    requiredHeaders: input.requiredHeaders ?? DEFAULT_RUN_CONFIG.requiredHeaders,
    contentTypeAllowlist: input.contentTypeAllowlist ?? DEFAULT_RUN_CONFIG.contentTypeAllowlist,
    headerEquals: input.headerEquals ?? DEFAULT_RUN_CONFIG.headerEquals,
    headerContains: input.headerContains ?? DEFAULT_RUN_CONFIG.headerContains,
    maxBodyBytes: input.maxBodyBytes ?? DEFAULT_RUN_CONFIG.maxBodyBytes,
    bodyContainsAll: input.bodyContainsAll ?? DEFAULT_RUN_CONFIG.bodyContainsAll,
    bodyContainsAny: input.bodyContainsAny ?? DEFAULT_RUN_CONFIG.bodyContainsAny,
    workerCount: input.workerCount ?? DEFAULT_RUN_CONFIG.workerCount,
    maxRetries: input.maxRetries ?? DEFAULT_RUN_CONFIG.maxRetries,
    requestTimeoutMs: input.requestTimeoutMs ?? DEFAULT_RUN_CONFIG.requestTimeoutMs,
  };

  assertInteger("workerCount", merged.workerCount, 0);
  assertInteger("maxRetries", merged.maxRetries, 0);
  assertInteger("maxBodyBytes", merged.maxBodyBytes, 1);

  if (!Number.isFinite(merged.requestTimeoutMs) || merged.requestTimeoutMs <= 0) {
    throw new ConfigValidationError(
      `requestTimeoutMs must be greater than 0, received ${merged.requestTimeoutMs}`,
    );
  }

  return Object.freeze({
    httpsRequired: merged.httpsRequired,
    requiredHeaders: freezeList(uniqueHeaderNames(merged.requiredHeaders)),
    contentTypeAllowlist: freezeList(merged.contentTypeAllowlist),
    headerEquals: freezeRules(merged.headerEquals),
    headerContains: freezeRules(merged.headerContains),
    maxBodyBytes: merged.maxBodyBytes,
    bodyContainsAll: freezeList(merged.bodyContainsAll),
    bodyContainsAny: freezeList(merged.bodyContainsAny),
    workerCount: merged.workerCount,
    maxRetries: merged.maxRetries,
    requestTimeoutMs: merged.requestTimeoutMs,
  });
}
