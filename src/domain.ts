import type { LogLevelSetting } from "./logger";

export type Target = string;

export type BatchStatus = "ok" | "degraded" | "down";

export type CheckOutputFormat = "text" | "json" | "ndjson" | "prometheus";

export interface HeaderRule {
  /** Header name, matched case-insensitively. */
  readonly name: string;
  /** Expected value (exact match) or substring, depending on the rule list. */
  readonly value: string;
}

export interface ValidationPolicy {
  /** Record a policy issue for every target that is not served over https://. */
  readonly httpsRequired: boolean;
  /** Headers that must be present on every response. */
  readonly requiredHeaders: readonly string[];
  /**
   * Allowed Content-Type prefixes, compared case-insensitively. An empty list
   * disables the check.
   */
  readonly contentTypeAllowlist: readonly string[];
  readonly headerEquals: readonly HeaderRule[];
  readonly headerContains: readonly HeaderRule[];
  /** Upper bound for the number of body bytes inspected by body rules. */
  readonly maxBodyBytes: number;
  readonly bodyContainsAll: readonly string[];
  readonly bodyContainsAny: readonly string[];
}

export interface RunConfig extends ValidationPolicy {
  /** Requested number of concurrent workers; clamped to [1, targets] at dispatch. */
  readonly workerCount: number;
  /** Extra attempts granted to a target whose request fails at the transport level. */
  readonly maxRetries: number;
  /** Timeout for a single HTTP attempt in milliseconds. */
  readonly requestTimeoutMs: number;
}

export interface ValidationReport {
  headerOk: boolean;
  bodyOk: boolean;
  httpsPolicyOk: boolean;
  /** Human readable findings in the order they were detected. */
  issues: string[];
}

export type CheckOutcome =
  | { readonly kind: "success"; readonly statusCode: number }
  | { readonly kind: "http-error"; readonly statusCode: number }
  | { readonly kind: "transport"; readonly message: string };

export type CheckOutcomeKind = CheckOutcome["kind"];

export interface ProbeResult {
  readonly target: Target;
  readonly outcome: CheckOutcome;
  /** Wall-clock duration of the final attempt in milliseconds. */
  readonly elapsedMs: number;
  /** Batch timestamp shared by every result of the batch, or "unknown". */
  readonly timestampUtc: string;
  readonly validation: Readonly<ValidationReport>;
  /** Number of HTTP attempts spent on the target, including retries. */
  readonly attempts: number;
}

export interface BatchSummary {
  total: number;
  successes: number;
  httpErrors: number;
  transportErrors: number;
  avgResponseMillis: number;
  uptimePct: number;
}

export interface BatchReport {
  /** Timestamp fetched once for the whole batch. */
  timestampUtc: string;
  startedAt: Date;
  completedAt: Date;
  results: ProbeResult[];
  summary: BatchSummary;
  status: BatchStatus;
}

export const UNKNOWN_TIMESTAMP = "unknown" as const;

export function overallOk(report: Readonly<ValidationReport>): boolean {
  return report.headerOk && report.bodyOk && report.httpsPolicyOk;
}

export function createValidationReport(): ValidationReport {
  return {
    headerOk: false,
    bodyOk: false,
    httpsPolicyOk: false,
    issues: [],
  };
}

export interface CliParameters {
  /** Path to the YAML/JSON configuration file. */
  configPath?: string;
  /** Path to the line-oriented target list. */
  targetsPath?: string;
  /** Delay between batches in the run command, in milliseconds. */
  intervalMs?: number;
  /** Timeout for a single HTTP request in milliseconds. */
  timeoutMs?: number;
  /** Retry budget for transport failures. */
  retries?: number;
  /** Number of concurrent workers. */
  workers?: number;
  /** Maximum number of body bytes inspected by body rules. */
  maxBodyBytes?: number;
  /** Disables the HTTPS policy when set. */
  allowHttp?: boolean;
  /** HTTP proxy URL used for outbound requests. */
  proxy?: string;
  /** Disable TLS verification (should only be used for tests). */
  insecure?: boolean;
  /** Output format for batch reports. */
  outputFormat?: CheckOutputFormat;
  /** Minimum level written to the stderr log. */
  logLevel?: LogLevelSetting;
}
