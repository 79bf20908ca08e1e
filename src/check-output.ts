import type { BatchReport, BatchStatus, BatchSummary, CheckOutcome, ProbeResult } from "./domain";
import { overallOk } from "./domain";
import { redactUrlCredentials } from "./redaction";

export type CheckJsonOutcome =
  | { kind: "success"; status_code: number }
  | { kind: "http-error"; status_code: number }
  | { kind: "transport"; message: string };

export interface CheckJsonResult {
  target: string;
  outcome: CheckJsonOutcome;
  elapsed_ms: number;
  timestamp_utc: string;
  attempts: number;
  validation: {
    overall_ok: boolean;
    header_ok: boolean;
    body_ok: boolean;
    https_policy_ok: boolean;
    issues: string[];
  };
}

export interface CheckJsonSummary {
  total: number;
  successes: number;
  http_errors: number;
  transport_errors: number;
  avg_response_ms: number;
  uptime_pct: number;
}

export interface CheckJsonSnapshot {
  status: BatchStatus;
  timestamp_utc: string;
  started_at: string;
  completed_at: string;
  summary: CheckJsonSummary;
  results: CheckJsonResult[];
}

function toIsoString(date: Date): string {
  if (!Number.isFinite(date.getTime())) {
    throw new TypeError("Invalid Date value provided for serialization");
  }

  return date.toISOString();
}

function roundMillis(value: number): number {
  return Math.round(value * 100) / 100;
}

function buildOutcomePayload(outcome: CheckOutcome): CheckJsonOutcome {
  switch (outcome.kind) {
    case "success":
    case "http-error":
      return { kind: outcome.kind, status_code: outcome.statusCode };
    case "transport":
      return { kind: outcome.kind, message: outcome.message };
    default: {
      const exhaustiveCheck: never = outcome;
      return exhaustiveCheck;
    }
  }
}

export function buildResultPayload(result: ProbeResult): CheckJsonResult {
  return {
    target: redactUrlCredentials(result.target),
    outcome: buildOutcomePayload(result.outcome),
    elapsed_ms: roundMillis(result.elapsedMs),
    timestamp_utc: result.timestampUtc,
    attempts: result.attempts,
    validation: {
      overall_ok: overallOk(result.validation),
      header_ok: result.validation.headerOk,
      body_ok: result.validation.bodyOk,
      https_policy_ok: result.validation.httpsPolicyOk,
      issues: [...result.validation.issues],
    },
  };
}

export function buildSummaryPayload(summary: BatchSummary): CheckJsonSummary {
  return {
    total: summary.total,
    successes: summary.successes,
    http_errors: summary.httpErrors,
    transport_errors: summary.transportErrors,
    avg_response_ms: roundMillis(summary.avgResponseMillis),
    uptime_pct: roundMillis(summary.uptimePct),
  };
}

export function buildCheckJsonSnapshot(report: BatchReport): CheckJsonSnapshot {
  return {
    status: report.status,
    timestamp_utc: report.timestampUtc,
    started_at: toIsoString(report.startedAt),
    completed_at: toIsoString(report.completedAt),
    summary: buildSummaryPayload(report.summary),
    results: report.results.map(buildResultPayload),
  } satisfies CheckJsonSnapshot;
}

export function serializeBatchReportToJson(report: BatchReport): string {
  return `${JSON.stringify(buildCheckJsonSnapshot(report), null, 2)}\n`;
}

export function serializeBatchReportToNdjson(report: BatchReport): string {
  if (report.results.length === 0) {
    return "";
  }

  const lines = report.results.map((result) => JSON.stringify(buildResultPayload(result)));
  return `${lines.join("\n")}\n`;
}
