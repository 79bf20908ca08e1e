import { overallOk, type BatchReport, type BatchSummary, type ProbeResult } from "./domain";
import { redactUrlCredentials } from "./redaction";

export const RESULT_SEPARATOR = "----------------------------------------";

function describeOutcome(result: ProbeResult): string {
  const { outcome } = result;

  switch (outcome.kind) {
    case "success":
      return `Status: ${outcome.statusCode} (success)`;
    case "http-error":
      return `Status: ${outcome.statusCode} (http error)`;
    case "transport":
      return `Transport error: ${outcome.message}`;
    default: {
      const exhaustiveCheck: never = outcome;
      return exhaustiveCheck;
    }
  }
}

export function renderProbeResult(result: ProbeResult): string {
  const { validation } = result;
  const lines = [
    `URL: ${redactUrlCredentials(result.target)}`,
    describeOutcome(result),
    `Response time (ms): ${Math.floor(result.elapsedMs)}`,
    `Timestamp (UTC): ${result.timestampUtc}`,
    `Validation overall ok? ${overallOk(validation)}`,
    ` - Header ok: ${validation.headerOk}`,
    ` - Body ok: ${validation.bodyOk}`,
    ` - HTTPS policy ok: ${validation.httpsPolicyOk}`,
  ];

  if (result.attempts > 1) {
    lines.push(`Attempts: ${result.attempts}`);
  }

  if (validation.issues.length > 0) {
    lines.push("Issues:", ...validation.issues.map((issue) => ` * ${issue}`));
  }

  return lines.join("\n");
}

export function renderSummary(summary: BatchSummary): string {
  return [
    "=== Summary ===",
    `Total: ${summary.total}`,
    `Successes: ${summary.successes}`,
    `HTTP errors: ${summary.httpErrors}`,
    `Transport errors: ${summary.transportErrors}`,
    `Avg response time (ms): ${summary.avgResponseMillis.toFixed(2)}`,
    `Uptime: ${summary.uptimePct.toFixed(2)}%`,
  ].join("\n");
}

export function renderTextReport(report: BatchReport): string {
  const blocks = report.results.map((result) => `${renderProbeResult(result)}\n${RESULT_SEPARATOR}`);
  return `${[...blocks, renderSummary(report.summary)].join("\n")}\n`;
}
