import { overallOk, type BatchReport, type ProbeResult } from "./domain";
import { redactUrlCredentials } from "./redaction";

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatTargetLabel(result: ProbeResult): string {
  return `{target="${escapeLabelValue(redactUrlCredentials(result.target))}"}`;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(3);
}

export function serializeBatchReportToPrometheusTextfile(report: BatchReport): string {
  const lines: string[] = [];

  lines.push("# HELP sitecheck_up 1 when the target answered with a 2xx status");
  lines.push("# TYPE sitecheck_up gauge");
  for (const result of report.results) {
    const up = result.outcome.kind === "success" ? 1 : 0;
    lines.push(`sitecheck_up${formatTargetLabel(result)} ${up}`);
  }

  lines.push("", "# HELP sitecheck_response_ms duration of the final attempt");
  lines.push("# TYPE sitecheck_response_ms gauge");
  for (const result of report.results) {
    lines.push(`sitecheck_response_ms${formatTargetLabel(result)} ${formatNumber(result.elapsedMs)}`);
  }

  lines.push("", "# HELP sitecheck_validation_ok 1 when header, body and HTTPS rules passed");
  lines.push("# TYPE sitecheck_validation_ok gauge");
  for (const result of report.results) {
    const ok = overallOk(result.validation) ? 1 : 0;
    lines.push(`sitecheck_validation_ok${formatTargetLabel(result)} ${ok}`);
  }

  lines.push(
    "",
    "# HELP sitecheck_uptime_pct share of targets with a 2xx status",
    "# TYPE sitecheck_uptime_pct gauge",
    `sitecheck_uptime_pct ${formatNumber(report.summary.uptimePct)}`,
  );

  return `${lines.join("\n")}\n`;
}
