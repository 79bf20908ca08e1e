import { overallOk, type BatchStatus, type BatchSummary, type ProbeResult } from "./domain";

export function summarize(results: readonly ProbeResult[]): BatchSummary {
  const total = results.length;
  let successes = 0;
  let httpErrors = 0;
  let transportErrors = 0;
  let totalMs = 0;

  for (const result of results) {
    totalMs += result.elapsedMs;

    switch (result.outcome.kind) {
      case "success":
        successes += 1;
        break;
      case "http-error":
        httpErrors += 1;
        break;
      case "transport":
        transportErrors += 1;
        break;
      default: {
        const exhaustiveCheck: never = result.outcome;
        return exhaustiveCheck;
      }
    }
  }

  if (total === 0) {
    return {
      total: 0,
      successes: 0,
      httpErrors: 0,
      transportErrors: 0,
      avgResponseMillis: 0,
      uptimePct: 0,
    };
  }

  return {
    total,
    successes,
    httpErrors,
    transportErrors,
    avgResponseMillis: totalMs / total,
    uptimePct: (successes * 100) / total,
  };
}

/**
 * Collapses a batch into one status: ok when every target succeeded and passed
 * validation, down when none succeeded, degraded otherwise.
 */
export function classifyBatch(results: readonly ProbeResult[]): BatchStatus {
  if (results.length === 0) {
    return "ok";
  }

  const successes = results.filter((result) => result.outcome.kind === "success");

  if (successes.length === 0) {
    return "down";
  }

  const healthy =
    successes.length === results.length &&
    successes.every((result) => overallOk(result.validation));

  return healthy ? "ok" : "degraded";
}
