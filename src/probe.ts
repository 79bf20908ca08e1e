import {
  createValidationReport,
  type CheckOutcome,
  type ProbeResult,
  type RunConfig,
  type Target,
} from "./domain";
import { toTransportError, type HttpClient, type ProbeResponse } from "./http";
import { enforceHttpsPolicy, recordTransportFailure, validateResponse } from "./validation";

const HTTP_SUCCESS_MIN = 200;
const HTTP_SUCCESS_MAX = 299;

export interface ProbeDependencies {
  client: HttpClient;
  /** Monotonic clock in milliseconds. Defaults to performance.now(). */
  now?: () => number;
}

export function isHttpSuccess(statusCode: number): boolean {
  return statusCode >= HTTP_SUCCESS_MIN && statusCode <= HTTP_SUCCESS_MAX;
}

export function classifyStatus(statusCode: number): CheckOutcome {
  return isHttpSuccess(statusCode)
    ? { kind: "success", statusCode }
    : { kind: "http-error", statusCode };
}

/**
 * Performs one attempt against a target: HTTPS policy, GET, validation. The
 * batch timestamp is attached as given; the probe never asks a time source.
 */
export async function runProbe(
  target: Target,
  config: RunConfig,
  batchTimestamp: string,
  deps: ProbeDependencies,
): Promise<ProbeResult> {
  const now = deps.now ?? (() => performance.now());
  const report = createValidationReport();

  enforceHttpsPolicy(target, report, config);

  const startedAt = now();
  let response: ProbeResponse;

  try {
    response = await deps.client.get(target, { timeoutMs: config.requestTimeoutMs });
  } catch (error) {
    const failure = toTransportError(error);
    recordTransportFailure({ transportError: failure.message }, report);

    return {
      target,
      outcome: { kind: "transport", message: failure.message },
      elapsedMs: Math.max(0, now() - startedAt),
      timestampUtc: batchTimestamp,
      validation: report,
      attempts: 1,
    };
  }

  await validateResponse(response, config, report);

  return {
    target,
    outcome: classifyStatus(response.statusCode),
    elapsedMs: Math.max(0, now() - startedAt),
    timestampUtc: batchTimestamp,
    validation: report,
    attempts: 1,
  };
}
