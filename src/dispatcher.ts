import { classifyBatch, summarize } from "./aggregator";
import { createWorkerPool, effectiveWorkerCount } from "./concurrency";
import {
  UNKNOWN_TIMESTAMP,
  type BatchReport,
  type ProbeResult,
  type RunConfig,
  type Target,
} from "./domain";
import { InternalError } from "./errors";
import type { HttpClient } from "./http";
import { silentLogger, type Logger } from "./logger";
import { runProbe } from "./probe";
import { redactUrlCredentials } from "./redaction";
import { retryWhile } from "./retry";
import type { TimeSource } from "./time-source";

export interface DispatcherDependencies {
  client: HttpClient;
  timeSource: TimeSource;
  logger?: Logger;
  /** Monotonic clock in milliseconds used for per-attempt latency. */
  now?: () => number;
  /** Wall clock used for batch start/completion stamps. */
  clock?: () => Date;
}

interface WorkItem {
  index: number;
  target: Target;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetches the batch timestamp once. A failing time source never fails the
 * batch; the sentinel "unknown" is used instead.
 */
export async function fetchBatchTimestamp(
  timeSource: TimeSource,
  logger: Logger = silentLogger,
): Promise<string> {
  try {
    return await timeSource.fetchUtcTimestamp();
  } catch (error) {
    logger.warn("time source unavailable, using sentinel timestamp", {
      error: describeError(error),
      timestamp: UNKNOWN_TIMESTAMP,
    });
    return UNKNOWN_TIMESTAMP;
  }
}

/**
 * Probes one target, repeating the attempt in place while it ends in a
 * transport failure and the retry budget lasts. HTTP responses of any status
 * are final.
 */
export async function probeWithRetry(
  target: Target,
  config: RunConfig,
  batchTimestamp: string,
  deps: Pick<DispatcherDependencies, "client" | "logger" | "now">,
): Promise<ProbeResult> {
  const logger = deps.logger ?? silentLogger;

  const { result, attempts } = await retryWhile(
    () => runProbe(target, config, batchTimestamp, deps),
    {
      retries: config.maxRetries,
      shouldRetry: (probe) => probe.outcome.kind === "transport",
      onRetry: (probe, nextAttempt) => {
        logger.debug("retrying target after transport error", {
          target: redactUrlCredentials(target),
          attempt: nextAttempt,
          error: probe.outcome.kind === "transport" ? probe.outcome.message : undefined,
        });
      },
    },
  );

  return { ...result, attempts };
}

/**
 * Checks every target on a fixed pool of workers and returns the results in
 * input order, whatever order they complete in.
 */
export async function checkAll(
  targets: readonly Target[],
  config: RunConfig,
  deps: DispatcherDependencies,
): Promise<ProbeResult[]> {
  if (targets.length === 0) {
    return [];
  }

  const logger = deps.logger ?? silentLogger;
  const workers = effectiveWorkerCount(config.workerCount, targets.length);
  const batchTimestamp = await fetchBatchTimestamp(deps.timeSource, logger);

  logger.info("batch started", {
    targets: targets.length,
    workers,
    retries: config.maxRetries,
    timestamp: batchTimestamp,
  });

  const pool = createWorkerPool(workers);
  const slots: Array<ProbeResult | undefined> = new Array<ProbeResult | undefined>(
    targets.length,
  ).fill(undefined);
  const items: WorkItem[] = targets.map((target, index) => ({ index, target }));

  await Promise.all(
    items.map((item) =>
      pool(async () => {
        slots[item.index] = await probeWithRetry(item.target, config, batchTimestamp, deps);
      }),
    ),
  );

  return collectResults(slots, targets);
}

/**
 * Unwraps the per-target slots filled by the workers. An empty slot means a
 * scheduled target produced no result.
 */
export function collectResults(
  slots: ReadonlyArray<ProbeResult | undefined>,
  targets: readonly Target[],
): ProbeResult[] {
  return slots.map((slot, index) => {
    if (!slot) {
      throw new InternalError(`Dispatcher finished without a result for target #${index}`, {
        context: { target: redactUrlCredentials(targets[index]) },
      });
    }

    return slot;
  });
}

/**
 * Runs one batch end to end: dispatch, then summary and batch status.
 */
export async function runBatch(
  targets: readonly Target[],
  config: RunConfig,
  deps: DispatcherDependencies,
): Promise<BatchReport> {
  const logger = deps.logger ?? silentLogger;
  const clock = deps.clock ?? (() => new Date());

  const startedAt = clock();
  const results = await checkAll(targets, config, deps);
  const completedAt = clock();
  const summary = summarize(results);
  const status = classifyBatch(results);

  if (results.length > 0) {
    logger.info("batch finished", {
      status,
      total: summary.total,
      successes: summary.successes,
      httpErrors: summary.httpErrors,
      transportErrors: summary.transportErrors,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    });
  }

  return {
    timestampUtc: results[0]?.timestampUtc ?? UNKNOWN_TIMESTAMP,
    startedAt,
    completedAt,
    results,
    summary,
    status,
  };
}
