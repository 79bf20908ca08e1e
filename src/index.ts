export type {
  BatchReport,
  BatchStatus,
  BatchSummary,
  CheckOutcome,
  CheckOutcomeKind,
  CheckOutputFormat,
  CliParameters,
  HeaderRule,
  ProbeResult,
  RunConfig,
  Target,
  ValidationPolicy,
  ValidationReport,
} from "./domain";
export { createValidationReport, overallOk, UNKNOWN_TIMESTAMP } from "./domain";

export { classifyBatch, summarize } from "./aggregator";
export { createWorkerPool, effectiveWorkerCount } from "./concurrency";
export type { WorkerPool } from "./concurrency";
export { checkAll, fetchBatchTimestamp, probeWithRetry, runBatch } from "./dispatcher";
export type { DispatcherDependencies } from "./dispatcher";
export { classifyStatus, isHttpSuccess, runProbe } from "./probe";
export type { ProbeDependencies } from "./probe";
export { retryWhile } from "./retry";
export type { RetryOptions, RetryOutcome } from "./retry";
export { createRunConfig, DEFAULT_RUN_CONFIG } from "./run-config";
export type { RunConfigInput } from "./run-config";
export { loadTargetList, parseTargetList } from "./targets";

export * from "./validation";
export * from "./http";
export {
  createFixedTimeSource,
  createNetworkTimeSource,
  createSystemTimeSource,
  DEFAULT_TIME_API_URL,
  FAKE_TIME_ENV_VARIABLE,
  TimeSourceError,
} from "./time-source";
export type { NetworkTimeSourceOptions, TimeSource } from "./time-source";

export * from "./config";
export { DurationParseError, formatMillisecondsToDuration, parseDurationToMilliseconds } from "./duration";
export * from "./errors";
export * from "./exit-codes";
export { createLogger, isLogLevelSetting, LOG_LEVELS, silentLogger } from "./logger";
export type { CreateLoggerOptions, LogEntry, LogFields, Logger, LogLevel, LogLevelSetting } from "./logger";
export { MonitorLoop } from "./monitor-loop";
export type { MonitorLoopOptions } from "./monitor-loop";

export {
  buildCheckJsonSnapshot,
  buildResultPayload,
  buildSummaryPayload,
  serializeBatchReportToJson,
  serializeBatchReportToNdjson,
} from "./check-output";
export type { CheckJsonOutcome, CheckJsonResult, CheckJsonSnapshot, CheckJsonSummary } from "./check-output";
export { serializeBatchReportToPrometheusTextfile } from "./prometheus-textfile";
export { renderProbeResult, renderSummary, renderTextReport, RESULT_SEPARATOR } from "./text-report";
export { REDACTED_PLACEHOLDER, redactUrlCredentials } from "./redaction";
