import { loadSitecheckConfig, resolveSettings, type SitecheckSettings } from "../config";
import type { BatchReport, CliParameters, Target } from "../domain";
import { runBatch } from "../dispatcher";
import { formatMillisecondsToDuration } from "../duration";
import { SitecheckError } from "../errors";
import { EXIT_CODE_INTERNAL_ERROR, EXIT_CODE_OK, exitCodeFromBatchStatus } from "../exit-codes";
import { createUndiciHttpClient, type HttpClient } from "../http";
import { createLogger, type Logger } from "../logger";
import { MonitorLoop } from "../monitor-loop";
import { redactRecordValues } from "../redaction";
import { loadTargetList } from "../targets";
import {
  createFixedTimeSource,
  createNetworkTimeSource,
  createSystemTimeSource,
  FAKE_TIME_ENV_VARIABLE,
  type TimeSource,
} from "../time-source";
import { parseCliCommand } from "./commands";
import { parseCliFlags } from "./flags";
import { renderCliHelp } from "./help";
import { renderBatchReport } from "./output";
import { redactCliParameters } from "./redaction";
import { readPackageVersion } from "./version";

const VERSION_FLAGS = new Set(["--version", "-v"]);
const HELP_FLAGS = new Set(["--help", "-h"]);

export const RUN_BANNER = "=== Running website checks ===";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}

/**
 * Seams replaced by tests: the HTTP client and time source factories, and the
 * hook that connects the run loop to process signals.
 */
export interface CliRuntime {
  createClient?: (settings: SitecheckSettings, logger: Logger) => HttpClient;
  createTimeSource?: (settings: SitecheckSettings, logger: Logger) => TimeSource;
  /** Registers `stop` for termination signals; returns the unregister function. */
  onStopSignal?: (stop: () => void) => () => void;
}

interface LoadedTargets {
  targets: Target[];
  origin: string;
}

function defaultOnStopSignal(stop: () => void): () => void {
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  return () => {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  };
}

async function loadSettings(parameters: CliParameters, io: CliIo): Promise<SitecheckSettings> {
  if (!parameters.configPath) {
    return resolveSettings(undefined, parameters, { cwd: io.cwd });
  }

  const loaded = await loadSitecheckConfig(parameters.configPath, { env: io.env, cwd: io.cwd });

  return resolveSettings(loaded.file, parameters, { cwd: io.cwd, configDir: loaded.directory });
}

async function loadTargets(settings: SitecheckSettings): Promise<LoadedTargets> {
  const source = settings.targetSource;

  switch (source.kind) {
    case "inline":
      return { targets: [...source.targets], origin: "configuration" };
    case "file":
      return { targets: await loadTargetList(source.path), origin: source.path };
    default: {
      const exhaustiveCheck: never = source;
      return exhaustiveCheck;
    }
  }
}

function createTimeSourceFor(
  settings: SitecheckSettings,
  env: NodeJS.ProcessEnv,
  logger: Logger,
): TimeSource {
  const fakeTime = env[FAKE_TIME_ENV_VARIABLE]?.trim();
  if (fakeTime) {
    return createFixedTimeSource(fakeTime);
  }

  switch (settings.timeSource) {
    case "network":
      return createNetworkTimeSource({
        url: settings.timeApiUrl,
        timeoutMs: settings.runConfig.requestTimeoutMs,
        proxy: settings.proxy,
        insecure: settings.insecure,
        env,
        logger,
      });
    case "system":
      return createSystemTimeSource();
    default: {
      const exhaustiveCheck: never = settings.timeSource;
      return exhaustiveCheck;
    }
  }
}

async function runMonitor(
  settings: SitecheckSettings,
  batch: () => Promise<BatchReport>,
  io: CliIo,
  runtime: CliRuntime,
): Promise<number> {
  const textOutput = settings.outputFormat === "text";
  const pause = formatMillisecondsToDuration(settings.intervalMs);

  const loop = new MonitorLoop<BatchReport>({
    intervalMs: settings.intervalMs,
    runCycle: async () => {
      if (textOutput) {
        io.stdout(`${RUN_BANNER}\n`);
      }

      return batch();
    },
    onCycle: (report) => {
      io.stdout(renderBatchReport(report, settings.outputFormat));

      if (textOutput) {
        io.stdout(`Sleeping ${pause} before next run...\n\n`);
      }
    },
  });

  const unregister = (runtime.onStopSignal ?? defaultOnStopSignal)(() => loop.stop());

  try {
    await loop.start();
  } finally {
    unregister();
  }

  return EXIT_CODE_OK;
}

async function executeCommand(
  command: "check" | "run",
  argv: readonly string[],
  io: CliIo,
  runtime: CliRuntime,
): Promise<number> {
  const parameters = parseCliFlags(argv, { warn: (message) => io.stderr(`${message}\n`) });
  const settings = await loadSettings(parameters, io);
  const logger = createLogger({
    level: settings.logLevel,
    write: (entry) => io.stderr(`${JSON.stringify(entry)}\n`),
  });

  logger.debug("settings resolved", {
    command,
    parameters: redactCliParameters(parameters),
    requestHeaders: redactRecordValues(settings.requestHeaders),
    workers: settings.runConfig.workerCount,
    retries: settings.runConfig.maxRetries,
    timeoutMs: settings.runConfig.requestTimeoutMs,
  });

  const { targets, origin } = await loadTargets(settings);
  if (targets.length === 0) {
    io.stderr(`No URLs found in ${origin}\n`);
    return EXIT_CODE_OK;
  }

  const client =
    runtime.createClient?.(settings, logger) ??
    createUndiciHttpClient({
      proxy: settings.proxy,
      insecure: settings.insecure,
      headers: settings.requestHeaders,
      env: io.env,
      logger,
    });
  const timeSource =
    runtime.createTimeSource?.(settings, logger) ?? createTimeSourceFor(settings, io.env, logger);

  const batch = () => runBatch(targets, settings.runConfig, { client, timeSource, logger });

  try {
    if (command === "run") {
      return await runMonitor(settings, batch, io, runtime);
    }

    const report = await batch();
    io.stdout(renderBatchReport(report, settings.outputFormat));
    return exitCodeFromBatchStatus(report.status);
  } finally {
    await client.close();
  }
}

/**
 * Runs the command line and resolves with the process exit code. Errors never
 * escape: they are printed to stderr and mapped to their exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo,
  runtime: CliRuntime = {},
): Promise<number> {
  if (argv.some((token) => VERSION_FLAGS.has(token))) {
    io.stdout(`sitecheck ${readPackageVersion()}\n`);
    return EXIT_CODE_OK;
  }

  if (argv.length === 0 || argv.some((token) => HELP_FLAGS.has(token))) {
    io.stdout(renderCliHelp());
    return EXIT_CODE_OK;
  }

  try {
    const { command, argv: rest } = parseCliCommand(argv);

    if (command === "help") {
      io.stdout(renderCliHelp());
      return EXIT_CODE_OK;
    }

    return await executeCommand(command, rest, io, runtime);
  } catch (error) {
    if (error instanceof SitecheckError) {
      io.stderr(`${error.message}\n`);
      return error.exitCode;
    }

    const message = error instanceof Error ? error.message : String(error);
    io.stderr(`Unexpected error: ${message}\n`);
    return EXIT_CODE_INTERNAL_ERROR;
  }
}
