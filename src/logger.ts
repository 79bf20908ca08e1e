export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogLevelSetting = LogLevel | "silent";

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
  time: string;
  level: LogLevel;
  msg: string;
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface CreateLoggerOptions {
  /** Minimum level that is written. Defaults to "info". */
  level?: LogLevelSetting;
  /** Sink for serialized entries. Defaults to JSON lines on stderr. */
  write?: (entry: LogEntry) => void;
  /** Clock used for the `time` field. */
  now?: () => Date;
  /** Fields merged into every entry. */
  bindings?: LogFields;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

const LEVEL_WEIGHTS: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const DEFAULT_WRITE = (entry: LogEntry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export function isLogLevelSetting(value: string): value is LogLevelSetting {
  return LOG_LEVELS.some((candidate) => candidate === value);
}

function serializeField(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  return value;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LEVEL_WEIGHTS[options.level ?? "info"];
  const write = options.write ?? DEFAULT_WRITE;
  const now = options.now ?? (() => new Date());
  const bindings = options.bindings ?? {};

  const log = (level: LogLevel, msg: string, fields?: LogFields) => {
    if (LEVEL_WEIGHTS[level] < threshold) {
      return;
    }

    const entry: LogEntry = {
      time: now().toISOString(),
      level,
      msg,
    };

    for (const [key, value] of Object.entries({ ...bindings, ...fields })) {
      if (value !== undefined) {
        entry[key] = serializeField(value);
      }
    }

    write(entry);
  };

  return {
    debug: (msg, fields) => log("debug", msg, fields),
    info: (msg, fields) => log("info", msg, fields),
    warn: (msg, fields) => log("warn", msg, fields),
    error: (msg, fields) => log("error", msg, fields),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
