import { httpRequest, type KeepAliveAgents } from "./http";
import { silentLogger, type Logger } from "./logger";

export const DEFAULT_TIME_API_URL = "https://timeapi.io/api/Time/current/zone?timeZone=UTC";

export const FAKE_TIME_ENV_VARIABLE = "SITECHECK_FAKE_TIME";

export interface TimeSource {
  /** Resolves with an ISO-8601 UTC timestamp or rejects with TimeSourceError. */
  fetchUtcTimestamp(): Promise<string>;
}

export class TimeSourceError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TimeSourceError";
  }
}

export interface NetworkTimeSourceOptions {
  url?: string;
  timeoutMs?: number;
  proxy?: string;
  insecure?: boolean;
  env?: NodeJS.ProcessEnv;
  keepAliveAgents?: KeepAliveAgents;
  logger?: Logger;
}

function readDateTime(payload: unknown): string | undefined {
  if (typeof payload !== "object" || payload === null) {
    return undefined;
  }

  const value: unknown = Reflect.get(payload, "dateTime");
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Queries a JSON time API that answers with `{ "dateTime": "..." }`.
 */
export function createNetworkTimeSource(options: NetworkTimeSourceOptions = {}): TimeSource {
  const url = options.url ?? DEFAULT_TIME_API_URL;
  const timeoutMs = options.timeoutMs ?? 5_000;

  return {
    async fetchUtcTimestamp() {
      let payload: unknown;

      try {
        const response = await httpRequest({
          url,
          timeoutMs,
          proxy: options.proxy,
          insecure: options.insecure,
          env: options.env,
          keepAliveAgents: options.keepAliveAgents,
          logger: options.logger ?? silentLogger,
        });

        if (response.statusCode < 200 || response.statusCode > 299) {
          await response.body.dump();
          throw new TimeSourceError(`Time request failed: HTTP ${response.statusCode}`);
        }

        payload = await response.body.json();
      } catch (error) {
        if (error instanceof TimeSourceError) {
          throw error;
        }

        const message = error instanceof Error ? error.message : String(error);
        throw new TimeSourceError(`Time request failed: ${message}`, { cause: error });
      }

      const dateTime = readDateTime(payload);
      if (!dateTime) {
        throw new TimeSourceError("Failed to parse time JSON: missing dateTime field");
      }

      return dateTime;
    },
  };
}

export function createSystemTimeSource(now: () => Date = () => new Date()): TimeSource {
  return {
    fetchUtcTimestamp: () => Promise.resolve(now().toISOString()),
  };
}

export function createFixedTimeSource(value: string): TimeSource {
  return {
    fetchUtcTimestamp: () => Promise.resolve(value),
  };
}
