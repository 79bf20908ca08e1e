import { ProxyAgent, request, type Dispatcher } from "undici";

import { silentLogger, type Logger } from "../logger";
import { redactUrlCredentials } from "../redaction";
import { RequestTimeoutError, toTransportError, TransportError } from "./errors";
import { MAX_REDIRECTIONS, type KeepAliveAgents } from "./keep-alive";

export type ProxyAgentCache = Map<string, ProxyAgent>;

export interface HttpRequestOptions {
  url: string;
  /** Bounds connect, headers and body phases of the request. */
  timeoutMs?: number;
  headers?: Record<string, string>;
  keepAliveAgents?: KeepAliveAgents;
  proxy?: string;
  insecure?: boolean;
  env?: NodeJS.ProcessEnv;
  proxyCache?: ProxyAgentCache;
  logger?: Logger;
  now?: () => number;
}

function parseTargetUrl(value: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new TransportError(`Invalid URL: ${value}`, { cause: error, code: "ERR_INVALID_URL" });
  }
}

function sanitizeProxyValue(value: string | undefined): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();

  return trimmed.length > 0 ? trimmed : undefined;
}

function resolveProxyFromEnv(protocol: string, env: NodeJS.ProcessEnv): string | undefined {
  const keys = protocol === "https:" ? ["HTTPS_PROXY", "HTTP_PROXY"] : ["HTTP_PROXY"];

  for (const key of keys) {
    const envValue = sanitizeProxyValue(env[key]);
    if (envValue) {
      return envValue;
    }
  }

  return undefined;
}

function resolveProxyUrl(
  url: URL,
  explicitProxy: string | undefined,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const sanitizedExplicit = sanitizeProxyValue(explicitProxy);
  if (sanitizedExplicit) {
    return sanitizedExplicit;
  }

  return resolveProxyFromEnv(url.protocol, env);
}

function getProxyAgent(
  proxyUrl: string,
  insecure: boolean | undefined,
  cache: ProxyAgentCache | undefined,
): ProxyAgent {
  const cacheKey = `${proxyUrl}|rejectUnauthorized=${insecure ? "false" : "true"}`;

  const cached = cache?.get(cacheKey);
  if (cached) {
    return cached;
  }

  const options: ProxyAgent.Options = { uri: proxyUrl, maxRedirections: MAX_REDIRECTIONS };

  if (insecure) {
    options.requestTls = { rejectUnauthorized: false };
  }

  const agent = new ProxyAgent(options);
  cache?.set(cacheKey, agent);

  return agent;
}

function isFinitePositive(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function selectDispatcher(
  targetUrl: URL,
  options: HttpRequestOptions,
  env: NodeJS.ProcessEnv,
): Dispatcher | undefined {
  const resolvedProxy = resolveProxyUrl(targetUrl, options.proxy, env);

  if (resolvedProxy) {
    return getProxyAgent(resolvedProxy, options.insecure, options.proxyCache);
  }

  if (options.keepAliveAgents) {
    return targetUrl.protocol === "https:"
      ? options.keepAliveAgents.https
      : options.keepAliveAgents.http;
  }

  return undefined;
}

/**
 * Issues a single GET request. The selected dispatcher follows up to
 * MAX_REDIRECTIONS redirects. Any failure to obtain a response is rejected as a
 * TransportError; HTTP error statuses resolve normally. `timeoutMs` is a
 * deadline for the whole exchange: it stays armed after the headers arrive and
 * destroys the body with a RequestTimeoutError if the body has not closed by
 * then.
 */
export async function httpRequest(options: HttpRequestOptions): Promise<Dispatcher.ResponseData> {
  const { url, timeoutMs, headers } = options;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => performance.now());

  const targetUrl = parseTargetUrl(url);
  const protocol = targetUrl.protocol;

  if (protocol !== "http:" && protocol !== "https:") {
    throw new TransportError(`Unsupported protocol for request: ${protocol}`, {
      code: "ERR_UNSUPPORTED_PROTOCOL",
    });
  }

  const environment = options.env ?? process.env;
  const hasTimeout = isFinitePositive(timeoutMs);
  const controller = hasTimeout ? new AbortController() : null;
  const timeoutError = hasTimeout ? new RequestTimeoutError(timeoutMs) : null;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let pendingBody: Dispatcher.ResponseData["body"] | null = null;

  const disarm = () => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  };

  if (controller && timeoutError) {
    timer = setTimeout(() => {
      timer = null;
      controller.abort(timeoutError);

      if (pendingBody && !pendingBody.destroyed) {
        pendingBody.destroy(timeoutError);
      }
    }, timeoutError.timeoutMs);
  }

  const dispatcher = selectDispatcher(targetUrl, options, environment);
  const startedAt = now();
  const logUrl = redactUrlCredentials(url);

  let response: Dispatcher.ResponseData;

  try {
    response = await request(targetUrl, {
      method: "GET",
      ...(headers ? { headers } : {}),
      ...(dispatcher ? { dispatcher } : {}),
      ...(hasTimeout ? { headersTimeout: timeoutMs, bodyTimeout: timeoutMs } : {}),
      ...(controller ? { signal: controller.signal } : {}),
    });
  } catch (error) {
    disarm();

    const failure =
      controller?.signal.aborted && timeoutError ? timeoutError : toTransportError(error);

    logger.debug("http request failed", {
      url: logUrl,
      error: failure,
      elapsedMs: Math.round(now() - startedAt),
    });

    throw failure;
  }

  logger.debug("http response received", {
    url: logUrl,
    statusCode: response.statusCode,
    elapsedMs: Math.round(now() - startedAt),
  });

  if (timer !== null) {
    if (response.body.destroyed) {
      disarm();
    } else {
      pendingBody = response.body;
      response.body.once("close", disarm);
    }
  }

  return response;
}
