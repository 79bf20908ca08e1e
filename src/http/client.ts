import type { Readable } from "node:stream";
import type { Dispatcher, ProxyAgent } from "undici";

import { silentLogger, type Logger } from "../logger";
import type { ResponseView } from "../validation";
import { createKeepAliveAgents, type KeepAliveAgents } from "./keep-alive";
import { httpRequest } from "./request";

export type ProbeResponse = ResponseView;

export interface HttpGetOptions {
  timeoutMs: number;
}

/**
 * Capability used by probes. `get` resolves for every HTTP response regardless
 * of status and rejects with a TransportError when no usable response exists.
 */
export interface HttpClient {
  get(url: string, options: HttpGetOptions): Promise<ProbeResponse>;
  close(): Promise<void>;
}

export interface UndiciHttpClientOptions {
  /** Explicit proxy; HTTPS_PROXY / HTTP_PROXY are used otherwise. */
  proxy?: string;
  /** Disable TLS certificate verification. */
  insecure?: boolean;
  /** Headers attached to every request. */
  headers?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Pre-built agents, mostly for tests. Created on demand otherwise. */
  keepAliveAgents?: KeepAliveAgents;
}

type ResponseHeaders = Dispatcher.ResponseData["headers"];

function lookupHeader(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];

  if (Array.isArray(value)) {
    return value.join(", ");
  }

  return value;
}

export async function readBounded(body: Readable, maxBytes: number): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  let received = 0;

  if (maxBytes > 0) {
    for await (const chunk of body) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      const remaining = maxBytes - received;

      if (buffer.length >= remaining) {
        chunks.push(buffer.subarray(0, remaining));
        received += remaining;
        break;
      }

      chunks.push(buffer);
      received += buffer.length;
    }
  }

  if (!body.destroyed) {
    body.destroy();
  }

  return Buffer.concat(chunks, received);
}

function toProbeResponse(response: Dispatcher.ResponseData): ProbeResponse {
  const { body, headers, statusCode } = response;

  return {
    statusCode,
    header: (name) => lookupHeader(headers, name),
    readBody: (maxBytes) => readBounded(body, maxBytes),
    async discard() {
      try {
        await body.dump();
      } catch {
        body.destroy();
      }
    },
  };
}

export function createUndiciHttpClient(options: UndiciHttpClientOptions = {}): HttpClient {
  const logger = options.logger ?? silentLogger;
  const keepAliveAgents =
    options.keepAliveAgents ?? createKeepAliveAgents({ insecure: options.insecure });
  const proxyCache = new Map<string, ProxyAgent>();

  return {
    async get(url, { timeoutMs }) {
      const response = await httpRequest({
        url,
        timeoutMs,
        headers: options.headers,
        keepAliveAgents,
        proxy: options.proxy,
        insecure: options.insecure,
        env: options.env,
        proxyCache,
        logger,
      });

      return toProbeResponse(response);
    },

    async close() {
      const proxies = Array.from(proxyCache.values());
      proxyCache.clear();
      await Promise.all([keepAliveAgents.close(), ...proxies.map((agent) => agent.close())]);
    },
  };
}
