import type { HttpClient, HttpGetOptions, ProbeResponse } from "../http";
import { TransportError } from "../http";

export interface FakeResponseInit {
  statusCode?: number;
  headers?: Record<string, string>;
  body?: string;
  /** Makes `readBody` reject with this message. */
  bodyError?: string;
}

export interface FakeResponse extends ProbeResponse {
  /** Byte limits requested through readBody, in call order. */
  readonly reads: number[];
  discarded(): boolean;
}

export function createFakeResponse(init: FakeResponseInit = {}): FakeResponse {
  const headers = new Map(
    Object.entries(init.headers ?? { "Content-Type": "text/html" }).map(([name, value]) => [
      name.toLowerCase(),
      value,
    ]),
  );
  const bytes = new TextEncoder().encode(init.body ?? "");
  const reads: number[] = [];
  let wasDiscarded = false;

  return {
    statusCode: init.statusCode ?? 200,
    reads,
    header: (name) => headers.get(name.toLowerCase()),
    readBody: async (maxBytes) => {
      reads.push(maxBytes);
      if (init.bodyError !== undefined) {
        throw new Error(init.bodyError);
      }
      return bytes.subarray(0, maxBytes);
    },
    discard: async () => {
      wasDiscarded = true;
    },
    discarded: () => wasDiscarded,
  };
}

/** One scripted reply: a response, or a transport failure message. */
export type FakeReply = FakeResponseInit | { transportError: string };

export interface FakeHttpClient extends HttpClient {
  readonly calls: Array<{ url: string; options: HttpGetOptions }>;
  /** Number of calls for a URL. */
  count(url: string): number;
  closed(): boolean;
}

export interface FakeHttpClientOptions {
  /** Awaited before every reply; lets tests hold requests in flight. */
  beforeReply?: (url: string) => Promise<void>;
}

/**
 * HttpClient stand-in that replays scripted replies per URL. The last reply of
 * a script repeats once the script is exhausted.
 */
export function createFakeHttpClient(
  script: Record<string, FakeReply | FakeReply[]>,
  options: FakeHttpClientOptions = {},
): FakeHttpClient {
  const calls: Array<{ url: string; options: HttpGetOptions }> = [];
  let isClosed = false;

  const count = (url: string) => calls.filter((call) => call.url === url).length;

  return {
    calls,
    count,
    closed: () => isClosed,
    async get(url, getOptions) {
      calls.push({ url, options: getOptions });
      const attempt = count(url);

      await options.beforeReply?.(url);

      const entry = script[url];
      if (entry === undefined) {
        throw new TransportError(`No scripted reply for ${url}`);
      }

      const replies = Array.isArray(entry) ? entry : [entry];
      const reply = replies[Math.min(attempt, replies.length) - 1];

      if (reply === undefined) {
        throw new TransportError(`No scripted reply for ${url}`);
      }

      if ("transportError" in reply) {
        throw new TransportError(reply.transportError);
      }

      return createFakeResponse(reply);
    },
    async close() {
      isClosed = true;
    },
  };
}
