import { Agent } from "undici";

/** Connection pools shared by every probe of one client, one per scheme. */
export interface KeepAliveAgents {
  http: Agent;
  https: Agent;
  close(): Promise<void>;
}

export interface KeepAliveAgentOptions {
  /** Applied to both pools on top of the built-in settings. */
  defaults?: Agent.Options;
  http?: Agent.Options;
  https?: Agent.Options;
  /** Skip certificate verification in both pools. */
  insecure?: boolean;
}

/** Redirects followed before a 3xx response is returned as final. */
export const MAX_REDIRECTIONS = 5;

const POOL_SETTINGS: Agent.Options = {
  maxRedirections: MAX_REDIRECTIONS,
  connections: 64,
  pipelining: 1,
  connectTimeout: 10_000,
  keepAliveTimeout: 10_000,
  keepAliveMaxTimeout: 60_000,
};

function withoutCertificateCheck(options: Agent.Options): Agent.Options {
  // A custom connector owns its TLS settings.
  if (typeof options.connect === "function") {
    return options;
  }

  return { ...options, connect: { ...options.connect, rejectUnauthorized: false } };
}

/**
 * Builds the pools a client sends its GET requests through. The caller owns
 * them; `close` waits for in-flight requests and may be called repeatedly.
 */
export function createKeepAliveAgents(options: KeepAliveAgentOptions = {}): KeepAliveAgents {
  const httpOptions: Agent.Options = { ...POOL_SETTINGS, ...options.defaults, ...options.http };
  const httpsOptions: Agent.Options = { ...POOL_SETTINGS, ...options.defaults, ...options.https };

  const http = new Agent(options.insecure ? withoutCertificateCheck(httpOptions) : httpOptions);
  const https = new Agent(options.insecure ? withoutCertificateCheck(httpsOptions) : httpsOptions);

  let closing: Promise<void> | null = null;

  return {
    http,
    https,
    close() {
      if (!closing) {
        closing = Promise.all([http.close(), https.close()]).then(() => undefined);
      }

      return closing;
    },
  };
}
