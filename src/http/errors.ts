/**
 * No interpretable HTTP response could be obtained: DNS or connect failure,
 * TLS failure, timeout, reset socket or malformed response bytes.
 */
export class TransportError extends Error {
  readonly code?: string;

  constructor(message: string, options: { cause?: unknown; code?: string } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TransportError";
    this.code = options.code;
  }
}

export class RequestTimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, { code: "ETIMEDOUT" });
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

function readErrorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" && code.length > 0 ? code : undefined;
}

function describeCause(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (cause instanceof Error && cause.message.length > 0 && cause.message !== error.message) {
    return cause.message;
  }

  return undefined;
}

/**
 * Wraps any failure raised while obtaining a response into a TransportError,
 * keeping the library error code when there is one.
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new TransportError(String(error), { cause: error });
  }

  const code = readErrorCode(error);
  const causeMessage = describeCause(error);
  const base = error.message.length > 0 ? error.message : error.name;
  const detailed = causeMessage ? `${base}: ${causeMessage}` : base;
  const message = code && !detailed.includes(code) ? `${detailed} (${code})` : detailed;

  return new TransportError(message, { cause: error, code });
}
