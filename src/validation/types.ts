/**
 * Read access to a received HTTP response, independent of the client that
 * produced it.
 */
export interface ResponseView {
  readonly statusCode: number;
  /** Case-insensitive header lookup; repeated headers are joined with ", ". */
  header(name: string): string | undefined;
  /** Reads at most `maxBytes` bytes of the body and releases the rest. */
  readBody(maxBytes: number): Promise<Uint8Array>;
  /** Releases the body without reading it. */
  discard(): Promise<void>;
}

export interface BodyCheckResult {
  ok: boolean;
  issues: string[];
}
