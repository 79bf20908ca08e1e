export interface RetryOptions<T> {
  /**
   * Maximum number of retry attempts performed after the initial attempt.
   */
  retries: number;
  /**
   * Decides whether a settled attempt should be repeated. Receives the result
   * and the attempt number that produced it (1-based).
   */
  shouldRetry: (result: T, attempt: number) => boolean;
  /**
   * Invoked before every repeated attempt with the discarded result.
   */
  onRetry?: (result: T, nextAttempt: number) => void;
}

export interface RetryOutcome<T> {
  result: T;
  attempts: number;
}

export type RetryableOperation<T> = (attempt: number) => Promise<T>;

function normalizeRetries(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError("retries must be a finite non-negative number");
  }

  return Math.floor(value);
}

/**
 * Repeats an operation in place, without delay, while `shouldRetry` accepts
 * its result and the retry budget lasts. Only the last result is returned.
 * The attempt counter lives in this call, never across operations.
 */
export async function retryWhile<T>(
  operation: RetryableOperation<T>,
  options: RetryOptions<T>,
): Promise<RetryOutcome<T>> {
  const retries = normalizeRetries(options.retries);
  const totalAttempts = retries + 1;

  let attempt = 1;
  let result = await operation(attempt);

  while (attempt < totalAttempts && options.shouldRetry(result, attempt)) {
    options.onRetry?.(result, attempt + 1);
    attempt += 1;
    result = await operation(attempt);
  }

  return { result, attempts: attempt };
}
