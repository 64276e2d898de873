import { errorMessage } from "./errors.js";

export type RetryOptions = {
  /** Total attempts, the first one included. */
  attempts: number;
  /** Delay before the first retry; doubles after each failure. */
  baseDelayMs: number;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
};

export class RetryExhaustedError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`${operation} failed after ${attempts} attempt(s): ${errorMessage(lastError)}`, { cause: lastError });
    this.name = "RetryExhaustedError";
  }
}

/**
 * Run `fn` until it succeeds or the attempts run out.
 * Backoff: baseDelayMs × 2^(attempt-1).
 */
export async function withRetry<T>(operation: string, opts: RetryOptions, fn: (attempt: number) => Promise<T>): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      lastError = e;
      if (attempt < attempts) {
        const delay = opts.baseDelayMs * 2 ** (attempt - 1);
        opts.onRetry?.(attempt, delay, e);
        if (delay > 0) await new Promise((r) => setTimeout(r, delay));
      }
    }
  }
  throw new RetryExhaustedError(operation, attempts, lastError);
}
