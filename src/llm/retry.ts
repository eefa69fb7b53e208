/**
 * Backoff wrapper for calls to the model endpoints
 * @module src/llm/retry
 */

import { isRemoteUnavailableError } from "../errors/index.js";

const RETRY_DEFAULTS = {
  /** One extra attempt: a second failure is reported to the caller */
  maxRetries: 1,
  baseDelayMs: 500,
  maxDelayMs: 10000,
} as const;

/** Failure messages of plain errors that usually clear up on their own */
const TRANSIENT_MESSAGE_PATTERNS = [
  "timeout",
  "timed out",
  "etimedout",
  "econnreset",
  "econnrefused",
  "socket hang up",
  "fetch failed",
  "temporarily unavailable",
  "overloaded",
] as const;

/** Called before each wait; attempt counts retries from 1 */
export type RetryCallback = (
  attempt: number,
  error: Error,
  delayMs: number
) => void;

export interface RetryOptions {
  /** Default: 1 */
  readonly maxRetries?: number;
  /** Wait before the first retry, doubled each time (default: 500) */
  readonly baseDelayMs?: number;
  /** Default: 10000 */
  readonly maxDelayMs?: number;
  /** Stops the loop before the next attempt */
  readonly signal?: AbortSignal;
  readonly onRetry?: RetryCallback;
  /** Default: isRetryableError */
  readonly shouldRetry?: (error: unknown) => boolean;
}

/**
 * Run an inference call, retrying transient failures
 *
 * The wait before retry n is min(baseDelayMs * 2^(n-1), maxDelayMs).
 * The last failure is rethrown as-is, so callers can still tell a timeout
 * from a rejected request.
 *
 * @example
 * ```typescript
 * const vectors = await retryWithBackoff(() => client.embedBatch(texts), {
 *   onRetry: (n, err) => logger.warn(`embedding retry ${n}: ${err.message}`),
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? RETRY_DEFAULTS.maxRetries;
  const baseDelayMs = options.baseDelayMs ?? RETRY_DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs;
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  let retries = 0;
  for (;;) {
    if (options.signal?.aborted) {
      throw new Error("Retry cancelled");
    }

    try {
      return await fn();
    } catch (error) {
      if (retries >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = Math.min(baseDelayMs * 2 ** retries, maxDelayMs);
      retries++;
      options.onRetry?.(
        retries,
        error instanceof Error ? error : new Error(String(error)),
        delayMs
      );

      await wait(delayMs);
    }
  }
}

/**
 * Transient failures: the typed remote error decides for itself; plain
 * errors are judged by status codes or network wording in their message
 */
export function isRetryableError(error: unknown): boolean {
  if (isRemoteUnavailableError(error)) {
    return error.retryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return (
    /\b(429|500|502|503|504)\b/.test(message) ||
    TRANSIENT_MESSAGE_PATTERNS.some((pattern) => message.includes(pattern))
  );
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
