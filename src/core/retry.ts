import { logger } from "./logger";
import { isPermanentError } from "./errors";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Stops waiting between attempts; the last error is rethrown. */
  signal?: AbortSignal;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 750,
  maxDelayMs: 8000,
  jitterMs: 400,
  shouldRetry: (error) => !isPermanentError(error),
};

/** Exponential backoff with jitter: base * 2^(attempt-1), capped at maxDelayMs. */
export function backoffDelay(attempt: number, options: RetryOptions, random: () => number = Math.random): number {
  const delay = Math.min(options.baseDelayMs * Math.pow(2, attempt - 1), options.maxDelayMs);
  return delay + random() * options.jitterMs;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = DEFAULT_RETRY_OPTIONS,
  context?: string
): Promise<T> {
  const { maxAttempts, shouldRetry, signal } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === maxAttempts || signal?.aborted) break;
      if (shouldRetry && !shouldRetry(error)) break;

      const delay = backoffDelay(attempt, options);
      logger.debug({ attempt, delay, context }, "Retrying after error");
      if (!(await sleep(delay, signal))) break;
    }
  }

  throw lastError;
}

/** Resolves true after `ms`, or false as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
