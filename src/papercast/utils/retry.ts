/**
 * Bounded retry with exponential backoff for idempotent outbound calls.
 */

import { PapercastError } from "../errors.js";

export type RetryConfig = {
  /** Retries after the first attempt */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added as random jitter (0-1) */
  jitter: number;
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  retries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  jitter: 0.2
};

export type RetryOptions = Partial<RetryConfig> & {
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  /** Injectable for tests */
  random?: () => number;
};

export function calculateDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const exponential = config.baseDelayMs * 2 ** attempt;
  const capped = Math.min(exponential, config.maxDelayMs);
  return Math.round(capped + capped * config.jitter * random());
}

/**
 * Errors carrying `retryable: true` (LlmError, lookup failures on 429/5xx) are retried.
 */
export function isRetryable(err: unknown): boolean {
  if (err instanceof PapercastError) {
    const details = err.details;
    return typeof details === "object" && details !== null && "retryable" in details && details.retryable === true;
  }
  if (err instanceof Error && "retryable" in err) {
    return err.retryable === true;
  }
  return false;
}

function retryAfterOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const source = err instanceof PapercastError ? err.details : err;
  if (typeof source === "object" && source !== null && "retryAfterMs" in source) {
    const value = source.retryAfterMs;
    if (typeof value === "number" && value >= 0) return value;
  }
  return undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new PapercastError("CANCELLED", "Cancelled during retry backoff"));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new PapercastError("CANCELLED", "Cancelled during retry backoff"));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Call `fn` until it succeeds, a non-retryable error is thrown, or retries run out.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config: RetryConfig = {
    retries: options.retries ?? DEFAULT_RETRY_CONFIG.retries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitter: options.jitter ?? DEFAULT_RETRY_CONFIG.jitter
  };
  const retryable = options.isRetryable ?? isRetryable;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= config.retries || !retryable(err) || options.signal?.aborted) {
        throw err;
      }
      const delayMs = Math.max(retryAfterOf(err) ?? 0, calculateDelay(attempt, config, options.random));
      options.onRetry?.(err, attempt + 1, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
