// ---------------------------------------------------------------------------
// Transport retry with capped exponential backoff and jitter.
// ---------------------------------------------------------------------------

import {
  ProviderConnectionError,
  ProviderHttpError,
  ProviderRateLimitError,
  ProviderTimeoutError,
} from "../core/errors.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryOptions {
  /** Total attempts including the first call (1 means no retry). */
  maxAttempts: number;
  /** Base delay in milliseconds before the first retry. */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay. */
  maxDelayMs?: number;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted the default policy is used:
   * - Retry: connection errors, timeouts, HTTP 429 and HTTP 5xx
   * - Do NOT retry: other HTTP statuses, parse errors, anything else
   */
  shouldRetry?: (error: unknown) => boolean;
}

// ── Default retry predicate ────────────────────────────────────────────────

export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof ProviderConnectionError) return true;
  if (error instanceof ProviderTimeoutError) return true;
  if (error instanceof ProviderRateLimitError) return true;
  if (error instanceof ProviderHttpError) return error.isTransient;
  return false;
}

// ── Delay helper ───────────────────────────────────────────────────────────

/**
 * Full jitter: a random value between 0 and the capped exponential ceiling.
 */
export function computeDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = Number.POSITIVE_INFINITY,
): number {
  const ceiling = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  return Math.round(Math.random() * ceiling);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn`, retrying transient failures up to `maxAttempts` calls in
 * total. The last error is thrown once attempts run out.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const {
    maxAttempts,
    baseDelayMs,
    maxDelayMs,
    shouldRetry = isTransientProviderError,
  } = options;
  const attempts = Math.max(1, maxAttempts);

  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= attempts - 1) {
        throw error;
      }

      await sleep(computeDelay(attempt, baseDelayMs, maxDelayMs));
    }
  }

  throw lastError;
}
