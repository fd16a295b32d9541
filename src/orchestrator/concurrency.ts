// ---------------------------------------------------------------------------
// Concurrency control utilities wrapping p-limit.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";
import { ProviderRateLimitError } from "../core/errors.js";
import { sleep } from "./retry.js";

// ── File pool ──────────────────────────────────────────────────────────────

/**
 * Caps the number of files resolved at the same time.
 */
export class ConcurrencyPool {
  private readonly limiter: ReturnType<typeof pLimit>;

  constructor(maxConcurrency = 1) {
    this.limiter = pLimit(maxConcurrency);
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    return this.limiter(fn);
  }

  get activeCount(): number {
    return this.limiter.activeCount;
  }

  get pendingCount(): number {
    return this.limiter.pendingCount;
  }
}

// ── Per-provider throttle ──────────────────────────────────────────────────

export interface ProviderThrottleOptions {
  /** Calls in flight per provider. */
  maxPerProvider?: number;
  /** Minimum gap between the starts of two calls to the same provider. */
  minIntervalMs?: number;
  /** Pause after a 429 that carried no Retry-After header. */
  rateLimitBackoffMs?: number;
  /** Upper bound on any backoff, including one asked for by Retry-After. */
  maxRateLimitBackoffMs?: number;
}

/**
 * Process-wide throttle keyed by provider. Every file shares it, so a 429
 * seen by one file delays the next call made on behalf of any file.
 */
export class ProviderThrottle {
  private readonly limiters = new Map<string, ReturnType<typeof pLimit>>();
  private readonly notBefore = new Map<string, number>();
  private readonly maxPerProvider: number;
  private readonly minIntervalMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly maxRateLimitBackoffMs: number;

  constructor(options: ProviderThrottleOptions = {}) {
    this.maxPerProvider = options.maxPerProvider ?? 1;
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? 5_000;
    this.maxRateLimitBackoffMs = options.maxRateLimitBackoffMs ?? 60_000;
  }

  /**
   * Run `fn` in the provider's queue, after any backoff or spacing delay.
   */
  run<T>(providerId: string, fn: () => Promise<T>): Promise<T> {
    return this.limiterFor(providerId)(async () => {
      const wait = (this.notBefore.get(providerId) ?? 0) - Date.now();
      if (wait > 0) await sleep(wait);

      this.push(providerId, Date.now() + this.minIntervalMs);

      try {
        return await fn();
      } catch (error: unknown) {
        if (error instanceof ProviderRateLimitError) {
          this.backOff(providerId, error.retryAfterMs ?? this.rateLimitBackoffMs);
        }
        throw error;
      }
    });
  }

  /** Hold every call to `providerId` for `delayMs` from now, at most the configured cap. */
  backOff(providerId: string, delayMs: number): void {
    this.push(providerId, Date.now() + Math.min(delayMs, this.maxRateLimitBackoffMs));
  }

  /** Epoch ms before which no call to `providerId` starts. */
  blockedUntil(providerId: string): number {
    return this.notBefore.get(providerId) ?? 0;
  }

  private push(providerId: string, until: number): void {
    const current = this.notBefore.get(providerId) ?? 0;
    if (until > current) this.notBefore.set(providerId, until);
  }

  private limiterFor(providerId: string): ReturnType<typeof pLimit> {
    let limiter = this.limiters.get(providerId);
    if (!limiter) {
      limiter = pLimit(this.maxPerProvider);
      this.limiters.set(providerId, limiter);
    }
    return limiter;
  }
}
