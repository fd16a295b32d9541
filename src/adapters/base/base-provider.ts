// ---------------------------------------------------------------------------
// BaseProvider – abstract base class shared by every bibliographic provider.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import type { z } from "zod";

import type {
  BookMetadataProvider,
  ISBN,
  ProviderId,
  ProviderItem,
  TextQuery,
} from "../../core/types.js";
import {
  ProviderConnectionError,
  ProviderError,
  ProviderHttpError,
  ProviderParseError,
  ProviderRateLimitError,
  ProviderTimeoutError,
} from "../../core/errors.js";
import type { ProviderThrottle } from "../../orchestrator/concurrency.js";
import { withRetry } from "../../orchestrator/retry.js";

export interface ProviderSettings {
  timeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxResults: number;
  language?: string;
  apiKey?: string;
}

export interface ProviderContext {
  settings: ProviderSettings;
  throttle: ProviderThrottle;
  logger: Logger;
}

export interface FetchJsonOptions {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

const DEFAULT_HEADERS: Record<string, string> = {
  "user-agent": "shelfsort/0.1",
  accept: "application/json",
};

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

/**
 * Concrete providers implement {@link executeIsbnLookup} and
 * {@link executeTextSearch}; the base class supplies timing, error wrapping
 * and {@link fetchJson}, which runs every request through the shared
 * per-provider throttle and the transport retry policy.
 */
export abstract class BaseProvider implements BookMetadataProvider {
  public readonly id: ProviderId;
  public readonly label: string;

  protected readonly settings: ProviderSettings;
  protected readonly throttle: ProviderThrottle;
  protected readonly logger: Logger;

  constructor(id: ProviderId, label: string, context: ProviderContext) {
    this.id = id;
    this.label = label;
    this.settings = context.settings;
    this.throttle = context.throttle;
    this.logger = context.logger.child({ provider: id });
  }

  // ── Public interface ────────────────────────────────────────────────────

  isAvailable(): boolean {
    return true;
  }

  lookupIsbn(isbn: ISBN, signal?: AbortSignal): Promise<ProviderItem[]> {
    return this.timed("isbn lookup", { isbn }, () =>
      this.executeIsbnLookup(isbn, signal),
    );
  }

  searchText(query: TextQuery, signal?: AbortSignal): Promise<ProviderItem[]> {
    return this.timed("text search", { title: query.title, author: query.author }, () =>
      this.executeTextSearch(query, signal),
    );
  }

  // ── Abstract methods for subclasses ─────────────────────────────────────

  protected abstract executeIsbnLookup(
    isbn: ISBN,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]>;

  protected abstract executeTextSearch(
    query: TextQuery,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]>;

  // ── Protected helpers ───────────────────────────────────────────────────

  /**
   * GET `url` and validate the JSON body against `schema`. Resolves to
   * null on 404. Other failures throw a {@link ProviderError} subclass after
   * the retry budget is spent.
   */
  protected fetchJson<T>(
    url: URL,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: FetchJsonOptions = {},
  ): Promise<T | null> {
    return withRetry(
      () => this.throttle.run(this.id, () => this.fetchOnce(url, schema, options)),
      {
        maxAttempts: this.settings.maxAttempts,
        baseDelayMs: this.settings.retryBaseDelayMs,
        maxDelayMs: this.settings.retryMaxDelayMs,
      },
    );
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  private async fetchOnce<T>(
    url: URL,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: FetchJsonOptions,
  ): Promise<T | null> {
    const timeout = AbortSignal.timeout(this.settings.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers: { ...DEFAULT_HEADERS, ...options.headers },
        signal,
      });

      if (response.status === 404) return null;

      if (response.status === 429) {
        throw new ProviderRateLimitError(
          `${this.label} rate limit reached`,
          this.id,
          parseRetryAfter(response.headers.get("retry-after")),
        );
      }

      if (!response.ok) {
        throw new ProviderHttpError(
          `${this.label} returned HTTP ${response.status}`,
          this.id,
          response.status,
        );
      }

      try {
        body = await response.json();
      } catch (error: unknown) {
        if (isAbort(error)) throw error;
        throw new ProviderParseError(`${this.label} returned invalid JSON`, this.id, {
          cause: error,
        });
      }
    } catch (error: unknown) {
      throw this.wrapError(error, url.pathname);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderParseError(
        `${this.label} response has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        this.id,
      );
    }
    return parsed.data;
  }

  private async timed(
    operation: string,
    fields: Record<string, unknown>,
    fn: () => Promise<ProviderItem[]>,
  ): Promise<ProviderItem[]> {
    const start = performance.now();
    this.logger.debug(fields, `${operation} started`);

    try {
      const items = await fn();
      this.logger.debug(
        { ...fields, results: items.length, responseTimeMs: Math.round(performance.now() - start) },
        `${operation} completed`,
      );
      return items;
    } catch (error: unknown) {
      const wrapped = this.wrapError(error, operation);
      this.logger.warn(
        { ...fields, responseTimeMs: Math.round(performance.now() - start), err: wrapped },
        `${operation} failed`,
      );
      throw wrapped;
    }
  }

  private wrapError(error: unknown, context: string): ProviderError {
    if (error instanceof ProviderError) return error;

    if (isAbort(error)) {
      return new ProviderTimeoutError(
        `${this.label} request timed out (${context})`,
        this.id,
        { cause: error },
      );
    }

    if (error instanceof TypeError) {
      return new ProviderConnectionError(
        `Network error talking to ${this.label}: ${error.message}`,
        this.id,
        { cause: error },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`${this.label} failed (${context}): ${message}`, this.id, {
      cause: error,
    });
  }
}

function isAbort(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}

// ── Shared mapping helpers ──────────────────────────────────────────────────

export function uniq<T>(xs: readonly T[]): T[] {
  return Array.from(new Set(xs));
}

/** Digits and X only, upper-cased. */
export function identifierDigits(value: string): string {
  return value.toUpperCase().replace(/[^\dX]/g, "");
}
