// ---------------------------------------------------------------------------
// Tests for the retry / exponential-backoff logic.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { computeDelay, isTransientProviderError, withRetry } from "../../../src/orchestrator/retry.js";
import {
  ProviderConnectionError,
  ProviderHttpError,
  ProviderParseError,
  ProviderRateLimitError,
  ProviderTimeoutError,
} from "../../../src/core/errors.js";
import { ProviderId } from "../../../src/core/types.js";

const GB = ProviderId.GOOGLE_BOOKS;

/**
 * Create a function that throws on the first N calls and then resolves.
 */
function failThenSucceed(error: Error, failCount: number, successValue = "ok"): () => Promise<string> {
  let calls = 0;
  return async () => {
    calls++;
    if (calls <= failCount) throw error;
    return successValue;
  };
}

function alwaysFail(error: Error): () => Promise<string> {
  return async () => {
    throw error;
  };
}

/**
 * Run withRetry expecting failure, advance all fake timers, and return the
 * caught error.
 */
async function expectRetryFailure(
  fn: () => Promise<string>,
  options: Parameters<typeof withRetry>[1],
): Promise<unknown> {
  let caughtError: unknown;
  const promise = withRetry(fn, options).catch((e: unknown) => {
    caughtError = e;
  });
  await vi.runAllTimersAsync();
  await promise;
  return caughtError;
}

describe("withRetry", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("returns the result when the first call succeeds", async () => {
    const fn = vi.fn(async () => "ok");
    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 100 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  // ── Transient errors ──────────────────────────────────────────────────

  it("retries a connection error and then succeeds", async () => {
    const fn = vi.fn(failThenSucceed(new ProviderConnectionError("conn fail", GB), 1, "recovered"));

    const promise = withRetry(fn, { maxAttempts: 3, baseDelayMs: 10 });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("retries timeouts, 429 and 5xx", async () => {
    for (const error of [
      new ProviderTimeoutError("timeout", GB),
      new ProviderRateLimitError("slow down", GB, 1_000),
      new ProviderHttpError("bad gateway", GB, 502),
    ]) {
      const fn = vi.fn(failThenSucceed(error, 1));
      const promise = withRetry(fn, { maxAttempts: 2, baseDelayMs: 10 });
      await vi.runAllTimersAsync();
      await expect(promise).resolves.toBe("ok");
      expect(fn).toHaveBeenCalledTimes(2);
    }
  });

  it("throws the last error once attempts run out", async () => {
    const fn = vi.fn(alwaysFail(new ProviderConnectionError("conn fail", GB)));

    const err = await expectRetryFailure(fn, { maxAttempts: 3, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(ProviderConnectionError);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("makes a single call when maxAttempts is 1", async () => {
    const fn = vi.fn(alwaysFail(new ProviderConnectionError("fail", GB)));
    await expectRetryFailure(fn, { maxAttempts: 1, baseDelayMs: 10 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  // ── Permanent errors ──────────────────────────────────────────────────

  it("does not retry a 404-class HTTP error", async () => {
    const fn = vi.fn(alwaysFail(new ProviderHttpError("forbidden", GB, 403)));

    const err = await expectRetryFailure(fn, { maxAttempts: 5, baseDelayMs: 10 });

    expect(err).toBeInstanceOf(ProviderHttpError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry parse errors or unknown errors", async () => {
    const parse = vi.fn(alwaysFail(new ProviderParseError("bad json", GB)));
    await expectRetryFailure(parse, { maxAttempts: 5, baseDelayMs: 10 });
    expect(parse).toHaveBeenCalledTimes(1);

    const unknown = vi.fn(alwaysFail(new Error("mysterious")));
    await expectRetryFailure(unknown, { maxAttempts: 5, baseDelayMs: 10 });
    expect(unknown).toHaveBeenCalledTimes(1);
  });

  // ── Custom shouldRetry ────────────────────────────────────────────────

  it("uses a custom shouldRetry predicate", async () => {
    const fn = vi.fn(failThenSucceed(new Error("custom transient"), 1));

    const promise = withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 10,
      shouldRetry: (error) => error instanceof Error && error.message === "custom transient",
    });
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe("computeDelay", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("draws from zero to the exponential ceiling", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
    expect(computeDelay(0, 100)).toBe(50);
    expect(computeDelay(2, 100)).toBe(200);
  });

  it("caps the ceiling at maxDelayMs", () => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
    expect(computeDelay(5, 100, 300)).toBe(150);
  });
});

describe("isTransientProviderError", () => {
  it("treats 5xx as transient and 4xx as permanent", () => {
    expect(isTransientProviderError(new ProviderHttpError("x", GB, 503))).toBe(true);
    expect(isTransientProviderError(new ProviderHttpError("x", GB, 400))).toBe(false);
  });
});
