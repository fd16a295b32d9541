import { describe, it, expect } from "vitest";

import { parseRetryAfter } from "../../../src/adapters/base/base-provider.js";

describe("parseRetryAfter", () => {
  it("returns null without a header", () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter("")).toBeNull();
  });

  it("reads delta-seconds", () => {
    expect(parseRetryAfter("120")).toBe(120_000);
  });

  it("clamps negative seconds to zero", () => {
    expect(parseRetryAfter("-5")).toBe(0);
  });

  it("reads an HTTP date relative to now", () => {
    expect(parseRetryAfter("Thu, 01 Jan 1970 00:00:30 GMT", 10_000)).toBe(20_000);
  });

  it("treats a date in the past as zero", () => {
    expect(parseRetryAfter("Thu, 01 Jan 1970 00:00:05 GMT", 10_000)).toBe(0);
  });

  it("returns null for an unreadable value", () => {
    expect(parseRetryAfter("soon")).toBeNull();
  });
});
