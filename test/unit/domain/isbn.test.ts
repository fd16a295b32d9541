// ---------------------------------------------------------------------------
// Tests for ISBN check digits, validation and conversion.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import {
  isbn10ToISBN13,
  isbn13ToISBN10,
  isbnForms,
  isPlaceholderISBN,
  isValidISBN10,
  isValidISBN13,
  normalizeISBNCandidate,
  parseISBN,
} from "../../../src/domain/isbn/isbn.js";
import {
  computeISBN10CheckDigit,
  computeISBN13CheckDigit,
  hasValidISBN10Checksum,
  hasValidISBN13Checksum,
} from "../../../src/domain/isbn/check-digit.js";
import type { ISBN } from "../../../src/core/types.js";

function mustParse(raw: string): ISBN {
  const result = parseISBN(raw);
  if (!result.ok) throw new Error(`expected ${raw} to parse: ${result.reason}`);
  return result.isbn;
}

// ── Check digits ────────────────────────────────────────────────────────────

describe("computeISBN10CheckDigit", () => {
  it("computes the check digit of a known ISBN-10", () => {
    expect(computeISBN10CheckDigit("030640615")).toBe("2");
  });

  it("returns X when the check value is 10", () => {
    expect(computeISBN10CheckDigit("080442957")).toBe("X");
  });

  it("throws for input that is not 9 digits", () => {
    expect(() => computeISBN10CheckDigit("12345")).toThrow();
    expect(() => computeISBN10CheckDigit("12345678X")).toThrow();
  });
});

describe("computeISBN13CheckDigit", () => {
  it("computes the check digit of a known ISBN-13", () => {
    expect(computeISBN13CheckDigit("978030640615")).toBe("7");
  });

  it("throws for input that is not 12 digits", () => {
    expect(() => computeISBN13CheckDigit("97803064061")).toThrow();
  });
});

describe("checksums", () => {
  it("accepts valid ISBN-10 checksums, including X", () => {
    expect(hasValidISBN10Checksum("0306406152")).toBe(true);
    expect(hasValidISBN10Checksum("080442957x")).toBe(true);
  });

  it("rejects a wrong ISBN-10 check digit", () => {
    expect(hasValidISBN10Checksum("0306406153")).toBe(false);
  });

  it("only accepts Bookland prefixes for ISBN-13", () => {
    expect(hasValidISBN13Checksum("9780306406157")).toBe(true);
    expect(hasValidISBN13Checksum("9780306406158")).toBe(false);
    expect(hasValidISBN13Checksum("1000000000009")).toBe(false);
  });

  it("counts the all-zero ISBN-10 as checksum-valid", () => {
    expect(hasValidISBN10Checksum("0000000000")).toBe(true);
  });
});

// ── Validation ──────────────────────────────────────────────────────────────

describe("isValidISBN10 / isValidISBN13", () => {
  it("accepts formatted input", () => {
    expect(isValidISBN10("0-306-40615-2")).toBe(true);
    expect(isValidISBN13("978-0-306-40615-7")).toBe(true);
  });

  it("rejects placeholders even when the checksum adds up", () => {
    expect(isValidISBN10("0000000000")).toBe(false);
  });

  it("rejects the wrong length", () => {
    expect(isValidISBN10("9780306406157")).toBe(false);
    expect(isValidISBN13("0306406152")).toBe(false);
  });
});

describe("isPlaceholderISBN", () => {
  it("flags repeated digits and filler prefixes", () => {
    expect(isPlaceholderISBN("1111111111")).toBe(true);
    expect(isPlaceholderISBN("1234567890")).toBe(true);
    expect(isPlaceholderISBN("")).toBe(true);
  });

  it("does not flag a real ISBN", () => {
    expect(isPlaceholderISBN("0306406152")).toBe(false);
  });
});

describe("normalizeISBNCandidate", () => {
  it("keeps digits and an upper-case X", () => {
    expect(normalizeISBNCandidate("isbn 0-8044-2957-x")).toBe("080442957X");
  });
});

describe("parseISBN", () => {
  it("parses a hyphenated ISBN-13", () => {
    expect(parseISBN("978-0-306-40615-7")).toEqual({
      ok: true,
      isbn: "9780306406157",
      kind: "isbn13",
    });
  });

  it("parses an ISBN-10", () => {
    expect(parseISBN("0306406152")).toEqual({ ok: true, isbn: "0306406152", kind: "isbn10" });
  });

  it("reports an invalid length", () => {
    expect(parseISBN("12345")).toEqual({
      ok: false,
      raw: "12345",
      reason: "Invalid length: expected 10 or 13 characters, got 5",
    });
  });

  it("reports a placeholder", () => {
    expect(parseISBN("0000000000")).toEqual({
      ok: false,
      raw: "0000000000",
      reason: "Placeholder ISBN",
    });
  });

  it("rejects a 13-digit value without a Bookland prefix", () => {
    const result = parseISBN("1000000000000");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("ISBN-13 must start with 978 or 979");
  });

  it("rejects a bad check digit", () => {
    const result = parseISBN("0306406153");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("Invalid check digit");
  });

  it("reports an empty string", () => {
    const result = parseISBN("--");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.reason).toBe("Empty string");
  });
});

// ── Conversion ──────────────────────────────────────────────────────────────

describe("conversion", () => {
  it("converts ISBN-10 to ISBN-13 and back", () => {
    const ten = parseISBN("0306406152");
    if (!ten.ok || ten.kind !== "isbn10") throw new Error("expected an ISBN-10");

    const thirteen = isbn10ToISBN13(ten.isbn);
    expect(thirteen).toBe("9780306406157");
    expect(isbn13ToISBN10(thirteen)).toBe("0306406152");
  });

  it("has no ISBN-10 form for 979 prefixes", () => {
    const result = parseISBN("9791090636071");
    if (!result.ok || result.kind !== "isbn13") throw new Error("expected an ISBN-13");
    expect(isbn13ToISBN10(result.isbn)).toBeNull();
  });

  it("isbnForms lists the ISBN first, then its other form", () => {
    expect(isbnForms(mustParse("0306406152"))).toEqual(["0306406152", "9780306406157"]);
    expect(isbnForms(mustParse("9780306406157"))).toEqual(["9780306406157", "0306406152"]);
    expect(isbnForms(mustParse("9791090636071"))).toEqual(["9791090636071"]);
  });
});
