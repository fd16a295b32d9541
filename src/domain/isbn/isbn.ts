// ---------------------------------------------------------------------------
// ISBN normalisation, plausibility and conversion.
// ---------------------------------------------------------------------------

import type {
  ISBN,
  ISBN10,
  ISBN13,
  ISBNParseResult,
  RawISBN,
} from "../../core/types.js";
import {
  computeISBN10CheckDigit,
  computeISBN13CheckDigit,
  hasValidISBN10Checksum,
  hasValidISBN13Checksum,
} from "./check-digit.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Keep only digits and the check character 'X', upper-cased. */
export function normalizeISBNCandidate(raw: string): string {
  return raw.toUpperCase().replace(/[^\dX]/g, "");
}

/** Prefixes that only show up on filler or template text. */
const PLACEHOLDER_PREFIXES = ["0000", "1111", "1234", "9999"];

/**
 * Placeholder ISBNs pass the checksum but never identify a real book:
 * one repeated digit, or an obvious filler run at the start.
 */
export function isPlaceholderISBN(candidate: string): boolean {
  const digits = normalizeISBNCandidate(candidate);
  if (digits.length === 0) return true;
  if (new Set(digits).size === 1) return true;
  return PLACEHOLDER_PREFIXES.some((prefix) => digits.startsWith(prefix));
}

// ── Validation ──────────────────────────────────────────────────────────────

/**
 * Checksum-valid and not a placeholder. `0000000000` therefore fails even
 * though its checksum adds up.
 */
export function isValidISBN10(raw: RawISBN): boolean {
  const value = normalizeISBNCandidate(raw);
  return (
    value.length === 10 &&
    hasValidISBN10Checksum(value) &&
    !isPlaceholderISBN(value)
  );
}

export function isValidISBN13(raw: RawISBN): boolean {
  const value = normalizeISBNCandidate(raw);
  return (
    value.length === 13 &&
    hasValidISBN13Checksum(value) &&
    !isPlaceholderISBN(value)
  );
}

/**
 * Parse an arbitrary string into a plausible ISBN.
 */
export function parseISBN(raw: RawISBN): ISBNParseResult {
  const value = normalizeISBNCandidate(raw);

  if (value.length === 0) {
    return { ok: false, raw, reason: "Empty string" };
  }
  if (value.length !== 10 && value.length !== 13) {
    return {
      ok: false,
      raw,
      reason: `Invalid length: expected 10 or 13 characters, got ${value.length}`,
    };
  }
  if (isPlaceholderISBN(value)) {
    return { ok: false, raw, reason: "Placeholder ISBN" };
  }
  if (value.length === 13) {
    if (!/^97[89]/.test(value)) {
      return { ok: false, raw, reason: "ISBN-13 must start with 978 or 979" };
    }
    if (!hasValidISBN13Checksum(value)) {
      return { ok: false, raw, reason: "Invalid check digit" };
    }
    return { ok: true, isbn: value as ISBN13, kind: "isbn13" };
  }
  if (!hasValidISBN10Checksum(value)) {
    return { ok: false, raw, reason: "Invalid check digit" };
  }
  return { ok: true, isbn: value as ISBN10, kind: "isbn10" };
}

// ── Conversion ──────────────────────────────────────────────────────────────

export function isbn10ToISBN13(isbn10: ISBN10): ISBN13 {
  const prefix12 = "978" + isbn10.slice(0, 9);
  return (prefix12 + computeISBN13CheckDigit(prefix12)) as ISBN13;
}

/** 979-prefixed ISBNs have no ISBN-10 form. */
export function isbn13ToISBN10(isbn13: ISBN13): ISBN10 | null {
  if (!isbn13.startsWith("978")) return null;
  const body9 = isbn13.slice(3, 12);
  return (body9 + computeISBN10CheckDigit(body9)) as ISBN10;
}

/**
 * The ISBN followed by its other-length equivalent, when one exists.
 * Providers may report either form for the same edition.
 */
export function isbnForms(isbn: ISBN): string[] {
  if (isbn.length === 10) {
    return [isbn, isbn10ToISBN13(isbn as ISBN10)];
  }
  const ten = isbn13ToISBN10(isbn as ISBN13);
  return ten ? [isbn, ten] : [isbn];
}

/** Type guard used when narrowing parsed identifiers. */
export function isISBN(value: string): value is ISBN {
  return parseISBN(value).ok;
}
