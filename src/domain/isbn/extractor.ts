// ---------------------------------------------------------------------------
// ISBN extraction from document text.
// Scans a bounded window of pages with an ordered list of patterns and
// returns the first plausible ISBN seen near a bibliographic keyword.
// ---------------------------------------------------------------------------

import type { ISBN } from "../../core/types.js";
import { normalizeISBNCandidate, parseISBN } from "./isbn.js";

// ── Patterns ────────────────────────────────────────────────────────────────

export interface IsbnPattern {
  name: string;
  /** Must carry the `g` flag. Capture group 1 is the ISBN body. */
  regex: RegExp;
}

/** Scan order is significant: earlier patterns win. */
export const DEFAULT_ISBN_PATTERNS: readonly IsbnPattern[] = [
  {
    name: "labelled",
    regex: /ISBN(?:-?1[03])?\s*:?\s*([0-9X][0-9X-]{9,16})/gi,
  },
  {
    name: "labelled-spaced",
    regex: /ISBN(?:-?1[03])?\s*:?\s*((?:97[89][\s-]?)?(?:\d[\s-]?){9}[\dX])/gi,
  },
  {
    name: "bare-bookland",
    regex: /(?<!\d)(97[89]-?\d{1,5}-?\d{1,7}-?\d{1,6}-?\d)(?!\d)/g,
  },
];

export const DEFAULT_CONTEXT_KEYWORDS: readonly string[] = [
  "isbn",
  "book",
  "edition",
  "publish",
];

/** Byte-oriented files are scanned over their first and last bytes only. */
export const BYTE_HEAD_WINDOW = 100_000;
export const BYTE_TAIL_WINDOW = 20_000;

export interface IsbnExtractorOptions {
  patterns?: readonly IsbnPattern[];
  contextKeywords?: readonly string[];
  /** Characters inspected on each side of a match. */
  contextRadius?: number;
  headPages?: number;
  tailPages?: number;
}

// ── Extractor ───────────────────────────────────────────────────────────────

export class IsbnExtractor {
  private readonly patterns: readonly IsbnPattern[];
  private readonly contextKeywords: readonly string[];
  private readonly contextRadius: number;
  private readonly headPages: number;
  private readonly tailPages: number;

  constructor(options: IsbnExtractorOptions = {}) {
    this.patterns = options.patterns ?? DEFAULT_ISBN_PATTERNS;
    this.contextKeywords = options.contextKeywords ?? DEFAULT_CONTEXT_KEYWORDS;
    this.contextRadius = options.contextRadius ?? 50;
    this.headPages = options.headPages ?? 5;
    this.tailPages = options.tailPages ?? 2;
  }

  /**
   * Select the first `headPages` and last `tailPages` pages (no page twice)
   * and scan them as one text.
   */
  extractFromPages(pages: readonly string[]): ISBN | null {
    return this.extractFromText(this.selectWindow(pages).join(" "));
  }

  extractFromText(text: string): ISBN | null {
    if (!text) return null;

    for (const pattern of this.patterns) {
      for (const match of text.matchAll(pattern.regex)) {
        const body = match[1] ?? match[0];
        const candidate = this.accept(body, text, match.index ?? 0, match[0].length);
        if (candidate) return candidate;
      }
    }

    return null;
  }

  selectWindow(pages: readonly string[]): string[] {
    if (pages.length <= this.headPages + this.tailPages) {
      return [...pages];
    }
    return [
      ...pages.slice(0, this.headPages),
      ...pages.slice(pages.length - this.tailPages),
    ];
  }

  // ── Private helpers ────────────────────────────────────────────────────

  private accept(
    body: string,
    text: string,
    start: number,
    length: number,
  ): ISBN | null {
    const digits = normalizeISBNCandidate(body);
    if (digits.length !== 10 && digits.length !== 13) return null;

    // Coincidental digit runs (tables, serial numbers) repeat few digits.
    if (new Set(digits).size <= 4) return null;

    const parsed = parseISBN(digits);
    if (!parsed.ok) return null;

    const context = text
      .slice(Math.max(0, start - this.contextRadius), start + length + this.contextRadius)
      .toLowerCase();
    if (!this.contextKeywords.some((keyword) => context.includes(keyword))) {
      return null;
    }

    return parsed.isbn;
  }
}
