// ---------------------------------------------------------------------------
// Filename parser: split a cleaned file name into title and author.
// ---------------------------------------------------------------------------

import type { HeuristicsData } from "../../config/heuristics.js";
import { defaultHeuristics } from "../../config/heuristics.js";
import { isKnownAuthor, looksLikeAuthor, looksLikeTitle } from "./classifiers.js";
import {
  DEFAULT_FILENAME_PATTERNS,
  extractYear,
  findPattern,
  stripYearGroups,
  type FilenamePattern,
  type FilenamePatternName,
} from "./patterns.js";

export interface ParsedFilename {
  title: string;
  author: string | null;
  year: string | null;
  /** Which rule produced the split. */
  pattern: FilenamePatternName | "known-author" | "whole-name";
}

export interface FilenameParserOptions {
  heuristics?: HeuristicsData;
  /** Pattern order; defaults to {@link DEFAULT_FILENAME_PATTERNS}. */
  patterns?: readonly (FilenamePattern | FilenamePatternName)[];
}

const SEPARATORS = ["-", "–", "—", ":"];

export class FilenameParser {
  private readonly heuristics: HeuristicsData;
  private readonly patterns: readonly FilenamePattern[];

  constructor(options: FilenameParserOptions = {}) {
    this.heuristics = options.heuristics ?? defaultHeuristics();
    this.patterns = (options.patterns ?? DEFAULT_FILENAME_PATTERNS).map((p) =>
      typeof p === "string" ? findPattern(p) : p,
    );
  }

  /**
   * `name` is expected without extension and already cleaned of junk.
   * Returns null only for an empty name.
   */
  parse(name: string): ParsedFilename | null {
    const text = name.trim();
    if (!text) return null;

    const year = extractYear(text);

    const known = this.matchKnownAuthor(text);
    if (known) return { ...known, year, pattern: "known-author" };

    for (const pattern of this.patterns) {
      const match = pattern.match(text);
      if (!match) continue;

      const decided = this.assign(match.groups, pattern.strict);
      if (!decided) continue;

      return {
        title: decided.title,
        author: decided.author,
        year: match.year ?? year,
        pattern: pattern.name,
      };
    }

    return { title: text, author: null, year, pattern: "whole-name" };
  }

  // ── Private helpers ────────────────────────────────────────────────────

  /**
   * A known author at the start ("Stephen King - The Shining") or anywhere
   * after the title ("The Shining - Stephen King").
   */
  private matchKnownAuthor(text: string): { title: string; author: string } | null {
    const lower = text.toLowerCase();

    for (const author of this.heuristics.knownAuthors) {
      const index = lower.indexOf(author.toLowerCase());
      if (index < 0) continue;

      if (index === 0) {
        const rest = text.slice(author.length).trim();
        if (!SEPARATORS.includes(rest.charAt(0))) continue;
        const title = stripYearGroups(rest.slice(1).trim());
        if (looksLikeTitle(title)) return { title, author };
        continue;
      }

      let title = text.slice(0, index).trim();
      if (SEPARATORS.includes(title.charAt(title.length - 1))) {
        title = title.slice(0, -1).trim();
      }
      title = stripYearGroups(title.replace(/\s+(?:by|por)$/i, ""));
      if (looksLikeTitle(title)) return { title, author };
    }

    return null;
  }

  /**
   * Decide which group is the title. Known authors decide first; then the
   * ordering where exactly one side looks like an author and the other like a
   * title; otherwise the pattern's own order.
   */
  private assign(
    groups: [string, string],
    strict: boolean,
  ): { title: string; author: string } | null {
    const [first, second] = groups;
    const h = this.heuristics;

    if (isKnownAuthor(second, h) && looksLikeTitle(first)) {
      return { title: first, author: second };
    }
    if (isKnownAuthor(first, h) && looksLikeTitle(second)) {
      return { title: second, author: first };
    }

    const asGiven = looksLikeTitle(first) && looksLikeAuthor(second, h);
    const swapped = looksLikeAuthor(first, h) && looksLikeTitle(second);

    if (swapped && !asGiven) return { title: second, author: first };
    if (asGiven || !strict) return { title: first, author: second };
    return null;
  }
}
