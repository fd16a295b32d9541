// ---------------------------------------------------------------------------
// Ordered structural patterns for "title / author" file names.
// Each matcher returns its groups as [title candidate, author candidate];
// the parser decides the final assignment.
// ---------------------------------------------------------------------------

export type FilenamePatternName =
  | "title-author-year"
  | "title-year-author"
  | "title-paren-author"
  | "dash-separator"
  | "title-by-author"
  | "author-colon-title"
  | "title-comma-author";

export interface PatternMatch {
  /** [default title, default author]; numeric-only groups already removed. */
  groups: [string, string];
  year: string | null;
}

export interface FilenamePattern {
  readonly name: FilenamePatternName;
  /**
   * Strict patterns only count when one of the two orderings actually looks
   * like (title, author); otherwise the parser moves on to the next pattern.
   */
  readonly strict: boolean;
  match(text: string): PatternMatch | null;
}

const YEAR_GROUP = String.raw`[(\[](\d{4})[)\]]`;
const DASH = String.raw`\s*[-–—]\s*`;
const DIGITS_ONLY = /^\d+$/;

interface RegexPatternDef {
  name: FilenamePatternName;
  regex: RegExp;
  /** Capture indexes of the title and author candidates. */
  title: number;
  author: number;
  year?: number;
  strict?: boolean;
}

function regexPattern(def: RegexPatternDef): FilenamePattern {
  return {
    name: def.name,
    strict: def.strict ?? false,
    match(text: string): PatternMatch | null {
      const m = def.regex.exec(text);
      if (!m) return null;

      const title = (m[def.title] ?? "").trim();
      const author = (m[def.author] ?? "").trim();
      if (!title || !author) return null;
      if (DIGITS_ONLY.test(title) || DIGITS_ONLY.test(author)) return null;

      const year = def.year !== undefined ? (m[def.year] ?? null) : null;
      return { groups: [title, author], year };
    },
  };
}

export const DEFAULT_FILENAME_PATTERNS: readonly FilenamePattern[] = [
  regexPattern({
    name: "title-author-year",
    regex: new RegExp(`^(.+?)${DASH}(.+?)\\s*${YEAR_GROUP}`, "i"),
    title: 1,
    author: 2,
    year: 3,
  }),
  regexPattern({
    name: "title-year-author",
    regex: new RegExp(`^(.+?)\\s*${YEAR_GROUP}${DASH}(.+)$`, "i"),
    title: 1,
    author: 3,
    year: 2,
  }),
  regexPattern({
    name: "title-paren-author",
    regex: /^(.+?)\s*[(\[]([^)\]]+)[)\]]/,
    title: 1,
    author: 2,
    strict: true,
  }),
  regexPattern({
    name: "dash-separator",
    regex: new RegExp(`^(.+?)${DASH}(.+)$`),
    title: 1,
    author: 2,
  }),
  regexPattern({
    name: "title-by-author",
    regex: /^(.+?)\s+(?:by|por)\s+(.+)$/i,
    title: 1,
    author: 2,
  }),
  regexPattern({
    name: "author-colon-title",
    regex: /^(.+?)\s*:\s*(.+)$/,
    title: 2,
    author: 1,
  }),
  regexPattern({
    name: "title-comma-author",
    regex: /^(.+?)\s*,\s*(.+)$/,
    title: 1,
    author: 2,
  }),
];

export function findPattern(name: FilenamePatternName): FilenamePattern {
  const pattern = DEFAULT_FILENAME_PATTERNS.find((p) => p.name === name);
  if (!pattern) throw new RangeError(`Unknown filename pattern "${name}"`);
  return pattern;
}

// ── Year ────────────────────────────────────────────────────────────────────

const YEAR_PATTERNS: readonly RegExp[] = [
  /[(\[](\d{4})[)\]]/g,
  /\b(\d{4})\b/g,
];

/**
 * First plausible year (1000 to next year) in the text. Bracketed years win
 * over bare ones.
 */
export function extractYear(text: string, now: Date = new Date()): string | null {
  const maxYear = now.getFullYear() + 1;
  for (const pattern of YEAR_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const year = match[1];
      if (year === undefined) continue;
      const value = Number(year);
      if (value >= 1000 && value <= maxYear) return year;
    }
  }
  return null;
}

/** Remove "(1977)" / "[1977]" groups. */
export function stripYearGroups(text: string): string {
  return text.replace(/\s*[(\[]\d{4}[)\]]\s*/g, " ").trim();
}
