// ---------------------------------------------------------------------------
// Filing decision: primary author, genre, year, file name and destination
// folder for an accepted record.
// ---------------------------------------------------------------------------

import path from "node:path";
import type { HeuristicsData } from "../../config/heuristics.js";
import { defaultHeuristics } from "../../config/heuristics.js";
import type { OrganizeMode } from "../../core/types.js";
import { normalizeSpaces, sanitizeForFilesystem } from "../text/normalizer.js";

export const UNKNOWN_AUTHOR = "Unknown Author";
export const GENERAL_GENRE = "General";
export const NO_DATE = "n.d.";
export const UNTITLED = "Untitled";

export const DEFAULT_FILENAME_PATTERN = "{author} - {title} ({year})";

/**
 * First author, "Surname, Given" reordered to "Given Surname", parentheses
 * removed. Placeholder or symbol-only names become {@link UNKNOWN_AUTHOR}.
 */
export function choosePrimaryAuthor(
  authors: readonly string[] | undefined,
  heuristics: HeuristicsData = defaultHeuristics(),
): string {
  const first = authors?.[0];
  if (!first) return UNKNOWN_AUTHOR;

  let author = first;
  if (author.includes(",")) {
    const parts = author.split(",").map((p) => p.trim());
    const [surname, given] = parts;
    if (surname !== undefined && given !== undefined) {
      author = `${given} ${surname}`;
    }
  }

  author = normalizeSpaces(author.replace(/\([^)]*\)/g, ""));

  if (
    author.length < 3 ||
    heuristics.placeholderAuthors.includes(author.toLowerCase()) ||
    !/\p{L}/u.test(author)
  ) {
    return UNKNOWN_AUTHOR;
  }

  return author;
}

/** Shortest category, sanitized. */
export function choosePrimaryGenre(categories: readonly string[] | undefined): string {
  if (!categories || categories.length === 0) return GENERAL_GENRE;
  const shortest = [...categories].sort((a, b) => a.length - b.length)[0] ?? "";
  return sanitizeForFilesystem(shortest) || GENERAL_GENRE;
}

/** First four-digit run of a date-like string, or {@link NO_DATE}. */
export function yearFrom(value: string | null | undefined): string {
  if (!value) return NO_DATE;
  return /(\d{4})/.exec(value)?.[1] ?? NO_DATE;
}

export interface FileNameParts {
  author: string;
  title: string;
  year: string;
}

/**
 * Substitute `{author}`, `{title}` and `{year}` into the pattern, sanitize,
 * and append the lower-cased original extension.
 */
export function buildFileName(
  pattern: string,
  parts: FileNameParts,
  extension: string,
  maxLen = 180,
): string {
  const raw = pattern.replace(/\{(author|title|year)\}/g, (_m, key: keyof FileNameParts) => parts[key]);
  const ext = extension ? extension.toLowerCase() : ".unknown";
  return sanitizeForFilesystem(raw, maxLen) + ext;
}

/** `<dest>/<Author>/` or `<dest>/<Genre>/<Author>/`. */
export function planDestinationDir(
  destinationRoot: string,
  mode: OrganizeMode,
  author: string,
  genre: string,
): string {
  const authorDir = sanitizeForFilesystem(author) || UNKNOWN_AUTHOR;
  if (mode === "genre") {
    return path.join(destinationRoot, sanitizeForFilesystem(genre) || GENERAL_GENRE, authorDir);
  }
  return path.join(destinationRoot, authorDir);
}

export interface FilingPlan {
  author: string;
  genre: string;
  year: string;
  title: string;
  directory: string;
  fileName: string;
}

export interface PlanInput {
  title: string;
  authors: readonly string[];
  publishedYear?: string;
  categories: readonly string[];
}

export interface PlanOptions {
  destinationRoot: string;
  organizeMode: OrganizeMode;
  fileNamePattern: string;
  maxFileNameLength: number;
  heuristics?: HeuristicsData;
}

export function planFiling(
  metadata: PlanInput,
  extension: string,
  options: PlanOptions,
): FilingPlan {
  const author = choosePrimaryAuthor(metadata.authors, options.heuristics);
  const genre = choosePrimaryGenre(metadata.categories);
  const year = yearFrom(metadata.publishedYear);
  const title = metadata.title.trim() || UNTITLED;

  return {
    author,
    genre,
    year,
    title,
    directory: planDestinationDir(options.destinationRoot, options.organizeMode, author, genre),
    fileName: buildFileName(
      options.fileNamePattern,
      { author, title, year },
      extension,
      options.maxFileNameLength,
    ),
  };
}
