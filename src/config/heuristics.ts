// ---------------------------------------------------------------------------
// Heuristic tables (known authors, denylists, stopwords).
// Loaded from data/heuristics.json, validated with Zod, and injected into the
// filename parser, the validator and the filing rules.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";

// ── Schema ──────────────────────────────────────────────────────────────────

const wordList = z.array(z.string().min(1));

export const HeuristicsSchema = z.object({
  knownAuthors: wordList,
  commonSurnames: wordList,
  junkWords: wordList,
  stopwords: wordList,
  invalidTitles: wordList,
  invalidAuthors: wordList,
  placeholderAuthors: wordList,
});

export type HeuristicsData = Readonly<z.infer<typeof HeuristicsSchema>>;

export const DEFAULT_HEURISTICS_PATH = fileURLToPath(
  new URL("../../data/heuristics.json", import.meta.url),
);

// ── Loading ─────────────────────────────────────────────────────────────────

/**
 * Read and validate a heuristics file. Entries are lower-cased except the
 * known-author list, whose casing is kept for output.
 */
export function loadHeuristics(
  filePath: string = DEFAULT_HEURISTICS_PATH,
): HeuristicsData {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read heuristics file ${filePath}`, {
      cause: error,
    });
  }

  const result = HeuristicsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid heuristics file ${filePath}: ${result.error.message}`,
    );
  }

  const lower = (xs: string[]): string[] => xs.map((x) => x.toLowerCase());
  const data = result.data;

  return Object.freeze({
    knownAuthors: data.knownAuthors,
    commonSurnames: lower(data.commonSurnames),
    junkWords: lower(data.junkWords),
    stopwords: lower(data.stopwords),
    invalidTitles: lower(data.invalidTitles),
    invalidAuthors: lower(data.invalidAuthors),
    placeholderAuthors: lower(data.placeholderAuthors),
  });
}

let cached: HeuristicsData | null = null;

/** The bundled tables, read once per process. */
export function defaultHeuristics(): HeuristicsData {
  cached ??= loadHeuristics();
  return cached;
}
