// ---------------------------------------------------------------------------
// Does a string look like a person's name, or like a book title?
// ---------------------------------------------------------------------------

import type { HeuristicsData } from "../../config/heuristics.js";
import { defaultHeuristics } from "../../config/heuristics.js";
import { wordSet } from "../matching/similarity.js";

const ALPHA_WORD = /^\p{L}+$/u;
const DIGITS_ONLY = /^\d+$/;

function startsUpper(word: string): boolean {
  const first = word.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

export function isKnownAuthor(
  text: string,
  heuristics: HeuristicsData = defaultHeuristics(),
): boolean {
  const lower = text.trim().toLowerCase();
  return heuristics.knownAuthors.some((author) => author.toLowerCase() === lower);
}

/**
 * Score-based check: one point each for capitalised words, at most four
 * words, a common surname, and two or more real words; two points for an
 * exact known-author match. Three points are needed.
 */
export function looksLikeAuthor(
  text: string,
  heuristics: HeuristicsData = defaultHeuristics(),
): boolean {
  const value = text.trim();
  if (value.length <= 2 || DIGITS_ONLY.test(value)) return false;

  const words = value.split(/\s+/);
  const lower = value.toLowerCase();

  if (words.every((word) => heuristics.stopwords.includes(word.toLowerCase()))) {
    return false;
  }

  const tokens = wordSet(value);
  if (heuristics.junkWords.some((junk) => tokens.has(junk))) return false;

  let score = 0;
  if (words.filter((word) => ALPHA_WORD.test(word)).every(startsUpper)) score += 1;
  if (words.length <= 4) score += 1;
  if (heuristics.commonSurnames.some((surname) => lower.includes(surname))) score += 1;
  if (isKnownAuthor(value, heuristics)) score += 2;
  if (words.filter((word) => word.length > 2 && ALPHA_WORD.test(word)).length >= 2) {
    score += 1;
  }

  return score >= 3;
}

/**
 * Numeric-only strings never qualify, so a title such as "1984" is not
 * recognised here.
 */
export function looksLikeTitle(text: string): boolean {
  const value = text.trim();
  if (value.length < 3 || value.length > 150) return false;
  if (DIGITS_ONLY.test(value)) return false;

  const hasCased = value.toUpperCase() !== value.toLowerCase();
  if (hasCased && value === value.toUpperCase() && value.length > 8) return false;

  const words = value.split(/\s+/);
  if (words.length >= 2) return true;
  return value.length > 4;
}

/**
 * For a free-text query of four or more words, try the last two to four
 * words as the author: "the shining stephen king" → ("the shining",
 * "stephen king"). Null when no split looks right.
 */
export function splitTrailingAuthor(
  text: string,
  heuristics: HeuristicsData = defaultHeuristics(),
): { title: string; author: string } | null {
  const words = text.trim().split(/\s+/);
  if (words.length < 4) return null;

  for (let size = 2; size < Math.min(5, words.length); size++) {
    const title = words.slice(0, -size).join(" ");
    const author = words.slice(-size).join(" ");
    if (looksLikeTitle(title) && looksLikeAuthor(author, heuristics)) {
      return { title, author };
    }
  }
  return null;
}
