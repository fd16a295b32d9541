// ---------------------------------------------------------------------------
// Token-overlap scoring for text search results.
// ---------------------------------------------------------------------------

/** Lower-cased word tokens (letters, digits and underscore, any script). */
export function wordSet(text: string | null | undefined): Set<string> {
  if (!text) return new Set();
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []);
}

/**
 * Jaccard index of the two word sets. 0 when either side has no tokens.
 */
export function tokenOverlap(
  a: string | null | undefined,
  b: string | null | undefined,
): number {
  const left = wordSet(a);
  const right = wordSet(b);
  if (left.size === 0 || right.size === 0) return 0;

  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

export const TITLE_WEIGHT = 0.7;
export const AUTHOR_WEIGHT = 0.3;

/**
 * `0.7 * overlap(title) + 0.3 * best overlap(author, any result author)`.
 */
export function scoreTextMatch(
  queryTitle: string,
  queryAuthor: string | null | undefined,
  resultTitle: string,
  resultAuthors: readonly string[],
): number {
  const titleScore = tokenOverlap(queryTitle, resultTitle);

  let authorScore = 0;
  if (queryAuthor) {
    for (const author of resultAuthors) {
      authorScore = Math.max(authorScore, tokenOverlap(queryAuthor, author));
    }
  }

  return TITLE_WEIGHT * titleScore + AUTHOR_WEIGHT * authorScore;
}
