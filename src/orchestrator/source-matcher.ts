// ---------------------------------------------------------------------------
// Source matcher: queries providers in priority order and returns the best
// scored candidate, or null.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  BookMetadataProvider,
  CandidateMetadata,
  ISBN,
  LogSink,
  ProviderItem,
  TextQuery,
} from "../core/types.js";
import { MetadataSource } from "../core/types.js";
import { isbnCacheKey, textCacheKey, type MatchCache } from "../cache/match-cache.js";
import { isbnForms } from "../domain/isbn/isbn.js";
import { scoreTextMatch } from "../domain/matching/similarity.js";

/** A text result must score strictly above this to be usable. */
export const MIN_TEXT_SCORE = 0.3;
/**
 * Provider iteration stops once the best score is above this. A best score
 * of exactly 0.4 keeps trying later providers, yet the cascade still
 * accepts it (`TEXT_ACCEPT_SCORE` is inclusive).
 */
export const EARLY_STOP_SCORE = 0.4;
/** Confidence given to an exact identifier match. */
export const ISBN_MATCH_SCORE = 1.0;
/** Confidence given to a simulation table hit. */
export const SIMULATION_SCORE = 0.6;

export interface SourceMatcherOptions {
  /** Network providers in priority order. */
  providers: readonly BookMetadataProvider[];
  /** Offline last resort; consulted only through {@link SourceMatcher.simulate}. */
  simulation?: BookMetadataProvider | null;
  cache?: MatchCache | null;
  logger: Logger;
  sink?: LogSink;
  minTextScore?: number;
  earlyStopScore?: number;
}

export interface SearchRequest {
  title?: string | null;
  author?: string | null;
  isbn?: ISBN | null;
}

function publishedYear(date: string | undefined): string | undefined {
  if (!date) return undefined;
  return /(\d{4})/.exec(date)?.[1];
}

function toCandidate(
  item: ProviderItem,
  source: MetadataSource,
  score: number,
  providerLabel: string,
): CandidateMetadata {
  return {
    title: item.title,
    authors: [...item.authors],
    publishedYear: publishedYear(item.publishedDate),
    categories: Array.from(new Set(item.categories)),
    coverImageUrls: { ...item.coverImageUrls },
    source,
    confidenceScore: Math.max(0, Math.min(1, score)),
    providerLabel,
  };
}

export class SourceMatcher {
  private readonly providers: readonly BookMetadataProvider[];
  private readonly simulation: BookMetadataProvider | null;
  private readonly cache: MatchCache | null;
  private readonly logger: Logger;
  private readonly sink: LogSink | null;
  private readonly minTextScore: number;
  private readonly earlyStopScore: number;

  constructor(options: SourceMatcherOptions) {
    this.providers = options.providers;
    this.simulation = options.simulation ?? null;
    this.cache = options.cache ?? null;
    this.logger = options.logger.child({ component: "SourceMatcher" });
    this.sink = options.sink ?? null;
    this.minTextScore = options.minTextScore ?? MIN_TEXT_SCORE;
    this.earlyStopScore = options.earlyStopScore ?? EARLY_STOP_SCORE;
  }

  /**
   * ISBN lookup, then title/author search, then the simulation table.
   */
  async search(request: SearchRequest): Promise<CandidateMetadata | null> {
    if (request.isbn) {
      const byIsbn = await this.lookupByIsbn(request.isbn);
      if (byIsbn) return byIsbn;
    }

    const title = request.title?.trim();
    if (!title) return null;

    const query: TextQuery = request.author ? { title, author: request.author } : { title };
    return (await this.searchByText(query)) ?? (await this.simulate(title));
  }

  /**
   * First provider item whose identifiers contain the ISBN (either form)
   * and whose title and first author are longer than two characters.
   */
  async lookupByIsbn(isbn: ISBN): Promise<CandidateMetadata | null> {
    const key = isbnCacheKey(isbn);
    const cached = this.cache?.get(key);
    if (cached) return { ...cached };

    const forms = isbnForms(isbn);

    for (const provider of this.available()) {
      const items = await this.call(provider, "ISBN lookup", () => provider.lookupIsbn(isbn));

      for (const item of items) {
        const exact = item.identifiers.some((id) => forms.includes(id));
        const firstAuthor = item.authors[0] ?? "";
        if (!exact || item.title.trim().length <= 2 || firstAuthor.trim().length <= 2) {
          continue;
        }

        const candidate = toCandidate(
          item,
          MetadataSource.ISBN_LOOKUP,
          ISBN_MATCH_SCORE,
          `${provider.label} (ISBN)`,
        );
        this.cache?.set(key, candidate);
        return candidate;
      }
    }

    return null;
  }

  /**
   * Score every result with title/author token overlap. Providers are
   * tried in order until one yields a score above the early-stop mark; the
   * overall best wins if it clears the usable threshold. Ties keep the
   * first result seen.
   */
  async searchByText(query: TextQuery): Promise<CandidateMetadata | null> {
    const title = query.title.trim();
    if (!title) return null;

    const key = textCacheKey(title, query.author);
    const cached = this.cache?.get(key);
    if (cached) return { ...cached };

    let best: { item: ProviderItem; score: number; label: string } | null = null;

    for (const provider of this.available()) {
      const items = await this.call(provider, "search", () => provider.searchText(query));

      for (const item of items) {
        const score = scoreTextMatch(title, query.author, item.title, item.authors);
        if (!best || score > best.score) {
          best = { item, score, label: provider.label };
        }
      }

      if (best && best.score > this.earlyStopScore) break;
    }

    if (!best || best.score <= this.minTextScore) {
      this.logger.debug({ title, author: query.author, bestScore: best?.score ?? 0 }, "no usable text match");
      return null;
    }

    const candidate = toCandidate(best.item, MetadataSource.EXTERNAL_SEARCH, best.score, best.label);
    this.cache?.set(key, candidate);
    return candidate;
  }

  /** Offline table lookup. Null when simulation is disabled. */
  async simulate(title: string): Promise<CandidateMetadata | null> {
    const simulation = this.simulation;
    if (!simulation || !simulation.isAvailable()) return null;

    const items = await this.call(simulation, "simulation", () => simulation.searchText({ title }));
    const first = items[0];
    if (!first) return null;

    return toCandidate(first, MetadataSource.SIMULATION, SIMULATION_SCORE, simulation.label);
  }

  // ── Private helpers ────────────────────────────────────────────────────

  private available(): BookMetadataProvider[] {
    return this.providers.filter((provider) => provider.isAvailable());
  }

  /**
   * Provider failures become an empty result plus a warning.
   */
  private async call(
    provider: BookMetadataProvider,
    operation: string,
    fn: () => Promise<ProviderItem[]>,
  ): Promise<ProviderItem[]> {
    try {
      return await fn();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ provider: provider.id, operation, err: error }, "provider call failed");
      this.sink?.log(`${provider.label} ${operation} failed: ${message}`, "warning");
      return [];
    }
  }
}
