// ---------------------------------------------------------------------------
// Run-scoped memo of successful provider matches.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";
import type { CacheConfig, CandidateMetadata } from "../core/types.js";
import { normalizeSpaces, stripAccents } from "../domain/text/normalizer.js";
import { MemoryCache } from "./memory-cache.js";

function normalizeKeyPart(value: string | null | undefined): string {
  return normalizeSpaces(stripAccents(value ?? "").toLowerCase());
}

export function textCacheKey(title: string, author?: string | null): string {
  return `text:${normalizeKeyPart(title)}|${normalizeKeyPart(author)}`;
}

export function isbnCacheKey(isbn: string): string {
  return `isbn:${isbn}`;
}

/**
 * Only hits are stored; a miss is retried the next time the same query
 * comes up. Entries do not expire within a run.
 */
export class MatchCache {
  private readonly cache: MemoryCache<Readonly<CandidateMetadata>>;
  private readonly enabled: boolean;
  private readonly logger: Logger;

  constructor(config: CacheConfig, logger: Logger) {
    this.cache = new MemoryCache(config.maxEntries);
    this.enabled = config.enabled;
    this.logger = logger;
  }

  get(key: string): Readonly<CandidateMetadata> | null {
    if (!this.enabled) return null;

    const hit = this.cache.get(key);
    this.logger.debug({ key }, hit ? "cache hit" : "cache miss");
    return hit;
  }

  set(key: string, match: Readonly<CandidateMetadata>): void {
    if (!this.enabled) return;
    this.cache.set(key, match);
    this.logger.debug({ key }, "cache set");
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
