import { describe, it, expect } from "vitest";
import pino from "pino";

import { MatchCache, isbnCacheKey, textCacheKey } from "../../../src/cache/match-cache.js";
import type { CandidateMetadata } from "../../../src/core/types.js";
import { MetadataSource } from "../../../src/core/types.js";

const logger = pino({ level: "silent" });

const shining: CandidateMetadata = {
  title: "The Shining",
  authors: ["Stephen King"],
  publishedYear: "1977",
  categories: ["Fiction"],
  coverImageUrls: {},
  source: MetadataSource.EXTERNAL_SEARCH,
  confidenceScore: 1,
  providerLabel: "Google Books",
};

describe("cache keys", () => {
  it("normalizes case, accents and spacing", () => {
    expect(textCacheKey("  Dom  Casmurro ", "Machado de Assís")).toBe(
      "text:dom casmurro|machado de assis",
    );
  });

  it("leaves the author part empty when absent", () => {
    expect(textCacheKey("Dune")).toBe("text:dune|");
  });

  it("prefixes ISBN keys", () => {
    expect(isbnCacheKey("0306406152")).toBe("isbn:0306406152");
  });
});

describe("MatchCache", () => {
  it("returns stored matches", () => {
    const cache = new MatchCache({ enabled: true, maxEntries: 10 }, logger);
    cache.set(textCacheKey("The Shining"), shining);
    expect(cache.get(textCacheKey("the shining"))).toEqual(shining);
    expect(cache.size).toBe(1);
  });

  it("misses for unknown keys", () => {
    const cache = new MatchCache({ enabled: true, maxEntries: 10 }, logger);
    expect(cache.get(isbnCacheKey("0306406152"))).toBeNull();
  });

  it("stores nothing when disabled", () => {
    const cache = new MatchCache({ enabled: false, maxEntries: 10 }, logger);
    cache.set("k", shining);
    expect(cache.get("k")).toBeNull();
    expect(cache.size).toBe(0);
  });

  it("clear empties the cache", () => {
    const cache = new MatchCache({ enabled: true, maxEntries: 10 }, logger);
    cache.set("k", shining);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
