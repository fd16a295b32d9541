// ---------------------------------------------------------------------------
// Tests for SourceMatcher: provider order, scoring thresholds, caching and
// failure handling, with in-memory providers.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, type Mock } from "vitest";
import pino from "pino";

import { SourceMatcher } from "../../../src/orchestrator/source-matcher.js";
import { MatchCache } from "../../../src/cache/match-cache.js";
import { SimulationProvider } from "../../../src/adapters/simulation/simulation-provider.js";
import type {
  BookMetadataProvider,
  ISBN13,
  LogSink,
  ProviderId,
  ProviderItem,
} from "../../../src/core/types.js";

// ── Fixtures ─────────────────────────────────────────────────────────────

const TEST_ISBN = "9780306406157" as ISBN13;

function item(overrides: Partial<ProviderItem> = {}): ProviderItem {
  return {
    title: "Dune",
    authors: ["Frank Herbert"],
    publishedDate: "1965-08-01",
    categories: ["Fiction"],
    coverImageUrls: {},
    identifiers: [],
    ...overrides,
  };
}

interface FakeProvider extends BookMetadataProvider {
  lookupIsbn: Mock<BookMetadataProvider["lookupIsbn"]>;
  searchText: Mock<BookMetadataProvider["searchText"]>;
}

function fakeProvider(
  id: ProviderId,
  label: string,
  results: { isbn?: ProviderItem[]; text?: ProviderItem[] } = {},
  available = true,
): FakeProvider {
  return {
    id,
    label,
    isAvailable: () => available,
    lookupIsbn: vi.fn<BookMetadataProvider["lookupIsbn"]>().mockResolvedValue(results.isbn ?? []),
    searchText: vi.fn<BookMetadataProvider["searchText"]>().mockResolvedValue(results.text ?? []),
  };
}

function createMatcher(
  providers: BookMetadataProvider[],
  extra: { sink?: LogSink; cache?: MatchCache; simulation?: BookMetadataProvider } = {},
) {
  return new SourceMatcher({ providers, logger: pino({ level: "silent" }), ...extra });
}

// ── ISBN lookup ──────────────────────────────────────────────────────────

describe("SourceMatcher.lookupByIsbn", () => {
  it("accepts an item whose identifiers contain the other ISBN form", async () => {
    const alpha = fakeProvider("google_books", "Alpha", {
      isbn: [item({ identifiers: ["0306406152"], categories: ["Fiction", "Fiction"] })],
    });
    const beta = fakeProvider("open_library", "Beta");

    const match = await createMatcher([alpha, beta]).lookupByIsbn(TEST_ISBN);

    expect(match).toEqual({
      title: "Dune",
      authors: ["Frank Herbert"],
      publishedYear: "1965",
      categories: ["Fiction"],
      coverImageUrls: {},
      source: "isbn_lookup",
      confidenceScore: 1,
      providerLabel: "Alpha (ISBN)",
    });
    expect(beta.lookupIsbn).not.toHaveBeenCalled();
  });

  it("skips items without the identifier or with a too-short author", async () => {
    const alpha = fakeProvider("google_books", "Alpha", {
      isbn: [
        item({ identifiers: ["9780000000002"] }),
        item({ identifiers: [TEST_ISBN], authors: ["Al"] }),
      ],
    });
    const beta = fakeProvider("open_library", "Beta", {
      isbn: [item({ identifiers: [TEST_ISBN] })],
    });

    const match = await createMatcher([alpha, beta]).lookupByIsbn(TEST_ISBN);

    expect(match?.providerLabel).toBe("Beta (ISBN)");
  });

  it("returns null when no provider confirms the ISBN", async () => {
    const alpha = fakeProvider("google_books", "Alpha", { isbn: [item()] });
    await expect(createMatcher([alpha]).lookupByIsbn(TEST_ISBN)).resolves.toBeNull();
  });

  it("serves a repeated lookup from the cache", async () => {
    const alpha = fakeProvider("google_books", "Alpha", {
      isbn: [item({ identifiers: [TEST_ISBN] })],
    });
    const cache = new MatchCache({ enabled: true, maxEntries: 10 }, pino({ level: "silent" }));
    const matcher = createMatcher([alpha], { cache });

    await matcher.lookupByIsbn(TEST_ISBN);
    const second = await matcher.lookupByIsbn(TEST_ISBN);

    expect(second?.title).toBe("Dune");
    expect(alpha.lookupIsbn).toHaveBeenCalledTimes(1);
  });
});

// ── Text search ──────────────────────────────────────────────────────────

describe("SourceMatcher.searchByText", () => {
  it("stops at the first provider with a strong match", async () => {
    const alpha = fakeProvider("google_books", "Alpha", { text: [item()] });
    const beta = fakeProvider("open_library", "Beta", { text: [item()] });

    const match = await createMatcher([alpha, beta]).searchByText({
      title: "Dune",
      author: "Frank Herbert",
    });

    expect(match).toMatchObject({
      source: "external_search",
      confidenceScore: 1,
      providerLabel: "Alpha",
    });
    expect(beta.searchText).not.toHaveBeenCalled();
  });

  it("keeps searching after a weak match and returns the best overall", async () => {
    const alpha = fakeProvider("google_books", "Alpha", {
      text: [item({ title: "Dune Messiah", authors: [] })],
    });
    const beta = fakeProvider("open_library", "Beta", { text: [item()] });

    const match = await createMatcher([alpha, beta]).searchByText({
      title: "Dune",
      author: "Frank Herbert",
    });

    expect(match?.providerLabel).toBe("Beta");
    expect(match?.title).toBe("Dune");
  });

  it("accepts a score between the usable and early-stop thresholds", async () => {
    const alpha = fakeProvider("google_books", "Alpha", {
      text: [item({ title: "Dune Messiah", authors: [] })],
    });

    const match = await createMatcher([alpha]).searchByText({ title: "Dune", author: "Frank Herbert" });

    expect(match?.confidenceScore).toBeCloseTo(0.35, 10);
  });

  it("rejects scores at or below the usable threshold", async () => {
    const alpha = fakeProvider("google_books", "Alpha", {
      text: [item({ title: "Dune Messiah Children", authors: [] })],
    });

    await expect(
      createMatcher([alpha]).searchByText({ title: "Dune", author: "Frank Herbert" }),
    ).resolves.toBeNull();
  });

  it("skips unavailable providers", async () => {
    const alpha = fakeProvider("isbndb", "Alpha", { text: [item()] }, false);

    await expect(createMatcher([alpha]).searchByText({ title: "Dune" })).resolves.toBeNull();
    expect(alpha.searchText).not.toHaveBeenCalled();
  });

  it("turns a provider failure into a warning and moves on", async () => {
    const alpha = fakeProvider("google_books", "Alpha");
    alpha.searchText.mockRejectedValueOnce(new Error("boom"));
    const beta = fakeProvider("open_library", "Beta", { text: [item()] });
    const sink = { log: vi.fn<LogSink["log"]>() };

    const match = await createMatcher([alpha, beta], { sink }).searchByText({ title: "Dune" });

    expect(match?.providerLabel).toBe("Beta");
    expect(sink.log).toHaveBeenCalledWith("Alpha search failed: boom", "warning");
  });
});

// ── Simulation & combined search ─────────────────────────────────────────

describe("SourceMatcher.simulate", () => {
  const entries = [
    { key: "dune", title: "Dune", authors: ["Frank Herbert"], publishedDate: "1965", categories: [] },
  ];

  it("returns null when simulation is disabled", async () => {
    const matcher = createMatcher([], { simulation: new SimulationProvider(false, entries) });
    await expect(matcher.simulate("dune")).resolves.toBeNull();
  });

  it("scores table hits at 0.6", async () => {
    const matcher = createMatcher([], { simulation: new SimulationProvider(true, entries) });

    const match = await matcher.simulate("dune frank herbert");

    expect(match).toEqual({
      title: "Dune",
      authors: ["Frank Herbert"],
      publishedYear: "1965",
      categories: [],
      coverImageUrls: {},
      source: "simulation",
      confidenceScore: 0.6,
      providerLabel: "Simulation",
    });
  });
});

describe("SourceMatcher.search", () => {
  it("falls back from ISBN lookup to text search", async () => {
    const alpha = fakeProvider("google_books", "Alpha", { text: [item()] });

    const match = await createMatcher([alpha]).search({
      isbn: TEST_ISBN,
      title: "Dune",
      author: "Frank Herbert",
    });

    expect(alpha.lookupIsbn).toHaveBeenCalledWith(TEST_ISBN);
    expect(alpha.searchText).toHaveBeenCalledWith({ title: "Dune", author: "Frank Herbert" });
    expect(match?.source).toBe("external_search");
  });

  it("returns null without an ISBN or title", async () => {
    await expect(createMatcher([]).search({ title: "  " })).resolves.toBeNull();
  });
});
