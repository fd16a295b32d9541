// ---------------------------------------------------------------------------
// Open Library provider: edition lookup by ISBN and search.json text search.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { CoverImageUrls, ISBN, ProviderItem, TextQuery } from "../../core/types.js";
import { ProviderId } from "../../core/types.js";
import {
  BaseProvider,
  identifierDigits,
  uniq,
  type ProviderContext,
} from "../base/base-provider.js";

const BASE_URL = "https://openlibrary.org";
const COVERS_URL = "https://covers.openlibrary.org/b/id";

/** Subjects kept per record. */
const MAX_SUBJECTS = 3;

// ── Response schemas ────────────────────────────────────────────────────────

const SubjectSchema = z.union([z.string(), z.object({ name: z.string() })]);

const EditionSchema = z.object({
  title: z.string().optional(),
  authors: z.array(z.object({ key: z.string().optional(), name: z.string().optional() })).optional(),
  publish_date: z.string().optional(),
  subjects: z.array(SubjectSchema).optional(),
  isbn_10: z.array(z.string()).optional(),
  isbn_13: z.array(z.string()).optional(),
  covers: z.array(z.number()).optional(),
});

const AuthorSchema = z.object({ name: z.string().optional() });

const SearchResponseSchema = z.object({
  numFound: z.number().optional(),
  docs: z
    .array(
      z.object({
        title: z.string().optional(),
        author_name: z.array(z.string()).optional(),
        first_publish_year: z.number().optional(),
        subject: z.array(z.string()).optional(),
        cover_i: z.number().optional(),
      }),
    )
    .optional(),
});

type Edition = z.infer<typeof EditionSchema>;

export function openLibraryCoverUrls(coverId: number | undefined): CoverImageUrls {
  if (coverId === undefined || coverId <= 0) return {};
  return {
    small: `${COVERS_URL}/${coverId}-S.jpg`,
    thumbnail: `${COVERS_URL}/${coverId}-M.jpg`,
    large: `${COVERS_URL}/${coverId}-L.jpg`,
  };
}

// ── Provider ────────────────────────────────────────────────────────────────

export class OpenLibraryProvider extends BaseProvider {
  constructor(context: ProviderContext) {
    super(ProviderId.OPEN_LIBRARY, "Open Library", context);
  }

  protected async executeIsbnLookup(
    isbn: ISBN,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]> {
    const edition = await this.fetchJson(
      new URL(`${BASE_URL}/isbn/${isbn}.json`),
      EditionSchema,
      { signal },
    );
    if (!edition?.title) return [];

    const authors = await this.resolveAuthors(edition, signal);

    return [
      {
        title: edition.title,
        authors,
        publishedDate: edition.publish_date,
        categories: uniq(
          (edition.subjects ?? []).map((s) => (typeof s === "string" ? s : s.name)),
        ).slice(0, MAX_SUBJECTS),
        coverImageUrls: openLibraryCoverUrls(edition.covers?.[0]),
        identifiers: uniq(
          [...(edition.isbn_10 ?? []), ...(edition.isbn_13 ?? [])].map(identifierDigits),
        ),
      },
    ];
  }

  protected async executeTextSearch(
    query: TextQuery,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]> {
    const q = [query.title, query.author].filter(Boolean).join(" ").trim();
    if (!q) return [];

    const url = new URL(`${BASE_URL}/search.json`);
    url.searchParams.set("q", q);
    url.searchParams.set("limit", String(this.settings.maxResults));
    url.searchParams.set("fields", "title,author_name,first_publish_year,subject,cover_i");
    if (this.settings.language) url.searchParams.set("lang", this.settings.language);

    const data = await this.fetchJson(url, SearchResponseSchema, { signal });

    const results: ProviderItem[] = [];
    for (const doc of data?.docs ?? []) {
      if (!doc.title) continue;
      results.push({
        title: doc.title,
        authors: doc.author_name ?? [],
        publishedDate:
          doc.first_publish_year !== undefined ? String(doc.first_publish_year) : undefined,
        categories: uniq(doc.subject ?? []).slice(0, MAX_SUBJECTS),
        coverImageUrls: openLibraryCoverUrls(doc.cover_i),
        identifiers: [],
      });
    }
    return results;
  }

  // ── Private helpers ─────────────────────────────────────────────────────

  /**
   * Editions reference authors by key; each key is fetched for its name.
   * Inline names are used when no key resolves.
   */
  private async resolveAuthors(edition: Edition, signal?: AbortSignal): Promise<string[]> {
    const names: string[] = [];

    for (const ref of edition.authors ?? []) {
      if (!ref.key) continue;
      try {
        const author = await this.fetchJson(
          new URL(`${BASE_URL}${ref.key}.json`),
          AuthorSchema,
          { signal },
        );
        if (author?.name) names.push(author.name);
      } catch (error: unknown) {
        this.logger.warn({ key: ref.key, err: error }, "author lookup failed");
      }
    }

    if (names.length > 0) return names;

    return (edition.authors ?? [])
      .map((ref) => ref.name)
      .filter((name): name is string => typeof name === "string" && name.length > 0);
  }
}
