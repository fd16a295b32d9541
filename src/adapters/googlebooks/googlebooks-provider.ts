// ---------------------------------------------------------------------------
// Google Books provider: volumes search by ISBN and by title/author.
// ---------------------------------------------------------------------------

import { z } from "zod";

import type { ISBN, ProviderItem, TextQuery } from "../../core/types.js";
import { ProviderId } from "../../core/types.js";
import {
  BaseProvider,
  identifierDigits,
  uniq,
  type ProviderContext,
} from "../base/base-provider.js";

const API_URL = "https://www.googleapis.com/books/v1/volumes";

// ── Response schema ─────────────────────────────────────────────────────────

const VolumeInfoSchema = z.object({
  title: z.string().optional(),
  authors: z.array(z.string()).optional(),
  publishedDate: z.string().optional(),
  categories: z.array(z.string()).optional(),
  imageLinks: z.record(z.string()).optional(),
  industryIdentifiers: z
    .array(z.object({ type: z.string().optional(), identifier: z.string().optional() }))
    .optional(),
});

const VolumesResponseSchema = z.object({
  totalItems: z.number().optional(),
  items: z.array(z.object({ volumeInfo: VolumeInfoSchema.optional() })).optional(),
});

type VolumeInfo = z.infer<typeof VolumeInfoSchema>;

// ── Provider ────────────────────────────────────────────────────────────────

export class GoogleBooksProvider extends BaseProvider {
  constructor(context: ProviderContext) {
    super(ProviderId.GOOGLE_BOOKS, "Google Books", context);
  }

  protected async executeIsbnLookup(
    isbn: ISBN,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]> {
    return this.query(`isbn:${isbn}`, signal);
  }

  /**
   * Phrase-quoted `intitle:` plus `inauthor:` when an author is known.
   */
  protected async executeTextSearch(
    query: TextQuery,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]> {
    const parts: string[] = [];
    if (query.title) parts.push(`intitle:"${query.title}"`);
    if (query.author) parts.push(`inauthor:"${query.author}"`);
    if (parts.length === 0) return [];
    return this.query(parts.join(" "), signal);
  }

  private async query(q: string, signal?: AbortSignal): Promise<ProviderItem[]> {
    const url = new URL(API_URL);
    url.searchParams.set("q", q);
    url.searchParams.set("maxResults", String(this.settings.maxResults));
    url.searchParams.set("printType", "books");
    if (this.settings.language) url.searchParams.set("langRestrict", this.settings.language);
    if (this.settings.apiKey) url.searchParams.set("key", this.settings.apiKey);

    const data = await this.fetchJson(url, VolumesResponseSchema, { signal });
    const items = data?.items ?? [];

    const results: ProviderItem[] = [];
    for (const item of items) {
      const mapped = item.volumeInfo ? toProviderItem(item.volumeInfo) : null;
      if (mapped) results.push(mapped);
    }
    return results;
  }
}

function toProviderItem(info: VolumeInfo): ProviderItem | null {
  if (!info.title) return null;

  const identifiers = (info.industryIdentifiers ?? [])
    .filter((id) => {
      const type = (id.type ?? "").toUpperCase();
      return type === "ISBN_10" || type === "ISBN_13";
    })
    .map((id) => identifierDigits(id.identifier ?? ""))
    .filter((id) => id.length > 0);

  const coverImageUrls: Record<string, string> = {};
  for (const [size, link] of Object.entries(info.imageLinks ?? {})) {
    coverImageUrls[size] = link.replace(/^http:/, "https:");
  }

  return {
    title: info.title,
    authors: info.authors ?? [],
    publishedDate: info.publishedDate,
    categories: uniq(info.categories ?? []),
    coverImageUrls,
    identifiers: uniq(identifiers),
  };
}
