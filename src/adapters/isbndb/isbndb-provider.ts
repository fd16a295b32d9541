// ---------------------------------------------------------------------------
// ISBNdb provider (api2.isbndb.com). Needs an API key; without one the
// provider reports itself unavailable and the matcher skips it.
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

const BASE_URL = "https://api2.isbndb.com";

const BookSchema = z.object({
  title: z.string().optional(),
  title_long: z.string().optional(),
  authors: z.array(z.string()).optional(),
  date_published: z.union([z.string(), z.number()]).optional(),
  subjects: z.array(z.string()).optional(),
  image: z.string().optional(),
  isbn: z.string().optional(),
  isbn10: z.string().optional(),
  isbn13: z.string().optional(),
});

const BookResponseSchema = z.object({ book: BookSchema.optional() });
const BooksResponseSchema = z.object({
  total: z.number().optional(),
  books: z.array(BookSchema).optional(),
});

type IsbndbBook = z.infer<typeof BookSchema>;

export class IsbndbProvider extends BaseProvider {
  constructor(context: ProviderContext) {
    super(ProviderId.ISBNDB, "ISBNdb", context);
  }

  override isAvailable(): boolean {
    return Boolean(this.settings.apiKey);
  }

  protected async executeIsbnLookup(
    isbn: ISBN,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]> {
    const data = await this.fetchJson(
      new URL(`${BASE_URL}/book/${isbn}`),
      BookResponseSchema,
      { signal, headers: this.authHeaders() },
    );
    const item = data?.book ? toProviderItem(data.book) : null;
    return item ? [item] : [];
  }

  protected async executeTextSearch(
    query: TextQuery,
    signal?: AbortSignal,
  ): Promise<ProviderItem[]> {
    const q = [query.title, query.author].filter(Boolean).join(" ").trim();
    if (!q) return [];

    const url = new URL(`${BASE_URL}/books/${encodeURIComponent(q)}`);
    url.searchParams.set("pageSize", String(this.settings.maxResults));

    const data = await this.fetchJson(url, BooksResponseSchema, {
      signal,
      headers: this.authHeaders(),
    });

    const results: ProviderItem[] = [];
    for (const book of data?.books ?? []) {
      const item = toProviderItem(book);
      if (item) results.push(item);
    }
    return results;
  }

  private authHeaders(): Record<string, string> {
    return { Authorization: this.settings.apiKey ?? "" };
  }
}

function toProviderItem(book: IsbndbBook): ProviderItem | null {
  const title = book.title ?? book.title_long;
  if (!title) return null;

  const identifiers = [book.isbn, book.isbn10, book.isbn13]
    .filter((id): id is string => typeof id === "string")
    .map(identifierDigits)
    .filter((id) => id.length > 0);

  return {
    title,
    authors: book.authors ?? [],
    publishedDate:
      book.date_published !== undefined ? String(book.date_published) : undefined,
    categories: uniq(book.subjects ?? []),
    coverImageUrls: book.image ? { thumbnail: book.image } : {},
    identifiers: uniq(identifiers),
  };
}
