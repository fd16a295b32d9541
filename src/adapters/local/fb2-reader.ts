// ---------------------------------------------------------------------------
// FictionBook 2 metadata from the <title-info> block.
// ---------------------------------------------------------------------------

import type { LocalMetadata } from "../../core/types.js";
import { normalizeSpaces } from "../../domain/text/normalizer.js";
import { readByteWindow } from "./byte-window.js";

const FB2_HEAD_BYTES = 64_000;

function tagText(xml: string, tag: string): string | null {
  const match = new RegExp(`<${tag}(?:\\s[^>]*)?>([^<]*)</${tag}>`).exec(xml);
  const value = normalizeSpaces(match?.[1] ?? "");
  return value.length > 0 ? value : null;
}

export function parseFb2Metadata(xml: string): LocalMetadata {
  const info = /<title-info>([\s\S]*?)<\/title-info>/.exec(xml)?.[1];
  if (!info) return {};

  const result: LocalMetadata = {};

  const title = tagText(info, "book-title");
  if (title) result.title = title;

  const authors: string[] = [];
  for (const block of info.matchAll(/<author>([\s\S]*?)<\/author>/g)) {
    const body = block[1] ?? "";
    const name = [tagText(body, "first-name"), tagText(body, "middle-name"), tagText(body, "last-name")]
      .filter((part): part is string => part !== null)
      .join(" ");
    if (name) authors.push(name);
  }
  if (authors.length > 0) result.authors = authors;

  const date = tagText(info, "date");
  if (date) result.publishedDate = date;

  const genres = Array.from(info.matchAll(/<genre[^>]*>([^<]+)<\/genre>/g))
    .map((m) => normalizeSpaces(m[1] ?? ""))
    .filter((genre) => genre.length > 0);
  if (genres.length > 0) result.categories = Array.from(new Set(genres));

  return result;
}

export async function readFb2Metadata(filePath: string): Promise<LocalMetadata> {
  const { head } = await readByteWindow(filePath, FB2_HEAD_BYTES, 0);
  return parseFb2Metadata(head.toString("utf-8"));
}
