// ---------------------------------------------------------------------------
// Best-effort title and author from the start of .doc, .docx and .rtf files.
// ---------------------------------------------------------------------------

import type { LocalMetadata } from "../../core/types.js";
import { normalizeSpaces } from "../../domain/text/normalizer.js";
import { readByteWindow } from "./byte-window.js";

const OFFICE_HEAD_BYTES = 5_000;

/** Tried in order; the first non-empty capture wins. */
const TITLE_PATTERNS: readonly RegExp[] = [/title:[ \t]*([^\r\n]*)\r?\n/i, /<title>([\s\S]*?)<\/title>/i];
const AUTHOR_PATTERNS: readonly RegExp[] = [/author:[ \t]*([^\r\n]*)\r?\n/i, /<author>([\s\S]*?)<\/author>/i];

function firstCapture(text: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const value = normalizeSpaces(pattern.exec(text)?.[1] ?? "");
    if (value.length > 0) return value;
  }
  return null;
}

/** `Title:` / `Author:` lines, then `<title>` / `<author>` tags. */
export function parseOfficeMetadata(text: string): LocalMetadata {
  const result: LocalMetadata = {};

  const title = firstCapture(text, TITLE_PATTERNS);
  if (title) result.title = title;

  const author = firstCapture(text, AUTHOR_PATTERNS);
  if (author) result.authors = [author];

  return result;
}

export async function readOfficeMetadata(filePath: string): Promise<LocalMetadata> {
  const { head } = await readByteWindow(filePath, OFFICE_HEAD_BYTES, 0);
  return parseOfficeMetadata(head.toString("utf-8"));
}
