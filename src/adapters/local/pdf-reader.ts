// ---------------------------------------------------------------------------
// PDF metadata from the document information dictionary and XMP packet,
// found by scanning a bounded byte window of the file.
// ---------------------------------------------------------------------------

import type { LocalMetadata } from "../../core/types.js";
import { normalizeSpaces } from "../../domain/text/normalizer.js";
import { readByteWindow } from "./byte-window.js";

export const PDF_HEAD_BYTES = 100_000;
export const PDF_TAIL_BYTES = 20_000;

/**
 * Undo PDF literal-string escapes and decode UTF-16BE strings (FE FF BOM).
 * Input is latin1-decoded text, one char per byte.
 */
export function decodePdfString(raw: string): string {
  const unescaped = raw.replace(/\\([nrtbf()\\]|[0-7]{1,3})/g, (_m, seq: string) => {
    switch (seq) {
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      case "b":
        return "\b";
      case "f":
        return "\f";
      case "(":
      case ")":
      case "\\":
        return seq;
      default:
        return String.fromCharCode(parseInt(seq, 8));
    }
  });

  if (unescaped.startsWith("þÿ")) {
    const bytes = Buffer.from(unescaped.slice(2), "latin1");
    const chars: string[] = [];
    for (let i = 0; i + 1 < bytes.length; i += 2) {
      chars.push(String.fromCharCode(bytes.readUInt16BE(i)));
    }
    return chars.join("");
  }

  return unescaped;
}

/** Literal `(...)` string after `/Key`, allowing escaped parentheses. */
function infoString(text: string, key: string): string | null {
  const match = new RegExp(`/${key}\\s*\\(((?:\\\\.|[^\\\\)])*)\\)`).exec(text);
  if (!match?.[1]) return null;
  const value = normalizeSpaces(decodePdfString(match[1]));
  return value.length > 0 ? value : null;
}

function xmpValue(text: string, element: string): string | null {
  const block = new RegExp(`<dc:${element}>([\\s\\S]*?)</dc:${element}>`).exec(text);
  if (!block?.[1]) return null;
  const li = /<rdf:li[^>]*>([^<]+)<\/rdf:li>/.exec(block[1]);
  const value = normalizeSpaces(li?.[1] ?? "");
  return value.length > 0 ? value : null;
}

/**
 * Scan latin1 text for the info dictionary, then XMP. Authors separated by
 * ";" or " and " in a single Author entry are split.
 */
export function parsePdfMetadata(text: string): LocalMetadata {
  const result: LocalMetadata = {};

  const title = infoString(text, "Title") ?? xmpValue(text, "title");
  if (title) result.title = title;

  const author = infoString(text, "Author") ?? xmpValue(text, "creator");
  if (author) {
    const authors = author
      .split(/\s*;\s*|\s+and\s+|\s*&\s*/)
      .map(normalizeSpaces)
      .filter((a) => a.length > 0);
    if (authors.length > 0) result.authors = authors;
  }

  const created = /\/CreationDate\s*\(D:(\d{4})/.exec(text)?.[1];
  if (created) result.publishedDate = created;

  const subject = infoString(text, "Subject");
  if (subject) result.categories = [subject];

  return result;
}

export async function readPdfMetadata(filePath: string): Promise<LocalMetadata> {
  const { head, tail } = await readByteWindow(filePath, PDF_HEAD_BYTES, PDF_TAIL_BYTES);
  if (!head.subarray(0, 5).toString("latin1").startsWith("%PDF")) return {};

  // The info dictionary usually sits near the end, after the last xref.
  const fromTail = parsePdfMetadata(tail.toString("latin1"));
  const fromHead = parsePdfMetadata(head.toString("latin1"));
  return { ...fromHead, ...fromTail };
}
