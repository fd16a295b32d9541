// ---------------------------------------------------------------------------
// EPUB metadata through epub2 (OPF dc:title, dc:creator, dc:date, ...).
// ---------------------------------------------------------------------------

import type { LocalMetadata } from "../../core/types.js";
import { normalizeSpaces } from "../../domain/text/normalizer.js";

interface EpubDocument {
  metadata: unknown;
  on(event: string, listener: (error?: Error) => void): unknown;
  parse(): void;
}

type EpubConstructor = new (filePath: string) => EpubDocument;

function isConstructor(value: unknown): value is EpubConstructor {
  return typeof value === "function";
}

function field(source: unknown, key: string): unknown {
  return typeof source === "object" && source !== null ? Reflect.get(source, key) : undefined;
}

/** epub2 is CommonJS; the class sits on `EPub` or on the default export. */
async function loadEpub(): Promise<EpubConstructor> {
  const mod: unknown = await import("epub2");
  const candidates = [field(mod, "EPub"), field(field(mod, "default"), "EPub"), field(mod, "default")];
  const ctor = candidates.find(isConstructor);
  if (!ctor) throw new Error("epub2 does not export an EPub class");
  return ctor;
}

/** A string, or a list of strings, as trimmed non-empty strings. */
export function stringList(value: unknown): string[] {
  const list = Array.isArray(value) ? value : [value];
  return list
    .filter((item): item is string => typeof item === "string")
    .map(normalizeSpaces)
    .filter((item) => item.length > 0);
}

/**
 * Map epub2's metadata object onto {@link LocalMetadata}. Creators may be a
 * single comma-free string or a list.
 */
export function mapEpubMetadata(metadata: unknown): LocalMetadata {
  const result: LocalMetadata = {};

  const title = stringList(field(metadata, "title"))[0];
  if (title) result.title = title;

  const authors = stringList(field(metadata, "creator"));
  if (authors.length > 0) result.authors = authors;

  const date = stringList(field(metadata, "date"))[0];
  if (date) result.publishedDate = date;

  const subjects = stringList(field(metadata, "subject"));
  if (subjects.length > 0) result.categories = Array.from(new Set(subjects));

  const identifiers = [
    ...stringList(field(metadata, "ISBN")),
    ...stringList(field(metadata, "identifier")),
  ];
  if (identifiers.length > 0) result.identifiers = Array.from(new Set(identifiers));

  return result;
}

export async function readEpubMetadata(filePath: string): Promise<LocalMetadata> {
  const EPub = await loadEpub();
  const epub = new EPub(filePath);

  await new Promise<void>((resolve, reject) => {
    epub.on("end", () => resolve());
    epub.on("error", (error) => reject(error ?? new Error("EPUB parse failed")));
    epub.parse();
  });

  return mapEpubMetadata(epub.metadata);
}
