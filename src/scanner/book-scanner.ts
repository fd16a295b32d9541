// ---------------------------------------------------------------------------
// Book scanner: list supported files under a directory tree.
// ---------------------------------------------------------------------------

import { readdir } from "node:fs/promises";
import path from "node:path";

import type { BookExtension, BookFile } from "../core/types.js";
import { SUPPORTED_EXTENSIONS } from "../core/types.js";

export function toBookExtension(fileName: string): BookExtension | null {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.find((supported) => supported === ext) ?? null;
}

export interface ScanOptions {
  /** Directories skipped entirely, e.g. the destination when it sits inside the source. */
  exclude?: readonly string[];
}

/**
 * Depth-first walk; entries are sorted by name at every level so runs over
 * the same tree see files in the same order.
 */
export async function scanBooks(root: string, options: ScanOptions = {}): Promise<BookFile[]> {
  const excluded = new Set((options.exclude ?? []).map((dir) => path.resolve(dir)));
  const books: BookFile[] = [];

  const walk = async (dir: string): Promise<void> => {
    if (excluded.has(path.resolve(dir))) return;

    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
        continue;
      }
      if (!entry.isFile()) continue;

      const extension = toBookExtension(entry.name);
      if (extension) books.push({ path: full, fileName: entry.name, extension });
    }
  };

  await walk(root);
  return books;
}
