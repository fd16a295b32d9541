// ---------------------------------------------------------------------------
// Cover saver: download the first reachable cover image beside the book.
// ---------------------------------------------------------------------------

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "pino";

import type { CoverImageUrls } from "../core/types.js";
import { sanitizeForFilesystem } from "../domain/text/normalizer.js";

/** Size tags tried in order. */
export const COVER_SIZE_PREFERENCE = ["large", "thumbnail", "small"] as const;

export interface CoverSaverOptions {
  logger: Logger;
  timeoutMs?: number;
}

export class CoverSaver {
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: CoverSaverOptions) {
    this.logger = options.logger.child({ component: "CoverSaver" });
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  /**
   * Save `<directory>/<baseName>.jpg` from the first URL that downloads.
   * Returns the written path, or null when nothing could be saved.
   */
  async save(urls: CoverImageUrls, directory: string, baseName: string): Promise<string | null> {
    const candidates = COVER_SIZE_PREFERENCE.map((size) => urls[size]).filter(
      (url): url is string => typeof url === "string" && url.length > 0,
    );

    for (const url of candidates) {
      try {
        const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (!response.ok) {
          this.logger.warn({ url, status: response.status }, "cover download failed");
          continue;
        }

        const bytes = Buffer.from(await response.arrayBuffer());
        await mkdir(directory, { recursive: true });
        const target = path.join(directory, `${sanitizeForFilesystem(baseName)}.jpg`);
        await writeFile(target, bytes);

        this.logger.debug({ url, target }, "cover saved");
        return target;
      } catch (error: unknown) {
        this.logger.warn({ url, err: error }, "cover download failed");
      }
    }

    return null;
  }
}
