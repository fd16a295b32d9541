// ---------------------------------------------------------------------------
// Local readers: container metadata and the raw text scanned for ISBNs.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  BookContentReader,
  BookExtension,
  BookFile,
  LocalMetadata,
  LocalMetadataReader,
} from "../../core/types.js";
import { BYTE_HEAD_WINDOW, BYTE_TAIL_WINDOW } from "../../domain/isbn/extractor.js";
import { readByteWindow } from "./byte-window.js";
import { readEpubMetadata } from "./epub-reader.js";
import { readFb2Metadata } from "./fb2-reader.js";
import { readOfficeMetadata } from "./office-reader.js";
import { readPdfMetadata } from "./pdf-reader.js";

export { readByteWindow } from "./byte-window.js";
export { mapEpubMetadata, readEpubMetadata } from "./epub-reader.js";
export { parseFb2Metadata, readFb2Metadata } from "./fb2-reader.js";
export { parseOfficeMetadata, readOfficeMetadata } from "./office-reader.js";
export { decodePdfString, parsePdfMetadata, readPdfMetadata } from "./pdf-reader.js";

type MetadataLoader = (filePath: string) => Promise<LocalMetadata>;

const LOADERS: Partial<Record<BookExtension, MetadataLoader>> = {
  ".epub": readEpubMetadata,
  ".pdf": readPdfMetadata,
  ".fb2": readFb2Metadata,
  ".doc": readOfficeMetadata,
  ".docx": readOfficeMetadata,
  ".rtf": readOfficeMetadata,
};

/**
 * Dispatches on extension. Unsupported formats and every read or parse
 * failure resolve to `{}`.
 */
export class FileMetadataReader implements LocalMetadataReader {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "FileMetadataReader" });
  }

  async read(filePath: string, extension: BookExtension): Promise<LocalMetadata> {
    const loader = LOADERS[extension];
    if (!loader) return {};

    try {
      return await loader(filePath);
    } catch (error: unknown) {
      this.logger.debug({ filePath, err: error }, "local metadata unreadable");
      return {};
    }
  }
}

/**
 * Text scanned by the ISBN extractor. EPUB identifiers become one page each,
 * labelled "ISBN" so the context check passes; other formats contribute the
 * first and last bytes of the file as two pages.
 */
export class FileContentReader implements BookContentReader {
  private readonly logger: Logger;
  private readonly headBytes: number;
  private readonly tailBytes: number;

  constructor(logger: Logger, headBytes = BYTE_HEAD_WINDOW, tailBytes = BYTE_TAIL_WINDOW) {
    this.logger = logger.child({ component: "FileContentReader" });
    this.headBytes = headBytes;
    this.tailBytes = tailBytes;
  }

  async readPages(file: BookFile, local: LocalMetadata): Promise<string[]> {
    if (file.extension === ".epub") {
      return (local.identifiers ?? []).map((id) => `ISBN ${id}`);
    }

    try {
      const { head, tail } = await readByteWindow(file.path, this.headBytes, this.tailBytes);
      const encoding = file.extension === ".txt" || file.extension === ".fb2" ? "utf-8" : "latin1";
      return [head.toString(encoding), tail.toString(encoding)].filter((page) => page.length > 0);
    } catch (error: unknown) {
      this.logger.debug({ filePath: file.path, err: error }, "content unreadable");
      return [];
    }
  }
}
