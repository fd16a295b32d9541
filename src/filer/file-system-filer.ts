// ---------------------------------------------------------------------------
// Filesystem filer: moves resolved books into the library tree and
// unresolved ones into quarantine, returning one ActionRecord per file.
// ---------------------------------------------------------------------------

import { constants } from "node:fs";
import { access, copyFile, link, mkdir, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "pino";

import type {
  ActionRecord,
  CandidateMetadata,
  Filer,
  FilingConfig,
  ISBN,
  LogSink,
  PathsConfig,
  TextOptions,
} from "../core/types.js";
import { ActionStatus } from "../core/types.js";
import { FilingError } from "../core/errors.js";
import type { HeuristicsData } from "../config/heuristics.js";
import { NO_DATE, UNKNOWN_AUTHOR, planFiling } from "../domain/metadata/filing.js";
import { applyTextOptions, cleanUnresolvedFilename } from "../domain/text/normalizer.js";
import type { CoverSaver } from "./cover-saver.js";

export const UNRESOLVED_GENRE = "Unresolved";
export const SYSTEM_SOURCE = "System";

export interface FileSystemFilerOptions {
  paths: Pick<PathsConfig, "destinationDir" | "unresolvedDirName" | "duplicatesDirName" | "coversDirName">;
  filing: FilingConfig;
  text: TextOptions;
  logger: Logger;
  sink: LogSink;
  heuristics?: HeuristicsData;
  coverSaver?: CoverSaver | null;
}

async function exists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Errors for which a hard link is impossible but a copy still works. */
const LINK_UNSUPPORTED = ["EXDEV", "EPERM", "ENOTSUP", "EOPNOTSUPP"];

/**
 * Move `source` to `target` without ever replacing an existing file: the
 * target is claimed with a hard link (or an exclusive copy across devices)
 * before the source is unlinked. Throws EEXIST when `target` is taken.
 */
export async function moveExclusive(source: string, target: string): Promise<void> {
  try {
    await link(source, target);
  } catch (error: unknown) {
    if (!LINK_UNSUPPORTED.some((code) => hasErrorCode(error, code))) throw error;
    await copyFile(source, target, constants.COPYFILE_EXCL);
  }
  await unlink(source);
}

export class FileSystemFiler implements Filer {
  private readonly options: FileSystemFilerOptions;
  private readonly logger: Logger;
  private readonly sink: LogSink;

  constructor(options: FileSystemFilerOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: "FileSystemFiler" });
    this.sink = options.sink;
  }

  async fileResolved(
    sourcePath: string,
    metadata: Readonly<CandidateMetadata>,
    isbn: ISBN | null = null,
  ): Promise<ActionRecord> {
    const { filing, paths } = this.options;
    const text = applyTextOptions(metadata.title, metadata.authors, this.options.text);
    const plan = planFiling(
      { ...metadata, title: text.title, authors: text.authors },
      path.extname(sourcePath),
      {
        destinationRoot: paths.destinationDir,
        organizeMode: filing.organizeMode,
        fileNamePattern: filing.fileNamePattern,
        maxFileNameLength: filing.maxFileNameLength,
        heuristics: this.options.heuristics,
      },
    );

    const record: ActionRecord = {
      sourcePath,
      destinationPath: "",
      title: plan.title,
      author: plan.author,
      year: plan.year,
      genre: plan.genre,
      coverPath: "",
      status: ActionStatus.SKIPPED,
      note: "",
      sourceLabel: metadata.providerLabel,
    };

    if (!(await exists(sourcePath))) {
      return { ...record, note: "source file no longer exists" };
    }

    let destinationPath = path.join(plan.directory, plan.fileName);
    try {
      await mkdir(plan.directory, { recursive: true });
      destinationPath = await this.moveToFreeName(sourcePath, plan.directory, plan.fileName);

      let coverPath = "";
      const saver = this.options.coverSaver;
      if (filing.downloadCovers && saver && Object.keys(metadata.coverImageUrls).length > 0) {
        const baseName = path.basename(destinationPath, path.extname(destinationPath));
        coverPath =
          (await saver.save(
            metadata.coverImageUrls,
            path.join(path.dirname(destinationPath), paths.coversDirName),
            baseName,
          )) ?? "";
      }

      const note = `Source: ${metadata.providerLabel}${isbn ? `, ISBN: ${isbn}` : ""}`;
      this.logger.info({ sourcePath, destinationPath }, "book filed");
      this.sink.log(
        `Moved to ${path.relative(paths.destinationDir, destinationPath)}`,
        "success",
      );

      return { ...record, destinationPath, coverPath, status: ActionStatus.MOVED, note };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      const wrapped = new FilingError(sourcePath, destinationPath, message, { cause: error });
      this.logger.error({ err: wrapped }, "filing failed");
      this.sink.log(`Failed to move ${path.basename(sourcePath)}: ${message}`, "error");
      return { ...record, destinationPath: sourcePath, status: ActionStatus.ERROR, note: message };
    }
  }

  async fileUnresolved(sourcePath: string, reason: string): Promise<ActionRecord> {
    const { paths } = this.options;
    const fileName = path.basename(sourcePath);

    const record: ActionRecord = {
      sourcePath,
      destinationPath: "",
      title: path.basename(fileName, path.extname(fileName)),
      author: UNKNOWN_AUTHOR,
      year: NO_DATE,
      genre: UNRESOLVED_GENRE,
      coverPath: "",
      status: ActionStatus.SKIPPED,
      note: reason,
      sourceLabel: SYSTEM_SOURCE,
    };

    if (!(await exists(sourcePath))) {
      return { ...record, note: "source file no longer exists" };
    }

    const directory = path.join(paths.destinationDir, paths.unresolvedDirName);
    let destinationPath = path.join(directory, cleanUnresolvedFilename(fileName));
    try {
      await mkdir(directory, { recursive: true });
      destinationPath = await this.moveToFreeName(sourcePath, directory, path.basename(destinationPath));

      this.logger.info({ sourcePath, destinationPath, reason }, "book quarantined");
      this.sink.log(`Moved to ${paths.unresolvedDirName}/${path.basename(destinationPath)}`, "warning");

      return { ...record, destinationPath, status: ActionStatus.MOVED_TO_UNKNOWN };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      const wrapped = new FilingError(sourcePath, destinationPath, message, { cause: error });
      this.logger.error({ err: wrapped }, "quarantine failed");
      this.sink.log(`Failed to quarantine ${fileName}: ${message}`, "error");
      return { ...record, destinationPath: sourcePath, status: ActionStatus.ERROR, note: message };
    }
  }

  // ── Private helpers ────────────────────────────────────────────────────

  /** Move to `target`; false when the name is already taken. */
  private async claim(sourcePath: string, target: string): Promise<boolean> {
    try {
      await moveExclusive(sourcePath, target);
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, "EEXIST")) return false;
      throw error;
    }
  }

  /**
   * Move to `<directory>/<fileName>` when free; otherwise to the duplicates
   * folder, then the duplicates folder with " (2)", " (3)", ... appended.
   * Each name is claimed atomically, so concurrent filers never share one.
   */
  private async moveToFreeName(sourcePath: string, directory: string, fileName: string): Promise<string> {
    const direct = path.join(directory, fileName);
    if (await this.claim(sourcePath, direct)) return direct;

    const duplicates = path.join(this.options.paths.destinationDir, this.options.paths.duplicatesDirName);
    await mkdir(duplicates, { recursive: true });

    const ext = path.extname(fileName);
    const base = path.basename(fileName, ext);
    const first = path.join(duplicates, fileName);
    if (await this.claim(sourcePath, first)) return first;

    for (let n = 2; ; n++) {
      const candidate = path.join(duplicates, `${base} (${n})${ext}`);
      if (await this.claim(sourcePath, candidate)) return candidate;
    }
  }
}
