// ---------------------------------------------------------------------------
// Run coordinator: scan, resolve, file, report.
// ---------------------------------------------------------------------------

import path from "node:path";

import type { Logger } from "pino";

import type { ActionRecord, BookFile, Filer, LogSink, ResolutionResult } from "../core/types.js";
import { ActionStatus } from "../core/types.js";
import { NO_DATE, UNKNOWN_AUTHOR } from "../domain/metadata/filing.js";
import { writeRunReport, type RunReportPaths } from "../reporting/run-report.js";
import { scanBooks } from "../scanner/book-scanner.js";
import { ConcurrencyPool } from "./concurrency.js";

export interface RunProgress {
  processed: number;
  total: number;
  current: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: RunProgress) => void;
}

export interface RunSummary {
  total: number;
  processed: number;
  moved: number;
  unresolved: number;
  errors: number;
  skipped: number;
  cancelled: boolean;
  durationMs: number;
  records: ActionRecord[];
  report: RunReportPaths | null;
}

export interface Resolver {
  resolve(file: BookFile): Promise<ResolutionResult>;
}

export interface RunCoordinatorOptions {
  resolver: Resolver;
  filer: Filer;
  logger: Logger;
  sink: LogSink;
  destinationDir: string;
  logsDirName: string;
  concurrency?: number;
  writeReport?: boolean;
  /** Injected for tests; defaults to walking the source directory. */
  scan?: (sourceDir: string) => Promise<BookFile[]>;
}

export class RunCoordinator {
  private readonly options: RunCoordinatorOptions;
  private readonly logger: Logger;

  constructor(options: RunCoordinatorOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: "RunCoordinator" });
  }

  async run(sourceDir: string, options: RunOptions = {}): Promise<RunSummary> {
    const started = Date.now();
    const { destinationDir } = this.options;
    const scan =
      this.options.scan ?? ((dir: string) => scanBooks(dir, { exclude: [destinationDir] }));

    const files = await scan(sourceDir);
    this.logger.info({ sourceDir, total: files.length }, "run started");
    this.options.sink.log(`Found ${files.length} book(s) in ${sourceDir}`, "info");

    const pool = new ConcurrencyPool(this.options.concurrency ?? 1);
    const records: (ActionRecord | undefined)[] = new Array<ActionRecord | undefined>(files.length);
    let processed = 0;
    let cancelled = false;

    await Promise.all(
      files.map((file, index) =>
        pool.run(async () => {
          if (options.signal?.aborted) {
            cancelled = true;
            return;
          }

          records[index] = await this.processFile(file);
          processed++;
          options.onProgress?.({ processed, total: files.length, current: file.fileName });
        }),
      ),
    );

    const done = records.filter((record): record is ActionRecord => record !== undefined);
    if (cancelled) {
      this.logger.warn({ processed, total: files.length }, "run cancelled");
      this.options.sink.log(`Cancelled after ${processed} of ${files.length} file(s)`, "warning");
    }

    let report: RunReportPaths | null = null;
    if (this.options.writeReport ?? true) {
      report = await writeRunReport(
        done,
        path.join(destinationDir, this.options.logsDirName),
        destinationDir,
      );
    }

    const count = (status: ActionRecord["status"]): number =>
      done.filter((record) => record.status === status).length;

    const summary: RunSummary = {
      total: files.length,
      processed,
      moved: count(ActionStatus.MOVED),
      unresolved: count(ActionStatus.MOVED_TO_UNKNOWN),
      errors: count(ActionStatus.ERROR),
      skipped: count(ActionStatus.SKIPPED),
      cancelled,
      durationMs: Date.now() - started,
      records: done,
      report,
    };

    this.logger.info(
      {
        total: summary.total,
        moved: summary.moved,
        unresolved: summary.unresolved,
        errors: summary.errors,
        durationMs: summary.durationMs,
      },
      "run finished",
    );
    return summary;
  }

  /** One file, start to finish. Never throws. */
  private async processFile(file: BookFile): Promise<ActionRecord> {
    const { sink, filer } = this.options;
    sink.log(`Processing ${file.fileName}`, "info");

    try {
      const result = await this.options.resolver.resolve(file);
      if (result.status === "resolved") {
        return await filer.fileResolved(file.path, result.metadata, result.isbn);
      }
      return await filer.fileUnresolved(file.path, result.reason);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ file: file.path, err: error }, "file processing failed");
      sink.log(`Error processing ${file.fileName}: ${message}`, "error");
      return {
        sourcePath: file.path,
        destinationPath: file.path,
        title: path.basename(file.fileName, file.extension),
        author: UNKNOWN_AUTHOR,
        year: NO_DATE,
        genre: "",
        coverPath: "",
        status: ActionStatus.ERROR,
        note: message,
        sourceLabel: "",
      };
    }
  }
}
