// ---------------------------------------------------------------------------
// Run report: the action log and a library index, as CSV.
// ---------------------------------------------------------------------------

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { ActionRecord } from "../core/types.js";
import { ActionStatus } from "../core/types.js";

export const ACTIONS_FILE = "actions.csv";
export const LIBRARY_INDEX_FILE = "library-index.csv";

const DELIMITER = ";";
const BOM = "\uFEFF";

const ACTION_COLUMNS = [
  "sourcePath",
  "destinationPath",
  "title",
  "author",
  "year",
  "genre",
  "coverPath",
  "status",
  "note",
  "sourceLabel",
] as const satisfies readonly (keyof ActionRecord)[];

const INDEX_HEADER = ["title", "author", "year", "genre", "path", "cover", "source"];

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsv(rows: readonly (readonly string[])[]): string {
  return BOM + rows.map((row) => row.map(quote).join(DELIMITER)).join("\r\n") + "\r\n";
}

export function actionRows(records: readonly ActionRecord[]): string[][] {
  return [
    [...ACTION_COLUMNS],
    ...records.map((record) => ACTION_COLUMNS.map((column) => record[column])),
  ];
}

/** Only books that landed in the library; paths relative to `libraryRoot`. */
export function libraryIndexRows(records: readonly ActionRecord[], libraryRoot: string): string[][] {
  const relative = (target: string): string =>
    target ? path.relative(libraryRoot, target).split(path.sep).join("/") : "";

  return [
    INDEX_HEADER,
    ...records
      .filter((record) => record.status === ActionStatus.MOVED)
      .map((record) => [
        record.title,
        record.author,
        record.year,
        record.genre,
        relative(record.destinationPath),
        relative(record.coverPath),
        record.sourceLabel,
      ]),
  ];
}

export interface RunReportPaths {
  actions: string;
  libraryIndex: string;
}

export async function writeRunReport(
  records: readonly ActionRecord[],
  outDir: string,
  libraryRoot: string = path.dirname(outDir),
): Promise<RunReportPaths> {
  await mkdir(outDir, { recursive: true });
  const paths: RunReportPaths = {
    actions: path.join(outDir, ACTIONS_FILE),
    libraryIndex: path.join(outDir, LIBRARY_INDEX_FILE),
  };

  await writeFile(paths.actions, toCsv(actionRows(records)), "utf8");
  await writeFile(paths.libraryIndex, toCsv(libraryIndexRows(records, libraryRoot)), "utf8");
  return paths;
}
