import { describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  actionRows,
  libraryIndexRows,
  toCsv,
  writeRunReport,
} from "../../../src/reporting/run-report.js";
import type { ActionRecord } from "../../../src/core/types.js";

const MOVED: ActionRecord = {
  sourcePath: "/in/dune.epub",
  destinationPath: "/library/Frank Herbert/Frank Herbert - Dune (1965).epub",
  title: "Dune",
  author: "Frank Herbert",
  year: "1965",
  genre: "Fiction",
  coverPath: "/library/Frank Herbert/covers/Frank Herbert - Dune (1965).jpg",
  status: "moved",
  note: "Source: Google Books",
  sourceLabel: "Google Books",
};

const QUARANTINED: ActionRecord = {
  ...MOVED,
  sourcePath: "/in/mystery.pdf",
  destinationPath: "/library/unresolved/mystery.pdf",
  title: "mystery",
  author: "Unknown Author",
  year: "n.d.",
  genre: "Unresolved",
  coverPath: "",
  status: "moved_to_unknown",
  note: "no valid metadata",
  sourceLabel: "System",
};

describe("toCsv", () => {
  it("quotes every field, doubles quotes and ends lines with CRLF after a BOM", () => {
    expect(toCsv([["a", 'say "hi"'], ["x;y", ""]])).toBe(
      '\uFEFF"a";"say ""hi"""\r\n"x;y";""\r\n',
    );
  });
});

describe("actionRows", () => {
  it("starts with the column header", () => {
    const rows = actionRows([MOVED]);
    expect(rows[0]).toEqual([
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
    ]);
    expect(rows[1]?.[7]).toBe("moved");
  });
});

describe("libraryIndexRows", () => {
  it("lists only moved books with library-relative paths", () => {
    expect(libraryIndexRows([MOVED, QUARANTINED], "/library")).toEqual([
      ["title", "author", "year", "genre", "path", "cover", "source"],
      [
        "Dune",
        "Frank Herbert",
        "1965",
        "Fiction",
        "Frank Herbert/Frank Herbert - Dune (1965).epub",
        "Frank Herbert/covers/Frank Herbert - Dune (1965).jpg",
        "Google Books",
      ],
    ]);
  });
});

describe("writeRunReport", () => {
  it("writes both files", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "report-"));
    try {
      const paths = await writeRunReport([MOVED, QUARANTINED], path.join(dir, "logs"));

      const actions = await readFile(paths.actions, "utf8");
      expect(actions.split("\r\n")).toHaveLength(4);

      const index = await readFile(paths.libraryIndex, "utf8");
      expect(index.startsWith('\uFEFF"title";"author";"year"')).toBe(true);
      expect(index.split("\r\n")).toHaveLength(3);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
