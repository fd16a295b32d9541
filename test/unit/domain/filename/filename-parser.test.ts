import { describe, it, expect } from "vitest";

import { FilenameParser } from "../../../../src/domain/filename/filename-parser.js";

describe("FilenameParser", () => {
  const parser = new FilenameParser();

  // ── Known authors ─────────────────────────────────────────────────────

  it("splits a known author at the start", () => {
    expect(parser.parse("Stephen King - The Shining (1977)")).toEqual({
      title: "The Shining",
      author: "Stephen King",
      year: "1977",
      pattern: "known-author",
    });
  });

  it("splits a known author at the end", () => {
    expect(parser.parse("The Da Vinci Code - Dan Brown")).toEqual({
      title: "The Da Vinci Code",
      author: "Dan Brown",
      year: null,
      pattern: "known-author",
    });
  });

  it("drops a trailing 'by' before a known author", () => {
    expect(parser.parse("The Hobbit by J.R.R. Tolkien")?.title).toBe("The Hobbit");
  });

  // ── Structural patterns ───────────────────────────────────────────────

  it("reads title - author (year)", () => {
    expect(parser.parse("Neuromancer - William Gibson (1984)")).toEqual({
      title: "Neuromancer",
      author: "William Gibson",
      year: "1984",
      pattern: "title-author-year",
    });
  });

  it("reads title (year) - author", () => {
    expect(parser.parse("Dune (1965) - Frank Herbert")).toEqual({
      title: "Dune",
      author: "Frank Herbert",
      year: "1965",
      pattern: "title-year-author",
    });
  });

  it("swaps author - title when only that order makes sense", () => {
    expect(parser.parse("William Gibson - Neuromancer")).toEqual({
      title: "Neuromancer",
      author: "William Gibson",
      year: null,
      pattern: "dash-separator",
    });
  });

  it("reads title by author", () => {
    expect(parser.parse("Dune by Frank Herbert")).toEqual({
      title: "Dune",
      author: "Frank Herbert",
      year: null,
      pattern: "title-by-author",
    });
  });

  it("reads author: title", () => {
    expect(parser.parse("Tolkien: O Hobbit")).toEqual({
      title: "O Hobbit",
      author: "Tolkien",
      year: null,
      pattern: "author-colon-title",
    });
  });

  it("reads title, author", () => {
    expect(parser.parse("Memorias Postumas, Machado de Assis")).toEqual({
      title: "Memorias Postumas",
      author: "Machado de Assis",
      year: null,
      pattern: "title-comma-author",
    });
  });

  // ── Fallbacks ─────────────────────────────────────────────────────────

  it("skips the paren pattern when neither side looks like a name", () => {
    expect(parser.parse("Notas de aula (rascunho)")).toEqual({
      title: "Notas de aula (rascunho)",
      author: null,
      year: null,
      pattern: "whole-name",
    });
  });

  it("returns the whole name when nothing matches", () => {
    expect(parser.parse("harry potter rowling")).toEqual({
      title: "harry potter rowling",
      author: null,
      year: null,
      pattern: "whole-name",
    });
  });

  it("returns null for an empty name", () => {
    expect(parser.parse("   ")).toBeNull();
  });

  it("can be limited to a subset of patterns", () => {
    const commaOnly = new FilenameParser({ patterns: ["title-comma-author"] });
    expect(commaOnly.parse("Neuromancer - William Gibson")?.pattern).toBe("whole-name");
  });
});
