import { describe, it, expect } from "vitest";

import { IsbnExtractor } from "../../../src/domain/isbn/extractor.js";

describe("IsbnExtractor", () => {
  const extractor = new IsbnExtractor();

  it("finds a labelled, hyphenated ISBN-13", () => {
    const text = "Copyright 2001. ISBN 978-0-306-40615-7. All rights reserved.";
    expect(extractor.extractFromText(text)).toBe("9780306406157");
  });

  it("finds a labelled ISBN-10 with a colon", () => {
    expect(extractor.extractFromText("First edition. ISBN: 0306406152")).toBe("0306406152");
  });

  it("accepts a bare Bookland number next to a keyword", () => {
    expect(extractor.extractFromText("Printed book 9780306406157 in paperback")).toBe(
      "9780306406157",
    );
  });

  it("ignores a bare number with no bibliographic keyword nearby", () => {
    expect(extractor.extractFromText("Order number 9780306406157 shipped today")).toBeNull();
  });

  it("ignores placeholder ISBNs", () => {
    expect(extractor.extractFromText("ISBN 0000000000")).toBeNull();
  });

  it("ignores a number with a bad check digit", () => {
    expect(extractor.extractFromText("ISBN 0306406153")).toBeNull();
  });

  it("returns null for empty text", () => {
    expect(extractor.extractFromText("")).toBeNull();
  });

  // ── Page window ─────────────────────────────────────────────────────────

  it("selects the first five and last two pages", () => {
    const pages = Array.from({ length: 10 }, (_, i) => `page ${i}`);
    expect(extractor.selectWindow(pages)).toEqual([
      "page 0",
      "page 1",
      "page 2",
      "page 3",
      "page 4",
      "page 8",
      "page 9",
    ]);
  });

  it("keeps every page of a short document once", () => {
    expect(extractor.selectWindow(["a", "b", "c"])).toEqual(["a", "b", "c"]);
  });

  it("finds an ISBN on the last page", () => {
    const pages = Array.from({ length: 10 }, () => "chapter text");
    pages[9] = "Colophon. ISBN 0-306-40615-2";
    expect(extractor.extractFromPages(pages)).toBe("0306406152");
  });

  it("does not look at pages outside the window", () => {
    const pages = Array.from({ length: 10 }, () => "chapter text");
    pages[6] = "ISBN 0-306-40615-2";
    expect(extractor.extractFromPages(pages)).toBeNull();
  });

  it("honours a custom window size", () => {
    const pages = ["cover", "ISBN 0306406152", "body"];
    expect(new IsbnExtractor({ headPages: 1, tailPages: 1 }).extractFromPages(pages)).toBeNull();
  });
});
