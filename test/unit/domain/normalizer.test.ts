import { describe, it, expect } from "vitest";

import {
  applyTextOptions,
  cleanFilenameQuery,
  cleanUnresolvedFilename,
  normalizeSpaces,
  removeSpecialCharacters,
  sanitizeForFilesystem,
  stripAccents,
  stripJunkTokens,
  toTitleCase,
  unifyPunctuation,
} from "../../../src/domain/text/normalizer.js";

describe("basic helpers", () => {
  it("collapses whitespace", () => {
    expect(normalizeSpaces("  a \t b\n")).toBe("a b");
  });

  it("strips accents", () => {
    expect(stripAccents("Machado de Assís")).toBe("Machado de Assis");
    expect(stripAccents("São Paulo")).toBe("Sao Paulo");
  });

  it("folds unicode dashes", () => {
    expect(unifyPunctuation("a – b — c")).toBe("a - b - c");
  });
});

describe("stripJunkTokens", () => {
  it("removes download-site tags", () => {
    expect(stripJunkTokens("Dom Casmurro (z-library)")).toBe("Dom Casmurro");
  });

  it("removes bracketed groups and URLs", () => {
    expect(stripJunkTokens("Dune [ebook] www.site.com")).toBe("Dune");
  });

  it("keeps a parenthesised year", () => {
    expect(stripJunkTokens("The Shining (1977)")).toBe("The Shining (1977)");
  });

  it("removes repeated and space-trailed extensions", () => {
    expect(stripJunkTokens("Dune.pdf.pdf")).toBe("Dune");
    expect(stripJunkTokens("Dune.epub ")).toBe("Dune");
  });

  it("is idempotent", () => {
    for (const input of ["Dom Casmurro (z-library) [v2]", "Dune.pdf.pdf", "Dune (pdf).epub"]) {
      const once = stripJunkTokens(input);
      expect(stripJunkTokens(once)).toBe(once);
    }
  });
});

describe("sanitizeForFilesystem", () => {
  it("replaces illegal characters and trims trailing dots", () => {
    expect(sanitizeForFilesystem("What? Why.  ")).toBe("What- Why");
  });

  it("truncates to the maximum length", () => {
    expect(sanitizeForFilesystem("abcdef", 3)).toBe("abc");
  });

  it("keeps accented letters", () => {
    expect(sanitizeForFilesystem("Memórias Póstumas")).toBe("Memórias Póstumas");
  });
});

describe("cleanFilenameQuery", () => {
  it("turns underscores into spaces", () => {
    expect(cleanFilenameQuery("Stephen_King_-_The_Shining")).toBe("Stephen King - The Shining");
  });

  it("drops dots between words and a leading track number", () => {
    expect(cleanFilenameQuery("01 Dom.Casmurro.Machado.de.Assis")).toBe(
      "Dom Casmurro Machado de Assis",
    );
  });

  it("keeps the dots of initials", () => {
    expect(cleanFilenameQuery("J.K. Rowling - Harry Potter")).toBe("J.K. Rowling - Harry Potter");
  });

  it("falls back to the raw name when cleaning leaves almost nothing", () => {
    expect(cleanFilenameQuery("novo documento")).toBe("novo documento");
  });

  it("returns an empty string for empty input", () => {
    expect(cleanFilenameQuery("")).toBe("");
  });

  it("is idempotent on an already clean name", () => {
    const once = cleanFilenameQuery("Stephen_King_-_The_Shining");
    expect(cleanFilenameQuery(once)).toBe(once);
  });
});

describe("cleanUnresolvedFilename", () => {
  it("removes site tags and bracketed groups but keeps the extension", () => {
    expect(cleanUnresolvedFilename("Livro Estranho (z-library) [123].pdf")).toBe(
      "Livro Estranho.pdf",
    );
  });

  it("keeps a name without extension", () => {
    expect(cleanUnresolvedFilename("notes_draft")).toBe("notes draft");
  });
});

describe("text options", () => {
  it("removes special characters", () => {
    expect(removeSpecialCharacters("Harry Potter and the Sorcerer's Stone!")).toBe(
      "Harry Potter and the Sorcerers Stone",
    );
  });

  it("title-cases", () => {
    expect(toTitleCase("the SHINING")).toBe("The Shining");
  });

  it("applies accent stripping, cleaning and title-casing of single-case titles", () => {
    expect(
      applyTextOptions("O SENHOR DOS ANÉIS", ["J.R.R. Tolkien"], {
        stripAccents: true,
        cleanCharacters: true,
      }),
    ).toEqual({ title: "O Senhor Dos Aneis", authors: ["J.R.R. Tolkien"] });
  });

  it("leaves mixed-case titles and accents alone when both options are off", () => {
    expect(
      applyTextOptions("Memórias Póstumas de Brás Cubas", ["Machado de Assis"], {
        stripAccents: false,
        cleanCharacters: false,
      }),
    ).toEqual({ title: "Memórias Póstumas de Brás Cubas", authors: ["Machado de Assis"] });
  });
});
