// ---------------------------------------------------------------------------
// Pure string cleaning shared by every resolution stage.
// ---------------------------------------------------------------------------

import type { TextOptions } from "../../core/types.js";

// ── Tables ──────────────────────────────────────────────────────────────────

/** Noise that download sites and converters leave in titles and names. */
const JUNK_PATTERNS: readonly RegExp[] = [
  /\((?:z-library|z-lib|libgen|pdf|epub|pdfcoffee|pdfcofee)\)/gi,
  /\bmicrosoft\s+word\b/gi,
  /\[[^\]]*\]/g,
  /\b\d+[pk]\b/gi,
  /https?:\/\/\S*/gi,
  /\bwww\.[\w-]+(?:\.[\w-]+)*/gi,
  /\.(?:com|org|net)\b/gi,
  /\.{3}/g,
  /\b[\w-]*(?:libgen|zlib|z-library|z-lib|reidoebook|livrosparatodos|pdfcoffee|pdf-free)[\w-]*/gi,
  /\b\w*(?:download|ebook)\w*\b/gi,
  /(?:\.(?:pdf|epub|mobi|azw3|docx?|txt|zip|rar))+\s*$/i,
];

/** Unicode dash variants folded to ASCII '-'. */
const UNICODE_DASHES = /[‒–—−⁃﹣－]/g;

/** Non-breaking and figure spaces. */
const INVISIBLE_SPACES = /[   ]/g;

/** Site names sometimes left at the start of a file name. */
const SITE_PREFIXES = [
  "pdfcoffee",
  "livrosparatodos",
  "reidoebook",
  "docero",
  "zlibrary",
  "libgen",
  "ebooksgratis",
  "baixarlivros",
  "downloadlivros",
  "freebook",
  "biblioteca",
];

/** Leftovers of "New document", "Untitled" and similar placeholder names. */
const PLACEHOLDER_NAME_PATTERNS: readonly RegExp[] = [
  /\bnew\s*(?:document|file|doc|txt|text)\b/gi,
  /\bnovo\s*(?:documento|arquivo|file|doc|txt|texto)\b/gi,
  /\bdocumento\s*(?:de\s*texto|sem\s*t[ií]tulo)/gi,
  /\buntitled\b/gi,
  /\bsem\s+t[ií]tulo\b/gi,
];

const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\n\r\t]/g;

/** Accented letters kept by the sanitizer even if a platform flags them. */
const ACCENTED_ALLOWLIST =
  "áéíóúàèìòùâêîôûãõäëïöüçÁÉÍÓÚÀÈÌÒÙÂÊÎÔÛÃÕÄËÏÖÜÇ";

// ── Basic helpers ───────────────────────────────────────────────────────────

export function normalizeSpaces(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Decompose and drop combining marks: "Machado de Assís" → "Machado de Assis". */
export function stripAccents(text: string): string {
  if (!text) return "";
  return text.normalize("NFD").replace(/\p{Mn}/gu, "");
}

/** Fold dash and space variants to their ASCII forms. */
export function unifyPunctuation(text: string): string {
  return text
    .normalize("NFKC")
    .replace(INVISIBLE_SPACES, " ")
    .replace(UNICODE_DASHES, "-");
}

function removeJunk(text: string): string {
  let result = text;
  for (const pattern of JUNK_PATTERNS) {
    result = result.replace(pattern, " ");
  }
  return result;
}

// ── Public normalizers ──────────────────────────────────────────────────────

/**
 * Remove download-site tags, bracketed groups, page counts, URLs and file
 * extensions; fold dashes; collapse whitespace.
 *
 * Passes repeat until the text stops changing, since one removal can expose
 * another. Every removal shortens the text.
 */
export function stripJunkTokens(text: string): string {
  if (!text) return "";
  let previous = "";
  let result = unifyPunctuation(text);
  while (result !== previous) {
    previous = result;
    result = normalizeSpaces(removeJunk(result));
  }
  return result;
}

/**
 * Make `text` safe as a single path segment on every common filesystem.
 */
export function sanitizeForFilesystem(text: string, maxLen = 180): string {
  let name = normalizeSpaces(text).replace(ILLEGAL_FILENAME_CHARS, "-");
  name = Array.from(name)
    .filter((ch) => !/\p{C}/u.test(ch) || ACCENTED_ALLOWLIST.includes(ch))
    .join("");
  name = name.replace(/[-_]{2,}/g, "-");
  return Array.from(name).slice(0, maxLen).join("").replace(/[. ]+$/, "");
}

/**
 * Full cleanup of a file name (extension already removed) before it is
 * split into title and author or used as a free-text query.
 */
export function cleanFilenameQuery(name: string): string {
  if (!name) return "";

  let text = name.replace(/\[\d+\]/g, "");
  text = removeJunk(unifyPunctuation(text));
  text = text
    .replace(/[+_]{2,}/g, " ")
    .replace(/\.{2,}/g, " ")
    .replace(/[+_]/g, " ");

  // Keep the dots of initials such as "J. K." or "J.K.".
  text = text.replace(/(?<!\b[A-Z])\.(?![A-Z]\b)/g, " ");
  text = text.replace(/(?<=\w)-(?=\w)/g, " ");
  text = trimDashes(text);

  for (const prefix of SITE_PREFIXES) {
    text = text.replace(new RegExp(`^\\s*${prefix}\\s+`, "i"), "");
  }

  text = text
    .replace(/\s\d+(?=\s)/g, " ")
    .replace(/^\s*\d+\s/, "")
    .replace(/\s\d+\s*$/, "");

  for (const pattern of PLACEHOLDER_NAME_PATTERNS) {
    text = text.replace(pattern, "");
  }

  text = normalizeSpaces(trimDashes(normalizeSpaces(text)));

  if (text.length < 3) {
    return normalizeSpaces(
      name.replace(/\[\d+\]/g, "").replace(/[+_]+/g, " "),
    );
  }

  return text;
}

/**
 * Lighter cleanup for files routed to quarantine: keeps most of the name so
 * a person can still recognise it, and keeps the original extension.
 */
export function cleanUnresolvedFilename(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  const hasExtension = dot > 0;
  const base = hasExtension ? fileName.slice(0, dot) : fileName;
  const extension = hasExtension ? fileName.slice(dot) : "";

  let name = base
    .replace(/reidoebook\[?\d*\]?\.com[+-]*/gi, " ")
    .replace(/www\.\w+\.com/gi, " ")
    .replace(/\(?z-library\)?/gi, " ")
    .replace(/pdfcoffee\.com/gi, " ")
    .replace(/\([^)]*\)/g, " ")
    .replace(/\[[^\]]*\]/g, " ")
    .replace(/\d{4}/g, " ");

  name = name.replace(/[+_]/g, " ");
  name = name.replace(/\s+/g, " ");
  name = name.replace(/[^\p{L}\p{N}_\s\-.]/gu, "").trim();

  if (name.length < 3) {
    name = normalizeSpaces(
      base.replace(/[^\p{L}\p{N}_\s\-.+]/gu, "").replace(/[+_]/g, " "),
    );
  }

  return name + extension;
}

/** Drop everything but letters, digits, whitespace and `-().`. */
export function removeSpecialCharacters(text: string): string {
  if (!text) return "";
  return normalizeSpaces(text.replace(/[^\p{L}\p{N}_\s\-().]/gu, ""));
}

export function toTitleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|[^\p{L}'])(\p{L})/gu, (_m, lead: string, letter: string) => lead + letter.toUpperCase());
}

function isSingleCase(text: string): boolean {
  const hasCased = text.toUpperCase() !== text.toLowerCase();
  return hasCased && (text === text.toUpperCase() || text === text.toLowerCase());
}

/**
 * Apply the user's text preferences to an accepted title and author list.
 * Single-case titles ("THE SHINING", "the shining") are title-cased.
 */
export function applyTextOptions(
  title: string,
  authors: readonly string[],
  options: TextOptions,
): { title: string; authors: string[] } {
  const clean = (value: string): string => {
    let result = value;
    if (options.stripAccents) result = stripAccents(result);
    if (options.cleanCharacters) result = removeSpecialCharacters(result);
    return normalizeSpaces(result);
  };

  let cleanTitle = clean(title);
  if (isSingleCase(cleanTitle)) cleanTitle = toTitleCase(cleanTitle);

  const cleanAuthors = authors.map(clean).filter((author) => author.length > 0);

  return { title: cleanTitle, authors: cleanAuthors };
}

function trimDashes(text: string): string {
  return text.replace(/^\s*-+\s*/, "").replace(/\s*-+\s*$/, "");
}
