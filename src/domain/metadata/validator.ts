// ---------------------------------------------------------------------------
// Metadata validator: the gate every candidate passes before filing.
// ---------------------------------------------------------------------------

import type { HeuristicsData } from "../../config/heuristics.js";
import { defaultHeuristics } from "../../config/heuristics.js";

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: string };

/** Shape checked by the validator; fields arrive from untyped sources. */
export interface ValidatableMetadata {
  title?: unknown;
  authors?: unknown;
}

export class MetadataValidator {
  private readonly invalidTitles: readonly string[];
  private readonly invalidAuthors: readonly string[];

  constructor(heuristics: HeuristicsData = defaultHeuristics()) {
    this.invalidTitles = heuristics.invalidTitles;
    this.invalidAuthors = heuristics.invalidAuthors;
  }

  validate(candidate: ValidatableMetadata): boolean {
    return this.check(candidate).valid;
  }

  /**
   * Denylist entries match as case-insensitive substrings, so "Unknown
   * Soldier" and "Administrator" are both rejected.
   */
  check(candidate: ValidatableMetadata): ValidationResult {
    const { title, authors } = candidate;

    if (typeof title !== "string" || title.trim().length < 2) {
      return { valid: false, reason: "missing or too short title" };
    }

    if (!Array.isArray(authors) || authors.length === 0) {
      return { valid: false, reason: "no authors" };
    }

    const names = authors.filter((a): a is string => typeof a === "string");
    const first = names[0];
    if (first === undefined || first.trim().length < 2) {
      return { valid: false, reason: "first author missing or too short" };
    }

    const lowerTitle = title.toLowerCase();
    const badTitle = this.invalidTitles.find((token) => lowerTitle.includes(token));
    if (badTitle) {
      return { valid: false, reason: `title contains "${badTitle}"` };
    }

    const lowerAuthors = names.join(", ").toLowerCase();
    const badAuthor = this.invalidAuthors.find((token) => lowerAuthors.includes(token));
    if (badAuthor) {
      return { valid: false, reason: `author contains "${badAuthor}"` };
    }

    return { valid: true };
  }
}
