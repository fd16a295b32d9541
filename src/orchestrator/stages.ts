// ---------------------------------------------------------------------------
// The three resolution stages. Each works from its own input only and
// either accepts a validated candidate or steps aside.
// ---------------------------------------------------------------------------

import path from "node:path";

import type {
  BookContentReader,
  BookFile,
  CandidateMetadata,
  ISBN,
  LocalMetadata,
  LogSink,
  ResolutionStage,
  TextQuery,
} from "../core/types.js";
import type { HeuristicsData } from "../config/heuristics.js";
import { splitTrailingAuthor } from "../domain/filename/classifiers.js";
import type { FilenameParser } from "../domain/filename/filename-parser.js";
import type { IsbnExtractor } from "../domain/isbn/extractor.js";
import type { MetadataValidator } from "../domain/metadata/validator.js";
import { cleanFilenameQuery } from "../domain/text/normalizer.js";
import type { SourceMatcher } from "./source-matcher.js";

/** Minimum confidence for an ISBN-sourced candidate. */
export const ISBN_ACCEPT_SCORE = 0.8;
/** Minimum confidence for candidates from the text stages. */
export const TEXT_ACCEPT_SCORE = 0.4;

export type MetadataMatcher = Pick<SourceMatcher, "lookupByIsbn" | "searchByText" | "simulate">;

export type StageOutcome =
  | { kind: "accepted"; metadata: CandidateMetadata; isbn: ISBN | null }
  | { kind: "skipped"; reason: string }
  | { kind: "rejected"; reason: string };

/** Per-file state shared by the stages of one resolution. */
export interface StageContext {
  readonly sink: LogSink;
  /** Read once per file, on first use. */
  localMetadata(): Promise<LocalMetadata>;
}

export interface ResolutionStageHandler {
  readonly name: ResolutionStage;
  run(file: BookFile, context: StageContext): Promise<StageOutcome>;
}

interface AcceptanceRules {
  validator: MetadataValidator;
  minScore: number;
}

function judge(
  candidate: CandidateMetadata | null,
  rules: AcceptanceRules,
): { ok: true } | { ok: false; reason: string } {
  if (!candidate) return { ok: false, reason: "no provider match" };

  const check = rules.validator.check(candidate);
  if (!check.valid) return { ok: false, reason: `rejected by validator: ${check.reason}` };

  if (candidate.confidenceScore < rules.minScore) {
    return {
      ok: false,
      reason: `score ${candidate.confidenceScore.toFixed(2)} below ${rules.minScore}`,
    };
  }
  return { ok: true };
}

// ── ISBN ────────────────────────────────────────────────────────────────────

export class IsbnStage implements ResolutionStageHandler {
  readonly name = "isbn" as const;

  constructor(
    private readonly extractor: IsbnExtractor,
    private readonly contentReader: BookContentReader,
    private readonly matcher: MetadataMatcher,
    private readonly validator: MetadataValidator,
  ) {}

  async run(file: BookFile, context: StageContext): Promise<StageOutcome> {
    const pages = await this.contentReader.readPages(file, await context.localMetadata());
    const isbn = this.extractor.extractFromPages(pages);
    if (!isbn) return { kind: "skipped", reason: "no ISBN found" };

    context.sink.log(`ISBN found: ${isbn}`, "info");

    const candidate = await this.matcher.lookupByIsbn(isbn);
    const verdict = judge(candidate, { validator: this.validator, minScore: ISBN_ACCEPT_SCORE });
    if (!candidate || !verdict.ok) {
      return {
        kind: "rejected",
        reason: `ISBN ${isbn}: ${verdict.ok ? "no provider match" : verdict.reason}`,
      };
    }

    return { kind: "accepted", metadata: candidate, isbn };
  }
}

// ── Local metadata ──────────────────────────────────────────────────────────

export class LocalMetadataStage implements ResolutionStageHandler {
  readonly name = "local-metadata" as const;

  constructor(
    private readonly matcher: MetadataMatcher,
    private readonly validator: MetadataValidator,
  ) {}

  async run(_file: BookFile, context: StageContext): Promise<StageOutcome> {
    const local = await context.localMetadata();
    const title = cleanFilenameQuery(local.title ?? "");
    if (title.length < 2) return { kind: "skipped", reason: "no embedded title" };

    const firstAuthor = local.authors?.[0];
    const author = firstAuthor ? cleanFilenameQuery(firstAuthor) : "";
    const query: TextQuery = author ? { title, author } : { title };

    context.sink.log(
      `Searching with embedded metadata: title "${title}"${author ? `, author "${author}"` : ""}`,
      "info",
    );

    const candidate = await this.matcher.searchByText(query);
    const verdict = judge(candidate, { validator: this.validator, minScore: TEXT_ACCEPT_SCORE });
    if (!candidate || !verdict.ok) {
      return { kind: "rejected", reason: verdict.ok ? "no provider match" : verdict.reason };
    }

    return { kind: "accepted", metadata: candidate, isbn: null };
  }
}

// ── Filename ────────────────────────────────────────────────────────────────

/**
 * Parsed title and author first, then the cleaned name as free text, then
 * the simulation table. The first candidate that passes is accepted.
 */
export class FilenameStage implements ResolutionStageHandler {
  readonly name = "filename" as const;

  constructor(
    private readonly parser: FilenameParser,
    private readonly matcher: MetadataMatcher,
    private readonly validator: MetadataValidator,
    private readonly heuristics: HeuristicsData,
  ) {}

  async run(file: BookFile, context: StageContext): Promise<StageOutcome> {
    const base = path.basename(file.fileName, path.extname(file.fileName));
    const cleaned = cleanFilenameQuery(base);
    const parsed = this.parser.parse(cleaned);
    if (!parsed) return { kind: "skipped", reason: "empty file name" };

    context.sink.log(
      `Searching with file name: title "${parsed.title}"${parsed.author ? `, author "${parsed.author}"` : ""}`,
      "info",
    );

    const rules: AcceptanceRules = { validator: this.validator, minScore: TEXT_ACCEPT_SCORE };
    const reasons: string[] = [];
    const tried = new Set<string>();

    const attempt = async (label: string, query: TextQuery): Promise<CandidateMetadata | null> => {
      const key = `${query.title}|${query.author ?? ""}`.toLowerCase();
      if (tried.has(key)) return null;
      tried.add(key);

      const candidate = await this.matcher.searchByText(query);
      const verdict = judge(candidate, rules);
      if (candidate && verdict.ok) return candidate;
      reasons.push(`${label}: ${verdict.ok ? "no provider match" : verdict.reason}`);
      return null;
    };

    const structured = await attempt(
      "parsed name",
      parsed.author ? { title: parsed.title, author: parsed.author } : { title: parsed.title },
    );
    if (structured) return { kind: "accepted", metadata: structured, isbn: null };

    const split = splitTrailingAuthor(cleaned, this.heuristics);
    const freeText = await attempt("free text", split ?? { title: cleaned });
    if (freeText) return { kind: "accepted", metadata: freeText, isbn: null };
    if (split) {
      const titleOnly = await attempt("free text", { title: cleaned });
      if (titleOnly) return { kind: "accepted", metadata: titleOnly, isbn: null };
    }

    const simulated = await this.matcher.simulate(cleaned);
    if (simulated && judge(simulated, rules).ok) {
      context.sink.log(`Using offline table entry: ${simulated.title}`, "warning");
      return { kind: "accepted", metadata: simulated, isbn: null };
    }

    return { kind: "rejected", reason: reasons.join("; ") || "no provider match" };
  }
}
