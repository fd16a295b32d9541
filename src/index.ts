// ---------------------------------------------------------------------------
// Public API.
// ---------------------------------------------------------------------------

export * from "./core/types.js";
export * from "./core/errors.js";

export { createShelfsort, type Shelfsort, type ShelfsortDeps } from "./app.js";
export { loadConfig, AppConfigSchema, type ConfigOverrides, type LoadConfigOptions } from "./config/config.js";
export { loadHeuristics, defaultHeuristics, type HeuristicsData } from "./config/heuristics.js";
export { createLogger, createLogSink } from "./logging/logger.js";

export { parseISBN, isbn10ToISBN13, isbn13ToISBN10, isValidISBN10, isValidISBN13, normalizeISBNCandidate } from "./domain/isbn/isbn.js";
export { IsbnExtractor } from "./domain/isbn/extractor.js";
export { FilenameParser, type ParsedFilename } from "./domain/filename/filename-parser.js";
export { looksLikeAuthor, looksLikeTitle, isKnownAuthor } from "./domain/filename/classifiers.js";
export { MetadataValidator, type ValidationResult } from "./domain/metadata/validator.js";
export {
  buildFileName,
  choosePrimaryAuthor,
  choosePrimaryGenre,
  planFiling,
  yearFrom,
  type FilingPlan,
} from "./domain/metadata/filing.js";
export {
  applyTextOptions,
  cleanFilenameQuery,
  cleanUnresolvedFilename,
  sanitizeForFilesystem,
  stripAccents,
  stripJunkTokens,
} from "./domain/text/normalizer.js";
export { scoreTextMatch, tokenOverlap } from "./domain/matching/similarity.js";

export { GoogleBooksProvider } from "./adapters/googlebooks/googlebooks-provider.js";
export { OpenLibraryProvider } from "./adapters/openlibrary/openlibrary-provider.js";
export { IsbndbProvider } from "./adapters/isbndb/isbndb-provider.js";
export { SimulationProvider } from "./adapters/simulation/simulation-provider.js";
export { FileContentReader, FileMetadataReader } from "./adapters/local/index.js";

export { SourceMatcher } from "./orchestrator/source-matcher.js";
export { FilenameStage, IsbnStage, LocalMetadataStage } from "./orchestrator/stages.js";
export { ResolutionCascade } from "./orchestrator/resolution-cascade.js";
export { RunCoordinator, type RunProgress, type RunSummary } from "./orchestrator/run-coordinator.js";
export { FileSystemFiler } from "./filer/file-system-filer.js";
export { scanBooks } from "./scanner/book-scanner.js";
export { writeRunReport } from "./reporting/run-report.js";
