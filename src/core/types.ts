// ---------------------------------------------------------------------------
// Core types for shelfsort.
// All other modules import from this file.
// ---------------------------------------------------------------------------

// ── Branded primitives ──────────────────────────────────────────────────────

/** A checksum-valid ISBN-10 string (9 digits + check digit). */
export type ISBN10 = string & { readonly __brand: "ISBN10" };

/** A checksum-valid ISBN-13 string (13 digits, 978/979 prefix). */
export type ISBN13 = string & { readonly __brand: "ISBN13" };

/** Either form of a validated ISBN. */
export type ISBN = ISBN10 | ISBN13;

/** Unvalidated ISBN input. */
export type RawISBN = string;

// ── Enums ───────────────────────────────────────────────────────────────────

export const MetadataSource = {
  ISBN_LOOKUP: "isbn_lookup",
  LOCAL_CONTAINER: "local_container",
  FILENAME_HEURISTIC: "filename_heuristic",
  EXTERNAL_SEARCH: "external_search",
  SIMULATION: "simulation",
  MANUAL_EDIT: "manual_edit",
} as const;
export type MetadataSource =
  (typeof MetadataSource)[keyof typeof MetadataSource];

export const ProviderId = {
  GOOGLE_BOOKS: "google_books",
  OPEN_LIBRARY: "open_library",
  ISBNDB: "isbndb",
  SIMULATION: "simulation",
} as const;
export type ProviderId = (typeof ProviderId)[keyof typeof ProviderId];

export const ActionStatus = {
  MOVED: "moved",
  MOVED_TO_UNKNOWN: "moved_to_unknown",
  ERROR: "error",
  SKIPPED: "skipped",
} as const;
export type ActionStatus = (typeof ActionStatus)[keyof typeof ActionStatus];

export type LogLevel = "info" | "success" | "warning" | "error";

export type OrganizeMode = "author" | "genre";

/** Extensions the scanner picks up. */
export const SUPPORTED_EXTENSIONS = [
  ".epub",
  ".pdf",
  ".mobi",
  ".azw3",
  ".djvu",
  ".fb2",
  ".txt",
  ".doc",
  ".docx",
  ".rtf",
] as const;
export type BookExtension = (typeof SUPPORTED_EXTENSIONS)[number];

// ── Book files & metadata ───────────────────────────────────────────────────

export interface BookFile {
  /** Absolute path of the file. */
  path: string;
  /** Base name including extension. */
  fileName: string;
  /** Lower-cased extension with leading dot. */
  extension: BookExtension;
}

/** Size tag → URL, e.g. `{ thumbnail: "https://..." }`. */
export type CoverImageUrls = Record<string, string>;

export interface CandidateMetadata {
  title: string;
  authors: string[];
  /** Four-digit year when one could be extracted. */
  publishedYear?: string;
  categories: string[];
  coverImageUrls: CoverImageUrls;
  source: MetadataSource;
  /** Match confidence in [0, 1]. */
  confidenceScore: number;
  /** Human-readable origin, e.g. "Google Books (ISBN)". */
  providerLabel: string;
}

/**
 * Best-effort metadata read from the container itself (EPUB OPF, PDF info
 * dictionary). Every field is optional; an empty object means "nothing".
 */
export interface LocalMetadata {
  title?: string;
  authors?: string[];
  publishedDate?: string;
  categories?: string[];
  /** Raw identifier strings (EPUB `dc:identifier`), scanned for ISBNs. */
  identifiers?: string[];
}

// ── Resolution ──────────────────────────────────────────────────────────────

export type ResolutionStage = "isbn" | "local-metadata" | "filename";

export type ResolutionResult =
  | {
      readonly status: "resolved";
      readonly metadata: Readonly<CandidateMetadata>;
      readonly isbn: ISBN | null;
      readonly stage: ResolutionStage;
    }
  | {
      readonly status: "unresolved";
      readonly reason: string;
    };

export interface ActionRecord {
  sourcePath: string;
  destinationPath: string;
  title: string;
  author: string;
  year: string;
  genre: string;
  coverPath: string;
  status: ActionStatus;
  note: string;
  sourceLabel: string;
}

// ── Provider contract ───────────────────────────────────────────────────────

export interface TextQuery {
  title: string;
  author?: string;
}

/** One raw hit returned by a provider before scoring. */
export interface ProviderItem {
  title: string;
  authors: string[];
  publishedDate?: string;
  categories: string[];
  coverImageUrls: CoverImageUrls;
  /** ISBN-10/13 identifiers reported for the item, digits only. */
  identifiers: string[];
}

/**
 * Every bibliographic provider implements this interface. A provider that
 * cannot answer a kind of query returns an empty list.
 */
export interface BookMetadataProvider {
  readonly id: ProviderId;
  readonly label: string;

  /** False when the provider needs credentials that are not configured. */
  isAvailable(): boolean;

  lookupIsbn(isbn: ISBN, signal?: AbortSignal): Promise<ProviderItem[]>;

  searchText(query: TextQuery, signal?: AbortSignal): Promise<ProviderItem[]>;
}

// ── Collaborator contracts ──────────────────────────────────────────────────

export interface LogSink {
  log(message: string, level: LogLevel): void;
}

export interface LocalMetadataReader {
  /** Never throws; resolves to `{}` on any failure. */
  read(path: string, extension: BookExtension): Promise<LocalMetadata>;
}

/** Supplies the text the ISBN extractor scans. */
export interface BookContentReader {
  /** Page-like text chunks in document order; empty on failure. */
  readPages(file: BookFile, local: LocalMetadata): Promise<string[]>;
}

export interface Filer {
  fileResolved(
    sourcePath: string,
    metadata: Readonly<CandidateMetadata>,
    isbn?: ISBN | null,
  ): Promise<ActionRecord>;

  fileUnresolved(sourcePath: string, reason: string): Promise<ActionRecord>;
}

// ── ISBN parse result ───────────────────────────────────────────────────────

export type ISBNParseResult =
  | { ok: true; isbn: ISBN10; kind: "isbn10" }
  | { ok: true; isbn: ISBN13; kind: "isbn13" }
  | { ok: false; raw: RawISBN; reason: string };

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "test" | "production";
  paths: PathsConfig;
  filing: FilingConfig;
  text: TextOptions;
  search: SearchConfig;
  providers: ProvidersConfig;
  cache: CacheConfig;
  run: RunConfig;
  logging: LoggingConfig;
}

export interface PathsConfig {
  sourceDir: string;
  destinationDir: string;
  logsDirName: string;
  unresolvedDirName: string;
  duplicatesDirName: string;
  coversDirName: string;
}

export interface FilingConfig {
  organizeMode: OrganizeMode;
  fileNamePattern: string;
  maxFileNameLength: number;
  downloadCovers: boolean;
}

export interface TextOptions {
  stripAccents: boolean;
  cleanCharacters: boolean;
}

export interface SearchConfig {
  requestTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  rateLimitBackoffMs: number;
  /** Cap on a rate-limit pause, whatever Retry-After asks for. */
  maxRateLimitBackoffMs: number;
  /** Minimum gap between two calls to the same provider. */
  minRequestIntervalMs: number;
  maxResults: number;
  language?: string;
}

export interface ProvidersConfig {
  googleBooksApiKey?: string;
  isbndbApiKey?: string;
  enableSimulation: boolean;
}

export interface CacheConfig {
  enabled: boolean;
  maxEntries: number;
}

export interface RunConfig {
  concurrency: number;
  writeReport: boolean;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
