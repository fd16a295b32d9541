// ---------------------------------------------------------------------------
// Application bootstrap: wires configuration, logging, providers and the
// cascade into a ready-to-run coordinator.
// ---------------------------------------------------------------------------

import path from "node:path";

import type { Logger } from "pino";

import type { AppConfig, BookMetadataProvider, LogSink } from "./core/types.js";
import { createLogger, createLogSink } from "./logging/logger.js";
import { defaultHeuristics, type HeuristicsData } from "./config/heuristics.js";
import { MatchCache } from "./cache/match-cache.js";
import type { ProviderContext, ProviderSettings } from "./adapters/base/base-provider.js";
import { GoogleBooksProvider } from "./adapters/googlebooks/googlebooks-provider.js";
import { OpenLibraryProvider } from "./adapters/openlibrary/openlibrary-provider.js";
import { IsbndbProvider } from "./adapters/isbndb/isbndb-provider.js";
import { SimulationProvider } from "./adapters/simulation/simulation-provider.js";
import { FileContentReader, FileMetadataReader } from "./adapters/local/index.js";
import { IsbnExtractor } from "./domain/isbn/extractor.js";
import { FilenameParser } from "./domain/filename/filename-parser.js";
import { MetadataValidator } from "./domain/metadata/validator.js";
import { ProviderThrottle } from "./orchestrator/concurrency.js";
import { SourceMatcher } from "./orchestrator/source-matcher.js";
import { FilenameStage, IsbnStage, LocalMetadataStage } from "./orchestrator/stages.js";
import { ResolutionCascade } from "./orchestrator/resolution-cascade.js";
import { RunCoordinator } from "./orchestrator/run-coordinator.js";
import { CoverSaver } from "./filer/cover-saver.js";
import { FileSystemFiler } from "./filer/file-system-filer.js";

export interface Shelfsort {
  config: AppConfig;
  logger: Logger;
  matcher: SourceMatcher;
  cascade: ResolutionCascade;
  filer: FileSystemFiler;
  coordinator: RunCoordinator;
}

export interface ShelfsortDeps {
  logger?: Logger;
  sink?: LogSink;
  heuristics?: HeuristicsData;
  /** Replaces the network providers, e.g. with fakes in tests. */
  providers?: readonly BookMetadataProvider[];
}

// ── Provider factory ───────────────────────────────────────────────────────

function createProviders(config: AppConfig, throttle: ProviderThrottle, logger: Logger): BookMetadataProvider[] {
  const settings = (apiKey?: string): ProviderSettings => ({
    timeoutMs: config.search.requestTimeoutMs,
    maxAttempts: config.search.maxAttempts,
    retryBaseDelayMs: config.search.retryBaseDelayMs,
    retryMaxDelayMs: config.search.retryMaxDelayMs,
    maxResults: config.search.maxResults,
    language: config.search.language,
    apiKey,
  });
  const context = (apiKey?: string): ProviderContext => ({
    settings: settings(apiKey),
    throttle,
    logger,
  });

  return [
    new GoogleBooksProvider(context(config.providers.googleBooksApiKey)),
    new OpenLibraryProvider(context()),
    new IsbndbProvider(context(config.providers.isbndbApiKey)),
  ];
}

// ── Main ───────────────────────────────────────────────────────────────────

export function createShelfsort(config: AppConfig, deps: ShelfsortDeps = {}): Shelfsort {
  const logger = deps.logger ?? createLogger(config.logging);
  const sink = deps.sink ?? createLogSink(logger.child({ module: "run" }));
  const heuristics = deps.heuristics ?? defaultHeuristics();

  const throttle = new ProviderThrottle({
    maxPerProvider: 1,
    minIntervalMs: config.search.minRequestIntervalMs,
    rateLimitBackoffMs: config.search.rateLimitBackoffMs,
    maxRateLimitBackoffMs: config.search.maxRateLimitBackoffMs,
  });

  const providers = deps.providers ?? createProviders(config, throttle, logger);
  const available = providers.filter((p) => p.isAvailable()).map((p) => p.id);
  logger.info({ providers: available }, "providers ready");

  const matcher = new SourceMatcher({
    providers,
    simulation: new SimulationProvider(config.providers.enableSimulation),
    cache: new MatchCache(config.cache, logger.child({ module: "cache" })),
    logger,
    sink,
  });

  const validator = new MetadataValidator(heuristics);
  const localReader = new FileMetadataReader(logger);

  const cascade = new ResolutionCascade({
    stages: [
      new IsbnStage(new IsbnExtractor(), new FileContentReader(logger), matcher, validator),
      new LocalMetadataStage(matcher, validator),
      new FilenameStage(new FilenameParser({ heuristics }), matcher, validator, heuristics),
    ],
    localReader,
    logger,
    sink,
  });

  const paths = { ...config.paths, destinationDir: path.resolve(config.paths.destinationDir) };

  const filer = new FileSystemFiler({
    paths,
    filing: config.filing,
    text: config.text,
    logger,
    sink,
    heuristics,
    coverSaver: config.filing.downloadCovers
      ? new CoverSaver({ logger, timeoutMs: config.search.requestTimeoutMs })
      : null,
  });

  const coordinator = new RunCoordinator({
    resolver: cascade,
    filer,
    logger,
    sink,
    destinationDir: paths.destinationDir,
    logsDirName: paths.logsDirName,
    concurrency: config.run.concurrency,
    writeReport: config.run.writeReport,
  });

  return { config, logger, matcher, cascade, filer, coordinator };
}
