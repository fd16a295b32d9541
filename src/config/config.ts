// ---------------------------------------------------------------------------
// Typed configuration loader.
// Defaults, overlaid by an optional YAML file, then SHELFSORT_* environment
// variables, then explicit overrides (CLI flags). The merged result is
// validated with Zod.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_FILENAME_PATTERN } from "../domain/metadata/filing.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

const PathsSchema = z
  .object({
    sourceDir: z.string().min(1).default("."),
    destinationDir: z.string().min(1).default("library"),
    logsDirName: z.string().min(1).default("logs"),
    unresolvedDirName: z.string().min(1).default("unresolved"),
    duplicatesDirName: z.string().min(1).default("duplicates"),
    coversDirName: z.string().min(1).default("covers"),
  })
  .default({});

const FilingSchema = z
  .object({
    organizeMode: z.enum(["author", "genre"]).default("author"),
    fileNamePattern: z.string().min(1).default(DEFAULT_FILENAME_PATTERN),
    maxFileNameLength: z.coerce.number().int().min(20).default(180),
    downloadCovers: z.boolean().default(true),
  })
  .default({});

const TextSchema = z
  .object({
    stripAccents: z.boolean().default(true),
    cleanCharacters: z.boolean().default(true),
  })
  .default({});

const SearchSchema = z
  .object({
    requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
    maxAttempts: z.coerce.number().int().min(1).default(3),
    retryBaseDelayMs: z.coerce.number().int().nonnegative().default(500),
    retryMaxDelayMs: z.coerce.number().int().nonnegative().default(8_000),
    rateLimitBackoffMs: z.coerce.number().int().nonnegative().default(5_000),
    maxRateLimitBackoffMs: z.coerce.number().int().nonnegative().default(60_000),
    minRequestIntervalMs: z.coerce.number().int().nonnegative().default(250),
    maxResults: z.coerce.number().int().min(1).max(40).default(5),
    language: z.string().min(2).optional(),
  })
  .default({});

const ProvidersSchema = z
  .object({
    googleBooksApiKey: z.string().min(1).optional(),
    isbndbApiKey: z.string().min(1).optional(),
    enableSimulation: z.boolean().default(false),
  })
  .default({});

const CacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    maxEntries: z.coerce.number().int().positive().default(1_000),
  })
  .default({});

const RunSchema = z
  .object({
    concurrency: z.coerce.number().int().min(1).max(16).default(1),
    writeReport: z.boolean().default(true),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    prettyPrint: z.boolean().default(false),
    redactSecrets: z.boolean().default(true),
  })
  .default({});

export const AppConfigSchema = z.object({
  env: z.enum(["development", "test", "production"]).default("development"),
  paths: PathsSchema,
  filing: FilingSchema,
  text: TextSchema,
  search: SearchSchema,
  providers: ProvidersSchema,
  cache: CacheSchema,
  run: RunSchema,
  logging: LoggingSchema,
});

/** Any subset of the configuration, as written in YAML or passed by the CLI. */
export type ConfigOverrides = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

// ── Merging ─────────────────────────────────────────────────────────────────

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge; `undefined` in `source` never replaces a value. */
function deepMerge(target: PlainObject, source: unknown): PlainObject {
  if (!isPlainObject(source)) return target;
  const result: PlainObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
}

// ── Environment-variable placeholders in YAML ──────────────────────────────

const ENV_PLACEHOLDER = /\$\{([A-Z_][A-Z0-9_]*)}/g;

/**
 * Replace `${ENV_VAR}` placeholders in every string of a parsed YAML
 * document. Throws if a referenced variable is not defined.
 */
function resolveEnvPlaceholders(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_PLACEHOLDER, (_match, varName: string) => {
      const envValue = env[varName];
      if (envValue === undefined) {
        throw new ConfigurationError(
          `Environment variable "${varName}" is referenced in the config file but is not defined`,
        );
      }
      return envValue;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholders(item, env));
  }
  if (isPlainObject(value)) {
    const resolved: PlainObject = {};
    for (const [k, v] of Object.entries(value)) {
      resolved[k] = resolveEnvPlaceholders(v, env);
    }
    return resolved;
  }
  return value;
}

// ── Layers ──────────────────────────────────────────────────────────────────

function readConfigFile(filePath: string, env: NodeJS.ProcessEnv): unknown {
  const absolute = path.resolve(filePath);
  if (!fs.existsSync(absolute)) {
    throw new ConfigurationError(`Config file does not exist: ${absolute}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(absolute, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Config file ${absolute} is not valid YAML`, { cause: err });
  }
  return resolveEnvPlaceholders(parsed ?? {}, env);
}

function parseBoolean(name: string, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${raw}"`);
}

/**
 * Map `SHELFSORT_*` variables onto the config tree. Numbers stay strings
 * here; the schema coerces them.
 */
function fromEnvironment(env: NodeJS.ProcessEnv): PlainObject {
  const str = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === "" ? undefined : value;
  };
  const bool = (name: string): boolean | undefined => {
    const value = str(name);
    return value === undefined ? undefined : parseBoolean(name, value);
  };

  return {
    env: str("SHELFSORT_ENV"),
    paths: {
      sourceDir: str("SHELFSORT_SOURCE_DIR"),
      destinationDir: str("SHELFSORT_DESTINATION_DIR"),
    },
    filing: {
      organizeMode: str("SHELFSORT_ORGANIZE_MODE"),
      fileNamePattern: str("SHELFSORT_FILENAME_PATTERN"),
      downloadCovers: bool("SHELFSORT_DOWNLOAD_COVERS"),
    },
    text: {
      stripAccents: bool("SHELFSORT_STRIP_ACCENTS"),
      cleanCharacters: bool("SHELFSORT_CLEAN_CHARACTERS"),
    },
    search: {
      requestTimeoutMs: str("SHELFSORT_REQUEST_TIMEOUT_MS"),
      language: str("SHELFSORT_LANGUAGE"),
    },
    providers: {
      googleBooksApiKey: str("SHELFSORT_GOOGLE_BOOKS_API_KEY"),
      isbndbApiKey: str("SHELFSORT_ISBNDB_API_KEY"),
      enableSimulation: bool("SHELFSORT_ENABLE_SIMULATION"),
    },
    cache: {
      enabled: bool("SHELFSORT_CACHE_ENABLED"),
    },
    run: {
      concurrency: str("SHELFSORT_CONCURRENCY"),
    },
    logging: {
      level: str("SHELFSORT_LOG_LEVEL"),
      prettyPrint: bool("SHELFSORT_LOG_PRETTY"),
    },
  };
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  /** YAML file; skipped when absent. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

/**
 * Load the application configuration.
 *
 * Every setting has a default so a run can start with zero configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;

  let merged: PlainObject = {};
  if (options.configPath) merged = deepMerge(merged, readConfigFile(options.configPath, env));
  merged = deepMerge(merged, fromEnvironment(env));
  merged = deepMerge(merged, options.overrides);

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
