#!/usr/bin/env node
// ---------------------------------------------------------------------------
// shelfsort command line: organize a folder of e-books into a library.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";

import { loadConfig, type ConfigOverrides } from "../config/config.js";
import { ConfigurationError } from "../core/errors.js";
import type { OrganizeMode } from "../core/types.js";
import { createShelfsort } from "../app.js";
import { printProgress, printSummary } from "./progress.js";

const USAGE = `Usage: shelfsort <source-dir> <destination-dir> [options]

Options:
  -c, --config <file>       YAML configuration file
      --mode <author|genre> Folder layout (default: author)
      --pattern <pattern>   File name pattern (default: "{author} - {title} ({year})")
      --concurrency <n>     Files processed at once (default: 1)
      --language <code>     Preferred language for provider searches
      --no-covers           Do not download cover images
      --keep-accents        Keep accented letters in names
      --simulate            Enable the offline simulation table
      --pretty              Human-readable log output
  -h, --help                Show this help
`;

function parseMode(value: string | undefined): OrganizeMode | undefined {
  if (value === undefined) return undefined;
  if (value === "author" || value === "genre") return value;
  throw new ConfigurationError(`--mode must be "author" or "genre", got "${value}"`);
}

function parseCount(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseCliArgs(argv: string[]): { configPath?: string; overrides: ConfigOverrides; help: boolean } {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      config: { type: "string", short: "c" },
      mode: { type: "string" },
      pattern: { type: "string" },
      concurrency: { type: "string" },
      language: { type: "string" },
      "no-covers": { type: "boolean", default: false },
      "keep-accents": { type: "boolean", default: false },
      simulate: { type: "boolean", default: false },
      pretty: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const [sourceDir, destinationDir] = positionals;

  return {
    configPath: values.config,
    help: values.help === true,
    overrides: {
      paths: { sourceDir, destinationDir },
      filing: {
        organizeMode: parseMode(values.mode),
        fileNamePattern: values.pattern,
        downloadCovers: values["no-covers"] ? false : undefined,
      },
      text: { stripAccents: values["keep-accents"] ? false : undefined },
      search: { language: values.language },
      providers: { enableSimulation: values.simulate ? true : undefined },
      run: { concurrency: parseCount("concurrency", values.concurrency) },
      logging: { prettyPrint: values.pretty ? true : undefined },
    },
  };
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = loadConfig({ configPath: args.configPath, overrides: args.overrides });
  const app = createShelfsort(config);

  const controller = new AbortController();
  process.once("SIGINT", () => {
    app.logger.warn("interrupt received; finishing the current file");
    controller.abort();
  });

  const startTime = Date.now();
  const summary = await app.coordinator.run(config.paths.sourceDir, {
    signal: controller.signal,
    onProgress: (progress) => printProgress(progress, startTime),
  });

  printSummary(summary);
  return summary.errors > 0 ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`shelfsort: ${message}`);
    if (err instanceof ConfigurationError) {
      process.stderr.write(USAGE);
    }
    process.exitCode = 2;
  },
);
