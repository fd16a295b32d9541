// ---------------------------------------------------------------------------
// Offline provider backed by a small static table of well-known titles.
// Lets the pipeline run deterministically without network access.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigurationError } from "../../core/errors.js";
import type {
  BookMetadataProvider,
  ISBN,
  ProviderItem,
  TextQuery,
} from "../../core/types.js";
import { ProviderId } from "../../core/types.js";
import { stripAccents } from "../../domain/text/normalizer.js";

const SimulationEntrySchema = z.object({
  /** Lower-case phrase looked for in the query title. */
  key: z.string().min(1),
  title: z.string().min(1),
  authors: z.array(z.string()),
  publishedDate: z.string().optional(),
  categories: z.array(z.string()).default([]),
});

export type SimulationEntry = z.infer<typeof SimulationEntrySchema>;

export const DEFAULT_SIMULATION_PATH = fileURLToPath(
  new URL("../../../data/simulation.json", import.meta.url),
);

export function loadSimulationTable(filePath: string = DEFAULT_SIMULATION_PATH): SimulationEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read simulation table ${filePath}`, { cause: error });
  }
  const parsed = z.array(SimulationEntrySchema).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid simulation table ${filePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function fold(text: string): string {
  return stripAccents(text).toLowerCase();
}

export class SimulationProvider implements BookMetadataProvider {
  public readonly id = ProviderId.SIMULATION;
  public readonly label = "Simulation";

  private readonly entries: readonly SimulationEntry[];
  private readonly enabled: boolean;

  constructor(enabled: boolean, entries: readonly SimulationEntry[] = loadSimulationTable()) {
    this.enabled = enabled;
    this.entries = entries;
  }

  isAvailable(): boolean {
    return this.enabled;
  }

  async lookupIsbn(_isbn: ISBN): Promise<ProviderItem[]> {
    return [];
  }

  /** First entry whose key appears in the title; accents are ignored. */
  async searchText(query: TextQuery): Promise<ProviderItem[]> {
    const title = fold(query.title);
    const entry = this.entries.find((e) => title.includes(fold(e.key)));
    if (!entry) return [];

    return [
      {
        title: entry.title,
        authors: [...entry.authors],
        publishedDate: entry.publishedDate,
        categories: [...entry.categories],
        coverImageUrls: {},
        identifiers: [],
      },
    ];
  }
}
