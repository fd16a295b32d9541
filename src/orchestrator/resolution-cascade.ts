// ---------------------------------------------------------------------------
// Resolution cascade: ISBN, then embedded metadata, then the file name.
// The first stage that accepts a candidate ends the cascade.
// ---------------------------------------------------------------------------

import type { Logger } from "pino";

import type {
  BookFile,
  LocalMetadata,
  LocalMetadataReader,
  LogSink,
  ResolutionResult,
} from "../core/types.js";
import type { ResolutionStageHandler, StageContext } from "./stages.js";

export const UNRESOLVED_REASON = "no valid metadata";

export interface ResolutionCascadeOptions {
  /** Stages in priority order. */
  stages: readonly ResolutionStageHandler[];
  localReader: LocalMetadataReader;
  logger: Logger;
  sink: LogSink;
}

export class ResolutionCascade {
  private readonly stages: readonly ResolutionStageHandler[];
  private readonly localReader: LocalMetadataReader;
  private readonly logger: Logger;
  private readonly sink: LogSink;

  constructor(options: ResolutionCascadeOptions) {
    this.stages = options.stages;
    this.localReader = options.localReader;
    this.logger = options.logger.child({ component: "ResolutionCascade" });
    this.sink = options.sink;
  }

  async resolve(file: BookFile): Promise<ResolutionResult> {
    const context = this.contextFor(file);
    const log = this.logger.child({ file: file.fileName });

    for (const stage of this.stages) {
      const outcome = await stage.run(file, context);

      switch (outcome.kind) {
        case "accepted": {
          const { metadata, isbn } = outcome;
          log.info(
            { stage: stage.name, provider: metadata.providerLabel, score: metadata.confidenceScore },
            "resolved",
          );
          this.sink.log(
            `Resolved via ${metadata.providerLabel}: "${metadata.title}" by ${metadata.authors.join(", ")}`,
            "success",
          );
          const result: ResolutionResult = {
            status: "resolved",
            metadata: Object.freeze({ ...metadata }),
            isbn,
            stage: stage.name,
          };
          return Object.freeze(result);
        }
        case "rejected":
          log.debug({ stage: stage.name, reason: outcome.reason }, "stage rejected");
          this.sink.log(`${stage.name}: ${outcome.reason}`, "warning");
          break;
        case "skipped":
          log.debug({ stage: stage.name, reason: outcome.reason }, "stage skipped");
          break;
      }
    }

    this.sink.log(`Could not identify ${file.fileName}`, "warning");
    const unresolved: ResolutionResult = { status: "unresolved", reason: UNRESOLVED_REASON };
    return Object.freeze(unresolved);
  }

  private contextFor(file: BookFile): StageContext {
    let local: Promise<LocalMetadata> | null = null;
    return {
      sink: this.sink,
      localMetadata: () => {
        local ??= this.localReader.read(file.path, file.extension);
        return local;
      },
    };
  }
}
