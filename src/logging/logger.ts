// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig, LogLevel, LogSink } from "../core/types.js";

export type Logger = pino.Logger;

/** Paths redacted from log output. */
const SECRET_PATHS: string[] = [
  "*.apiKey",
  "*.googleBooksApiKey",
  "*.isbndbApiKey",
  "headers.authorization",
  "headers.Authorization",
];

/**
 * Create a configured pino logger.
 *
 * - JSON output (pino default), or pino-pretty when `prettyPrint` is set
 * - API keys redacted when `redactSecrets` is set
 * - Base fields: `service` and `version`
 */
export function createLogger(config: LoggingConfig): pino.Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "shelfsort",
      version: process.env["SHELFSORT_VERSION"] ?? "dev",
    },
    ...(config.redactSecrets
      ? {
          redact: {
            paths: SECRET_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return pino(baseOptions);
}

/**
 * Adapt a pino logger to the four-level {@link LogSink} contract used by
 * the resolution cascade. `success` is logged at info with
 * `outcome: "success"`.
 */
export function createLogSink(logger: pino.Logger): LogSink {
  return {
    log(message: string, level: LogLevel): void {
      switch (level) {
        case "success":
          logger.info({ outcome: "success" }, message);
          break;
        case "warning":
          logger.warn(message);
          break;
        case "error":
          logger.error(message);
          break;
        default:
          logger.info(message);
      }
    },
  };
}
