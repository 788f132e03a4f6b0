// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

/** Re-export pino's Logger type for convenience. */
export type Logger = pino.Logger;

/**
 * Create a configured pino logger instance.
 *
 * Lines carry `service` and `version` base fields. With `prettyPrint` the
 * output goes through the `pino-pretty` transport, which runs in a worker
 * and cannot write to a caller-supplied destination, so asking for both
 * is a configuration error.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const baseOptions: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: "upc-checker",
      version: process.env["APP_VERSION"] ?? "dev",
    },
  };

  if (config.prettyPrint) {
    if (destination) {
      throw new ConfigurationError(
        "prettyPrint cannot be combined with a custom log destination",
      );
    }
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return destination ? pino(baseOptions, destination) : pino(baseOptions);
}
