/**
 * Structured logging.
 *
 * Uses pino for JSON-structured logs; development runs pretty-print
 * through pino-pretty.
 */

import pino from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";
import type { HostConfig } from "./config.js";

/**
 * Create the host logger. An explicit destination (used by tests)
 * always receives raw JSON lines.
 */
export function createLogger(
  config: Pick<HostConfig, "LOG_LEVEL" | "NODE_ENV">,
  destination?: DestinationStream,
): Logger {
  const options: LoggerOptions = {
    level: config.LOG_LEVEL,
    base: { service: "splitvault" },
    ...(config.NODE_ENV === "development" && destination === undefined
      ? { transport: { target: "pino-pretty" } }
      : {}),
  };
  return destination === undefined ? pino(options) : pino(options, destination);
}
