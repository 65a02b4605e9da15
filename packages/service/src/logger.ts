/**
 * Structured logging.
 *
 * JSON logs via pino; pretty-printed through pino-pretty in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}

/** Logger that discards everything. Used when the caller supplies none. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
