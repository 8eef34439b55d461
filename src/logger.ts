/**
 * Structured logging.
 *
 * Logs go to stderr so stdout carries only the CLI report.
 */

import pino, { type LevelWithSilent, type Logger } from "pino";

export type { LevelWithSilent, Logger };

/** Create a logger writing synchronously to stderr. */
export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({ name: "doi-finder", level }, pino.destination({ dest: 2, sync: true }));
}

/** Shared logger used when a caller does not pass one. */
export const logger: Logger = createLogger();
