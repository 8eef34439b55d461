/**
 * Runtime configuration from environment variables.
 */

import { z } from "zod";
import type { LevelWithSilent } from "./logger.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/** Default delay between consecutive Crossref lookups, in ms */
export const DEFAULT_REQUEST_DELAY = 500;

/** Treat empty strings as unset */
const unsetIfEmpty = (value: unknown): unknown => (value === "" ? undefined : value);

export const EnvSchema = z.object({
  CROSSREF_MAILTO: z.preprocess(unsetIfEmpty, z.string().email().optional()),
  DOI_FINDER_REQUEST_DELAY_MS: z.preprocess(
    unsetIfEmpty,
    z.coerce.number().int().nonnegative().default(DEFAULT_REQUEST_DELAY)
  ),
  LOG_LEVEL: z.preprocess(unsetIfEmpty, z.enum(LOG_LEVELS).default("info")),
});

export interface FinderConfig {
  /** Contact address sent to Crossref for the polite pool */
  mailto?: string;
  /** Delay between consecutive lookups in ms */
  requestDelay: number;
  logLevel: LevelWithSilent;
}

/**
 * Build the finder configuration from an environment.
 *
 * @throws When a variable is present but invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FinderConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const config: FinderConfig = {
    requestDelay: parsed.data.DOI_FINDER_REQUEST_DELAY_MS,
    logLevel: parsed.data.LOG_LEVEL,
  };
  if (parsed.data.CROSSREF_MAILTO !== undefined) config.mailto = parsed.data.CROSSREF_MAILTO;
  return config;
}
