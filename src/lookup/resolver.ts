/**
 * Citation resolver.
 * Looks up citations one at a time, in input order, and turns each
 * outcome into a record. A failed lookup never stops the run.
 */

import { DEFAULT_REQUEST_DELAY } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { type CitationRecord, type LookupResult, NOT_FOUND } from "../types.js";
import { type FindDoiOptions, findDoi, toDoiUrl } from "./crossref.js";

/** Citations are truncated to this length in log lines */
const PREVIEW_LENGTH = 80;

export interface ResolveOptions extends FindDoiOptions {
  /** Delay between consecutive lookups in ms (default: 500) */
  requestDelay?: number;
  logger?: Logger;
  onProgress?: (progress: { completed: number; total: number; citation: string }) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Shorten a citation for display. */
export function previewCitation(citation: string): string {
  return citation.length > PREVIEW_LENGTH ? `${citation.slice(0, PREVIEW_LENGTH)}...` : citation;
}

/** Build a record from a citation and its DOI, or null when not found. */
export function toRecord(citation: string, doi: string | null): CitationRecord {
  if (!doi) {
    return { citation, doi: NOT_FOUND, doi_url: "" };
  }
  return { citation, doi, doi_url: toDoiUrl(doi) };
}

/**
 * Resolve a single citation to a DOI.
 * Lookup errors are logged and reported as not found.
 */
export async function resolveCitation(
  citation: string,
  options?: ResolveOptions
): Promise<LookupResult> {
  const log = options?.logger ?? defaultLogger;
  const crossref: FindDoiOptions = {};
  if (options?.mailto) crossref.mailto = options.mailto;

  try {
    const doi = await findDoi(citation, crossref);
    if (doi) {
      log.info({ doi, citation: previewCitation(citation) }, "doi_found");
      return { record: toRecord(citation, doi), status: "found" };
    }
    log.warn({ citation: previewCitation(citation) }, "doi_not_found");
    return { record: toRecord(citation, null), status: "not_found" };
  } catch (err) {
    const error = errorMessage(err);
    log.error({ err, citation: previewCitation(citation) }, "doi_lookup_failed");
    return { record: toRecord(citation, null), status: "not_found", error };
  }
}

/**
 * Resolve citations sequentially, waiting between consecutive lookups.
 */
export async function resolveCitations(
  citations: string[],
  options?: ResolveOptions
): Promise<LookupResult[]> {
  const log = options?.logger ?? defaultLogger;
  const requestDelay = options?.requestDelay ?? DEFAULT_REQUEST_DELAY;
  const total = citations.length;
  const results: LookupResult[] = [];

  log.info({ total }, "resolving_citations");

  for (const [index, citation] of citations.entries()) {
    results.push(await resolveCitation(citation, options));
    options?.onProgress?.({ completed: index + 1, total, citation });

    if (index < total - 1 && requestDelay > 0) {
      await sleep(requestDelay);
    }
  }

  return results;
}
