/**
 * DOI finder operations.
 * Ties citation reading, Crossref resolution and table persistence together.
 */

import { readCitations } from "./citations.js";
import { isFileNotFound } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { previewCitation, type ResolveOptions, resolveCitations } from "./lookup/resolver.js";
import {
  loadTable,
  mergeRecords,
  readCsvTable,
  removeDuplicateDois,
  type SavedTable,
  saveTable,
} from "./table/index.js";
import type { CitationRecord, CitationTable, LookupResult } from "./types.js";

export type FindOptions = ResolveOptions;

export interface FindSummary {
  /** One result per input citation, in input order */
  results: LookupResult[];
  /** Records appended to the table */
  added: CitationRecord[];
  /** Records skipped because their DOI was already in the table */
  skipped: CitationRecord[];
  /** Number of resolved DOIs among the results */
  found: number;
  /** Rows in the table before this run */
  previousRows: number;
  /** Rows in the table after this run */
  totalRows: number;
  csvPath: string;
  workbookPath: string;
  /** Set when the workbook could not be written */
  workbookError?: string;
}

export interface CleanOptions {
  logger?: Logger;
}

export interface CleanSummary {
  removed: number;
  remaining: number;
  csvPath: string;
  workbookPath: string;
  /** Set when the workbook could not be written */
  workbookError?: string;
}

function logSaved(log: Logger, saved: SavedTable): void {
  if (saved.workbookError !== undefined) {
    log.error(
      { workbookPath: saved.workbookPath, error: saved.workbookError },
      "workbook_save_failed"
    );
  }
}

/**
 * Resolve every citation in a file and add the new DOIs to a table.
 * The table is created if it does not exist. Records whose DOI is already
 * present are skipped and reported.
 *
 * @throws If the citations file is missing or the existing table cannot be read
 */
export async function findDois(
  inputPath: string,
  outputPath: string,
  options?: FindOptions
): Promise<FindSummary> {
  const log = options?.logger ?? defaultLogger;

  const citations = await readCitations(inputPath);
  log.info({ inputPath, count: citations.length }, "citations_loaded");

  const table = await loadTable(outputPath);
  log.debug({ outputPath, rows: table.rows.length }, "table_loaded");

  const results = await resolveCitations(citations, options);
  const merged = mergeRecords(table.rows, results.map((r) => r.record));

  for (const record of merged.skipped) {
    log.info(
      { doi: record.doi, citation: previewCitation(record.citation) },
      "doi_already_in_table"
    );
  }

  const updated: CitationTable = { columns: table.columns, rows: merged.rows };
  const saved = await saveTable(outputPath, updated);
  logSaved(log, saved);
  log.info({ ...saved, rows: updated.rows.length }, "table_saved");

  return {
    results,
    added: merged.added,
    skipped: merged.skipped,
    found: results.filter((r) => r.status === "found").length,
    previousRows: table.rows.length,
    totalRows: updated.rows.length,
    ...saved,
  };
}

/**
 * Remove rows with a repeated DOI from a CSV table, keeping the first
 * occurrence, and write the CSV and its workbook back.
 *
 * @throws If the CSV file does not exist or cannot be parsed
 */
export async function cleanDuplicates(
  csvPath: string,
  options?: CleanOptions
): Promise<CleanSummary> {
  const log = options?.logger ?? defaultLogger;

  let table: CitationTable;
  try {
    table = await readCsvTable(csvPath);
  } catch (err) {
    if (isFileNotFound(err)) {
      throw new Error(`CSV file not found: ${csvPath}`);
    }
    throw err;
  }

  const { rows, removed } = removeDuplicateDois(table.rows);
  const saved = await saveTable(csvPath, { columns: table.columns, rows });
  logSaved(log, saved);
  log.info({ ...saved, removed, remaining: rows.length }, "table_cleaned");

  return { removed, remaining: rows.length, ...saved };
}
