/**
 * DOI-keyed merging and de-duplication of citation rows.
 *
 * DOIs compare case-insensitively. Rows without a resolved DOI are never
 * considered duplicates of each other.
 */

import { type CitationRecord, NOT_FOUND, type TableRow } from "../types.js";

export interface MergeResult {
  /** Existing rows followed by the appended records */
  rows: TableRow[];
  /** Records appended to the table */
  added: CitationRecord[];
  /** Records whose DOI was already present */
  skipped: CitationRecord[];
}

export interface DedupeResult<T extends CitationRecord> {
  rows: T[];
  removed: number;
}

/** Comparison key for a DOI, or null if the row has no resolved DOI. */
export function doiKey(doi: string): string | null {
  const trimmed = doi.trim();
  if (!trimmed || trimmed === NOT_FOUND) return null;
  return trimmed.toLowerCase();
}

/**
 * Append new records to existing rows, skipping any whose DOI is already
 * in the table or was appended earlier in the same batch.
 * Existing rows are kept unchanged.
 */
export function mergeRecords(existing: TableRow[], incoming: CitationRecord[]): MergeResult {
  const seen = new Set<string>();
  for (const row of existing) {
    const key = doiKey(row.doi);
    if (key) seen.add(key);
  }

  const rows = [...existing];
  const added: CitationRecord[] = [];
  const skipped: CitationRecord[] = [];

  for (const record of incoming) {
    const key = doiKey(record.doi);
    if (key && seen.has(key)) {
      skipped.push(record);
      continue;
    }
    if (key) seen.add(key);
    rows.push({ ...record });
    added.push(record);
  }

  return { rows, added, skipped };
}

/**
 * Drop rows whose DOI already appeared earlier, keeping the first occurrence.
 */
export function removeDuplicateDois<T extends CitationRecord>(rows: T[]): DedupeResult<T> {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const row of rows) {
    const key = doiKey(row.doi);
    if (key) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    unique.push(row);
  }

  return { rows: unique, removed: rows.length - unique.length };
}
