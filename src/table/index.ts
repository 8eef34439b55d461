/**
 * Citation table persistence.
 * A table is stored as a CSV file plus a companion XLSX workbook.
 */

import { errorMessage } from "../errors.js";
import { getWorkbookPath } from "../paths.js";
import type { CitationTable } from "../types.js";
import { writeCsvTable } from "./csv.js";
import { writeWorkbook } from "./workbook.js";

export interface SavedTable {
  csvPath: string;
  workbookPath: string;
  /** Set when the CSV was written but the workbook could not be */
  workbookError?: string;
}

/**
 * Write a table as CSV and as a workbook sharing the CSV's base name.
 * The CSV is written first; a workbook failure is returned, not thrown.
 *
 * @throws If the CSV cannot be written
 */
export async function saveTable(csvPath: string, table: CitationTable): Promise<SavedTable> {
  const workbookPath = getWorkbookPath(csvPath);
  await writeCsvTable(csvPath, table);
  try {
    await writeWorkbook(workbookPath, table);
  } catch (err) {
    return { csvPath, workbookPath, workbookError: errorMessage(err) };
  }
  return { csvPath, workbookPath };
}

export {
  emptyTable,
  formatCsvTable,
  loadTable,
  parseCsvTable,
  readCsvTable,
  writeCsvTable,
} from "./csv.js";
export { buildWorkbook, SHEET_NAME, writeWorkbook } from "./workbook.js";
export { doiKey, mergeRecords, removeDuplicateDois } from "./merge.js";
export type { DedupeResult, MergeResult } from "./merge.js";
