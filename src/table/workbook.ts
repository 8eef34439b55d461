/**
 * XLSX workbook output for citation tables.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import * as XLSX from "xlsx";
import type { CitationTable } from "../types.js";

/** Name of the single sheet in the workbook */
export const SHEET_NAME = "dois";

/** Build a workbook with one sheet: header row, then one row per table row. */
export function buildWorkbook(table: CitationTable): XLSX.WorkBook {
  const rows = table.rows.map((row) => table.columns.map((column) => row[column] ?? ""));
  const sheet = XLSX.utils.aoa_to_sheet([table.columns, ...rows]);
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
  return workbook;
}

/** Write a table as an XLSX workbook, creating the parent directory if needed. */
export async function writeWorkbook(path: string, table: CitationTable): Promise<void> {
  const data: Buffer = XLSX.write(buildWorkbook(table), { type: "buffer", bookType: "xlsx" });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
}
