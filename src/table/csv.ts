/**
 * CSV persistence for citation tables.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Papa from "papaparse";
import { isFileNotFound } from "../errors.js";
import { type CitationTable, REQUIRED_COLUMNS, type TableRow } from "../types.js";

const REQUIRED: readonly string[] = REQUIRED_COLUMNS;

/** Create a table with only the required columns and no rows. */
export function emptyTable(): CitationTable {
  return { columns: [...REQUIRED_COLUMNS], rows: [] };
}

function cell(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function toRow(raw: Record<string, unknown>, columns: string[]): TableRow {
  const extras: Record<string, string> = {};
  for (const column of columns) {
    if (!REQUIRED.includes(column)) extras[column] = cell(raw[column]);
  }
  return {
    ...extras,
    citation: cell(raw["citation"]),
    doi: cell(raw["doi"]),
    doi_url: cell(raw["doi_url"]),
  };
}

/**
 * Parse CSV text with a header row into a table.
 * Required columns come first; any other columns keep their file order.
 * Rows with missing cells are padded with empty strings.
 *
 * @throws On malformed CSV (e.g. unterminated quotes) or a row with more cells than the header
 */
export function parseCsvTable(text: string): CitationTable {
  if (!text.trim()) return emptyTable();

  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const errors = result.errors.filter((e) => e.code !== "TooFewFields");
  if (errors.length > 0) {
    throw new Error(
      `Failed to parse CSV: ${errors.map((e) => `row ${e.row ?? "?"}: ${e.message}`).join(", ")}`
    );
  }

  const fields = result.meta.fields ?? [];
  const columns = [...REQUIRED_COLUMNS, ...fields.filter((f) => f && !REQUIRED.includes(f))];
  const rows = result.data.map((raw) => toRow(raw, columns));
  return { columns, rows };
}

/** Format a table as CSV with a header row, "\n" line endings and a trailing newline. */
export function formatCsvTable(table: CitationTable): string {
  const data = table.rows.map((row) => table.columns.map((column) => row[column] ?? ""));
  return `${Papa.unparse({ fields: table.columns, data }, { newline: "\n" })}\n`;
}

/** Read a CSV table from disk. */
export async function readCsvTable(path: string): Promise<CitationTable> {
  const text = await readFile(path, "utf-8");
  return parseCsvTable(text);
}

/** Read a CSV table, or an empty table if the file does not exist. */
export async function loadTable(path: string): Promise<CitationTable> {
  try {
    return await readCsvTable(path);
  } catch (err) {
    if (isFileNotFound(err)) return emptyTable();
    throw err;
  }
}

/** Write a table as CSV, creating the parent directory if needed. */
export async function writeCsvTable(path: string, table: CitationTable): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatCsvTable(table), "utf-8");
}
