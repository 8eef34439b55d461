/**
 * # citation-doi-finder
 *
 * Resolve plain-text academic citations to DOIs via Crossref and keep them in a
 * duplicate-free table.
 *
 * ## Workflow
 *
 * 1. **Read**: One citation per line; list markers such as `[1]` or `(1)` are stripped.
 * 2. **Resolve**: Each citation is sent to the Crossref works search, one at a time;
 *    the top match's DOI is kept, or `"Not Found"`.
 * 3. **Merge**: New records are appended to the existing table; DOIs already present
 *    are skipped and reported.
 * 4. **Write**: The table is saved as CSV and as an XLSX workbook with the same base name.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { cleanDuplicates, findDois } from "citation-doi-finder";
 *
 * const summary = await findDois("citations.txt", "dois.csv", {
 *   mailto: "you@example.com",
 *   requestDelay: 500,
 * });
 * console.log(`${summary.added.length} added, ${summary.skipped.length} already present`);
 *
 * const { removed } = await cleanDuplicates("dois.csv");
 * ```
 *
 * ## Configuration
 *
 * The CLI reads these from the environment (or a `.env` file):
 *
 * - **CROSSREF_MAILTO**: Contact address for Crossref's polite pool.
 * - **DOI_FINDER_REQUEST_DELAY_MS**: Delay between lookups. Default: `500`.
 * - **LOG_LEVEL**: pino log level. Default: `info`.
 *
 * ## Modules
 *
 * - **Operations**: {@link findDois}, {@link cleanDuplicates}
 * - **Lookup**: {@link searchCrossref}, {@link findDoi}, {@link resolveCitation}, {@link resolveCitations}
 * - **Input**: {@link readCitations}, {@link parseCitations}, {@link cleanCitation}
 * - **Tables**: {@link loadTable}, {@link saveTable}, {@link mergeRecords}, {@link removeDuplicateDois}
 * - **Utilities**: {@link getWorkbookPath}, {@link loadConfig}, {@link createLogger}
 *
 * @module citation-doi-finder
 */

// === Operations ===
export { findDois, cleanDuplicates } from "./finder.js";
export type { CleanOptions, CleanSummary, FindOptions, FindSummary } from "./finder.js";

// === Lookup ===
export { searchCrossref, findDoi, toDoiUrl } from "./lookup/crossref.js";
export type { CrossrefOptions, CrossrefWork, FindDoiOptions } from "./lookup/crossref.js";
export { resolveCitation, resolveCitations, toRecord } from "./lookup/resolver.js";
export type { ResolveOptions } from "./lookup/resolver.js";

// === Input ===
export { readCitations, parseCitations, cleanCitation } from "./citations.js";

// === Tables ===
export {
  buildWorkbook,
  emptyTable,
  formatCsvTable,
  loadTable,
  mergeRecords,
  parseCsvTable,
  readCsvTable,
  removeDuplicateDois,
  saveTable,
  writeCsvTable,
  writeWorkbook,
} from "./table/index.js";
export type { DedupeResult, MergeResult, SavedTable } from "./table/index.js";

// === Configuration & Utilities ===
export { loadConfig } from "./config.js";
export type { FinderConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { getWorkbookPath } from "./paths.js";

// === Types ===
export { NOT_FOUND, REQUIRED_COLUMNS } from "./types.js";
export type { CitationRecord, CitationTable, LookupResult, LookupStatus, TableRow } from "./types.js";
