/**
 * Citation table type definitions.
 * Defines the records the finder resolves and the table it persists.
 */

/** Sentinel stored in the `doi` column when no DOI could be resolved. */
export const NOT_FOUND = "Not Found";

/** Columns every citation table starts with, in order. */
export const REQUIRED_COLUMNS = ["citation", "doi", "doi_url"] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/**
 * A single resolved citation.
 */
export type CitationRecord = {
  /** Cleaned citation text as it was searched */
  citation: string;
  /** Resolved DOI, or {@link NOT_FOUND} */
  doi: string;
  /** "https://doi.org/{doi}" when found, otherwise empty */
  doi_url: string;
};

/**
 * A row of a persisted table. Carries the record fields plus any extra
 * columns already present in the file.
 */
export type TableRow = CitationRecord & Record<string, string>;

/**
 * An ordered table of citation rows as stored in CSV/XLSX.
 */
export interface CitationTable {
  /** Column order; always begins with {@link REQUIRED_COLUMNS} */
  columns: string[];
  rows: TableRow[];
}

/** Outcome of a single lookup. */
export type LookupStatus = "found" | "not_found";

/**
 * Result of resolving one citation.
 */
export interface LookupResult {
  record: CitationRecord;
  status: LookupStatus;
  /** Error message when the lookup failed rather than returning no match */
  error?: string;
}
