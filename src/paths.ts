/**
 * Path resolution utilities for output tables.
 */

import { extname } from "node:path";

/** Get the companion workbook path for a CSV table. */
export function getWorkbookPath(csvPath: string): string {
  const ext = extname(csvPath);
  if (ext.toLowerCase() === ".csv") {
    return `${csvPath.slice(0, -ext.length)}.xlsx`;
  }
  return `${csvPath}.xlsx`;
}
