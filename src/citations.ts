/**
 * Citation input reading and cleaning.
 */

import { readFile } from "node:fs/promises";
import anyAscii from "any-ascii";
import { isFileNotFound } from "./errors.js";

const LATIN_LETTER = /^[a-z]/i;
const WHITESPACE_RUN = /\s+/g;
/** Unicode "Other" categories (control, format, private use, unassigned) except whitespace */
const NON_PRINTABLE = /[^\P{C}\s]/gu;

/**
 * Offset of the first character that transliterates to a Latin letter,
 * or -1 if there is none.
 */
function firstLetterOffset(text: string): number {
  let offset = 0;
  for (const char of text) {
    if (LATIN_LETTER.test(anyAscii(char))) return offset;
    offset += char.length;
  }
  return -1;
}

/**
 * Clean a raw citation line for searching.
 * Strips list markers such as "(1)", "[1]" or "1." before the first letter,
 * drops non-printable characters and collapses whitespace.
 */
export function cleanCitation(line: string): string {
  const trimmed = line.trim();
  const start = firstLetterOffset(trimmed);
  const body = start > 0 ? trimmed.slice(start) : trimmed;
  return body.replace(NON_PRINTABLE, "").replace(WHITESPACE_RUN, " ").trim();
}

/** Split file content into cleaned, non-empty citations. */
export function parseCitations(content: string): string[] {
  const citations: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    const citation = cleanCitation(line);
    if (citation) citations.push(citation);
  }
  return citations;
}

/**
 * Read a citations file, one citation per line.
 *
 * @throws If the file does not exist or cannot be read
 */
export async function readCitations(path: string): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isFileNotFound(err)) {
      throw new Error(`Citations file not found: ${path}`);
    }
    throw err;
  }
  return parseCitations(content);
}
