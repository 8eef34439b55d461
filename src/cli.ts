/**
 * Command-line interface.
 *
 * ```
 * doi-finder -i citations.txt [-o dois.csv]   add DOIs for new citations
 * doi-finder -c dois.csv                      remove duplicate DOIs
 * ```
 */

import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import {
  type CleanSummary,
  cleanDuplicates,
  type FindOptions,
  type FindSummary,
  findDois,
} from "./finder.js";
import { createLogger } from "./logger.js";
import { previewCitation } from "./lookup/resolver.js";

const DEFAULT_OUTPUT = "dois.csv";

export const USAGE = `Usage:
  doi-finder -i <citations.txt> [-o <output.csv>]   Add DOIs for citations to a table
  doi-finder -c <table.csv>                         Remove duplicate DOIs from a table

Options:
  -i, --input <path>    Text file with citations, one per line
  -o, --output <path>   Output CSV path (default: ${DEFAULT_OUTPUT}); a .xlsx copy is written beside it
  -c, --clean <path>    CSV table to remove duplicate DOIs from
  -h, --help            Show this help`;

export interface CliArgs {
  input?: string;
  output: string;
  clean?: string;
  help: boolean;
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
}

/**
 * Parse command-line arguments.
 *
 * @throws On unknown options, missing option values or positional arguments
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o", default: DEFAULT_OUTPUT },
      clean: { type: "string", short: "c" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const args: CliArgs = {
    output: values.output ?? DEFAULT_OUTPUT,
    help: values.help ?? false,
  };
  if (values.input !== undefined) args.input = values.input;
  if (values.clean !== undefined) args.clean = values.clean;
  return args;
}

/** Success rate as a percentage with one decimal. */
function successRate(found: number, total: number): string {
  return total === 0 ? "0.0" : ((found / total) * 100).toFixed(1);
}

/** Where a table was saved, plus the workbook error if there was one. */
function savedLines(
  prefix: string,
  summary: Pick<FindSummary, "csvPath" | "workbookPath" | "workbookError">
): string[] {
  if (summary.workbookError === undefined) {
    return [`${prefix} ${summary.csvPath} and ${summary.workbookPath}`];
  }
  return [
    `${prefix} ${summary.csvPath}`,
    `Error saving to Excel (${summary.workbookPath}): ${summary.workbookError}`,
  ];
}

/** Report lines for a find run. */
export function formatFindReport(summary: FindSummary): string[] {
  const lines = summary.skipped.map(
    (record) => `Already in table: ${record.doi} ${previewCitation(record.citation)}`
  );
  const total = summary.results.length;
  lines.push(
    "",
    "Summary:",
    `Total citations: ${total}`,
    `DOIs found: ${summary.found}`,
    `Success rate: ${successRate(summary.found, total)}%`,
    `Total citations in CSV file: ${summary.totalRows}`,
    `New citations successfully added: ${summary.added.length}`,
    `Duplicate citations not added: ${summary.skipped.length}`,
    ...savedLines("Results saved to", summary)
  );
  return lines;
}

/** Report lines for a clean run. */
export function formatCleanReport(summary: CleanSummary): string[] {
  return [
    ...savedLines("Cleaned CSV file saved to", summary),
    "Summary:",
    `Duplicate citations removed: ${summary.removed}`,
    `Citations remaining after removal: ${summary.remaining}`,
  ];
}

const defaultIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  env: process.env,
};

/**
 * Run the CLI.
 *
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return 0;
    }

    const config = loadConfig(io.env);
    const logger = createLogger(config.logLevel);

    if (args.clean) {
      io.stdout(`Cleaning duplicate DOIs in ${args.clean}...`);
      const summary = await cleanDuplicates(args.clean, { logger });
      for (const line of formatCleanReport(summary)) io.stdout(line);
      return 0;
    }

    if (args.input) {
      io.stdout(`Processing citations from ${args.input}...`);
      const options: FindOptions = {
        logger,
        requestDelay: config.requestDelay,
        onProgress: ({ completed, total, citation }) =>
          io.stdout(`[${completed}/${total}] ${previewCitation(citation)}`),
      };
      if (config.mailto) options.mailto = config.mailto;

      const summary = await findDois(args.input, args.output, options);
      for (const line of formatFindReport(summary)) io.stdout(line);
      return 0;
    }

    io.stderr(
      "Error: No valid arguments provided. Use -i for input file or -c for cleaning a CSV file."
    );
    io.stderr(USAGE);
    return 1;
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}`);
    return 1;
  }
}
