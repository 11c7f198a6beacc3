#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ingestFiles, listCsvFiles, readRawLines } from './core/sources/ingest.js';
import { loadDatabase, saveDatabase, saveErrors, saveQueryResults } from './core/store/database.js';
import { parseQueriesFile } from './core/query/parse.js';
import { runQueries } from './core/query/evaluate.js';
import { toText } from './core/report/toText.js';
import type { NormalizedRecord } from './core/records/types.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_CLI_ERROR = 2;
const EXIT_QUERY_ERROR = 3;
const EXIT_SOURCE_ERROR = 4;
const EXIT_OUTPUT_ERROR = 5;

/** Default output paths. */
const DEFAULT_DB_PATH = 'db.json';
const DEFAULT_ERRORS_PATH = 'errors.txt';
const DEFAULT_QUERY_RESULTS_PATH = 'query_results.json';

function printUsage(): void {
  process.stdout.write(
    `Usage: flight-schedule-tool [options]

Options:
  -i, --input <path>        Parse a single CSV file
  -d, --dir <path>          Parse all .csv files in a folder and combine results
  -o, --out <path>          Write valid flights to this JSON file (default: ${DEFAULT_DB_PATH})
  -j, --db <path>           Load an existing JSON database instead of parsing CSVs
  -q, --queries <path>      JSON file containing queries to run on the database
  --query-results <path>    Where to write query results (default: ${DEFAULT_QUERY_RESULTS_PATH})
  --errors <path>           Write rejected rows to this file (default: ${DEFAULT_ERRORS_PATH})
  -s, --show                Print raw CSV lines before parsing
  --summary                 Print a text summary of the parsed sources
  --help                    Show this help message

Exit codes:
  0  success
  2  invalid arguments or no input source given
  3  query execution failed
  4  input source unreadable
  5  output could not be written
`,
  );
}

export function main(argv?: string[]): number {
  let args: ReturnType<typeof parseArgs>;

  try {
    args = parseArgs({
      args: argv,
      options: {
        input: { type: 'string', short: 'i' },
        dir: { type: 'string', short: 'd' },
        out: { type: 'string', short: 'o', default: DEFAULT_DB_PATH },
        db: { type: 'string', short: 'j' },
        queries: { type: 'string', short: 'q' },
        'query-results': { type: 'string', default: DEFAULT_QUERY_RESULTS_PATH },
        errors: { type: 'string', default: DEFAULT_ERRORS_PATH },
        show: { type: 'boolean', short: 's', default: false },
        summary: { type: 'boolean', default: false },
        help: { type: 'boolean', default: false },
      },
      strict: true,
    });
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values['help'] === true) {
    printUsage();
    return EXIT_OK;
  }

  const stringOption = (name: string): string | undefined => {
    const value = args.values[name];
    return typeof value === 'string' ? value : undefined;
  };

  const outPath = stringOption('out') ?? DEFAULT_DB_PATH;
  const errorsPath = stringOption('errors') ?? DEFAULT_ERRORS_PATH;
  const queryResultsPath = stringOption('query-results') ?? DEFAULT_QUERY_RESULTS_PATH;
  const queriesPath = stringOption('queries');
  const dbPath = stringOption('db');

  let flights: readonly NormalizedRecord[];
  let errors: readonly string[] = [];

  if (dbPath !== undefined) {
    // Load DB from JSON instead of parsing CSVs
    try {
      flights = loadDatabase(dbPath);
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : '';
      process.stderr.write(`Error: Failed to load database ${dbPath}.${detail !== '' ? ` ${detail}` : ''}\n`);
      return EXIT_SOURCE_ERROR;
    }
    process.stdout.write(`Loaded ${String(flights.length)} flights from ${dbPath}\n`);
  } else {
    const csvPaths: string[] = [];
    const inputPath = stringOption('input');
    if (inputPath !== undefined) {
      csvPaths.push(inputPath);
    }
    const dir = stringOption('dir');
    if (dir !== undefined) {
      try {
        csvPaths.push(...listCsvFiles(dir));
      } catch (error: unknown) {
        const detail = error instanceof Error ? error.message : `Directory not found: ${dir}`;
        process.stderr.write(`Error: ${detail}\n`);
        return EXIT_SOURCE_ERROR;
      }
    }

    if (csvPaths.length === 0) {
      process.stderr.write(
        'Error: Provide --db <path>, --input <file.csv> or --dir <folder>. Use --help for usage.\n',
      );
      return EXIT_CLI_ERROR;
    }

    if (args.values['show'] === true) {
      for (const csvPath of csvPaths) {
        try {
          for (const line of readRawLines(csvPath)) {
            process.stdout.write(`${line}\n`);
          }
        } catch (error: unknown) {
          const detail = error instanceof Error ? error.message : String(error);
          process.stderr.write(`Error reading ${csvPath} for --show: ${detail}\n`);
        }
      }
    }

    const result = ingestFiles(csvPaths);
    flights = result.records;
    errors = result.errors;
    process.stdout.write(
      `Parsed: ${String(result.metadata.validCount)} valid flights, ${String(result.metadata.errorCount)} errors\n`,
    );

    if (args.values['summary'] === true) {
      process.stdout.write(toText(result));
    }
  }

  try {
    saveDatabase(outPath, flights);
    process.stdout.write(`Saved DB to ${outPath}\n`);
    if (errors.length > 0) {
      saveErrors(errorsPath, errors);
      process.stdout.write(`Saved errors to ${errorsPath}\n`);
    }
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: Failed to write output. ${detail}\n`);
    return EXIT_OUTPUT_ERROR;
  }

  if (queriesPath !== undefined) {
    try {
      const batch = runQueries(flights, parseQueriesFile(queriesPath));
      saveQueryResults(queryResultsPath, batch);
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : '';
      process.stderr.write(`Error: Failed to run queries.${detail !== '' ? ` ${detail}` : ''}\n`);
      return EXIT_QUERY_ERROR;
    }
    process.stdout.write(`Wrote query results to ${queryResultsPath}\n`);
  }

  return EXIT_OK;
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  process.exitCode = main(process.argv.slice(2));
}
