export type {
  NormalizedRecord,
  RawRow,
  RequiredField,
  RowRejection,
  RowValidation,
  SourceLocator,
} from './core/records/types.js';

export type {
  IngestMetadata,
  IngestResult,
  QueryBatchResult,
  QueryResult,
} from './core/report/reportTypes.js';

export type { FilterValue, QuerySpec } from './core/query/schema.js';
export type { SourceRow } from './core/sources/csv.js';

export { REQUIRED_FIELDS } from './core/records/types.js';
export { DATETIME_LAYOUT, formatFlightDateTime, parseFlightDateTime } from './core/records/datetime.js';
export { formatRejection, validateRow } from './core/records/validate.js';
export { applyFilters, evaluateQuery, runQueries } from './core/query/evaluate.js';
export { parseQueriesDocument, parseQueriesFile } from './core/query/parse.js';
export { readCsvRows } from './core/sources/csv.js';
export { ingestFiles, listCsvFiles, readRawLines } from './core/sources/ingest.js';
export { loadDatabase, saveDatabase, saveErrors, saveQueryResults } from './core/store/database.js';
export { toJson } from './core/report/toJson.js';
export { toText } from './core/report/toText.js';

import { ingestFiles, listCsvFiles } from './core/sources/ingest.js';
import type { IngestResult } from './core/report/reportTypes.js';

/** Options for the ingest function. */
export interface IngestOptions {
  /** CSV files to read, in order. */
  readonly paths?: readonly string[] | undefined;
  /** A folder whose `.csv` files are read after `paths`, sorted by name. */
  readonly dir?: string | undefined;
}

/**
 * Validate flight rows from CSV files and/or a folder of CSV files.
 * Returns the accepted records, one error line per rejection, and counts.
 *
 * Throws when `dir` is given but is not a directory.
 */
export function ingest(options: IngestOptions): IngestResult {
  const paths = [...(options.paths ?? [])];
  if (options.dir !== undefined) {
    paths.push(...listCsvFiles(options.dir));
  }
  return ingestFiles(paths);
}
