import type { NormalizedRecord } from '../records/types.js';

/** The named, counted result set for one query. */
export interface QueryResult {
  readonly name: string;
  readonly count: number;
  readonly results: readonly NormalizedRecord[];
}

/** Results of a query batch, in the order the queries were given. */
export interface QueryBatchResult {
  readonly queries: readonly QueryResult[];
}

/** Metadata about an ingest run. */
export interface IngestMetadata {
  readonly sources: readonly string[];
  readonly validCount: number;
  readonly errorCount: number;
}

/** The complete result of validating a set of CSV sources. */
export interface IngestResult {
  readonly records: readonly NormalizedRecord[];
  /** One diagnostic line per rejected row or unreadable source, in source-then-line order. */
  readonly errors: readonly string[];
  readonly metadata: IngestMetadata;
}
