import { parseFlightDateTime } from '../records/datetime.js';
import type { NormalizedRecord } from '../records/types.js';
import type { QueryBatchResult, QueryResult } from '../report/reportTypes.js';
import type { FilterValue, QuerySpec } from './schema.js';

/** Record fields the datetime-range clauses compare against. */
type TimestampField = 'departure_datetime' | 'arrival_datetime';

/**
 * Apply every clause of a query to the records, narrowing in turn:
 * equality filters, then departure_between, arrival_before, arrival_after.
 * Relative order of the records is kept.
 *
 * Throws when a range bound, or a stored timestamp it is compared with,
 * does not parse as `YYYY-MM-DD HH:MM`.
 */
export function applyFilters(
  records: readonly NormalizedRecord[],
  query: QuerySpec,
): NormalizedRecord[] {
  let matched = [...records];

  if (query.filter !== undefined && query.filter !== null) {
    for (const [field, expected] of Object.entries(query.filter)) {
      const wanted = asText(expected).toLowerCase();
      matched = matched.filter((record) => asText(record[field]).toLowerCase() === wanted);
    }
  }

  if (query.departure_between !== undefined) {
    const [start, end] = query.departure_between;
    const from = parseBound('departure_between', start);
    const to = parseBound('departure_between', end);
    matched = matched.filter((record) => {
      const at = timestampOf(record, 'departure_datetime');
      return from <= at && at <= to;
    });
  }

  if (query.arrival_before !== undefined) {
    const to = parseBound('arrival_before', query.arrival_before);
    matched = matched.filter((record) => timestampOf(record, 'arrival_datetime') <= to);
  }

  if (query.arrival_after !== undefined) {
    const from = parseBound('arrival_after', query.arrival_after);
    matched = matched.filter((record) => timestampOf(record, 'arrival_datetime') >= from);
  }

  return matched;
}

/**
 * Evaluate one query. `position` is 1-based and names the result
 * (`q<position>`) when the query has no name of its own.
 */
export function evaluateQuery(
  records: readonly NormalizedRecord[],
  query: QuerySpec,
  position: number,
): QueryResult {
  const results = applyFilters(records, query);
  const name =
    query.name !== undefined && query.name !== null && query.name !== ''
      ? query.name
      : `q${String(position)}`;
  return { name, count: results.length, results };
}

/**
 * Run a batch of queries in order. A failure in any query aborts the
 * whole batch; no partial result is returned.
 */
export function runQueries(
  records: readonly NormalizedRecord[],
  queries: readonly QuerySpec[],
): QueryBatchResult {
  return {
    queries: queries.map((query, index) => evaluateQuery(records, query, index + 1)),
  };
}

/** Numbers use JavaScript's shortest form: a stored price of 200 reads as "200". */
function asText(value: FilterValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  return String(value);
}

function parseBound(clause: string, text: string): number {
  try {
    return parseFlightDateTime(text).getTime();
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid ${clause} bound: ${detail}`);
  }
}

function timestampOf(record: NormalizedRecord, field: TimestampField): number {
  try {
    return parseFlightDateTime(record[field]).getTime();
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Stored flight "${record.flight_id}" has an unreadable ${field}: ${detail}`);
  }
}
