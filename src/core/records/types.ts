/** The fields every flight row must carry, in the order they are checked. */
export const REQUIRED_FIELDS = [
  'flight_id',
  'origin',
  'destination',
  'departure_datetime',
  'arrival_datetime',
  'price',
] as const;

/** Name of one of the canonical flight fields. */
export type RequiredField = (typeof REQUIRED_FIELDS)[number];

/** One unvalidated source row: column name to cell text. */
export type RawRow = Readonly<Record<string, string | undefined>>;

/** Where a row came from. Line numbers are 1-based and count the header. */
export interface SourceLocator {
  readonly file: string;
  readonly line: number;
}

/**
 * A validated flight. Datetimes are canonical `YYYY-MM-DD HH:MM` strings.
 * Extra CSV columns ride along as trimmed text under their original names.
 */
export interface NormalizedRecord {
  readonly flight_id: string;
  readonly origin: string;
  readonly destination: string;
  readonly departure_datetime: string;
  readonly arrival_datetime: string;
  readonly price: number;
  readonly [field: string]: string | number;
}

/** Why a row was turned away. Only the first failing rule is reported. */
export interface RowRejection {
  readonly locator: SourceLocator;
  readonly row: RawRow;
  readonly reason: string;
}

/** Outcome of validating a single row. */
export type RowValidation =
  | { readonly ok: true; readonly record: NormalizedRecord }
  | { readonly ok: false; readonly rejection: RowRejection };
