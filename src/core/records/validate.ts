import { REQUIRED_FIELDS } from './types.js';
import type {
  NormalizedRecord,
  RawRow,
  RequiredField,
  RowRejection,
  RowValidation,
  SourceLocator,
} from './types.js';
import { formatFlightDateTime, parseFlightDateTime } from './datetime.js';

/** 2-8 letters or digits, any script. */
const FLIGHT_ID_PATTERN = /^[\p{L}\p{N}]{2,8}$/u;

/** Exactly three uppercase letters. */
const AIRPORT_CODE_PATTERN = /^\p{Lu}{3}$/u;

/** A finite decimal number, optionally signed, optionally with an exponent. */
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const REQUIRED_FIELD_SET: ReadonlySet<string> = new Set(REQUIRED_FIELDS);

/**
 * Validate one raw flight row.
 *
 * Rules run in a fixed order and stop at the first failure:
 * presence, flight_id, origin, destination, both datetimes,
 * arrival after departure, then price.
 */
export function validateRow(row: RawRow, locator: SourceLocator): RowValidation {
  const reject = (reason: string): RowValidation => ({
    ok: false,
    rejection: { locator, row, reason },
  });

  for (const field of REQUIRED_FIELDS) {
    if (cell(row, field) === '') {
      return reject(`missing required field '${field}'`);
    }
  }

  const flightId = cell(row, 'flight_id');
  if (!FLIGHT_ID_PATTERN.test(flightId)) {
    return reject('flight_id must be 2-8 alphanumeric characters');
  }

  const origin = cell(row, 'origin');
  if (!AIRPORT_CODE_PATTERN.test(origin)) {
    return reject('origin must be 3 uppercase letters');
  }
  const destination = cell(row, 'destination');
  if (!AIRPORT_CODE_PATTERN.test(destination)) {
    return reject('destination must be 3 uppercase letters');
  }

  let departure: Date;
  try {
    departure = parseFlightDateTime(cell(row, 'departure_datetime'));
  } catch (error: unknown) {
    return reject(`departure_datetime parse error: ${describe(error)}`);
  }
  let arrival: Date;
  try {
    arrival = parseFlightDateTime(cell(row, 'arrival_datetime'));
  } catch (error: unknown) {
    return reject(`arrival_datetime parse error: ${describe(error)}`);
  }

  if (arrival.getTime() <= departure.getTime()) {
    return reject('arrival_datetime must be after departure_datetime');
  }

  const priceText = cell(row, 'price');
  const price = Number(priceText);
  if (!DECIMAL_PATTERN.test(priceText) || !Number.isFinite(price)) {
    return reject('price must be a positive float');
  }
  if (price <= 0) {
    return reject('price must be a positive number');
  }

  const extras = Object.fromEntries(
    Object.entries(row).flatMap(([key, value]): [string, string][] => {
      const trimmed = value?.trim() ?? '';
      return REQUIRED_FIELD_SET.has(key) || trimmed === '' ? [] : [[key, trimmed]];
    }),
  );

  const record: NormalizedRecord = {
    flight_id: flightId,
    origin,
    destination,
    departure_datetime: formatFlightDateTime(departure),
    arrival_datetime: formatFlightDateTime(arrival),
    price,
    ...extras,
  };

  return { ok: true, record };
}

/**
 * Format a rejection as a single diagnostic line:
 * `<file>:<line>: <reason> -- <row as JSON>`.
 */
export function formatRejection(rejection: RowRejection): string {
  const { locator, reason, row } = rejection;
  return `${locator.file}:${String(locator.line)}: ${reason} -- ${JSON.stringify(row)}`;
}

function cell(row: RawRow, field: RequiredField): string {
  return row[field]?.trim() ?? '';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
