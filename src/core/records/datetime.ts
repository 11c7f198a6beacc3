/** Human-readable form of the only accepted datetime layout. */
export const DATETIME_LAYOUT = 'YYYY-MM-DD HH:MM';

/**
 * Date and time separated by spaces. Runs of spaces are accepted and
 * collapse to one when the value is formatted back.
 */
const DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) +(\d{2}):(\d{2})$/;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse a flight datetime in the exact `YYYY-MM-DD HH:MM` layout.
 * Surrounding whitespace is trimmed. The result is a UTC instant; flight
 * times carry no timezone, so UTC is used only as a neutral reference.
 *
 * @throws Error when the text is empty or does not match the layout.
 */
export function parseFlightDateTime(text: string): Date {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw new Error('empty datetime');
  }

  const invalid = new Error(`invalid datetime format (expected '${DATETIME_LAYOUT}'): ${trimmed}`);
  const match = DATETIME_PATTERN.exec(trimmed);
  if (match === null) {
    throw invalid;
  }

  const [year, month, day, hour, minute] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined
  ) {
    throw invalid;
  }

  if (
    year < 1 ||
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59
  ) {
    throw invalid;
  }

  // Date.UTC maps years 0-99 onto 1900-1999, so set the year explicitly.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, 0, 0);
  return date;
}

/** Render a parsed flight datetime back to `YYYY-MM-DD HH:MM`. */
export function formatFlightDateTime(date: Date): string {
  const pad = (value: number, width = 2): string => String(value).padStart(width, '0');
  return (
    `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`
  );
}

