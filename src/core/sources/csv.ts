import Papa from 'papaparse';
import type { RawRow, SourceLocator } from '../records/types.js';

/** A raw row together with where it was read from. */
export interface SourceRow {
  readonly row: RawRow;
  readonly locator: SourceLocator;
}

/**
 * Parse CSV text whose first line is a header naming the columns.
 *
 * Blank lines are skipped and every cell stays text. The n-th data row is
 * reported at line n + 1, counting the header as line 1. Cells past the
 * last header column are dropped; missing trailing cells are absent.
 * When a header name repeats, the rightmost cell wins.
 */
export function readCsvRows(content: string, file: string): readonly SourceRow[] {
  const result = Papa.parse<string[]>(content, {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const [header, ...records] = result.data;
  if (header === undefined) {
    return [];
  }

  return records.map((cells, index) => ({
    row: toRawRow(header, cells),
    locator: { file, line: index + 2 },
  }));
}

function toRawRow(header: readonly string[], cells: readonly string[]): RawRow {
  // Map keeps the first position of a repeated name and the last value;
  // fromEntries defines keys such as `__proto__` as own properties.
  const fields = new Map<string, string>();
  header.forEach((name, column) => {
    const value = cells[column];
    if (value !== undefined) {
      fields.set(name, value);
    }
  });
  return Object.fromEntries(fields);
}
