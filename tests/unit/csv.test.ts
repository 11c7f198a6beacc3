import { describe, it, expect } from 'vitest';
import { readCsvRows } from '../../src/core/sources/csv.js';
import { validateRow } from '../../src/core/records/validate.js';

const HEADER = 'flight_id,origin,destination,departure_datetime,arrival_datetime,price';

describe('readCsvRows', () => {
  it('maps each data row to its header columns', () => {
    const rows = readCsvRows(`${HEADER}\nAA100,JFK,LAX,2025-11-20 08:00,2025-11-20 11:00,199.99\n`, 'a.csv');

    expect(rows).toHaveLength(1);
    expect(rows[0]).toEqual({
      row: {
        flight_id: 'AA100',
        origin: 'JFK',
        destination: 'LAX',
        departure_datetime: '2025-11-20 08:00',
        arrival_datetime: '2025-11-20 11:00',
        price: '199.99',
      },
      locator: { file: 'a.csv', line: 2 },
    });
  });

  it('keeps every cell as text', () => {
    const rows = readCsvRows(`${HEADER}\n100,JFK,LAX,x,y,0089.50\n`, 'a.csv');
    expect(rows[0]?.row['flight_id']).toBe('100');
    expect(rows[0]?.row['price']).toBe('0089.50');
  });

  it('numbers rows by position and skips blank lines', () => {
    const rows = readCsvRows(`${HEADER}\nAA1,JFK,LAX,a,b,1\n\nAA2,JFK,LAX,a,b,2\n`, 'gaps.csv');
    expect(rows.map((r) => [r.row['flight_id'], r.locator.line])).toEqual([
      ['AA1', 2],
      ['AA2', 3],
    ]);
  });

  it('handles CRLF line endings and quoted cells', () => {
    const rows = readCsvRows(`${HEADER},note\r\nAA1,JFK,LAX,a,b,1,"late, again"\r\n`, 'crlf.csv');
    expect(rows[0]?.row['price']).toBe('1');
    expect(rows[0]?.row['note']).toBe('late, again');
  });

  it('leaves missing trailing cells absent', () => {
    const rows = readCsvRows(`${HEADER}\nAA1,JFK\n`, 'short.csv');
    expect(rows[0]?.row['origin']).toBe('JFK');
    expect(rows[0]?.row['destination']).toBeUndefined();
  });

  it('drops cells past the last header column', () => {
    const rows = readCsvRows(`${HEADER}\nAA1,JFK,LAX,a,b,1,surplus\n`, 'long.csv');
    expect(Object.keys(rows[0]?.row ?? {})).toEqual(HEADER.split(','));
  });

  it('keeps the rightmost cell when a header name repeats', () => {
    const rows = readCsvRows(
      `${HEADER},price\nAA100,JFK,LAX,2025-11-20 08:00,2025-11-20 11:00,199.99,abc\n`,
      'dup.csv',
    );
    const first = rows[0];
    expect(first?.row['price']).toBe('abc');
    expect(Object.keys(first?.row ?? {})).toEqual(HEADER.split(','));
    if (first === undefined) return;

    const outcome = validateRow(first.row, first.locator);
    expect(outcome.ok ? null : outcome.rejection.reason).toBe('price must be a positive float');
  });

  it('keeps a column named __proto__ as an own field', () => {
    const rows = readCsvRows(`${HEADER},__proto__\nAA1,JFK,LAX,a,b,1,x\n`, 'proto.csv');
    const row = rows[0]?.row ?? {};
    expect(Object.getOwnPropertyDescriptor(row, '__proto__')?.value).toBe('x');
    expect(Object.getPrototypeOf(row)).toBe(Object.prototype);
  });

  it('returns no rows for an empty file', () => {
    expect(readCsvRows('', 'blank.csv')).toEqual([]);
  });

  it('returns no rows for a header-only file', () => {
    expect(readCsvRows(`${HEADER}\n`, 'empty.csv')).toEqual([]);
  });
});
