import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resolve, join } from 'node:path';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import {
  loadDatabase,
  saveDatabase,
  saveErrors,
  saveQueryResults,
} from '../../src/core/store/database.js';
import type { NormalizedRecord } from '../../src/core/records/types.js';

const FIXTURES_DIR = resolve(import.meta.dirname, '../fixtures/db');

const RECORD: NormalizedRecord = {
  flight_id: 'AA100',
  origin: 'JFK',
  destination: 'LAX',
  departure_datetime: '2025-11-20 08:00',
  arrival_datetime: '2025-11-20 11:00',
  price: 199.99,
  airline: 'American',
};

describe('loadDatabase', () => {
  it('loads a list of flights', () => {
    const records = loadDatabase(resolve(FIXTURES_DIR, 'flights.json'));
    expect(records).toHaveLength(2);
    expect(records[0]?.flight_id).toBe('AA100');
    expect(records[1]?.['airline']).toBe('United');
  });

  it('rejects a document that is not a list', () => {
    expect(() => loadDatabase(resolve(FIXTURES_DIR, 'not-a-list.json'))).toThrow(
      /^expected JSON database to be a list of flights: /,
    );
  });

  it('names the first bad field of a malformed flight', () => {
    expect(() => loadDatabase(resolve(FIXTURES_DIR, 'missing-fields.json'))).toThrow(
      /^expected JSON database to be a list of flights at 0\.origin: /,
    );
  });

  it('throws on malformed JSON', () => {
    expect(() => loadDatabase(resolve(FIXTURES_DIR, 'malformed.json'))).toThrow(SyntaxError);
  });
});

describe('writers', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'flight-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the database as indented JSON that loads back', () => {
    const path = join(dir, 'db.json');
    saveDatabase(path, [RECORD]);

    expect(readFileSync(path, 'utf-8')).toBe(JSON.stringify([RECORD], null, 2));
    expect(loadDatabase(path)).toEqual([RECORD]);
  });

  it('writes one error per line', () => {
    const path = join(dir, 'errors.txt');
    saveErrors(path, ['a.csv:2: first', 'file not found: b.csv']);
    expect(readFileSync(path, 'utf-8')).toBe('a.csv:2: first\nfile not found: b.csv\n');
  });

  it('wraps query results under a single queries key', () => {
    const path = join(dir, 'results.json');
    saveQueryResults(path, { queries: [{ name: 'q1', count: 1, results: [RECORD] }] });

    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    expect(parsed).toEqual({ queries: [{ name: 'q1', count: 1, results: [RECORD] }] });
  });
});
