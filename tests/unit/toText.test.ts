import { describe, it, expect } from 'vitest';
import { toText } from '../../src/core/report/toText.js';
import { toJson } from '../../src/core/report/toJson.js';

describe('toText', () => {
  it('summarizes sources, counts and rejected rows', () => {
    const text = toText({
      records: [],
      errors: ['a.csv:3: missing required field \'origin\' -- {}'],
      metadata: { sources: ['a.csv'], validCount: 0, errorCount: 1 },
    });

    expect(text.split('\n')).toEqual([
      '=== Flight Schedule Ingest ===',
      '',
      'Sources:   1',
      '  a.csv',
      'Valid:     0',
      'Rejected:  1',
      '',
      '--- Rejected Rows ---',
      "  a.csv:3: missing required field 'origin' -- {}",
      '',
    ]);
  });

  it('says so when nothing was rejected', () => {
    const text = toText({
      records: [],
      errors: [],
      metadata: { sources: [], validCount: 0, errorCount: 0 },
    });
    expect(text).toContain('No rejected rows.');
    expect(text).not.toContain('--- Rejected Rows ---');
  });
});

describe('toJson', () => {
  it('indents by two spaces and keeps key order', () => {
    expect(toJson({ b: 1, a: [2] })).toBe('{\n  "b": 1,\n  "a": [\n    2\n  ]\n}');
  });
});
