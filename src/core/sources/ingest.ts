import { existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { validateRow, formatRejection } from '../records/validate.js';
import type { NormalizedRecord } from '../records/types.js';
import type { IngestResult } from '../report/reportTypes.js';
import { readCsvRows } from './csv.js';

/**
 * Validate every row of every CSV file, in the order given.
 *
 * Rejected rows and unreadable files become error lines; neither stops
 * the run.
 */
export function ingestFiles(paths: readonly string[]): IngestResult {
  const records: NormalizedRecord[] = [];
  const errors: string[] = [];

  for (const path of paths) {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error: unknown) {
      errors.push(describeReadFailure(path, error));
      continue;
    }

    for (const { row, locator } of readCsvRows(content, path)) {
      const outcome = validateRow(row, locator);
      if (outcome.ok) {
        records.push(outcome.record);
      } else {
        errors.push(formatRejection(outcome.rejection));
      }
    }
  }

  return {
    records,
    errors,
    metadata: {
      sources: [...paths],
      validCount: records.length,
      errorCount: errors.length,
    },
  };
}

/**
 * List the `.csv` files directly inside a directory, sorted by file name.
 * The extension check ignores case.
 */
export function listCsvFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new Error(`Directory not found: ${dir}`);
  }
  const names = readdirSync(dir).filter((name) => name.toLowerCase().endsWith('.csv'));
  return names.sort().map((name) => join(dir, name));
}

/**
 * Echo the raw lines of a source as `<path>: Line <n>: <text>`, skipping
 * blank lines. Line numbers count every physical line.
 */
export function readRawLines(path: string): string[] {
  const lines = readFileSync(path, 'utf-8').split(/\r?\n/);
  const echoed: string[] = [];
  lines.forEach((line, index) => {
    if (line.trim() !== '') {
      echoed.push(`${path}: Line ${String(index + 1)}: ${line}`);
    }
  });
  return echoed;
}

function describeReadFailure(path: string, error: unknown): string {
  if (isNodeError(error) && error.code === 'ENOENT') {
    return `file not found: ${path}`;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return `${path}: error reading file: ${detail}`;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
