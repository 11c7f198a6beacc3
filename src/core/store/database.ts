import { readFileSync, writeFileSync } from 'node:fs';
import { databaseFileSchema } from './schema.js';
import type { NormalizedRecord } from '../records/types.js';
import type { QueryBatchResult } from '../report/reportTypes.js';
import { toJson } from '../report/toJson.js';

/**
 * Read a JSON database written by {@link saveDatabase}.
 * Throws on unreadable files, malformed JSON, or a document that is not
 * a list of flight objects.
 */
export function loadDatabase(filePath: string): NormalizedRecord[] {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  const parsed = databaseFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.map(String).join('.')}` : '';
    throw new Error(
      `expected JSON database to be a list of flights${where}: ${issue?.message ?? 'invalid document'}`,
    );
  }
  return parsed.data;
}

/** Write the records as a pretty-printed JSON array. */
export function saveDatabase(filePath: string, records: readonly NormalizedRecord[]): void {
  writeFileSync(filePath, toJson(records), 'utf-8');
}

/** Write one error per line. */
export function saveErrors(filePath: string, errors: readonly string[]): void {
  writeFileSync(filePath, errors.map((e) => `${e}\n`).join(''), 'utf-8');
}

/** Write query results as `{ "queries": [...] }`. */
export function saveQueryResults(filePath: string, batch: QueryBatchResult): void {
  writeFileSync(filePath, toJson(batch), 'utf-8');
}
