import { readFileSync } from 'node:fs';
import { queriesFileSchema } from './schema.js';
import type { QuerySpec } from './schema.js';

/**
 * Validate an already-decoded queries document.
 * Throws when the value is not an array of query objects.
 */
export function parseQueriesDocument(value: unknown): readonly QuerySpec[] {
  const parsed = queriesFileSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? ` at ${issue.path.map(String).join('.')}` : '';
    throw new Error(
      `queries JSON must be a list of query objects${where}: ${issue?.message ?? 'invalid document'}`,
    );
  }
  return parsed.data;
}

/**
 * Read and validate a queries JSON file.
 * Throws on unreadable files, malformed JSON and documents of the wrong shape.
 */
export function parseQueriesFile(filePath: string): readonly QuerySpec[] {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return parseQueriesDocument(raw);
}
