/**
 * Serialize a document for the database or query results, indented by two spaces.
 * Keys keep their insertion order so records read back the way they were written.
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
