import type { IngestResult } from './reportTypes.js';

/**
 * Format an IngestResult as human-readable text.
 */
export function toText(result: IngestResult): string {
  const lines: string[] = [];

  lines.push('=== Flight Schedule Ingest ===');
  lines.push('');
  lines.push(`Sources:   ${String(result.metadata.sources.length)}`);
  for (const source of result.metadata.sources) {
    lines.push(`  ${source}`);
  }
  lines.push(`Valid:     ${String(result.metadata.validCount)}`);
  lines.push(`Rejected:  ${String(result.metadata.errorCount)}`);
  lines.push('');

  if (result.errors.length > 0) {
    lines.push('--- Rejected Rows ---');
    for (const error of result.errors) {
      lines.push(`  ${error}`);
    }
  } else {
    lines.push('No rejected rows.');
  }

  lines.push('');
  return lines.join('\n');
}
