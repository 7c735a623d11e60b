import { KIND_FOLDERS, OBJECT_KINDS } from '../catalog/types.js';
import type { RunReport } from './reportTypes.js';

/**
 * Format a RunReport as a human-readable summary.
 */
export function toText(report: RunReport): string {
  const lines: string[] = [];

  lines.push('=== SQL Server Object Extraction ===');
  lines.push('');
  lines.push(`Timestamp: ${report.extraction_date}`);
  lines.push(`Server:    ${report.server}`);
  lines.push(`Output:    ${report.output_directory}`);
  lines.push('');

  const names = Object.keys(report.databases);
  if (names.length === 0) {
    lines.push('No artifacts found.');
  } else {
    lines.push('--- Artifacts ---');
    let total = 0;
    for (const name of names) {
      const counts = report.databases[name] ?? {};
      const parts: string[] = [];
      for (const kind of OBJECT_KINDS) {
        const count = counts[KIND_FOLDERS[kind]];
        if (count !== undefined) {
          parts.push(`${KIND_FOLDERS[kind]}=${String(count)}`);
          total += count;
        }
      }
      lines.push(`  ${name}: ${parts.join(' ')}`);
    }
    lines.push('');
    lines.push(`Total:     ${String(total)}`);
  }

  lines.push('');
  return lines.join('\n');
}
