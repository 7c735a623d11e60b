import type { RunReport } from './reportTypes.js';

/**
 * Serialize a RunReport as 2-space indented JSON.
 * Key order is the order the report was built in.
 */
export function toJson(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}
