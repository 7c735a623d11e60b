import type { KindFolder } from '../catalog/types.js';

/** Artifact counts for one database, keyed by kind folder. Kinds without a folder are absent. */
export type DatabaseCounts = Partial<Record<KindFolder, number>>;

/**
 * The run report as written to `extraction_report.json`.
 * Keys follow the on-disk JSON document.
 */
export interface RunReport {
  readonly extraction_date: string;
  readonly server: string;
  readonly output_directory: string;
  readonly databases: Readonly<Record<string, DatabaseCounts>>;
}

/** File name of the report, directly under the output root. */
export const REPORT_FILE_NAME = 'extraction_report.json';
