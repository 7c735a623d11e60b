import { existsSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { KIND_FOLDERS, OBJECT_KINDS } from '../catalog/types.js';
import { ARTIFACT_EXTENSION, serverDirectory, writeFileAtomic } from '../output/writeArtifact.js';
import { compareStrings } from '../../util/index.js';
import { toJson } from './toJson.js';
import { REPORT_FILE_NAME } from './reportTypes.js';
import type { DatabaseCounts, RunReport } from './reportTypes.js';

export interface BuildReportOptions {
  readonly outputRoot: string;
  readonly server: string;
  readonly generatedAt?: Date | undefined;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

function countArtifacts(directory: string): number {
  return readdirSync(directory, { withFileTypes: true }).filter(
    (entry) => entry.isFile() && entry.name.endsWith(ARTIFACT_EXTENSION),
  ).length;
}

/**
 * Build the run report by scanning the output tree.
 * Counts reflect what is on disk, not what a run attempted.
 */
export function buildRunReport(options: BuildReportOptions): RunReport {
  const serverDir = serverDirectory(options.outputRoot, options.server);
  const counts = new Map<string, DatabaseCounts>();

  if (isDirectory(serverDir)) {
    for (const kind of OBJECT_KINDS) {
      const folder = KIND_FOLDERS[kind];
      const kindDir = join(serverDir, folder);
      if (!isDirectory(kindDir)) {
        continue;
      }
      for (const entry of readdirSync(kindDir, { withFileTypes: true })) {
        if (!entry.isDirectory()) {
          continue;
        }
        const dbCounts = counts.get(entry.name) ?? {};
        dbCounts[folder] = countArtifacts(join(kindDir, entry.name));
        counts.set(entry.name, dbCounts);
      }
    }
  }

  const databases: Record<string, DatabaseCounts> = {};
  for (const name of [...counts.keys()].sort(compareStrings)) {
    const dbCounts = counts.get(name);
    if (dbCounts === undefined) {
      continue;
    }
    // Re-key in processing order so the JSON is stable.
    const ordered: DatabaseCounts = {};
    for (const kind of OBJECT_KINDS) {
      const value = dbCounts[KIND_FOLDERS[kind]];
      if (value !== undefined) {
        ordered[KIND_FOLDERS[kind]] = value;
      }
    }
    databases[name] = ordered;
  }

  return {
    extraction_date: (options.generatedAt ?? new Date()).toISOString(),
    server: options.server,
    output_directory: options.outputRoot,
    databases,
  };
}

/** Write the report to `<outputRoot>/extraction_report.json` and return its path. */
export function writeRunReport(report: RunReport, outputRoot: string): string {
  const path = join(outputRoot, REPORT_FILE_NAME);
  writeFileAtomic(path, toJson(report));
  return path;
}
