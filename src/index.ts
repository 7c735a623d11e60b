export type {
  ObjectKind,
  ObjectRef,
  ColumnDescriptor,
  DefinitionResult,
  DefinitionSource,
  KindFolder,
} from './core/catalog/types.js';
export type {
  SqlSession,
  SqlStatement,
  SqlRow,
  ConnectionOptions,
  ConnectionProvider,
} from './core/connection/session.js';
export type {
  RunPhase,
  RunStatus,
  ExtractionOptions,
  ExtractionOutcome,
  DatabaseOutcome,
} from './core/run/extract.js';
export type { RunReport, DatabaseCounts } from './core/report/reportTypes.js';
export type { ConfigFile } from './core/config/schema.js';
export type { ResolvedConfig, ConfigOverrides } from './core/config/load.js';
export type { Logger, LogLevel } from './util/logger.js';

export { OBJECT_KINDS, KIND_FOLDERS, fullName } from './core/catalog/types.js';
export { CatalogReader } from './core/catalog/reader.js';
export { DefinitionResolver } from './core/definition/resolve.js';
export { renderCreateTable, synthesizeTableDdl } from './core/definition/synthesize.js';
export { sanitizeName } from './core/output/sanitize.js';
export { artifactPath, writeArtifact } from './core/output/writeArtifact.js';
export { connectSqlServer } from './core/connection/connect.js';
export { extractAll } from './core/run/extract.js';
export { buildRunReport, writeRunReport } from './core/report/buildReport.js';
export { loadConfigFile, resolveConfig } from './core/config/load.js';
export {
  ExtractorError,
  ConnectionError,
  ConnectionUnavailableError,
  UnsafeIdentifierError,
  ConfigError,
} from './core/errors.js';
export { createStderrLogger, createMemoryLogger, createTracer, enableTracing } from './util/logger.js';

import { extractAll } from './core/run/extract.js';
import type { ExtractionOptions, ExtractionOutcome } from './core/run/extract.js';
import { buildRunReport, writeRunReport } from './core/report/buildReport.js';
import type { RunReport } from './core/report/reportTypes.js';
import { describeError } from './core/errors.js';
import { silentLogger } from './util/logger.js';
import type { Logger } from './util/logger.js';

/** Result of a full run: the extraction outcome and, when it could be written, the report. */
export interface RunResult {
  readonly outcome: ExtractionOutcome;
  readonly report: RunReport | null;
  readonly reportPath: string | null;
}

/** Options for regenerating a report from an existing output tree. */
export interface ReportOptions {
  readonly outputRoot: string;
  readonly server: string;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

/**
 * Rescan the output tree and write `extraction_report.json`.
 * Failures are logged; the return value is null when nothing was written.
 */
export function regenerateReport(options: ReportOptions): { report: RunReport; reportPath: string } | null {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  try {
    const report = buildRunReport({
      outputRoot: options.outputRoot,
      server: options.server,
      generatedAt: now(),
    });
    const reportPath = writeRunReport(report, options.outputRoot);
    logger.info(`Report generated: ${reportPath}`);
    return { report, reportPath };
  } catch (error: unknown) {
    logger.error(`Error generating report: ${describeError(error)}`);
    return null;
  }
}

/**
 * Extract every object, then write the report.
 * The report is written whatever the outcome, reflecting what is on disk.
 */
export async function runExtraction(options: ExtractionOptions): Promise<RunResult> {
  const outcome = await extractAll(options);
  const generated = regenerateReport({
    outputRoot: options.outputRoot,
    server: options.connection.server,
    logger: options.logger,
    now: options.now,
  });
  return {
    outcome,
    report: generated?.report ?? null,
    reportPath: generated?.reportPath ?? null,
  };
}
