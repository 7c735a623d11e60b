#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { existsSync, realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { regenerateReport, runExtraction } from './index.js';
import { loadConfigFile, resolveConfig } from './core/config/load.js';
import { DEFAULT_CONFIG_FILE } from './core/config/schema.js';
import { toText } from './core/report/toText.js';
import { describeError } from './core/errors.js';
import { createStderrLogger, enableTracing } from './util/logger.js';
import type { ConnectionProvider } from './core/connection/session.js';
import type { ResolvedConfig } from './core/config/load.js';
import type { Logger } from './util/logger.js';
import type { RunReport } from './core/report/reportTypes.js';
import type { RunStatus } from './core/run/extract.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_INTERRUPTED = 130;

const EXIT_CODES: Record<RunStatus, number> = {
  completed: EXIT_OK,
  failed: EXIT_FAILED,
  cancelled: EXIT_INTERRUPTED,
};

function printUsage(): void {
  process.stdout.write(
    `Usage: sqlserver-object-extractor [options]

Options:
  --server <name>       SQL Server host, or HOST\\INSTANCE
  --username <name>     SQL Server login
  --password <value>    SQL Server password
  --port <number>       SQL Server port (default: 1433)
  --output <dir>        Output directory (default: sql_extracted_objects)
  --config <path>       Configuration file (default: config.json)
  --no-trust-cert       Don't trust the server certificate
  --log-file <path>     Log file (default: sql_extractor.log)
  --verbose             Trace run phases and every saved artifact (DEBUG=sqlserver-object-extractor:*)
  --report-only         Rebuild extraction_report.json from the output tree without connecting
  --help                Show this help message
`,
  );
}

/** Collaborators the CLI can be given instead of the defaults. */
export interface CliDependencies {
  readonly connect?: ConnectionProvider | undefined;
  readonly logger?: Logger | undefined;
  readonly now?: (() => Date) | undefined;
}

function parsePort(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const port = Number(value);
  return port >= 1 && port <= 65535 ? port : null;
}

function printSummary(report: RunReport | null): void {
  if (report !== null) {
    process.stdout.write(toText(report));
  }
}

export async function main(argv?: string[], deps: CliDependencies = {}): Promise<number> {
  let args: ReturnType<typeof parseArgs>;

  try {
    args = parseArgs({
      args: argv,
      options: {
        server: { type: 'string' },
        username: { type: 'string' },
        password: { type: 'string' },
        port: { type: 'string' },
        output: { type: 'string' },
        config: { type: 'string', default: DEFAULT_CONFIG_FILE },
        'no-trust-cert': { type: 'boolean', default: false },
        'log-file': { type: 'string' },
        verbose: { type: 'boolean', default: false },
        'report-only': { type: 'boolean', default: false },
        help: { type: 'boolean', default: false },
      },
      strict: true,
    });
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values['help'] === true) {
    printUsage();
    return EXIT_OK;
  }

  const stringArg = (name: string): string | undefined => {
    const value = args.values[name];
    return typeof value === 'string' ? value : undefined;
  };

  // Validate port
  const portArg = stringArg('port');
  let port: number | undefined;
  if (portArg !== undefined) {
    const parsed = parsePort(portArg);
    if (parsed === null) {
      process.stderr.write(`Error: Invalid --port value "${portArg}". Must be an integer between 1 and 65535.\n`);
      return EXIT_CLI_ERROR;
    }
    port = parsed;
  }

  // Load config, flags win over file values
  let config: ResolvedConfig;
  try {
    const file = loadConfigFile(resolve(stringArg('config') ?? DEFAULT_CONFIG_FILE));
    config = resolveConfig(file, {
      server: stringArg('server'),
      username: stringArg('username'),
      password: stringArg('password'),
      port,
      outputDir: stringArg('output'),
      noTrustCert: args.values['no-trust-cert'] === true,
      logFile: stringArg('log-file'),
    });
  } catch (error: unknown) {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values['verbose'] === true) {
    enableTracing();
  }
  const logger = deps.logger ?? createStderrLogger({ filePath: config.logFile });

  if (args.values['report-only'] === true) {
    if (config.server === undefined) {
      process.stderr.write('Error: Server is required to locate the output tree.\n');
      return EXIT_CLI_ERROR;
    }
    const generated = regenerateReport({
      outputRoot: config.outputDir,
      server: config.server,
      logger,
      now: deps.now,
    });
    if (generated === null) {
      return EXIT_FAILED;
    }
    printSummary(generated.report);
    return EXIT_OK;
  }

  const { server, username, password } = config;
  if (server === undefined || username === undefined || password === undefined) {
    process.stderr.write(
      'Error: Server, username, and password are required.\nProvide them via command line arguments or the config file.\n',
    );
    return EXIT_CLI_ERROR;
  }

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupt received, stopping after the current object');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await runExtraction({
      connection: {
        server,
        port: config.port,
        username,
        password,
        trustServerCertificate: config.trustCert,
        connectionTimeoutMs: config.connectionTimeoutMs,
        queryTimeoutMs: config.queryTimeoutMs,
      },
      outputRoot: config.outputDir,
      connect: deps.connect,
      logger,
      signal: controller.signal,
      now: deps.now,
    });

    printSummary(result.report);
    return EXIT_CODES[result.outcome.status];
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

/** True when this file is the process entry point, including through an npm bin symlink. */
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined || !existsSync(entry)) {
    return false;
  }
  return realpathSync(resolve(entry)) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      process.stderr.write(`Error: ${describeError(error)}\n`);
      process.exitCode = EXIT_FAILED;
    });
}
