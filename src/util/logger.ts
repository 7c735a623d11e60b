import { appendFileSync } from 'node:fs';
import debug from 'debug';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// Base namespace for trace output
const BASE_NAMESPACE = 'sqlserver-object-extractor';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createTracer('run') -> returns a debugger for 'sqlserver-object-extractor:run'
 */
export function createTracer(subNamespace: string): debug.Debugger {
  return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/** Turn on every trace namespace, on top of whatever DEBUG already enables. */
export function enableTracing(): void {
  const current = debug.disable();
  debug.enable([current, `${BASE_NAMESPACE}:*`].filter((ns) => ns !== '').join(','));
}

export interface StderrLoggerOptions {
  /** Lines are also appended here when set. */
  readonly filePath?: string | undefined;
  readonly now?: (() => Date) | undefined;
  /** Receives debug messages; defaults to the `run` namespace. */
  readonly trace?: debug.Debugger | undefined;
}

/**
 * Logger writing `<ISO timestamp> - LEVEL - message` lines to stderr for info and above,
 * mirrored into a log file when one is configured.
 * Debug messages go to the `debug` namespace, shown with DEBUG or --verbose.
 */
export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const trace = options.trace ?? createTracer('run');
  let filePath = options.filePath;

  const log = (level: Exclude<LogLevel, 'debug'>, message: string): void => {
    const line = `${now().toISOString()} - ${level.toUpperCase()} - ${message}\n`;
    process.stderr.write(line);
    if (filePath !== undefined) {
      try {
        appendFileSync(filePath, line, 'utf-8');
      } catch (error: unknown) {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`Log file ${filePath} is not writable, logging to stderr only: ${detail}\n`);
        filePath = undefined;
      }
    }
  };

  return {
    debug: (message) => trace('%s', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
  };
}

/** A logged line held in memory. */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
}

/** Logger that records entries instead of printing them. */
export interface MemoryLogger extends Logger {
  readonly entries: readonly LogEntry[];
}

export function createMemoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  return {
    entries,
    debug: (message) => entries.push({ level: 'debug', message }),
    info: (message) => entries.push({ level: 'info', message }),
    warn: (message) => entries.push({ level: 'warn', message }),
    error: (message) => entries.push({ level: 'error', message }),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
