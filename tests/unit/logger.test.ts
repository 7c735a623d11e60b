import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createStderrLogger, createTracer } from '../../src/util/logger.js';

const NOW = new Date('2026-03-01T10:00:00.000Z');

describe('createStderrLogger', () => {
  let stderrOutput: string;
  let dir: string;

  beforeEach(() => {
    stderrOutput = '';
    dir = mkdtempSync(join(tmpdir(), 'logger-test-'));
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk);
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes timestamped lines for info and above', () => {
    const logger = createStderrLogger({ now: () => NOW });
    logger.info('Processing database: Sales');
    logger.warn('Skipping database Archive: denied');

    expect(stderrOutput).toBe(
      '2026-03-01T10:00:00.000Z - INFO - Processing database: Sales\n' +
        '2026-03-01T10:00:00.000Z - WARN - Skipping database Archive: denied\n',
    );
  });

  it('sends debug messages to the trace namespace only', () => {
    const traced: string[] = [];
    const trace = createTracer('test');
    trace.enabled = true;
    trace.log = (...args: unknown[]) => {
      traced.push(args.map(String).join(' '));
    };
    const filePath = join(dir, 'run.log');
    const logger = createStderrLogger({ filePath, now: () => NOW, trace });

    logger.debug('Saved dbo.T');
    logger.info('Done');

    expect(traced).toHaveLength(1);
    expect(traced[0]).toContain('sqlserver-object-extractor:test');
    expect(traced[0]).toContain('Saved dbo.T');
    expect(stderrOutput).toBe('2026-03-01T10:00:00.000Z - INFO - Done\n');
    expect(readFileSync(filePath, 'utf-8')).toBe('2026-03-01T10:00:00.000Z - INFO - Done\n');
  });

  it('drops debug messages while tracing is off', () => {
    const trace = createTracer('quiet');
    trace.enabled = false;
    const logger = createStderrLogger({ now: () => NOW, trace });
    logger.debug('Run phase: idle -> connected');
    expect(stderrOutput).toBe('');
  });

  it('mirrors lines into the log file', () => {
    const filePath = join(dir, 'run.log');
    const logger = createStderrLogger({ filePath, now: () => NOW });
    logger.error('Failed to connect to SQL Server: refused');
    expect(readFileSync(filePath, 'utf-8')).toBe(
      '2026-03-01T10:00:00.000Z - ERROR - Failed to connect to SQL Server: refused\n',
    );
  });

  it('falls back to stderr only when the log file cannot be written', () => {
    const logger = createStderrLogger({ filePath: join(dir, 'missing', 'run.log'), now: () => NOW });
    logger.info('first');
    logger.info('second');
    const lines = stderrOutput.trimEnd().split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe('2026-03-01T10:00:00.000Z - INFO - first');
    expect(lines[1]).toMatch(/^Log file .*run\.log is not writable, logging to stderr only: /);
    expect(lines[2]).toBe('2026-03-01T10:00:00.000Z - INFO - second');
  });
});
