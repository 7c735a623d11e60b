import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { buildRunReport, writeRunReport } from '../../src/core/report/buildReport.js';
import { toText } from '../../src/core/report/toText.js';

const GENERATED_AT = new Date('2026-03-01T09:00:00.000Z');

function touch(root: string, ...segments: string[]): void {
  const path = join(root, ...segments);
  mkdirSync(join(path, '..'), { recursive: true });
  writeFileSync(path, '-- x');
}

describe('buildRunReport', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'report-test-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('counts .sql files per database and kind folder', () => {
    touch(root, 'S1', 'tables', 'Sales', 'dbo.A.sql');
    touch(root, 'S1', 'tables', 'Sales', 'dbo.B.sql');
    touch(root, 'S1', 'views', 'Sales', 'dbo.V.sql');
    touch(root, 'S1', 'tables', 'Archive', 'dbo.Old.sql');
    touch(root, 'S1', 'stored_procedures', 'Archive', 'dbo.P.sql');

    const report = buildRunReport({ outputRoot: root, server: 'S1', generatedAt: GENERATED_AT });

    expect(report).toEqual({
      extraction_date: '2026-03-01T09:00:00.000Z',
      server: 'S1',
      output_directory: root,
      databases: {
        Archive: { tables: 1, stored_procedures: 1 },
        Sales: { tables: 2, views: 1 },
      },
    });
  });

  it('ignores non-.sql files and stray temp files', () => {
    touch(root, 'S1', 'tables', 'Sales', 'dbo.A.sql');
    touch(root, 'S1', 'tables', 'Sales', 'dbo.B.sql.1234.1.tmp');
    touch(root, 'S1', 'tables', 'Sales', 'notes.txt');

    const report = buildRunReport({ outputRoot: root, server: 'S1', generatedAt: GENERATED_AT });
    expect(report.databases).toEqual({ Sales: { tables: 1 } });
  });

  it('reports zero for an empty database folder', () => {
    mkdirSync(join(root, 'S1', 'views', 'Empty'), { recursive: true });
    const report = buildRunReport({ outputRoot: root, server: 'S1', generatedAt: GENERATED_AT });
    expect(report.databases).toEqual({ Empty: { views: 0 } });
  });

  it('returns no databases when the server folder is missing', () => {
    const report = buildRunReport({ outputRoot: root, server: 'Nowhere', generatedAt: GENERATED_AT });
    expect(report.databases).toEqual({});
  });

  it('looks under the sanitized server folder', () => {
    touch(root, 'HOST_INST', 'tables', 'DB', 'dbo.T.sql');
    const report = buildRunReport({ outputRoot: root, server: 'HOST\\INST', generatedAt: GENERATED_AT });
    expect(report.server).toBe('HOST\\INST');
    expect(report.databases).toEqual({ DB: { tables: 1 } });
  });
});

describe('writeRunReport', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'report-write-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('writes indented JSON with a fixed key order', () => {
    touch(root, 'S1', 'views', 'DB1', 'dbo.V.sql');
    touch(root, 'S1', 'tables', 'DB1', 'dbo.T.sql');
    const report = buildRunReport({ outputRoot: root, server: 'S1', generatedAt: GENERATED_AT });

    const path = writeRunReport(report, root);

    expect(path).toBe(join(root, 'extraction_report.json'));
    const content = readFileSync(path, 'utf-8');
    expect(content).toBe(
      [
        '{',
        '  "extraction_date": "2026-03-01T09:00:00.000Z",',
        '  "server": "S1",',
        `  "output_directory": ${JSON.stringify(root)},`,
        '  "databases": {',
        '    "DB1": {',
        '      "tables": 1,',
        '      "views": 1',
        '    }',
        '  }',
        '}',
      ].join('\n'),
    );
  });
});

describe('toText', () => {
  it('summarizes counts per database', () => {
    const text = toText({
      extraction_date: '2026-03-01T09:00:00.000Z',
      server: 'S1',
      output_directory: 'out',
      databases: { DB1: { tables: 2, views: 1 }, DB2: { stored_procedures: 3 } },
    });
    expect(text.split('\n')).toEqual([
      '=== SQL Server Object Extraction ===',
      '',
      'Timestamp: 2026-03-01T09:00:00.000Z',
      'Server:    S1',
      'Output:    out',
      '',
      '--- Artifacts ---',
      '  DB1: tables=2 views=1',
      '  DB2: stored_procedures=3',
      '',
      'Total:     6',
      '',
    ]);
  });

  it('says so when nothing was extracted', () => {
    const text = toText({
      extraction_date: '2026-03-01T09:00:00.000Z',
      server: 'S1',
      output_directory: 'out',
      databases: {},
    });
    expect(text).toContain('No artifacts found.');
  });
});
