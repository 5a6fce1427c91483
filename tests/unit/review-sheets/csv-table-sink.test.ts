import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { Decimal } from 'decimal.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createCsvTableSink, formatCell } from '@/modules/review-sheets/shell/repo/csv-table-sink.js';

import { testLogger } from '../../fixtures/builders.js';

import type { RenderedTable } from '@/modules/review-sheets/core/tables.js';

const TABLE: RenderedTable = {
  kind: 'remarks',
  fileName: '6-1_2023_その他備考.csv',
  columns: ['列A', '列B'],
  rows: [
    ['x', null],
    [new Decimal('1.5'), 'y'],
  ],
};

describe('formatCell', () => {
  it('formats each cell type', () => {
    expect(formatCell(null)).toBeNull();
    expect(formatCell('a')).toBe('a');
    expect(formatCell(42)).toBe('42');
    expect(formatCell(new Decimal('-0.25'))).toBe('-0.25');
  });
});

describe('createCsvTableSink', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rs-sink-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('writes a CSV with a byte-order mark', async () => {
    const sink = createCsvTableSink({ rootDir, writeProfiles: false, logger: testLogger });

    const result = await sink.writeTable(2023, TABLE);

    expect(result.isOk()).toBe(true);
    const contents = await fs.readFile(path.join(rootDir, 'year_2023', TABLE.fileName), 'utf8');
    expect(contents).toBe('\uFEFF列A,列B\nx,\n1.5,y\n');
    await expect(fs.access(path.join(rootDir, 'schemas'))).rejects.toThrow();
  });

  it('writes a profile beside the schemas directory when enabled', async () => {
    const sink = createCsvTableSink({ rootDir, writeProfiles: true, logger: testLogger });

    await sink.writeTable(2023, TABLE);

    const profile: unknown = JSON.parse(
      await fs.readFile(
        path.join(rootDir, 'schemas', 'year_2023', '6-1_2023_その他備考.schema.json'),
        'utf8'
      )
    );
    expect(profile).toMatchObject({
      fileName: TABLE.fileName,
      rowCount: 2,
      columnCount: 2,
      columns: [
        { name: '列A', dataType: 'string', nullable: false },
        { name: '列B', dataType: 'string', nullable: true, statistics: { nullCount: 1 } },
      ],
    });
  });

  it('returns an OutputWriteError when profiling fails', async () => {
    const sink = createCsvTableSink({
      rootDir,
      writeProfiles: true,
      logger: testLogger,
      profiler: () => {
        throw new RangeError('Maximum call stack size exceeded');
      },
    });

    const result = await sink.writeTable(2023, TABLE);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'OutputWriteError',
      fileName: TABLE.fileName,
      message: `Failed to profile ${TABLE.fileName}: Maximum call stack size exceeded`,
    });
    const contents = await fs.readFile(path.join(rootDir, 'year_2023', TABLE.fileName), 'utf8');
    expect(contents).toBe('\uFEFF列A,列B\nx,\n1.5,y\n');
    await expect(fs.access(path.join(rootDir, 'schemas'))).rejects.toThrow();
  });

  it('profiles a table with many rows', { timeout: 60_000 }, async () => {
    const rows = Array.from({ length: 200_000 }, (_, position) => [String(position), 'y']);
    const sink = createCsvTableSink({ rootDir, writeProfiles: true, logger: testLogger });

    const result = await sink.writeTable(2023, { ...TABLE, rows });

    expect(result.isOk()).toBe(true);
    const profile: unknown = JSON.parse(
      await fs.readFile(
        path.join(rootDir, 'schemas', 'year_2023', '6-1_2023_その他備考.schema.json'),
        'utf8'
      )
    );
    expect(profile).toMatchObject({
      rowCount: 200_000,
      columns: [
        { name: '列A', dataType: 'integer', statistics: { numeric: { max: '199999' } } },
        { name: '列B', dataType: 'string', statistics: { uniqueCount: 1 } },
      ],
    });
  });

  it('returns an OutputWriteError when the directory cannot be created', async () => {
    const blocker = path.join(rootDir, 'blocker');
    await fs.writeFile(blocker, '', 'utf8');
    const sink = createCsvTableSink({ rootDir: blocker, writeProfiles: false, logger: testLogger });

    const result = await sink.writeTable(2023, TABLE);

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'OutputWriteError',
      fileName: TABLE.fileName,
    });
  });
});
