import fs from 'node:fs/promises';
import path from 'node:path';

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import { describeCause } from '../../../../common/types/errors.js';
import {
  createSourceListError,
  createSourceReadError,
  type SourceListError,
  type SourceReadError,
} from '../../core/errors.js';
import { dedupeHeaders } from '../../core/source-table.js';

import type { SourceEntry, SourceTableRepo } from '../../core/ports.js';
import type { SourceRow, SourceTable } from '../../core/types.js';

export interface CsvSourceRepoOptions {
  /** Directory holding one `year_<YYYY>` directory per fiscal year */
  rootDir: string;
}

const YEAR_DIR_RE = /^year_(\d{4})$/;
const CSV_FILE_RE = /\.csv$/i;

export const yearDirectoryName = (fiscalYear: number): string => `year_${String(fiscalYear)}`;

const isStringMatrix = (value: unknown): value is string[][] =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

/**
 * Turns parsed CSV records into a source table. The first record is the
 * header row; short rows read as empty cells, extra cells are dropped.
 */
export const toSourceTable = (name: string, records: readonly (readonly string[])[]): SourceTable => {
  const [headerRow, ...dataRows] = records;
  const headers = dedupeHeaders(headerRow ?? []);

  const rows = dataRows.map((cells): SourceRow => {
    const row: Record<string, string> = {};
    headers.forEach((header, position) => {
      row[header] = cells[position] ?? '';
    });
    return row;
  });

  return { name, headers, rows };
};

/**
 * Reads decoded review sheets from `<rootDir>/year_<YYYY>/*.csv`.
 */
export const createCsvSourceRepo = (options: CsvSourceRepoOptions): SourceTableRepo => {
  const { rootDir } = options;

  return {
    async listYears(): Promise<Result<number[], SourceListError>> {
      try {
        const entries = await fs.readdir(rootDir, { withFileTypes: true });
        const years = entries
          .filter((entry) => entry.isDirectory())
          .map((entry) => YEAR_DIR_RE.exec(entry.name)?.[1])
          .filter((year): year is string => year !== undefined)
          .map((year) => Number.parseInt(year, 10))
          .sort((a, b) => a - b);
        return ok(years);
      } catch (error) {
        return err(
          createSourceListError(
            `Failed to list year directories in ${rootDir}: ${describeCause(error)}`,
            null,
            error
          )
        );
      }
    },

    async listSources(fiscalYear: number): Promise<Result<SourceEntry[], SourceListError>> {
      const yearDir = path.join(rootDir, yearDirectoryName(fiscalYear));
      try {
        const entries = await fs.readdir(yearDir, { withFileTypes: true });
        const sources = entries
          .filter((entry) => entry.isFile() && CSV_FILE_RE.test(entry.name))
          .map((entry) => entry.name)
          .sort()
          .map((name) => ({ fiscalYear, name, location: path.join(yearDir, name) }));
        return ok(sources);
      } catch (error) {
        return err(
          createSourceListError(
            `Failed to list source files in ${yearDir}: ${describeCause(error)}`,
            fiscalYear,
            error
          )
        );
      }
    },

    async read(entry: SourceEntry): Promise<Result<SourceTable, SourceReadError>> {
      let contents: string;
      try {
        contents = await fs.readFile(entry.location, 'utf8');
      } catch (error) {
        return err(
          createSourceReadError(
            entry.name,
            `Failed to read ${entry.location}: ${describeCause(error)}`,
            error
          )
        );
      }

      let records: unknown;
      try {
        records = parse(contents, {
          bom: true,
          relax_column_count: true,
          relax_quotes: true,
          skip_empty_lines: true,
        });
      } catch (error) {
        return err(
          createSourceReadError(
            entry.name,
            `Failed to parse ${entry.location}: ${describeCause(error)}`,
            error
          )
        );
      }

      if (!isStringMatrix(records)) {
        return err(createSourceReadError(entry.name, `Unexpected CSV structure in ${entry.location}`));
      }

      return ok(toSourceTable(entry.name, records));
    },
  };
};
