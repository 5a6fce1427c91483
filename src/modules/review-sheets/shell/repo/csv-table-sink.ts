import fs from 'node:fs/promises';
import path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import { err, fromThrowable, ok, type Result } from 'neverthrow';

import { describeCause } from '../../../../common/types/errors.js';
import { profileTable, type ProfileCell } from '../../../table-profiles/index.js';
import { createOutputWriteError, type OutputWriteError } from '../../core/errors.js';
import { yearDirectoryName } from './csv-source-repo.js';

import type { Logger } from '../../../../infra/logger/index.js';
import type { OutputTableSink } from '../../core/ports.js';
import type { CellValue, RenderedTable } from '../../core/tables.js';

export type TableProfiler = typeof profileTable;

export interface CsvTableSinkOptions {
  /** Tables go to `<rootDir>/year_<YYYY>/`, profiles to `<rootDir>/schemas/year_<YYYY>/` */
  rootDir: string;
  writeProfiles: boolean;
  logger: Logger;
  /** Defaults to `profileTable` */
  profiler?: TableProfiler;
}

const UTF8_BOM = '\uFEFF';

export const formatCell = (value: CellValue): ProfileCell => {
  if (value === null) return null;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return value.toString();
};

const schemaFileName = (fileName: string): string =>
  `${fileName.replace(/\.csv$/i, '')}.schema.json`;

/**
 * Writes RS tables as UTF-8 CSV with a byte-order mark, so spreadsheet tools
 * open them with the right encoding.
 */
export const createCsvTableSink = (options: CsvTableSinkOptions): OutputTableSink => {
  const { rootDir, writeProfiles } = options;
  const log = options.logger.child({ sink: 'CsvTableSink' });
  const safeProfile = fromThrowable(options.profiler ?? profileTable, (error) => error);

  const writeFile = async (
    filePath: string,
    contents: string,
    fileName: string
  ): Promise<Result<void, OutputWriteError>> => {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, contents, 'utf8');
      return ok(undefined);
    } catch (error) {
      return err(
        createOutputWriteError(fileName, `Failed to write ${filePath}: ${describeCause(error)}`, error)
      );
    }
  };

  return {
    async writeTable(
      fiscalYear: number,
      table: RenderedTable
    ): Promise<Result<void, OutputWriteError>> {
      const cells = table.rows.map((row) => row.map(formatCell));
      const csv = stringify([[...table.columns], ...cells.map((row) => row.map((cell) => cell ?? ''))]);

      const tablePath = path.join(rootDir, yearDirectoryName(fiscalYear), table.fileName);
      const tableResult = await writeFile(tablePath, `${UTF8_BOM}${csv}`, table.fileName);
      if (tableResult.isErr()) {
        return err(tableResult.error);
      }
      log.info({ file: table.fileName, rows: table.rows.length }, 'Wrote table');

      if (!writeProfiles) {
        return ok(undefined);
      }

      const profileResult = safeProfile(table.fileName, table.columns, cells);
      if (profileResult.isErr()) {
        return err(
          createOutputWriteError(
            table.fileName,
            `Failed to profile ${table.fileName}: ${describeCause(profileResult.error)}`,
            profileResult.error
          )
        );
      }

      const profilePath = path.join(
        rootDir,
        'schemas',
        yearDirectoryName(fiscalYear),
        schemaFileName(table.fileName)
      );
      return writeFile(profilePath, `${JSON.stringify(profileResult.value, null, 2)}\n`, table.fileName);
    },
  };
};
