/**
 * Process Year Batch Use Case
 *
 * Turns every decoded source sheet of one fiscal year into the RS table set.
 * Files are processed in the order the source repo lists them; entity ids
 * follow that order. Tables are written once, after the last file.
 */

import { err, fromThrowable, ok, type Result } from 'neverthrow';

import { appendTables, assembleReviewSheet, countRecords } from './assemble-review-sheet.js';
import { describeCause } from '../../../../common/types/errors.js';
import { createAssemblyError, type ReviewSheetError } from '../errors.js';
import { detectSheetType } from '../sheet-type.js';
import { normalizeSourceTable } from '../source-table.js';
import { renderTables } from '../tables.js';
import { createEmptyTables, type MinistryDirectory, type TableKind } from '../types.js';

import type { Logger } from '../../../../infra/logger/index.js';
import type { TextNormalizer } from '../../../text-normalization/index.js';
import type { BatchContext } from '../batch-context.js';
import type { OutputTableSink, SourceTableRepo } from '../ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ProcessYearBatchDeps {
  sourceRepo: SourceTableRepo;
  sink: OutputTableSink;
  normalizer: TextNormalizer;
  ministries: MinistryDirectory;
  logger: Logger;
}

export interface ProcessYearBatchInput {
  fiscalYear: number;
  /** Reset for `fiscalYear` before the first file is read */
  context: BatchContext;
}

export interface YearBatchSummary {
  fiscalYear: number;
  /** Source files listed for the year */
  total: number;
  succeeded: number;
  /** Empty sheets and sheets that are not review sheets */
  skipped: number;
  failed: number;
  /** Rows that received an entity id */
  entityCount: number;
  recordCounts: Partial<Record<TableKind, number>>;
  writtenFiles: string[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Case
// ─────────────────────────────────────────────────────────────────────────────

const safeAssemble = fromThrowable(assembleReviewSheet, (error) => error);

/**
 * Processes one fiscal year.
 *
 * A file that cannot be read or assembled is logged, counted as failed and
 * contributes nothing; its entity ids are handed back. Only listing the
 * year's sources or writing a table fails the batch.
 */
export async function processYearBatch(
  deps: ProcessYearBatchDeps,
  input: ProcessYearBatchInput
): Promise<Result<YearBatchSummary, ReviewSheetError>> {
  const { sourceRepo, sink, normalizer, ministries } = deps;
  const { fiscalYear, context } = input;
  const log = deps.logger.child({ usecase: 'processYearBatch', fiscalYear });

  context.resetForYear(fiscalYear);

  const sourcesResult = await sourceRepo.listSources(fiscalYear);
  if (sourcesResult.isErr()) {
    return err(sourcesResult.error);
  }

  const sources = sourcesResult.value;
  const tables = createEmptyTables();
  let succeeded = 0;
  let skipped = 0;
  let failed = 0;

  log.info({ files: sources.length }, 'Processing source files');

  for (const entry of sources) {
    const readResult = await sourceRepo.read(entry);
    if (readResult.isErr()) {
      failed += 1;
      log.error({ file: entry.name, err: readResult.error }, 'Failed to read source file');
      continue;
    }

    const table = normalizeSourceTable(readResult.value, normalizer);
    if (table.rows.length === 0) {
      skipped += 1;
      log.warn({ file: entry.name }, 'Empty source file');
      continue;
    }

    const sheetType = detectSheetType(table);
    if (sheetType !== 'review') {
      skipped += 1;
      log.warn({ file: entry.name, sheetType }, 'Skipping sheet that is not a review sheet');
      continue;
    }

    const mark = context.mark();
    const entityIds = context.assignEntityIds(table.rows.length);
    const assembled = safeAssemble({ table, fiscalYear, entityIds, ministries });

    if (assembled.isErr()) {
      context.rewind(mark);
      failed += 1;
      const error = createAssemblyError(
        entry.name,
        `Failed to assemble ${entry.name}: ${describeCause(assembled.error)}`,
        assembled.error
      );
      log.error({ file: entry.name, err: error }, 'Failed to assemble review sheet');
      continue;
    }

    appendTables(tables, assembled.value);
    succeeded += 1;
    log.debug({ file: entry.name, rows: table.rows.length }, 'Assembled review sheet');
  }

  const writtenFiles: string[] = [];
  for (const rendered of renderTables(tables, fiscalYear)) {
    const writeResult = await sink.writeTable(fiscalYear, rendered);
    if (writeResult.isErr()) {
      return err(writeResult.error);
    }
    writtenFiles.push(rendered.fileName);
  }

  const summary: YearBatchSummary = {
    fiscalYear,
    total: sources.length,
    succeeded,
    skipped,
    failed,
    entityCount: context.mark().nextId - 1,
    recordCounts: countRecords(tables),
    writtenFiles,
  };

  log.info(
    {
      total: summary.total,
      succeeded,
      skipped,
      failed,
      entityCount: summary.entityCount,
      tables: writtenFiles.length,
    },
    'Year batch complete'
  );

  return ok(summary);
}
