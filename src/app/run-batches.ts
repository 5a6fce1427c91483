/**
 * Runs the year batch for each requested fiscal year and totals the results.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createBatchContext,
  processYearBatch,
  type ProcessYearBatchDeps,
  type ReviewSheetError,
  type SourceListError,
  type YearBatchSummary,
} from '../modules/review-sheets/index.js';

export interface RunBatchesInput {
  /** Years to process; every year the source repo lists when omitted */
  years?: readonly number[];
}

export interface FailedYear {
  fiscalYear: number;
  error: ReviewSheetError;
}

export interface RunSummary {
  years: YearBatchSummary[];
  failedYears: FailedYear[];
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
}

export const hasFailures = (summary: RunSummary): boolean =>
  summary.failedYears.length > 0 || summary.failed > 0;

export async function runBatches(
  deps: ProcessYearBatchDeps,
  input: RunBatchesInput = {}
): Promise<Result<RunSummary, SourceListError>> {
  let years: readonly number[];
  if (input.years !== undefined) {
    years = input.years;
  } else {
    const listed = await deps.sourceRepo.listYears();
    if (listed.isErr()) {
      return err(listed.error);
    }
    years = listed.value;
  }

  const log = deps.logger.child({ usecase: 'runBatches' });
  const context = createBatchContext();
  const summary: RunSummary = {
    years: [],
    failedYears: [],
    total: 0,
    succeeded: 0,
    skipped: 0,
    failed: 0,
  };

  if (years.length === 0) {
    log.warn('No fiscal years to process');
  }

  for (const fiscalYear of years) {
    const result = await processYearBatch(deps, { fiscalYear, context });
    if (result.isErr()) {
      log.error({ fiscalYear, err: result.error }, 'Year batch failed');
      summary.failedYears.push({ fiscalYear, error: result.error });
      continue;
    }

    const yearSummary = result.value;
    summary.years.push(yearSummary);
    summary.total += yearSummary.total;
    summary.succeeded += yearSummary.succeeded;
    summary.skipped += yearSummary.skipped;
    summary.failed += yearSummary.failed;
  }

  return ok(summary);
}
