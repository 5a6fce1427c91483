import { isNonZero } from '../values.js';
import { expandRows, type Assembler } from './shared.js';

import type { BudgetFieldKind, BudgetSummaryRecord } from '../types.js';

const BUDGET_FIELD_KINDS: readonly BudgetFieldKind[] = [
  'budget.initial',
  'budget.supplementary',
  'budget.carriedFromPrevious',
  'budget.carriedToNext',
  'budget.reserveFund',
  'budget.total',
  'budget.executed',
  'budget.executionRate',
];

/**
 * One record per budget year that has at least one non-zero figure. Years
 * whose columns are all blank or zero produce nothing.
 */
export const assembleBudgetSummary: Assembler<'budgetSummary'> = (input) => {
  const years = input.index
    .keysFor(BUDGET_FIELD_KINDS)
    .filter((key) => key.fiscalYear !== null);

  return expandRows(input, ({ reader, prefix }) => {
    const accountCategory = reader.text('common.accountCategory');
    const records: BudgetSummaryRecord[] = [];

    for (const key of years) {
      if (key.fiscalYear === null) continue;

      const record: BudgetSummaryRecord = {
        table: 'budgetSummary',
        prefix,
        budgetYear: key.fiscalYear,
        accountCategory,
        initial: reader.amount('budget.initial', key),
        supplementary: reader.amount('budget.supplementary', key),
        carriedFromPrevious: reader.amount('budget.carriedFromPrevious', key),
        carriedToNext: reader.amount('budget.carriedToNext', key),
        reserveFund: reader.amount('budget.reserveFund', key),
        total: reader.amount('budget.total', key),
        executed: reader.amount('budget.executed', key),
        executionRate: reader.amount('budget.executionRate', key),
      };

      const hasFigure = [
        record.initial,
        record.supplementary,
        record.carriedFromPrevious,
        record.carriedToNext,
        record.reserveFund,
        record.total,
        record.executed,
        record.executionRate,
      ].some(isNonZero);
      if (hasFigure) records.push(record);
    }

    return records;
  });
};
