import { isNonZero } from '../values.js';
import { expandRows, type Assembler } from './shared.js';

import type { ExpenseUsageRecord } from '../types.js';

export const assembleExpenseUsage: Assembler<'expenseUsage'> = (input) => {
  const slots = input.index.keysFor(['expenseUsage.item', 'expenseUsage.usage', 'expenseUsage.amount']);

  return expandRows(input, ({ reader, prefix }) => {
    const records: ExpenseUsageRecord[] = [];

    for (const key of slots) {
      if (key.block === null) continue;
      const item = reader.text('expenseUsage.item', key);
      const usage = reader.text('expenseUsage.usage', key);
      const amount = reader.amount('expenseUsage.amount', key);
      if (item === null && usage === null && !isNonZero(amount)) continue;

      records.push({
        table: 'expenseUsage',
        prefix,
        number: records.length + 1,
        block: key.block,
        item,
        usage,
        amount,
      });
    }

    return records;
  });
};
