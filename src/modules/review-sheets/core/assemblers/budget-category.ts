import { isNonZero } from '../values.js';
import { expandRows, type Assembler } from './shared.js';

import type { BudgetCategoryRecord } from '../types.js';

export const assembleBudgetCategory: Assembler<'budgetCategory'> = (input) => {
  const keys = input.index.keysFor([
    'category.item',
    'category.subItem',
    'category.initialBudget',
    'category.request',
  ]);

  return expandRows(input, ({ reader, prefix }) => {
    const accountCategory = reader.text('common.accountCategory');
    const records: BudgetCategoryRecord[] = [];

    for (const key of keys) {
      const item = reader.text('category.item', key);
      const subItem = reader.text('category.subItem', key);
      const initialBudget = reader.amount('category.initialBudget', key);
      const request = reader.amount('category.request', key);

      if (item === null && subItem === null && !isNonZero(initialBudget) && !isNonZero(request)) {
        continue;
      }

      records.push({
        table: 'budgetCategory',
        prefix,
        number: records.length + 1,
        accountCategory,
        item,
        subItem,
        initialBudget,
        request,
      });
    }

    return records;
  });
};
