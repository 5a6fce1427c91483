import { parseSubsidyTerms } from './free-text.js';
import { expandRows, type Assembler } from './shared.js';

import type { SubsidyRateRecord } from '../types.js';

export const assembleSubsidyRate: Assembler<'subsidyRate'> = (input) =>
  expandRows<SubsidyRateRecord>(input, ({ reader, prefix }) => {
    const text = reader.text('overview.subsidyText');
    if (text === null) return [];

    return [{ table: 'subsidyRate', prefix, number: 1, ...parseSubsidyTerms(text) }];
  });
