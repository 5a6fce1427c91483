import { expandRows, type Assembler } from './shared.js';

import type { ExpenditureFieldKind, ExpenditureRecord } from '../types.js';

const EXPENDITURE_FIELD_KINDS: readonly ExpenditureFieldKind[] = [
  'expenditure.recipientName',
  'expenditure.corporateNumber',
  'expenditure.workSummary',
  'expenditure.amount',
  'expenditure.contractMethod',
  'expenditure.bidderCount',
  'expenditure.winningBidRate',
  'expenditure.soleBidReason',
  'expenditure.soleBidReasonDetail',
];

/**
 * One record per (block, sequence) slot with a recipient. Slots left blank
 * or filled with a placeholder are skipped, so sequences may have gaps.
 */
export const assembleExpenditure: Assembler<'expenditure'> = (input) => {
  const slots = input.index.keysFor(EXPENDITURE_FIELD_KINDS);

  return expandRows(input, ({ reader, prefix }) => {
    const records: ExpenditureRecord[] = [];

    for (const key of slots) {
      if (key.block === null || key.sequence === null) continue;
      const recipientName = reader.text('expenditure.recipientName', key);
      if (recipientName === null) continue;

      records.push({
        table: 'expenditure',
        prefix,
        block: key.block,
        sequence: key.sequence,
        recipientName,
        corporateNumber: reader.text('expenditure.corporateNumber', key),
        workSummary: reader.text('expenditure.workSummary', key),
        amount: reader.amount('expenditure.amount', key),
        contractMethod: reader.text('expenditure.contractMethod', key),
        bidderCount: reader.amount('expenditure.bidderCount', key),
        winningBidRate: reader.amount('expenditure.winningBidRate', key),
        soleBidReason: reader.text('expenditure.soleBidReason', key),
        soleBidReasonDetail: reader.text('expenditure.soleBidReasonDetail', key),
      });
    }

    return records;
  });
};
