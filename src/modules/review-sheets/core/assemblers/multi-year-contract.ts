import { expandRows, type Assembler } from './shared.js';

import type { ContractFieldKind, MultiYearContractRecord } from '../types.js';

const CONTRACT_FIELD_KINDS: readonly ContractFieldKind[] = [
  'contract.blockName',
  'contract.contractor',
  'contract.corporateNumber',
  'contract.workSummary',
  'contract.amount',
  'contract.method',
  'contract.bidderCount',
  'contract.winningBidRate',
  'contract.soleBidReason',
];

export const assembleMultiYearContract: Assembler<'multiYearContract'> = (input) => {
  const slots = input.index.keysFor(CONTRACT_FIELD_KINDS);

  return expandRows(input, ({ reader, prefix }) => {
    const records: MultiYearContractRecord[] = [];

    for (const key of slots) {
      const contractor = reader.text('contract.contractor', key);
      if (contractor === null) continue;

      records.push({
        table: 'multiYearContract',
        prefix,
        number: records.length + 1,
        blockName: reader.text('contract.blockName', key),
        contractor,
        corporateNumber: reader.text('contract.corporateNumber', key),
        workSummary: reader.text('contract.workSummary', key),
        amount: reader.amount('contract.amount', key),
        method: reader.text('contract.method', key),
        bidderCount: reader.amount('contract.bidderCount', key),
        winningBidRate: reader.amount('contract.winningBidRate', key),
        soleBidReason: reader.text('contract.soleBidReason', key),
      });
    }

    return records;
  });
};
