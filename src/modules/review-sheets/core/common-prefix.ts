import { REVIEW_SHEET_KIND_LABEL, type CommonPrefix, type MinistryDirectory } from './types.js';

import type { RowReader } from './values.js';

export interface CommonPrefixInput {
  readonly fiscalYear: number;
  readonly entityId: number;
  readonly ministries: MinistryDirectory;
}

export const buildCommonPrefix = (reader: RowReader, input: CommonPrefixInput): CommonPrefix => {
  const rawMinistry = reader.text('common.ministry');
  const ministry = rawMinistry === null ? null : input.ministries.canonicalName(rawMinistry);

  return {
    sheetKind: REVIEW_SHEET_KIND_LABEL,
    fiscalYear: input.fiscalYear,
    entityId: input.entityId,
    projectName: reader.text('common.projectName'),
    ministryOrder: ministry === null ? null : input.ministries.orderOf(ministry),
    policyMinistry: ministry,
    ministry,
    bureau: reader.text('common.bureau'),
    department: reader.text('common.department'),
    division: reader.text('common.division'),
    office: reader.text('common.office'),
    team: reader.text('common.team'),
    unit: reader.text('common.unit'),
  };
};
