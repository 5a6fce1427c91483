import { parseYear } from '../values.js';
import { expandRows, type Assembler } from './shared.js';

import type { ProjectOverviewRecord } from '../types.js';

export const assembleProjectOverview: Assembler<'projectOverview'> = (input) => {
  const legacyNumberKeys = input.index.keysFor(['overview.legacyNumber']);

  return expandRows<ProjectOverviewRecord>(input, ({ reader, prefix }) => {
    const legacyParts = legacyNumberKeys
      .map((key) => reader.text('overview.legacyNumber', key))
      .filter((part): part is string => part !== null);

    return [
      {
        table: 'projectOverview',
        prefix,
        purpose: reader.text('overview.purpose'),
        currentIssues: reader.text('overview.currentIssues'),
        summary: reader.text('overview.summary'),
        summaryUrl: reader.text('overview.summaryUrl'),
        category: reader.text('overview.category'),
        majorExpense: reader.text('overview.majorExpense'),
        implementationMethod: reader.text('overview.implementationMethod'),
        subsidyText: reader.text('overview.subsidyText'),
        legacyProjectNumber: legacyParts.length > 0 ? legacyParts.join('-') : null,
        startYear: parseYear(reader.text('overview.startYear')),
        startYearUnknown: reader.text('overview.startYearUnknown'),
        endYear: parseYear(reader.text('overview.endYear')),
        noPlannedEnd: reader.text('overview.noPlannedEnd'),
      },
    ];
  });
};
