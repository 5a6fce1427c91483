import { expandRows, type Assembler } from './shared.js';

import type { RelatedProjectRecord } from '../types.js';

export const assembleRelatedProjects: Assembler<'relatedProjects'> = (input) => {
  const keys = input.index.keysFor(['related.projectNumber']);

  return expandRows(input, ({ reader, prefix }) => {
    const records: RelatedProjectRecord[] = [];
    for (const key of keys) {
      const projectId = reader.text('related.projectNumber', key);
      if (projectId === null || key.fiscalYear === null) continue;

      records.push({
        table: 'relatedProjects',
        prefix,
        number: key.sequence ?? records.length + 1,
        referenceYear: key.fiscalYear,
        relatedProjectId: projectId,
        relatedProjectName: null,
        relation: `${String(key.fiscalYear)}年度過去事業`,
      });
    }
    return records;
  });
};
