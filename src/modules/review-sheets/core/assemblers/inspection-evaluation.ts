import { expandRows, type Assembler } from './shared.js';

import type { InspectionEvaluationRecord } from '../types.js';

export const assembleInspectionEvaluation: Assembler<'inspectionEvaluation'> = (input) =>
  expandRows(input, ({ reader, prefix }) => {
    const record: InspectionEvaluationRecord = {
      table: 'inspectionEvaluation',
      prefix,
      selfCheckResult: reader.text('inspection.selfCheckResult'),
      improvementDirection: reader.text('inspection.improvementDirection'),
      effectEvaluation: reader.text('inspection.effectEvaluation'),
      externalFindings: reader.text('inspection.externalFindings'),
      teamJudgement: reader.text('inspection.teamJudgement'),
      teamFindings: reader.text('inspection.teamFindings'),
      publicProcessSummary: reader.text('inspection.publicProcessSummary'),
    };

    const hasContent = [
      record.selfCheckResult,
      record.improvementDirection,
      record.effectEvaluation,
      record.externalFindings,
      record.teamJudgement,
      record.teamFindings,
      record.publicProcessSummary,
    ].some((value) => value !== null);

    return hasContent ? [record] : [];
  });
