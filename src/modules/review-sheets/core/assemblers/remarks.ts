import { expandRows, type Assembler } from './shared.js';

import type { RemarksRecord } from '../types.js';

export const OTHER_FINDINGS_HEADING = '【その他の指摘事項】';

export const assembleRemarks: Assembler<'remarks'> = (input) =>
  expandRows<RemarksRecord>(input, ({ reader, prefix }) => {
    const remarks = reader.text('remarks.remarks');
    const otherFindings = reader.text('remarks.otherFindings');

    const parts: string[] = [];
    if (remarks !== null) parts.push(remarks);
    if (otherFindings !== null) parts.push(`${OTHER_FINDINGS_HEADING}\n${otherFindings}`);
    if (parts.length === 0) return [];

    return [{ table: 'remarks', prefix, remarks: parts.join('\n\n') }];
  });
