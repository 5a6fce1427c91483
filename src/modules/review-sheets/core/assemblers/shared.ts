import { createRowReader, type RowReader } from '../values.js';

import type { HeaderIndex } from '../header-index.js';
import type { CommonPrefix, SourceTable, TableKind, TableRecordMap } from '../types.js';

/**
 * Everything an assembler needs for one source table. `prefixes` is parallel
 * to `table.rows` and carries each row's entity id.
 */
export interface AssemblerInput {
  readonly table: SourceTable;
  readonly index: HeaderIndex;
  readonly prefixes: readonly CommonPrefix[];
}

export type Assembler<K extends TableKind> = (input: AssemblerInput) => TableRecordMap[K][];

export interface AssemblerRow {
  readonly reader: RowReader;
  readonly prefix: CommonPrefix;
}

/**
 * Runs `expand` over every row, concatenating what it yields.
 */
export const expandRows = <T>(
  input: AssemblerInput,
  expand: (row: AssemblerRow) => readonly T[]
): T[] => {
  const records: T[] = [];
  input.table.rows.forEach((row, position) => {
    const prefix = input.prefixes[position];
    if (prefix === undefined) {
      throw new Error(`Row ${String(position)} of ${input.table.name} has no entity id`);
    }
    records.push(...expand({ reader: createRowReader(input.index, row), prefix }));
  });
  return records;
};
