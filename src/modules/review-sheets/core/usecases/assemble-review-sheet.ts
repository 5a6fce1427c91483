import { ASSEMBLERS } from '../assemblers/index.js';
import { buildCommonPrefix } from '../common-prefix.js';
import { buildHeaderIndex } from '../header-index.js';
import {
  createEmptyTables,
  TABLE_KINDS,
  type MinistryDirectory,
  type ReviewSheetTables,
  type SourceTable,
  type TableKind,
} from '../types.js';
import { createRowReader } from '../values.js';

import type { AssemblerInput } from '../assemblers/shared.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface AssembleReviewSheetInput {
  /** Normalized review sheet */
  table: SourceTable;
  fiscalYear: number;
  /** One id per row, in row order */
  entityIds: readonly number[];
  ministries: MinistryDirectory;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Expands every row of one review sheet into the twelve RS tables.
 *
 * Headers are classified once for the whole sheet; each assembler then walks
 * the rows through the resulting index. Throws only on programming errors,
 * such as an id list that does not match the row count.
 */
export const assembleReviewSheet = (input: AssembleReviewSheetInput): ReviewSheetTables => {
  const { table, fiscalYear, entityIds, ministries } = input;

  if (entityIds.length !== table.rows.length) {
    throw new Error(
      `Expected ${String(table.rows.length)} entity ids for ${table.name}, got ${String(entityIds.length)}`
    );
  }

  const index = buildHeaderIndex(table.headers);
  const prefixes = table.rows.map((row, position) =>
    buildCommonPrefix(createRowReader(index, row), {
      fiscalYear,
      entityId: entityIds[position] ?? 0,
      ministries,
    })
  );

  const assemblerInput: AssemblerInput = { table, index, prefixes };
  const tables = createEmptyTables();

  const run = <K extends TableKind>(kind: K): void => {
    for (const record of ASSEMBLERS[kind](assemblerInput)) {
      tables[kind].push(record);
    }
  };
  TABLE_KINDS.forEach((kind) => run(kind));

  return tables;
};

/**
 * Appends every record of `source` to `target`, kind by kind.
 */
export const appendTables = (target: ReviewSheetTables, source: ReviewSheetTables): void => {
  const append = <K extends TableKind>(kind: K): void => {
    for (const record of source[kind]) {
      target[kind].push(record);
    }
  };
  TABLE_KINDS.forEach((kind) => append(kind));
};

export const countRecords = (tables: ReviewSheetTables): Partial<Record<TableKind, number>> => {
  const counts: Partial<Record<TableKind, number>> = {};
  for (const kind of TABLE_KINDS) {
    if (tables[kind].length > 0) counts[kind] = tables[kind].length;
  }
  return counts;
};
