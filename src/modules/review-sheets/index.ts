/**
 * Review Sheets Module
 *
 * Classifies the headers of yearly review-sheet spreadsheets and expands
 * each row into the canonical RS tables.
 */

// Core - Types
export {
  LEGACY_BLOCK,
  MinistryMasterSchema,
  REVIEW_SHEET_KIND_LABEL,
  TABLE_KINDS,
  createEmptyTables,
  type ClassifiedColumn,
  type CommonPrefix,
  type DominantEra,
  type FieldKind,
  type HeaderContext,
  type HeaderGeneration,
  type MinistryDirectory,
  type MinistryMaster,
  type OutputRecord,
  type RepeatKey,
  type ReviewSheetTables,
  type SheetKind,
  type SourceRow,
  type SourceTable,
  type TableKind,
  type TableRecordMap,
} from './core/types.js';

// Core - Errors
export {
  createAssemblyError,
  createMinistryDirectoryError,
  createOutputWriteError,
  createSourceListError,
  createSourceReadError,
  type AssemblyError,
  type MinistryDirectoryError,
  type OutputWriteError,
  type ReviewSheetError,
  type SourceListError,
  type SourceReadError,
} from './core/errors.js';

// Core - Ports
export type { OutputTableSink, SourceEntry, SourceTableRepo } from './core/ports.js';

// Core - Classification
export { createBatchContext, type BatchContext, type BatchMark } from './core/batch-context.js';
export { detectSheetType } from './core/sheet-type.js';
export {
  detectDominantEra,
  parseFiscalYearToken,
  resolveBareYear,
  type FiscalYearToken,
} from './core/fiscal-year.js';
export { classifyHeader, createHeaderContext } from './core/header-classifier.js';
export { HEADER_RULES, type HeaderRule } from './core/header-rules.js';
export { buildHeaderIndex, type HeaderIndex } from './core/header-index.js';
export { meaningfulText, parseAmount, parseYear } from './core/values.js';
export { createMinistryDirectory } from './core/ministries.js';
export { dedupeHeaders, normalizeSourceTable } from './core/source-table.js';

// Core - Assembly
export { ASSEMBLERS } from './core/assemblers/index.js';
export {
  TABLE_DEFINITIONS,
  renderTable,
  renderTables,
  tableFileName,
  type CellValue,
  type RenderedTable,
} from './core/tables.js';

// Core - Use Cases
export {
  appendTables,
  assembleReviewSheet,
  type AssembleReviewSheetInput,
} from './core/usecases/assemble-review-sheet.js';
export {
  processYearBatch,
  type ProcessYearBatchDeps,
  type ProcessYearBatchInput,
  type YearBatchSummary,
} from './core/usecases/process-year-batch.js';

// Shell
export { createCsvSourceRepo, type CsvSourceRepoOptions } from './shell/repo/csv-source-repo.js';
export { createCsvTableSink, type CsvTableSinkOptions } from './shell/repo/csv-table-sink.js';
export { loadMinistryDirectory } from './shell/repo/ministry-directory-repo.js';
