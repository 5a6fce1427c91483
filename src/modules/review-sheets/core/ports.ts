import type { OutputWriteError, SourceListError, SourceReadError } from './errors.js';
import type { RenderedTable } from './tables.js';
import type { SourceTable } from './types.js';
import type { Result } from 'neverthrow';

/** A decoded source sheet available for one fiscal year. */
export interface SourceEntry {
  readonly fiscalYear: number;
  readonly name: string;
  readonly location: string;
}

/**
 * Where decoded review sheets come from.
 */
export interface SourceTableRepo {
  /** Fiscal years that have a source directory, ascending. */
  listYears(): Promise<Result<number[], SourceListError>>;
  /** Source sheets of one year, in a stable order. */
  listSources(fiscalYear: number): Promise<Result<SourceEntry[], SourceListError>>;
  read(entry: SourceEntry): Promise<Result<SourceTable, SourceReadError>>;
}

/**
 * Where assembled RS tables go. Called once per table kind per year.
 */
export interface OutputTableSink {
  writeTable(fiscalYear: number, table: RenderedTable): Promise<Result<void, OutputWriteError>>;
}
