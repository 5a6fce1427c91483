import type { AppError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/** The year's source files could not be enumerated. */
export interface SourceListError extends AppError {
  readonly type: 'SourceListError';
  readonly fiscalYear: number | null;
}

/** One source file could not be read or decoded. */
export interface SourceReadError extends AppError {
  readonly type: 'SourceReadError';
  readonly sourceName: string;
}

/** Assembling the tables of one source file threw. */
export interface AssemblyError extends AppError {
  readonly type: 'AssemblyError';
  readonly sourceName: string;
}

export interface OutputWriteError extends AppError {
  readonly type: 'OutputWriteError';
  readonly fileName: string;
}

export interface MinistryDirectoryError extends AppError {
  readonly type: 'MinistryDirectoryError';
  readonly path: string;
  readonly details: readonly string[];
}

export type ReviewSheetError =
  | SourceListError
  | SourceReadError
  | AssemblyError
  | OutputWriteError
  | MinistryDirectoryError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createSourceListError = (
  message: string,
  fiscalYear: number | null,
  cause?: unknown
): SourceListError => ({
  type: 'SourceListError',
  message,
  fiscalYear,
  ...(cause !== undefined && { cause }),
});

export const createSourceReadError = (
  sourceName: string,
  message: string,
  cause?: unknown
): SourceReadError => ({
  type: 'SourceReadError',
  message,
  sourceName,
  ...(cause !== undefined && { cause }),
});

export const createAssemblyError = (
  sourceName: string,
  message: string,
  cause?: unknown
): AssemblyError => ({
  type: 'AssemblyError',
  message,
  sourceName,
  ...(cause !== undefined && { cause }),
});

export const createOutputWriteError = (
  fileName: string,
  message: string,
  cause?: unknown
): OutputWriteError => ({
  type: 'OutputWriteError',
  message,
  fileName,
  ...(cause !== undefined && { cause }),
});

export const createMinistryDirectoryError = (
  path: string,
  message: string,
  details: readonly string[] = [],
  cause?: unknown
): MinistryDirectoryError => ({
  type: 'MinistryDirectoryError',
  message,
  path,
  details,
  ...(cause !== undefined && { cause }),
});
