import { Decimal } from 'decimal.js';

import type {
  ColumnDataType,
  ColumnProfile,
  ColumnStatistics,
  NumericStatistics,
  ProfileCell,
  TableProfile,
  TextStatistics,
} from './types.js';

const INTEGER_RE = /^-?\d+$/;
const DECIMAL_RE = /^-?(?:\d+(?:\.\d*)?|\.\d+)$/;
const MAX_SAMPLES = 5;

export const inferDataType = (values: readonly string[]): ColumnDataType => {
  if (values.length === 0) return 'string';
  if (values.every((value) => INTEGER_RE.test(value))) return 'integer';
  if (values.every((value) => DECIMAL_RE.test(value))) return 'number';
  return 'string';
};

const median = (sorted: readonly Decimal[]): Decimal => {
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? new Decimal(0);
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[middle - 1] ?? upper;
  return lower.plus(upper).dividedBy(2);
};

// Columns can hold hundreds of thousands of cells: fold, never spread into arguments

const numericStatistics = (values: readonly string[]): NumericStatistics => {
  const numbers = values.map((value) => new Decimal(value)).sort((a, b) => a.comparedTo(b));
  const sum = numbers.reduce((acc, value) => acc.plus(value), new Decimal(0));
  return {
    min: numbers.reduce((acc, value) => Decimal.min(acc, value)).toString(),
    max: numbers.reduce((acc, value) => Decimal.max(acc, value)).toString(),
    mean: sum.dividedBy(numbers.length).toDecimalPlaces(4).toString(),
    median: median(numbers).toString(),
  };
};

const textStatistics = (values: readonly string[]): TextStatistics => {
  const lengths = values.map((value) => [...value].length);
  const total = lengths.reduce((acc, length) => acc + length, 0);
  return {
    minLength: lengths.reduce((acc, length) => Math.min(acc, length)),
    maxLength: lengths.reduce((acc, length) => Math.max(acc, length)),
    averageLength: new Decimal(total).dividedBy(lengths.length).toDecimalPlaces(2).toString(),
  };
};

const profileColumn = (
  name: string,
  position: number,
  cells: readonly ProfileCell[]
): ColumnProfile => {
  const values = cells.filter((cell): cell is string => cell !== null && cell !== '');
  const dataType = inferDataType(values);
  const distinct = [...new Set(values)];

  let statistics: ColumnStatistics = {
    totalCount: cells.length,
    nonNullCount: values.length,
    nullCount: cells.length - values.length,
    uniqueCount: distinct.length,
  };
  if (values.length > 0) {
    statistics =
      dataType === 'string'
        ? { ...statistics, text: textStatistics(values) }
        : { ...statistics, numeric: numericStatistics(values) };
  }

  return {
    index: position,
    name,
    dataType,
    nullable: statistics.nullCount > 0,
    statistics,
    sampleValues: distinct.slice(0, MAX_SAMPLES),
  };
};

/**
 * Describes a written table: inferred type, null counts and summary figures
 * per column, plus a few sample values.
 */
export const profileTable = (
  fileName: string,
  columns: readonly string[],
  rows: readonly (readonly ProfileCell[])[]
): TableProfile => ({
  fileName,
  rowCount: rows.length,
  columnCount: columns.length,
  columns: columns.map((name, position) =>
    profileColumn(
      name,
      position,
      rows.map((row) => row[position] ?? null)
    )
  ),
});
