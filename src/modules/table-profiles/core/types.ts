export type ColumnDataType = 'integer' | 'number' | 'string';

/** Decimal figures are kept as strings so the JSON carries them exactly. */
export interface NumericStatistics {
  readonly min: string;
  readonly max: string;
  readonly mean: string;
  readonly median: string;
}

export interface TextStatistics {
  readonly minLength: number;
  readonly maxLength: number;
  readonly averageLength: string;
}

export interface ColumnStatistics {
  readonly totalCount: number;
  readonly nonNullCount: number;
  readonly nullCount: number;
  readonly uniqueCount: number;
  readonly numeric?: NumericStatistics;
  readonly text?: TextStatistics;
}

export interface ColumnProfile {
  readonly index: number;
  readonly name: string;
  readonly dataType: ColumnDataType;
  readonly nullable: boolean;
  readonly statistics: ColumnStatistics;
  readonly sampleValues: readonly string[];
}

export interface TableProfile {
  readonly fileName: string;
  readonly rowCount: number;
  readonly columnCount: number;
  readonly columns: readonly ColumnProfile[];
}

/** A cell as written to the output file; null is an empty cell. */
export type ProfileCell = string | null;
