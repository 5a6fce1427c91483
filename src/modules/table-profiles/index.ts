/**
 * Table Profiles Module
 *
 * Schema definitions for the written RS tables.
 */

export type {
  ColumnDataType,
  ColumnProfile,
  ColumnStatistics,
  NumericStatistics,
  ProfileCell,
  TableProfile,
  TextStatistics,
} from './core/types.js';
export { inferDataType, profileTable } from './core/profile.js';
