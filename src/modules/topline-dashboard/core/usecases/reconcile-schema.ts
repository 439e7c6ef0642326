import { WILDCARD_LABEL } from '../constants.js';
import {
  WILDCARD,
  type CubeRow,
  type Dimension,
  type DimensionValue,
  type OutputCell,
  type OutputRow,
  type ReportTable,
} from '../types.js';

const isDimension = (column: string): column is Dimension =>
  column === 'geo' || column === 'channel' || column === 'os' || column === 'date';

/**
 * The wildcard becomes "all"; a missing category becomes an empty cell.
 */
export const serializeDimension = (value: DimensionValue): string => {
  if (value === WILDCARD) {
    return WILDCARD_LABEL;
  }
  return value ?? '';
};

const reconcileRow = (row: CubeRow, columns: readonly string[]): OutputRow => {
  const output: Record<string, OutputCell> = {};

  for (const column of columns) {
    if (isDimension(column)) {
      output[column] = serializeDimension(row.dimensions[column]);
    } else {
      // Columns of the historical report that the source never carried
      output[column] = row.sums.get(column)?.toNumber() ?? 0;
    }
  }

  return output;
};

/**
 * Projects cube rows onto the target column layout.
 * The resulting columns are exactly `targetColumns`, whatever the source held.
 */
export const reconcileSchema = (
  rows: readonly CubeRow[],
  targetColumns: readonly string[]
): ReportTable => {
  const columns = [...targetColumns];

  return {
    columns,
    rows: rows.map((row) => reconcileRow(row, columns)),
  };
};

const SORT_COLUMNS: readonly Dimension[] = ['date', 'geo', 'channel', 'os'];

const compareRows = (left: OutputRow, right: OutputRow): number => {
  for (const column of SORT_COLUMNS) {
    const a = String(left[column] ?? '');
    const b = String(right[column] ?? '');
    if (a < b) return -1;
    if (a > b) return 1;
  }
  return 0;
};

/**
 * Orders rows by date, geo, channel and os, so identical input always
 * serializes to identical bytes.
 */
export const sortReportRows = (table: ReportTable): ReportTable => ({
  columns: table.columns,
  rows: [...table.rows].sort(compareRows),
});
