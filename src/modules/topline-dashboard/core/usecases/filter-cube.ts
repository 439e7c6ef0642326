import { Decimal } from 'decimal.js';

import { WILDCARD, type Cube, type CubeRow } from '../types.js';

export interface FilteredCube {
  rows: CubeRow[];
  /** Cells aggregated across dates */
  crossDateRows: number;
  /** Cells whose aggregates sum to zero */
  zeroRows: number;
}

/**
 * Sum of every aggregate of a cube row.
 */
export const cubeRowTotal = (row: CubeRow): Decimal => {
  let total = new Decimal(0);
  for (const value of row.sums.values()) {
    total = total.plus(value);
  }
  return total;
};

/**
 * Drops cross-date cells, then cells carrying no positive total.
 */
export const filterCube = (cube: Cube): FilteredCube => {
  const rows: CubeRow[] = [];
  let crossDateRows = 0;
  let zeroRows = 0;

  for (const row of cube.values()) {
    if (row.dimensions.date === WILDCARD) {
      crossDateRows++;
      continue;
    }

    if (!cubeRowTotal(row).gt(0)) {
      zeroRows++;
      continue;
    }

    rows.push(row);
  }

  return { rows, crossDateRows, zeroRows };
};
