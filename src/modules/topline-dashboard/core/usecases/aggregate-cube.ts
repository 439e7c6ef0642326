import { Decimal } from 'decimal.js';

import { DIMENSIONS } from '../constants.js';
import {
  WILDCARD,
  type Cube,
  type Dimension,
  type DimensionValues,
  type NormalizedRecord,
} from '../types.js';

export interface CubeBuild {
  cube: Cube;
  /** Records skipped because their date did not parse */
  undatedRows: number;
}

interface CubeCell {
  dimensions: DimensionValues;
  sums: Map<string, Decimal>;
}

const ZERO = new Decimal(0);

/**
 * Every subset of the given dimensions, from the empty set to the full set.
 */
export const dimensionSubsets = (
  dimensions: readonly Dimension[]
): ReadonlySet<Dimension>[] => {
  const subsets: ReadonlySet<Dimension>[] = [];
  for (let mask = 0; mask < 1 << dimensions.length; mask++) {
    subsets.push(new Set(dimensions.filter((_, index) => (mask & (1 << index)) !== 0)));
  }
  return subsets;
};

const SUBSETS = dimensionSubsets(DIMENSIONS);

/**
 * Stable key of a dimension tuple. Concrete values are strings or null,
 * so the wildcard encodes as 0.
 */
export const encodeDimensionKey = (values: DimensionValues): string =>
  JSON.stringify(
    DIMENSIONS.map((dimension) => {
      const value = values[dimension];
      return value === WILDCARD ? 0 : value;
    })
  );

const project = (concrete: DimensionValues, subset: ReadonlySet<Dimension>): DimensionValues => ({
  geo: subset.has('geo') ? concrete.geo : WILDCARD,
  channel: subset.has('channel') ? concrete.channel : WILDCARD,
  os: subset.has('os') ? concrete.os : WILDCARD,
  date: subset.has('date') ? concrete.date : WILDCARD,
});

const addInto = (
  cells: Map<string, CubeCell>,
  dimensions: DimensionValues,
  values: ReadonlyMap<string, Decimal>,
  aggregateFields: readonly string[]
): void => {
  const key = encodeDimensionKey(dimensions);
  let cell = cells.get(key);
  if (cell === undefined) {
    cell = {
      dimensions,
      sums: new Map<string, Decimal>(aggregateFields.map((field) => [field, ZERO])),
    };
    cells.set(key, cell);
  }

  for (const field of aggregateFields) {
    const current = cell.sums.get(field) ?? ZERO;
    cell.sums.set(field, current.plus(values.get(field) ?? ZERO));
  }
};

/**
 * Grouped sums over every subset of the dimension set.
 *
 * Dimensions outside a subset are set to the wildcard. Groups with no
 * contributing record are absent. Records without a concrete date take part
 * in no group at all.
 */
export const aggregateCube = (
  records: readonly NormalizedRecord[],
  aggregateFields: readonly string[]
): CubeBuild => {
  const cells = new Map<string, CubeCell>();
  let undatedRows = 0;

  for (const record of records) {
    if (record.date === null) {
      undatedRows++;
      continue;
    }

    const concrete: DimensionValues = {
      geo: record.geo,
      channel: record.channel,
      os: record.os,
      date: record.date,
    };

    for (const subset of SUBSETS) {
      addInto(cells, project(concrete, subset), record.aggregates, aggregateFields);
    }
  }

  return { cube: cells, undatedRows };
};

/**
 * Combines partial cubes by key. Decimal addition keeps the result
 * independent of partition count and merge order.
 */
export const mergeCubes = (cubes: readonly Cube[], aggregateFields: readonly string[]): Cube => {
  const cells = new Map<string, CubeCell>();

  for (const cube of cubes) {
    for (const row of cube.values()) {
      addInto(cells, row.dimensions, row.sums, aggregateFields);
    }
  }

  return cells;
};
