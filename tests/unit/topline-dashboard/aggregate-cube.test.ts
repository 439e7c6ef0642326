import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { DIMENSIONS } from '@/modules/topline-dashboard/core/constants.js';
import {
  WILDCARD,
  type Cube,
  type DimensionValues,
  type NormalizedRecord,
} from '@/modules/topline-dashboard/core/types.js';
import {
  aggregateCube,
  dimensionSubsets,
  encodeDimensionKey,
  mergeCubes,
} from '@/modules/topline-dashboard/core/usecases/aggregate-cube.js';

const FIELDS = ['actives', 'hours'];

const makeRecord = (
  dimensions: { geo: string; channel: string; os: string; date: string | null },
  actives: number,
  hours: number
): NormalizedRecord => ({
  ...dimensions,
  aggregates: new Map([
    ['actives', new Decimal(actives)],
    ['hours', new Decimal(hours)],
  ]),
});

const sumsAt = (cube: Cube, dimensions: DimensionValues): Record<string, number> | undefined => {
  const row = cube.get(encodeDimensionKey(dimensions));
  if (row === undefined) return undefined;
  return Object.fromEntries([...row.sums].map(([field, value]) => [field, value.toNumber()]));
};

describe('dimensionSubsets', () => {
  it('enumerates the power set of the dimensions', () => {
    const subsets = dimensionSubsets(DIMENSIONS);

    expect(subsets).toHaveLength(16);
    expect(subsets[0]?.size).toBe(0);
    expect(subsets[15]).toEqual(new Set(DIMENSIONS));
  });

  it('produces each subset once', () => {
    const encoded = dimensionSubsets(DIMENSIONS).map((subset) => [...subset].sort().join(','));

    expect(new Set(encoded).size).toBe(16);
  });
});

describe('encodeDimensionKey', () => {
  it('distinguishes the wildcard from a category literally named all', () => {
    const wildcard = encodeDimensionKey({ geo: WILDCARD, channel: 'x', os: 'y', date: 'z' });
    const literal = encodeDimensionKey({ geo: 'all', channel: 'x', os: 'y', date: 'z' });

    expect(wildcard).not.toBe(literal);
  });

  it('distinguishes the wildcard from a missing category', () => {
    const wildcard = encodeDimensionKey({ geo: 'US', channel: WILDCARD, os: 'y', date: 'z' });
    const missing = encodeDimensionKey({ geo: 'US', channel: null, os: 'y', date: 'z' });

    expect(wildcard).not.toBe(missing);
  });
});

describe('aggregateCube', () => {
  const records = [
    makeRecord({ geo: 'FR', channel: 'release', os: 'Windows', date: '2019-01-01' }, 5, 10),
    makeRecord({ geo: 'FR', channel: 'beta', os: 'Windows', date: '2019-01-01' }, 3, 4),
  ];

  it('emits one cell per distinct projection of each subset', () => {
    const { cube } = aggregateCube(records, FIELDS);

    // Subsets without channel collapse both records (8 cells), subsets with it split them (16)
    expect(cube.size).toBe(24);
  });

  it('sums a group over the wildcarded dimension', () => {
    const { cube } = aggregateCube(records, FIELDS);

    expect(
      sumsAt(cube, { geo: 'FR', channel: WILDCARD, os: 'Windows', date: '2019-01-01' })
    ).toEqual({ actives: 8, hours: 14 });
  });

  it('keeps fully concrete groups', () => {
    const { cube } = aggregateCube(records, FIELDS);

    expect(
      sumsAt(cube, { geo: 'FR', channel: 'beta', os: 'Windows', date: '2019-01-01' })
    ).toEqual({ actives: 3, hours: 4 });
  });

  it('includes the fully wildcarded cell', () => {
    const { cube } = aggregateCube(records, FIELDS);

    expect(
      sumsAt(cube, { geo: WILDCARD, channel: WILDCARD, os: WILDCARD, date: WILDCARD })
    ).toEqual({ actives: 8, hours: 14 });
  });

  it('does not emit empty groups', () => {
    const { cube } = aggregateCube(records, FIELDS);

    expect(
      sumsAt(cube, { geo: 'FR', channel: 'nightly', os: WILDCARD, date: '2019-01-01' })
    ).toBeUndefined();
  });

  it('excludes records without a date from every group', () => {
    const undated = makeRecord({ geo: 'FR', channel: 'beta', os: 'Linux', date: null }, 100, 100);
    const { cube, undatedRows } = aggregateCube([...records, undated], FIELDS);

    expect(undatedRows).toBe(1);
    expect(cube.size).toBe(24);
    expect(
      sumsAt(cube, { geo: WILDCARD, channel: WILDCARD, os: WILDCARD, date: WILDCARD })
    ).toEqual({ actives: 8, hours: 14 });
  });

  it('keeps decimal sums exact', () => {
    const fractional = [
      makeRecord({ geo: 'US', channel: 'release', os: 'Darwin', date: '2019-01-01' }, 0, 0.1),
      makeRecord({ geo: 'US', channel: 'release', os: 'Darwin', date: '2019-01-01' }, 0, 0.2),
    ];
    const { cube } = aggregateCube(fractional, FIELDS);
    const row = cube.get(
      encodeDimensionKey({ geo: 'US', channel: 'release', os: 'Darwin', date: '2019-01-01' })
    );

    expect(row?.sums.get('hours')?.toString()).toBe('0.3');
  });

  it('returns an empty cube for no records', () => {
    const { cube, undatedRows } = aggregateCube([], FIELDS);

    expect(cube.size).toBe(0);
    expect(undatedRows).toBe(0);
  });
});

describe('mergeCubes', () => {
  const records = [
    makeRecord({ geo: 'US', channel: 'release', os: 'Windows', date: '2019-01-01' }, 2, 3),
    makeRecord({ geo: 'DE', channel: 'release', os: 'Linux', date: '2019-01-01' }, 4, 5),
    makeRecord({ geo: 'US', channel: 'beta', os: 'Windows', date: '2019-01-08' }, 6, 7),
    makeRecord({ geo: 'Other', channel: 'aurora', os: 'Darwin', date: '2019-01-08' }, 8, 9),
  ];

  const asPlain = (cube: Cube): Map<string, string[]> =>
    new Map(
      [...cube].map(([key, row]) => [key, [...row.sums.values()].map((value) => value.toString())])
    );

  it('matches a single-batch cube for any split', () => {
    const single = aggregateCube(records, FIELDS).cube;
    const merged = mergeCubes(
      [aggregateCube(records.slice(0, 1), FIELDS).cube, aggregateCube(records.slice(1), FIELDS).cube],
      FIELDS
    );

    expect(asPlain(merged)).toEqual(asPlain(single));
  });

  it('does not depend on merge order', () => {
    const parts = records.map((record) => aggregateCube([record], FIELDS).cube);

    expect(asPlain(mergeCubes(parts, FIELDS))).toEqual(
      asPlain(mergeCubes([...parts].reverse(), FIELDS))
    );
  });

  it('returns an empty cube when nothing is merged', () => {
    expect(mergeCubes([], FIELDS).size).toBe(0);
  });
});
