/**
 * Reformat Topline Use Case
 *
 * Turns the topline summary into the historical dashboard layout:
 * 1. Validate rows against the input schema
 * 2. Bucket regions and parse report dates
 * 3. Cube every (geo, channel, os, date) combination, per partition
 * 4. Merge the partial cubes
 * 5. Drop cross-date and all-zero cells
 * 6. Project onto the historical columns and sort
 */

import { err, ok, type Result } from 'neverthrow';

import { aggregateCube, mergeCubes } from './aggregate-cube.js';
import { filterCube } from './filter-cube.js';
import { normalizeSummaryRecord } from './normalize-dimensions.js';
import { parseSummaryRecords } from './parse-summary-records.js';
import { reconcileSchema, sortReportRows } from './reconcile-schema.js';
import { HISTORICAL_COLUMNS, REGION_ALLOW_LIST, TOPLINE_AGGREGATE_FIELDS } from '../constants.js';

import type { SchemaMismatchError } from '../errors.js';
import type { Cube, RawSummaryRow, ReformatOptions, ReformatResult } from '../types.js';

export const DEFAULT_REFORMAT_OPTIONS: ReformatOptions = {
  aggregateFields: TOPLINE_AGGREGATE_FIELDS,
  targetColumns: HISTORICAL_COLUMNS,
  regionAllowList: REGION_ALLOW_LIST,
};

/**
 * Reformats a dataset split into partitions. Each partition is cubed on its
 * own and the partial cubes are merged, which gives the same result as a
 * single batch.
 */
export const reformatToplinePartitions = (
  partitions: readonly (readonly RawSummaryRow[])[],
  options: Partial<ReformatOptions> = {}
): Result<ReformatResult, SchemaMismatchError> => {
  const { aggregateFields, targetColumns, regionAllowList } = {
    ...DEFAULT_REFORMAT_OPTIONS,
    ...options,
  };
  const allowList = new Set(regionAllowList);

  const partialCubes: Cube[] = [];
  let inputRows = 0;
  let undatedRows = 0;

  for (const [index, rows] of partitions.entries()) {
    const parsed = parseSummaryRecords(rows, aggregateFields, index);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    const normalized = parsed.value.map((record) => normalizeSummaryRecord(record, allowList));
    const build = aggregateCube(normalized, aggregateFields);

    partialCubes.push(build.cube);
    inputRows += rows.length;
    undatedRows += build.undatedRows;
  }

  const cube = mergeCubes(partialCubes, aggregateFields);
  const filtered = filterCube(cube);
  const table = sortReportRows(reconcileSchema(filtered.rows, targetColumns));

  return ok({
    table,
    stats: {
      inputRows,
      undatedRows,
      cubeRows: cube.size,
      crossDateRows: filtered.crossDateRows,
      zeroRows: filtered.zeroRows,
      outputRows: table.rows.length,
    },
  });
};

/**
 * Reformats a single batch of rows.
 */
export const reformatTopline = (
  rows: readonly RawSummaryRow[],
  options: Partial<ReformatOptions> = {}
): Result<ReformatResult, SchemaMismatchError> => reformatToplinePartitions([rows], options);
