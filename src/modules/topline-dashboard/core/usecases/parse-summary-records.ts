import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import {
  createSchemaMismatchError,
  formatSchemaErrors,
  type SchemaMismatchError,
} from '../errors.js';
import {
  AggregateValueSchema,
  SummaryDimensionsSchema,
  type RawSummaryRow,
  type SummaryRecord,
} from '../types.js';

const dimensionsValidator = TypeCompiler.Compile(SummaryDimensionsSchema);
const aggregateValidator = TypeCompiler.Compile(AggregateValueSchema);

/**
 * Validates one partition of raw rows against the input schema.
 *
 * The first structural violation fails the whole partition; there is no
 * partial result.
 */
export const parseSummaryRecords = (
  rows: readonly RawSummaryRow[],
  aggregateFields: readonly string[],
  partition = 0
): Result<SummaryRecord[], SchemaMismatchError> => {
  const records: SummaryRecord[] = [];

  for (const [index, row] of rows.entries()) {
    if (!dimensionsValidator.Check(row)) {
      const details = formatSchemaErrors(dimensionsValidator.Errors(row));
      const field = dimensionsValidator.Errors(row).First()?.path.replace(/^\//, '') ?? '';
      return err(createSchemaMismatchError(partition, index, field, details));
    }

    const aggregates = new Map<string, number | null>();
    for (const field of aggregateFields) {
      const value = row[field];
      if (!aggregateValidator.Check(value)) {
        const details = formatSchemaErrors(aggregateValidator.Errors(value)).map(
          (detail) => `/${field}${detail}`
        );
        return err(createSchemaMismatchError(partition, index, field, details));
      }
      aggregates.set(field, value);
    }

    records.push({
      geo: row.geo,
      channel: row.channel,
      os: row.os,
      reportStart: row.report_start,
      aggregates,
    });
  }

  return ok(records);
};
