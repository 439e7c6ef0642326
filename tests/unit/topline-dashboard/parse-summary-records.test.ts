import { describe, expect, it } from 'vitest';

import { parseSummaryRecords } from '@/modules/topline-dashboard/core/usecases/parse-summary-records.js';
import { makeSummaryRow } from '@/tests/fixtures/builders.js';

const FIELDS = ['actives', 'hours'];

describe('parseSummaryRecords', () => {
  it('maps valid rows to summary records', () => {
    const result = parseSummaryRecords([makeSummaryRow({ geo: 'FR', actives: 5, hours: null })], FIELDS);

    expect(result.isOk()).toBe(true);
    const [record] = result._unsafeUnwrap();
    expect(record).toEqual({
      geo: 'FR',
      channel: 'release',
      os: 'Windows',
      reportStart: '20190101',
      aggregates: new Map([
        ['actives', 5],
        ['hours', null],
      ]),
    });
  });

  it('ignores columns that are neither dimensions nor aggregates', () => {
    const result = parseSummaryRecords([{ ...makeSummaryRow(), mode: 'weekly' }], FIELDS);

    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()[0]?.aggregates.size).toBe(2);
  });

  it('keeps malformed date tokens for the normalizer to absorb', () => {
    const result = parseSummaryRecords([makeSummaryRow({ report_start: 'garbage' })], FIELDS);

    expect(result._unsafeUnwrap()[0]?.reportStart).toBe('garbage');
  });

  it('accepts null categorical values and a null date token', () => {
    const result = parseSummaryRecords(
      [makeSummaryRow({ geo: null, channel: null, os: null, report_start: null })],
      FIELDS
    );

    expect(result._unsafeUnwrap()[0]).toMatchObject({
      geo: null,
      channel: null,
      os: null,
      reportStart: null,
    });
  });

  it('fails when a dimension column is missing', () => {
    const { os: _os, ...withoutOs } = makeSummaryRow();
    const result = parseSummaryRecords([makeSummaryRow(), withoutOs], FIELDS, 3);

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe('SchemaMismatchError');
    expect(error.partition).toBe(3);
    expect(error.row).toBe(1);
    expect(error.field).toBe('os');
    expect(error.details.length).toBeGreaterThan(0);
  });

  it('fails when the date token is not a string', () => {
    const result = parseSummaryRecords([{ ...makeSummaryRow(), report_start: 20190101 }], FIELDS);

    expect(result._unsafeUnwrapErr().field).toBe('report_start');
  });

  it('fails when an aggregate column is missing', () => {
    const { hours: _hours, ...withoutHours } = makeSummaryRow();
    const result = parseSummaryRecords([withoutHours], FIELDS);

    const error = result._unsafeUnwrapErr();
    expect(error.field).toBe('hours');
    expect(error.row).toBe(0);
  });

  it('fails when an aggregate is not numeric', () => {
    const result = parseSummaryRecords([{ ...makeSummaryRow(), actives: '5' }], FIELDS);

    expect(result._unsafeUnwrapErr().field).toBe('actives');
  });

  it('fails on NaN aggregates', () => {
    const result = parseSummaryRecords([makeSummaryRow({ hours: Number.NaN })], FIELDS);

    expect(result._unsafeUnwrapErr().field).toBe('hours');
  });

  it('accepts an empty partition', () => {
    expect(parseSummaryRecords([], FIELDS)._unsafeUnwrap()).toEqual([]);
  });
});
