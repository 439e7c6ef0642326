import { Decimal } from 'decimal.js';

import { OTHER_REGION } from '../constants.js';

import type { NormalizedRecord, SummaryRecord } from '../types.js';

const DATE_TOKEN_RE = /^\d{8}$/;

/**
 * Keeps regions of the allow-list, buckets the rest (a missing geo included) into "Other".
 */
export const normalizeRegion = (geo: string | null, allowList: ReadonlySet<string>): string =>
  geo !== null && allowList.has(geo) ? geo : OTHER_REGION;

/**
 * Parses a `YYYYMMDD` token into `YYYY-MM-DD`.
 * Returns null for a missing token or anything that is not a real calendar date.
 */
export const parseDateToken = (token: string | null): string | null => {
  if (token === null || !DATE_TOKEN_RE.test(token)) {
    return null;
  }

  const year = token.slice(0, 4);
  const month = token.slice(4, 6);
  const day = token.slice(6, 8);

  const parsed = new Date(0);
  parsed.setUTCFullYear(Number(year), Number(month) - 1, Number(day));

  // Date rolls overflowing days and months forward; a round trip catches them
  if (
    parsed.getUTCFullYear() !== Number(year) ||
    parsed.getUTCMonth() !== Number(month) - 1 ||
    parsed.getUTCDate() !== Number(day)
  ) {
    return null;
  }

  return `${year}-${month}-${day}`;
};

export const normalizeSummaryRecord = (
  record: SummaryRecord,
  allowList: ReadonlySet<string>
): NormalizedRecord => {
  const aggregates = new Map<string, Decimal>();
  for (const [field, value] of record.aggregates) {
    aggregates.set(field, new Decimal(value ?? 0));
  }

  return {
    geo: normalizeRegion(record.geo, allowList),
    channel: record.channel,
    os: record.os,
    date: parseDateToken(record.reportStart),
    aggregates,
  };
};
