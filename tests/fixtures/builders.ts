/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import type { OutputRow, RawSummaryRow } from '@/modules/topline-dashboard/index.js';

export interface SummaryRowOverrides {
  geo?: string | null;
  channel?: string | null;
  os?: string | null;
  report_start?: string | null;
  actives?: number | null;
  hours?: number | null;
}

/**
 * Create a topline summary row carrying only `actives` and `hours`.
 */
export const makeSummaryRow = (overrides: SummaryRowOverrides = {}): RawSummaryRow => ({
  geo: 'US',
  channel: 'release',
  os: 'Windows',
  report_start: '20190101',
  actives: 1,
  hours: 1,
  ...overrides,
});

/**
 * Find the single output row matching the given dimension values.
 */
export const findRow = (
  rows: readonly OutputRow[],
  match: { date: string; geo: string; channel: string; os: string }
): OutputRow | undefined =>
  rows.find(
    (row) =>
      row['date'] === match.date &&
      row['geo'] === match.geo &&
      row['channel'] === match.channel &&
      row['os'] === match.os
  );
