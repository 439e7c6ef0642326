/**
 * Fixed tables of the legacy topline dashboard.
 */

import type { DashboardMode, Dimension } from './types.js';

/**
 * Countries reported individually. Every other region is bucketed into {@link OTHER_REGION}.
 */
export const REGION_ALLOW_LIST: readonly string[] = [
  'US',
  'CA',
  'BR',
  'MX',
  'FR',
  'ES',
  'IT',
  'PL',
  'TR',
  'RU',
  'DE',
  'IN',
  'ID',
  'CN',
  'JP',
  'GB',
];

export const OTHER_REGION = 'Other';

/** Serialized form of the wildcard marker in the legacy report. */
export const WILDCARD_LABEL = 'all';

/**
 * Categorical dimensions, in cube order. `date` is derived from `report_start`.
 */
export const DIMENSIONS: readonly Dimension[] = ['geo', 'channel', 'os', 'date'];

/**
 * Numeric fields of the topline summary dataset.
 */
export const TOPLINE_AGGREGATE_FIELDS: readonly string[] = [
  'hours',
  'crashes',
  'google',
  'bing',
  'yahoo',
  'other',
  'actives',
  'new_records',
  'default',
];

/**
 * Column layout of the historical `v4-weekly.csv` / `v4-monthly.csv` reports.
 * Aggregate columns the topline summary does not carry are written as 0.
 */
export const HISTORICAL_COLUMNS: readonly string[] = [
  'date',
  'geo',
  'channel',
  'os',
  'actives',
  'hours',
  'inactives',
  'new_records',
  'five_of_seven',
  'total_records',
  'crashes',
  'default',
  'google',
  'bing',
  'yahoo',
  'other',
];

export const DEFAULT_INPUT_BUCKET = 'telemetry-parquet';
export const DEFAULT_INPUT_PREFIX = 'topline_summary/v1';

export const DASHBOARD_MODES: readonly DashboardMode[] = ['weekly', 'monthly'];

export const isDashboardMode = (value: string): value is DashboardMode =>
  DASHBOARD_MODES.some((mode) => mode === value);
