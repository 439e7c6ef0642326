import { Type } from '@sinclair/typebox';

import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Dimensions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Marks a dimension aggregated over all of its values.
 * Serialized as `"all"` only when a report row is built, so a real category
 * named "all" never collides with it.
 */
export const WILDCARD: unique symbol = Symbol('wildcard');

export type Wildcard = typeof WILDCARD;

export type Dimension = 'geo' | 'channel' | 'os' | 'date';

/** null is a concrete category: the source left the field empty */
export type DimensionValue = string | null | Wildcard;

export type DimensionValues = Readonly<Record<Dimension, DimensionValue>>;

// ─────────────────────────────────────────────────────────────────────────────
// Input
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A row as delivered by a {@link SummaryReader}, before validation.
 */
export type RawSummaryRow = Readonly<Record<string, unknown>>;

const NullableString = (description: string) =>
  Type.Union([Type.String(), Type.Null()], { description });

/**
 * Categorical columns every topline summary row must carry.
 * Each may be null; extra columns (partition columns, unused aggregates) are allowed.
 */
export const SummaryDimensionsSchema = Type.Object({
  geo: NullableString('Country code'),
  channel: NullableString('Release channel'),
  os: NullableString('Operating system'),
  report_start: NullableString('Report start date token, YYYYMMDD'),
});

/**
 * Aggregate columns are numeric; a missing value inside a present column is null.
 */
export const AggregateValueSchema = Type.Union([Type.Number(), Type.Null()]);

export interface SummaryRecord {
  readonly geo: string | null;
  readonly channel: string | null;
  readonly os: string | null;
  readonly reportStart: string | null;
  readonly aggregates: ReadonlyMap<string, number | null>;
}

export interface NormalizedRecord {
  readonly geo: string;
  readonly channel: string | null;
  readonly os: string | null;
  /** `YYYY-MM-DD`, or null when the date token did not parse */
  readonly date: string | null;
  readonly aggregates: ReadonlyMap<string, Decimal>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Cube
// ─────────────────────────────────────────────────────────────────────────────

export interface CubeRow {
  readonly dimensions: DimensionValues;
  readonly sums: ReadonlyMap<string, Decimal>;
}

/**
 * Cube cells keyed by their encoded dimension tuple.
 */
export type Cube = ReadonlyMap<string, CubeRow>;

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

export type OutputCell = string | number;

export type OutputRow = Readonly<Record<string, OutputCell>>;

export interface ReportTable {
  /** Target schema columns, in declared order */
  readonly columns: readonly string[];
  readonly rows: readonly OutputRow[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────

export interface ReformatOptions {
  /** Numeric fields summed by the cube */
  readonly aggregateFields: readonly string[];
  /** Output column layout */
  readonly targetColumns: readonly string[];
  /** Regions kept as-is; everything else becomes "Other" */
  readonly regionAllowList: readonly string[];
}

export interface ReformatStats {
  inputRows: number;
  /** Rows whose date token did not parse; excluded from every cube cell */
  undatedRows: number;
  cubeRows: number;
  crossDateRows: number;
  zeroRows: number;
  outputRows: number;
}

export interface ReformatResult {
  table: ReportTable;
  stats: ReformatStats;
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage
// ─────────────────────────────────────────────────────────────────────────────

export type DashboardMode = 'weekly' | 'monthly';

export interface StorageLocation {
  bucket: string;
  prefix: string;
}

export interface ObjectLocation {
  bucket: string;
  key: string;
}
