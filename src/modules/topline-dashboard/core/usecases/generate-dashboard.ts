/**
 * Generate Dashboard Use Case
 *
 * Reads one mode of the topline summary, reformats it and writes the
 * dashboard CSV. Failed runs are recovered by re-running the job: the
 * transform is deterministic and the input is never modified.
 */

import { err, ok, type Result } from 'neverthrow';

import { reformatToplinePartitions } from './reformat-topline.js';
import { createNoInputDataError, type ToplineError } from '../errors.js';

import type { DashboardWriter, SummaryReader } from '../ports.js';
import type {
  DashboardMode,
  ObjectLocation,
  ReformatOptions,
  ReformatStats,
  StorageLocation,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateDashboardDeps {
  reader: SummaryReader;
  writer: DashboardWriter;
  logger: Logger;
  /** Overrides for the legacy tables, mostly for tests */
  options?: Partial<ReformatOptions>;
}

export interface GenerateDashboardInput {
  mode: DashboardMode;
  /** Output bucket */
  bucket: string;
  /** Output key prefix */
  prefix: string;
  inputBucket: string;
  inputPrefix: string;
}

export interface GenerateDashboardResult {
  inputLocation: string;
  outputLocation: string;
  stats: ReformatStats;
}

// ─────────────────────────────────────────────────────────────────────────────
// Locations
// ─────────────────────────────────────────────────────────────────────────────

export const formatStorageUri = (bucket: string, path: string): string => `s3://${bucket}/${path}`;

/**
 * The summary is partitioned by mode; only the partition path is needed.
 */
export const buildInputLocation = (input: GenerateDashboardInput): StorageLocation => ({
  bucket: input.inputBucket,
  prefix: `${input.inputPrefix}/mode=${input.mode}`,
});

export const buildOutputLocation = (input: GenerateDashboardInput): ObjectLocation => ({
  bucket: input.bucket,
  key: `${input.prefix}/topline-${input.mode}.csv`,
});

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const generateDashboard = async (
  deps: GenerateDashboardDeps,
  input: GenerateDashboardInput
): Promise<Result<GenerateDashboardResult, ToplineError>> => {
  const { reader, writer, logger, options } = deps;
  const log = logger.child({ usecase: 'generateDashboard', mode: input.mode });

  log.info(`Generating ${input.mode} topline dashboard`);

  const source = buildInputLocation(input);
  const inputLocation = formatStorageUri(source.bucket, source.prefix);
  log.info({ inputLocation }, 'Reading input data');

  const readResult = await reader.readPartitions(source);
  if (readResult.isErr()) {
    log.error({ error: readResult.error }, 'Failed to read topline summary');
    return err(readResult.error);
  }

  const partitions = readResult.value;
  if (partitions.length === 0) {
    return err(createNoInputDataError(inputLocation));
  }

  const reformatResult = reformatToplinePartitions(partitions, options);
  if (reformatResult.isErr()) {
    log.error({ error: reformatResult.error }, 'Input does not match the topline summary schema');
    return err(reformatResult.error);
  }

  const { table, stats } = reformatResult.value;
  log.info({ partitions: partitions.length, ...stats }, 'Reformatted topline summary');

  if (stats.undatedRows > 0) {
    log.warn({ undatedRows: stats.undatedRows }, 'Dropped rows with an unparseable report date');
  }

  const target = buildOutputLocation(input);
  const outputLocation = formatStorageUri(target.bucket, target.key);

  const writeResult = await writer.write(table, target);
  if (writeResult.isErr()) {
    log.error({ error: writeResult.error, outputLocation }, 'Failed to write dashboard data');
    return err(writeResult.error);
  }

  log.info({ outputLocation, rows: stats.outputRows }, 'Wrote dashboard data');

  return ok({ inputLocation, outputLocation, stats });
};
