/**
 * Parquet Summary Reader
 *
 * Reads the topline summary part files from object storage. Each parquet
 * file becomes one partition of the rollup.
 */

import { parquetReadObjects } from 'hyparquet';
import { err, ok, type Result } from 'neverthrow';

import { createDecodeError, type ToplineError } from '../../core/errors.js';

import type { ObjectStore, SummaryReader } from '../../core/ports.js';
import type { RawSummaryRow, StorageLocation } from '../../core/types.js';
import type { Logger } from 'pino';

export type ParquetDecoder = (file: ArrayBuffer) => Promise<Record<string, unknown>[]>;

export interface ParquetSummaryReaderOptions {
  store: ObjectStore;
  logger: Logger;
  /** Defaults to hyparquet */
  decode?: ParquetDecoder;
}

const decodeWithHyparquet: ParquetDecoder = async (file) => parquetReadObjects({ file });

// Value written for a null partition column
const DEFAULT_PARTITION = '__HIVE_DEFAULT_PARTITION__';

const isPartFile = (key: string): boolean => key.endsWith('.parquet');

const asDirectory = (prefix: string): string => (prefix.endsWith('/') ? prefix : `${prefix}/`);

const decodeSegment = (text: string): string => {
  try {
    return decodeURIComponent(text);
  } catch {
    // Not percent-encoded after all
    return text;
  }
};

const toArrayBuffer = (bytes: Uint8Array): ArrayBuffer => {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
};

/**
 * Columns encoded in the `name=value` directories between the prefix and
 * the file name, e.g. `report_start=20190101/part-0.parquet`.
 */
export const parsePartitionColumns = (
  key: string,
  prefix: string
): Record<string, string | null> => {
  const directory = asDirectory(prefix);
  const relative = key.startsWith(directory) ? key.slice(directory.length) : key;
  const columns: Record<string, string | null> = {};

  for (const segment of relative.split('/').slice(0, -1)) {
    const separator = segment.indexOf('=');
    if (separator <= 0) {
      continue;
    }

    const name = decodeSegment(segment.slice(0, separator));
    const value = decodeSegment(segment.slice(separator + 1));
    columns[name] = value === DEFAULT_PARTITION ? null : value;
  }

  return columns;
};

/**
 * Applies the input typing the rollup expects: 64-bit integers become
 * numbers and an integer `report_start` becomes its `YYYYMMDD` string.
 * Integers outside the safe range are rejected rather than rounded.
 */
export const applyInputTyping = (
  row: Readonly<Record<string, unknown>>
): Result<RawSummaryRow, Error> => {
  const typed: Record<string, unknown> = {};

  for (const [name, value] of Object.entries(row)) {
    if (typeof value !== 'bigint') {
      typed[name] = value;
      continue;
    }

    const converted = Number(value);
    if (!Number.isSafeInteger(converted)) {
      return err(
        new Error(`Column '${name}' holds ${value.toString()}, beyond the safe integer range`)
      );
    }
    typed[name] = converted;
  }

  const reportStart = typed['report_start'];
  if (typeof reportStart === 'number') {
    typed['report_start'] = String(reportStart);
  }

  return ok(typed);
};

export const createParquetSummaryReader = (
  options: ParquetSummaryReaderOptions
): SummaryReader => {
  const { store } = options;
  const decode = options.decode ?? decodeWithHyparquet;
  const log = options.logger.child({ repo: 'ParquetSummaryReader' });

  return {
    async readPartitions(
      location: StorageLocation
    ): Promise<Result<RawSummaryRow[][], ToplineError>> {
      const listResult = await store.listKeys(location);
      if (listResult.isErr()) {
        return err(listResult.error);
      }

      const keys = listResult.value.filter(isPartFile).sort();
      const partitions: RawSummaryRow[][] = [];

      for (const key of keys) {
        const getResult = await store.getObject({ bucket: location.bucket, key });
        if (getResult.isErr()) {
          return err(getResult.error);
        }

        let rows: Record<string, unknown>[];
        try {
          rows = await decode(toArrayBuffer(getResult.value));
        } catch (error) {
          log.error({ err: error, key }, 'Failed to decode parquet file');
          return err(createDecodeError(key, error));
        }

        const partitionColumns = parsePartitionColumns(key, location.prefix);
        const typedRows: RawSummaryRow[] = [];
        for (const row of rows) {
          const typed = applyInputTyping({ ...partitionColumns, ...row });
          if (typed.isErr()) {
            log.error({ err: typed.error, key }, 'Parquet file holds unrepresentable values');
            return err(createDecodeError(key, typed.error));
          }
          typedRows.push(typed.value);
        }

        log.debug({ key, rows: rows.length, partitionColumns }, 'Decoded parquet file');
        partitions.push(typedRows);
      }

      log.info(
        { bucket: location.bucket, prefix: location.prefix, files: keys.length },
        'Read topline summary'
      );
      return ok(partitions);
    },
  };
};
