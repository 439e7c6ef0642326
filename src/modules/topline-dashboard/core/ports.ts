import type { StorageError, ToplineError } from './errors.js';
import type { ObjectLocation, RawSummaryRow, ReportTable, StorageLocation } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Supplies the topline summary, one array of rows per data file.
 * Input-specific typing (64-bit integers, the date token as a string) is already applied.
 */
export interface SummaryReader {
  readPartitions(location: StorageLocation): Promise<Result<RawSummaryRow[][], ToplineError>>;
}

/**
 * Persists a finished report.
 */
export interface DashboardWriter {
  write(table: ReportTable, location: ObjectLocation): Promise<Result<void, ToplineError>>;
}

/**
 * Minimal object storage surface used by the shell adapters.
 */
export interface ObjectStore {
  /**
   * Keys under a prefix, treated as a directory.
   */
  listKeys(location: StorageLocation): Promise<Result<string[], StorageError>>;

  getObject(location: ObjectLocation): Promise<Result<Uint8Array, StorageError>>;

  putObject(
    location: ObjectLocation,
    body: string,
    contentType: string
  ): Promise<Result<void, StorageError>>;
}
