/**
 * Topline Dashboard Module - Domain Errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { ValueError } from '@sinclair/typebox/errors';

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A row does not conform to the input schema. Fails the whole run.
 */
export interface SchemaMismatchError {
  readonly type: 'SchemaMismatchError';
  readonly message: string;
  readonly partition: number;
  readonly row: number;
  readonly field: string;
  readonly details: string[];
}

/**
 * The input location holds no data files.
 */
export interface NoInputDataError {
  readonly type: 'NoInputDataError';
  readonly message: string;
  readonly location: string;
}

/**
 * A data file could not be decoded.
 */
export interface DecodeError {
  readonly type: 'DecodeError';
  readonly message: string;
  readonly key: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

export type StorageOperation = 'list' | 'get' | 'put';

/**
 * Object storage request failed.
 */
export interface StorageError {
  readonly type: 'StorageError';
  readonly message: string;
  readonly operation: StorageOperation;
  readonly bucket: string;
  readonly key: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

export type ToplineError = SchemaMismatchError | NoInputDataError | DecodeError | StorageError;

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

export const createSchemaMismatchError = (
  partition: number,
  row: number,
  field: string,
  details: string[]
): SchemaMismatchError => ({
  type: 'SchemaMismatchError',
  message: `Row ${String(row)} of partition ${String(partition)} does not match the input schema at '${field}'`,
  partition,
  row,
  field,
  details,
});

export const createNoInputDataError = (location: string): NoInputDataError => ({
  type: 'NoInputDataError',
  message: `No parquet files found under ${location}`,
  location,
});

export const createDecodeError = (key: string, cause: unknown): DecodeError => ({
  type: 'DecodeError',
  message: `Failed to decode parquet file '${key}': ${cause instanceof Error ? cause.message : String(cause)}`,
  key,
  cause,
});

export const createStorageError = (
  operation: StorageOperation,
  bucket: string,
  key: string,
  cause: unknown,
  retryable = false
): StorageError => ({
  type: 'StorageError',
  message: `Storage ${operation} failed for s3://${bucket}/${key}: ${cause instanceof Error ? cause.message : String(cause)}`,
  operation,
  bucket,
  key,
  retryable,
  cause,
});
