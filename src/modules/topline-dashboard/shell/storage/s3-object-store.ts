/**
 * S3 Object Store
 *
 * `ObjectStore` implementation on the AWS SDK v3 S3 client.
 */

import {
  GetObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  paginateListObjectsV2,
} from '@aws-sdk/client-s3';
import { err, ok, type Result } from 'neverthrow';

import { createStorageError, type StorageError } from '../../core/errors.js';

import type { ObjectStore } from '../../core/ports.js';
import type { ObjectLocation, StorageLocation } from '../../core/types.js';
import type { Logger } from 'pino';

export interface S3ObjectStoreOptions {
  client: S3Client;
  logger: Logger;
}

/**
 * Server-side faults (throttling, 5xx) are worth retrying; client faults are not.
 */
const isRetryable = (error: unknown): boolean =>
  error instanceof S3ServiceException && error.$fault === 'server';

const asDirectory = (prefix: string): string => (prefix.endsWith('/') ? prefix : `${prefix}/`);

class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly log: Logger;

  constructor(options: S3ObjectStoreOptions) {
    this.client = options.client;
    this.log = options.logger.child({ repo: 'S3ObjectStore' });
  }

  async listKeys(location: StorageLocation): Promise<Result<string[], StorageError>> {
    const prefix = asDirectory(location.prefix);
    const keys: string[] = [];

    try {
      const pages = paginateListObjectsV2(
        { client: this.client },
        { Bucket: location.bucket, Prefix: prefix }
      );
      for await (const page of pages) {
        for (const object of page.Contents ?? []) {
          if (object.Key !== undefined) {
            keys.push(object.Key);
          }
        }
      }
    } catch (error) {
      this.log.error({ err: error, bucket: location.bucket, prefix }, 'Failed to list objects');
      return err(createStorageError('list', location.bucket, prefix, error, isRetryable(error)));
    }

    this.log.debug({ bucket: location.bucket, prefix, count: keys.length }, 'Listed objects');
    return ok(keys);
  }

  async getObject(location: ObjectLocation): Promise<Result<Uint8Array, StorageError>> {
    try {
      const output = await this.client.send(
        new GetObjectCommand({ Bucket: location.bucket, Key: location.key })
      );

      if (output.Body === undefined) {
        return err(
          createStorageError('get', location.bucket, location.key, new Error('Empty response body'))
        );
      }

      return ok(await output.Body.transformToByteArray());
    } catch (error) {
      this.log.error({ err: error, ...location }, 'Failed to get object');
      return err(
        createStorageError('get', location.bucket, location.key, error, isRetryable(error))
      );
    }
  }

  async putObject(
    location: ObjectLocation,
    body: string,
    contentType: string
  ): Promise<Result<void, StorageError>> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: location.bucket,
          Key: location.key,
          Body: body,
          ContentType: contentType,
        })
      );
    } catch (error) {
      this.log.error({ err: error, ...location }, 'Failed to put object');
      return err(
        createStorageError('put', location.bucket, location.key, error, isRetryable(error))
      );
    }

    return ok(undefined);
  }
}

export const createS3Client = (region?: string): S3Client =>
  new S3Client(region !== undefined ? { region } : {});

export const createS3ObjectStore = (options: S3ObjectStoreOptions): ObjectStore =>
  new S3ObjectStore(options);
