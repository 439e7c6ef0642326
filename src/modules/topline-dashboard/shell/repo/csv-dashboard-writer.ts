/**
 * CSV Dashboard Writer
 *
 * Serializes the report as CSV with a header row and uploads it.
 */

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import type { ToplineError } from '../../core/errors.js';
import type { DashboardWriter, ObjectStore } from '../../core/ports.js';
import type { ObjectLocation, ReportTable } from '../../core/types.js';
import type { Logger } from 'pino';

export interface CsvDashboardWriterOptions {
  store: ObjectStore;
  logger: Logger;
}

const CSV_CONTENT_TYPE = 'text/csv';

export const formatDashboardCsv = (table: ReportTable): string =>
  stringify([...table.rows], {
    header: true,
    columns: [...table.columns],
  });

export const createCsvDashboardWriter = (options: CsvDashboardWriterOptions): DashboardWriter => {
  const { store } = options;
  const log = options.logger.child({ repo: 'CsvDashboardWriter' });

  return {
    async write(table: ReportTable, location: ObjectLocation): Promise<Result<void, ToplineError>> {
      const body = formatDashboardCsv(table);

      const putResult = await store.putObject(location, body, CSV_CONTENT_TYPE);
      if (putResult.isErr()) {
        return err(putResult.error);
      }

      log.debug({ ...location, bytes: Buffer.byteLength(body) }, 'Uploaded dashboard csv');
      return ok(undefined);
    },
  };
};
