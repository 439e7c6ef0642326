#!/usr/bin/env node

import { buildProgram } from './program.js';
import { createConfig, parseEnv } from '../infra/config/env.js';
import { createLogger } from '../infra/logger/index.js';
import { generateDashboard } from '../modules/topline-dashboard/core/usecases/generate-dashboard.js';
import { createCsvDashboardWriter } from '../modules/topline-dashboard/shell/repo/csv-dashboard-writer.js';
import { createParquetSummaryReader } from '../modules/topline-dashboard/shell/repo/parquet-summary-reader.js';
import {
  createS3Client,
  createS3ObjectStore,
} from '../modules/topline-dashboard/shell/storage/s3-object-store.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const store = createS3ObjectStore({ client: createS3Client(config.storage.region), logger });
  const reader = createParquetSummaryReader({ store, logger });
  const writer = createCsvDashboardWriter({ store, logger });

  const program = buildProgram(
    async (input) => {
      const result = await generateDashboard({ reader, writer, logger }, input);
      if (result.isErr()) {
        logger.error({ error: result.error }, result.error.message);
        process.exitCode = 1;
      }
    },
    { inputBucket: config.input.bucket, inputPrefix: config.input.prefix }
  );

  await program.parseAsync(process.argv);
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
