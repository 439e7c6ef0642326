/**
 * Command surface of the topline dashboard job.
 *
 * Usage:
 *   topline-dashboard weekly <bucket> <prefix>
 *   topline-dashboard monthly <bucket> <prefix> --input_bucket <bucket> --input_prefix <prefix>
 */

import { Argument, Command, InvalidArgumentError } from 'commander';

import {
  DASHBOARD_MODES,
  DEFAULT_INPUT_BUCKET,
  DEFAULT_INPUT_PREFIX,
  isDashboardMode,
} from '../modules/topline-dashboard/core/constants.js';

import type { GenerateDashboardInput } from '../modules/topline-dashboard/core/usecases/generate-dashboard.js';

interface CliOptions {
  input_bucket: string;
  input_prefix: string;
}

export interface CliDefaults {
  inputBucket: string;
  inputPrefix: string;
}

export type RunDashboard = (input: GenerateDashboardInput) => Promise<void>;

export const buildProgram = (
  run: RunDashboard,
  defaults: CliDefaults = { inputBucket: DEFAULT_INPUT_BUCKET, inputPrefix: DEFAULT_INPUT_PREFIX }
): Command =>
  new Command()
    .name('topline-dashboard')
    .description('Reformat the topline summary into the topline dashboard rollup')
    .addArgument(new Argument('<mode>', 'reporting period').choices(DASHBOARD_MODES))
    .argument('<bucket>', 'output bucket')
    .argument('<prefix>', 'output key prefix')
    .option('--input_bucket <bucket>', 'Bucket of the ToplineSummary dataset', defaults.inputBucket)
    .option('--input_prefix <prefix>', 'Prefix of the ToplineSummary dataset', defaults.inputPrefix)
    .action(async (mode: string, bucket: string, prefix: string, options: CliOptions) => {
      if (!isDashboardMode(mode)) {
        throw new InvalidArgumentError(`Unknown mode '${mode}'`);
      }

      await run({
        mode,
        bucket,
        prefix,
        inputBucket: options.input_bucket,
        inputPrefix: options.input_prefix,
      });
    });
