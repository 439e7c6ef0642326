import { describe, expect, it, vi } from 'vitest';

import { buildProgram, type RunDashboard } from '@/cli/program.js';

const parse = async (run: RunDashboard, args: string[], defaults?: Parameters<typeof buildProgram>[1]) => {
  const program = buildProgram(run, defaults)
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  await program.parseAsync(args, { from: 'user' });
};

describe('buildProgram', () => {
  it('passes positional arguments and default input location', async () => {
    const run = vi.fn<RunDashboard>().mockResolvedValue(undefined);

    await parse(run, ['weekly', 'dashboard-bucket', 'topline']);

    expect(run).toHaveBeenCalledWith({
      mode: 'weekly',
      bucket: 'dashboard-bucket',
      prefix: 'topline',
      inputBucket: 'telemetry-parquet',
      inputPrefix: 'topline_summary/v1',
    });
  });

  it('accepts input location options', async () => {
    const run = vi.fn<RunDashboard>().mockResolvedValue(undefined);

    await parse(run, [
      'monthly',
      'dashboard-bucket',
      'topline',
      '--input_bucket',
      'backup-bucket',
      '--input_prefix',
      'topline_summary/v0',
    ]);

    expect(run).toHaveBeenCalledWith({
      mode: 'monthly',
      bucket: 'dashboard-bucket',
      prefix: 'topline',
      inputBucket: 'backup-bucket',
      inputPrefix: 'topline_summary/v0',
    });
  });

  it('uses configured defaults', async () => {
    const run = vi.fn<RunDashboard>().mockResolvedValue(undefined);

    await parse(run, ['weekly', 'b', 'p'], { inputBucket: 'env-bucket', inputPrefix: 'env/prefix' });

    expect(run).toHaveBeenCalledWith(
      expect.objectContaining({ inputBucket: 'env-bucket', inputPrefix: 'env/prefix' })
    );
  });

  it('rejects unknown modes', async () => {
    const run = vi.fn<RunDashboard>().mockResolvedValue(undefined);

    await expect(parse(run, ['daily', 'b', 'p'])).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(run).not.toHaveBeenCalled();
  });

  it('requires the output bucket and prefix', async () => {
    const run = vi.fn<RunDashboard>().mockResolvedValue(undefined);

    await expect(parse(run, ['weekly'])).rejects.toMatchObject({
      code: 'commander.missingArgument',
    });
    expect(run).not.toHaveBeenCalled();
  });
});
