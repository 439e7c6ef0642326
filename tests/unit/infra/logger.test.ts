import { describe, expect, it } from 'vitest';

import { createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('uses the requested level and name', () => {
    const logger = createLogger({ level: 'warn', name: 'rollup-test', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toMatchObject({ name: 'rollup-test' });
  });

  it('creates child loggers carrying their bindings', () => {
    const logger = createLogger({ level: 'silent', pretty: false });

    expect(logger.child({ usecase: 'generateDashboard' }).bindings()).toMatchObject({
      name: 'topline-dashboard',
      usecase: 'generateDashboard',
    });
  });
});
