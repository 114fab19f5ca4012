import { describe, expect, it } from 'vitest';
import { createLogger, logger } from '../logger.js';

describe('logger', () => {
  it('tags every record with the service', () => {
    expect(logger.bindings()).toMatchObject({ service: 'ytp-forge', pid: process.pid });
  });

  it('scopes child loggers to their module', () => {
    const child = createLogger({ module: 'compiler' });
    expect(child.bindings()).toMatchObject({ service: 'ytp-forge', module: 'compiler' });
    expect(child.level).toBe('silent');
  });
});
