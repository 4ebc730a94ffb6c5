import { afterEach, describe, expect, it } from 'vitest';

import { createLogger } from '../src/utils/logger.js';

describe('createLogger', () => {
  const previous = process.env.LOG_LEVEL;

  afterEach(() => {
    if (previous === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = previous;
    }
  });

  it('is silent under tests by default', () => {
    delete process.env.LOG_LEVEL;
    expect(createLogger('deploy-runner').level).toBe('silent');
  });

  it('honours a LOG_LEVEL set after the module was loaded', () => {
    process.env.LOG_LEVEL = 'debug';
    expect(createLogger('deploy-runner').level).toBe('debug');
  });
});
