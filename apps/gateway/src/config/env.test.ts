import { describe, expect, it } from 'vitest';

import { loadConfig } from './env';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({ NODE_ENV: 'test' });

    expect(config).toEqual({
      env: 'test',
      port: 8080,
      rateLimit: { max: 120, timeWindow: '1 minute' },
      session: { driver: 'memory', redisUrl: undefined, ttlSeconds: undefined },
      pagination: { maxPageSize: 140, nextToken: '#', nextLabel: 'More', backToken: '0', backLabel: 'Back' },
      prompt: { combineValidationErrorWithMessage: true },
      logLevel: undefined,
    });
  });

  it('reads session, pagination and prompt settings', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      SESSION_STORE_DRIVER: 'REDIS',
      REDIS_URL: 'redis://localhost:6379',
      SESSION_TTL_SECONDS: '600',
      PAGINATION_PAGE_SIZE: '160',
      PAGINATION_NEXT_TOKEN: '98',
      PAGINATION_BACK_TOKEN: '99',
      COMBINE_VALIDATION_ERRORS: 'false',
      LOG_LEVEL: 'warn',
    });

    expect(config.port).toBe(3000);
    expect(config.session).toEqual({ driver: 'redis', redisUrl: 'redis://localhost:6379', ttlSeconds: 600 });
    expect(config.pagination).toMatchObject({ maxPageSize: 160, nextToken: '98', backToken: '99' });
    expect(config.prompt.combineValidationErrorWithMessage).toBe(false);
    expect(config.logLevel).toBe('warn');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PAGINATION_PAGE_SIZE: 'lots' })).toThrow('Invalid PAGINATION_PAGE_SIZE value: lots');
    expect(() => loadConfig({ SESSION_STORE_DRIVER: 'memcached' })).toThrow();
    expect(() => loadConfig({ SESSION_STORE_DRIVER: 'redis' })).toThrow('requires REDIS_URL');
  });
});
