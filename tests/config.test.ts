import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: 'http://localhost:3000',
      requestTimeoutMs: 5000,
      logging: true,
      storage: {
        backend: 'memory',
        redis: {
          addr: 'localhost:6379',
          password: undefined,
          db: 0,
          ttlSeconds: 0,
          connectTimeoutMs: 5000,
          commandTimeoutMs: 3000,
        },
      },
    });
  });

  it('should read the Redis settings', () => {
    const config = loadConfig({
      STORAGE_BACKEND: 'Redis',
      REDIS_ADDR: 'cache.internal:6390',
      REDIS_PASSWORD: 'test-secret',
      REDIS_DB: '3',
      REDIS_TTL_SECONDS: '86400',
    });

    expect(config.storage.backend).toBe('redis');
    expect(config.storage.redis).toMatchObject({
      addr: 'cache.internal:6390',
      password: 'test-secret',
      db: 3,
      ttlSeconds: 86400,
    });
  });

  it('should prefer SHORTENER_HOST over BASE_URL', () => {
    expect(loadConfig({ BASE_URL: 'http://b:1' }).host).toBe('http://b:1');
    expect(loadConfig({ SHORTENER_HOST: 'http://s:2', BASE_URL: 'http://b:1' }).host).toBe('http://s:2');
  });

  it('should turn logging off only for "false"', () => {
    expect(loadConfig({ LOG_ENABLED: 'false' }).logging).toBe(false);
    expect(loadConfig({ LOG_ENABLED: '0' }).logging).toBe(true);
  });

  it('should reject an unknown backend', () => {
    expect(() => loadConfig({ STORAGE_BACKEND: 'memcached' })).toThrow(ConfigError);
    expect(() => loadConfig({ STORAGE_BACKEND: 'memcached' })).toThrow(
      'STORAGE_BACKEND must be "memory" or "redis", got "memcached"'
    );
  });

  it('should reject malformed numbers', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('PORT must be a non-negative integer, got "eighty"');
    expect(() => loadConfig({ REDIS_TTL_SECONDS: '-5' })).toThrow(ConfigError);
  });
});
