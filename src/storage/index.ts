import type { StorageConfig, StorageOptions } from '../types';
import { MemoryUrlStorage } from './memory.storage';
import { RedisUrlStorage } from './redis.storage';
import type { UrlStorage } from './storage';

export { MemoryUrlStorage } from './memory.storage';
export { RedisUrlStorage, KEY_PREFIX, parseRedisAddr } from './redis.storage';
export { MISSING } from './storage';
export type { UrlStorage } from './storage';

/**
 * Build the configured backend. Redis is connected and verified before this
 * resolves.
 */
export async function createStorage(
  config: StorageConfig,
  options: StorageOptions = {}
): Promise<UrlStorage> {
  switch (config.backend) {
    case 'redis':
      return RedisUrlStorage.connect(config.redis, options);
    case 'memory':
      return new MemoryUrlStorage();
  }
}
