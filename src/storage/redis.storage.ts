import { Redis } from 'ioredis';
import { ConnectionError, describeError } from '../errors';
import { logger } from '../logger';
import type { LookupResult, RedisStorageConfig, StorageOptions } from '../types';
import { withDeadline } from '../utils/deadline';
import { MISSING, type UrlStorage } from './storage';

// Namespace for mapping keys in a shared Redis
export const KEY_PREFIX = 'url:';

/**
 * Split "host:port" into its parts; the port defaults to 6379
 */
export function parseRedisAddr(addr: string): { host: string; port: number } {
  const separator = addr.lastIndexOf(':');
  if (separator === -1) {
    return { host: addr || 'localhost', port: 6379 };
  }
  const host = addr.slice(0, separator) || 'localhost';
  const port = parseInt(addr.slice(separator + 1), 10);
  if (Number.isNaN(port)) {
    throw new ConnectionError(`invalid Redis address "${addr}"`);
  }
  return { host, port };
}

/**
 * Storage on a single Redis instance.
 *
 * Mappings live under `url:<shortId>` with the configured TTL applied on
 * every write. Every call is a single round trip bounded by the caller's
 * signal.
 */
export class RedisUrlStorage implements UrlStorage {
  private closed = false;

  private constructor(
    private readonly client: Redis,
    private readonly ttlSeconds: number
  ) {}

  /**
   * Connect and PING once. Rejects with ConnectionError when Redis is not
   * reachable, so startup fails instead of the first request.
   */
  static async connect(
    config: RedisStorageConfig,
    options: StorageOptions = {}
  ): Promise<RedisUrlStorage> {
    const { host, port } = parseRedisAddr(config.addr);
    const client = new Redis({
      host,
      port,
      password: config.password,
      db: config.db,
      connectTimeout: config.connectTimeoutMs,
      commandTimeout: config.commandTimeoutMs,
      maxRetriesPerRequest: 1,
      retryStrategy: (times: number) => Math.min(times * 100, 3000),
      lazyConnect: true,
    });

    client.on('error', (error: Error) => {
      logger.warn(`Redis ${config.addr}: ${error.message}`);
    });

    try {
      await withDeadline('redis connect', () => client.connect(), options.signal);
      await withDeadline('redis ping', () => client.ping(), options.signal);
    } catch (error) {
      client.disconnect();
      throw new ConnectionError(
        `failed to connect to Redis at ${config.addr}: ${describeError(error)}`,
        { cause: error }
      );
    }

    logger.info(`Connected to Redis at ${config.addr} (db ${config.db})`);
    return new RedisUrlStorage(client, config.ttlSeconds);
  }

  async set(shortId: string, url: string, options: StorageOptions = {}): Promise<void> {
    const key = KEY_PREFIX + shortId;
    await this.run(
      'redis set',
      () => (this.ttlSeconds > 0 ? this.client.set(key, url, 'EX', this.ttlSeconds) : this.client.set(key, url)),
      options.signal
    );
  }

  async get(shortId: string, options: StorageOptions = {}): Promise<LookupResult> {
    const url = await this.run('redis get', () => this.client.get(KEY_PREFIX + shortId), options.signal);
    if (url === null) {
      return MISSING;
    }
    return { url, found: true };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.client.quit();
    } catch (error) {
      logger.warn(`Redis quit failed, disconnecting: ${describeError(error)}`);
      this.client.disconnect();
    }
  }

  private async run<T>(name: string, command: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (this.closed) {
      throw new ConnectionError(`${name}: storage is closed`);
    }
    try {
      return await withDeadline(name, command, signal);
    } catch (error) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      throw new ConnectionError(`${name} failed: ${describeError(error)}`, { cause: error });
    }
  }
}
