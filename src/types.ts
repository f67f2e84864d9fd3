// Per-call options accepted by every storage operation
export interface StorageOptions {
  // Caller's deadline; networked backends abort when it fires
  signal?: AbortSignal;
}

// Outcome of a lookup. A miss is { url: '', found: false }, not an error
export interface LookupResult {
  url: string;
  found: boolean;
}

export type StorageBackend = 'memory' | 'redis';

// Connection settings for the Redis backend
export interface RedisStorageConfig {
  // host:port
  addr: string;
  password?: string;
  db: number;
  // 0 keeps mappings until the server evicts them
  ttlSeconds: number;
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

export interface StorageConfig {
  backend: StorageBackend;
  redis: RedisStorageConfig;
}
