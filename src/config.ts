import dotenv from 'dotenv';
import { ConfigError } from './errors';
import type { StorageBackend, StorageConfig } from './types';

dotenv.config();

export interface AppConfig {
  port: number;
  host: string;
  requestTimeoutMs: number;
  logging: boolean;
  storage: StorageConfig;
}

type Env = Record<string, string | undefined>;

function parseNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return value;
}

function parseBackend(raw: string | undefined): StorageBackend {
  const backend = (raw || 'memory').toLowerCase();
  if (backend !== 'memory' && backend !== 'redis') {
    throw new ConfigError(`STORAGE_BACKEND must be "memory" or "redis", got "${raw}"`);
  }
  return backend;
}

export function loadConfig(env: Env): AppConfig {
  return {
    // Server configuration
    port: parseNumber(env, 'PORT', 3000),
    // Prefix of every short URL; no trailing slash
    host: env.SHORTENER_HOST || env.BASE_URL || 'http://localhost:3000',
    requestTimeoutMs: parseNumber(env, 'REQUEST_TIMEOUT_MS', 5000),
    logging: env.LOG_ENABLED !== 'false',

    storage: {
      backend: parseBackend(env.STORAGE_BACKEND),
      redis: {
        addr: env.REDIS_ADDR || 'localhost:6379',
        password: env.REDIS_PASSWORD || undefined,
        db: parseNumber(env, 'REDIS_DB', 0),
        ttlSeconds: parseNumber(env, 'REDIS_TTL_SECONDS', 0),
        connectTimeoutMs: 5000,
        commandTimeoutMs: 3000,
      },
    },
  };
}

export const config = loadConfig(process.env);
