import type { Application } from 'express';
import { createApp } from '../../src/app';
import { Logger } from '../../src/logger';
import { UrlShortener } from '../../src/services/url.service';
import { MemoryUrlStorage, type UrlStorage } from '../../src/storage';
import type { LookupResult } from '../../src/types';

export const TEST_HOST = 'http://h:3000';

export const silentLogger = new Logger('TEST', false);

export interface TestApp {
  app: Application;
  shortener: UrlShortener;
  storage: UrlStorage;
}

export function createTestApp(storage: UrlStorage = new MemoryUrlStorage()): TestApp {
  const shortener = new UrlShortener(TEST_HOST, storage, silentLogger);
  const app = createApp(shortener, { requestTimeoutMs: 1000, logger: silentLogger });
  return { app, shortener, storage };
}

/**
 * Storage whose every call fails the way an unreachable backend does
 */
export class UnreachableStorage implements UrlStorage {
  constructor(private readonly error: Error) {}

  async set(): Promise<void> {
    throw this.error;
  }

  async get(): Promise<LookupResult> {
    throw this.error;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
