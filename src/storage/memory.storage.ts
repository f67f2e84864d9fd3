import type { LookupResult, StorageOptions } from '../types';
import { MISSING, type UrlStorage } from './storage';

/**
 * Process-lifetime storage backed by a single Map.
 *
 * Each read and write is one synchronous step, so the event loop never
 * interleaves a reader with a writer. Nothing is evicted.
 */
export class MemoryUrlStorage implements UrlStorage {
  private readonly urlMap = new Map<string, string>();

  async set(shortId: string, url: string, _options?: StorageOptions): Promise<void> {
    this.urlMap.set(shortId, url);
  }

  async get(shortId: string, _options?: StorageOptions): Promise<LookupResult> {
    const url = this.urlMap.get(shortId);
    if (url === undefined) {
      return MISSING;
    }
    return { url, found: true };
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  get size(): number {
    return this.urlMap.size;
  }
}
