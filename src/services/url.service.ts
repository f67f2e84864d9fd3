import { type Logger, logger as defaultLogger } from '../logger';
import type { UrlStorage } from '../storage';
import type { LookupResult, StorageOptions } from '../types';
import { generateShortId } from '../utils/shortcode';

/**
 * URL shortening service
 *
 * IDs are fingerprints of the URL, so shortening is idempotent: the mapping
 * is written on every call and a repeat call overwrites it with the same
 * value. The service keeps no copy of the mappings; storage is the only
 * source of truth.
 */
export class UrlShortener {
  constructor(
    private readonly host: string,
    private readonly storage: UrlStorage,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Store the mapping for `url` and return its short ID.
   * Storage failures reject; the ID is never handed out unsaved.
   */
  async shorten(url: string, options: StorageOptions = {}): Promise<string> {
    const shortId = generateShortId(url);
    await this.storage.set(shortId, url, options);
    this.logger.info(`Shortened URL: ${shortId} -> ${url}`);
    return shortId;
  }

  /**
   * Full short URL: host + "/" + ID
   */
  async getShortUrl(url: string, options: StorageOptions = {}): Promise<string> {
    const shortId = await this.shorten(url, options);
    return `${this.host}/${shortId}`;
  }

  async resolve(shortId: string, options: StorageOptions = {}): Promise<LookupResult> {
    return this.storage.get(shortId, options);
  }
}
