import type { LookupResult, StorageOptions } from '../types';

/**
 * Key/value persistence for short ID -> URL mappings.
 *
 * Implementations must tolerate concurrent calls. A missing key is a normal
 * lookup result; only connectivity or protocol failures reject.
 */
export interface UrlStorage {
  /**
   * Store or overwrite the mapping for a short ID
   */
  set(shortId: string, url: string, options?: StorageOptions): Promise<void>;

  /**
   * Look up a mapping; `{ url: '', found: false }` when absent
   */
  get(shortId: string, options?: StorageOptions): Promise<LookupResult>;

  /**
   * Release held connections. Safe to call more than once.
   */
  close(): Promise<void>;
}

export const MISSING: LookupResult = Object.freeze({ url: '', found: false });
