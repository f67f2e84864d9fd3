import { createHash } from 'crypto';

export const SHORT_ID_LENGTH = 8;

/**
 * Derive the short ID for a URL: the first 8 hex characters of the
 * SHA-256 digest of its UTF-8 bytes.
 *
 * IDs are content addressed, so the same URL always maps to the same ID and
 * shortening it again is a plain overwrite. Eight hex characters give
 * 16^8 (about 4.3 billion) IDs; among n stored URLs some pair collides with
 * probability of roughly n^2 / 2^33, about 1% at 9,300 URLs. A later
 * colliding URL replaces the earlier mapping.
 */
export function generateShortId(url: string): string {
  return createHash('sha256').update(url, 'utf8').digest('hex').slice(0, SHORT_ID_LENGTH);
}
