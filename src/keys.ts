import { createHash } from 'node:crypto';
import { MAX_KEY_LENGTH } from './lib.js';

/**
 * Maps a cache key to the identifier used in the store.
 *
 * Long keys are hashed so the map never holds or compares them in full. The
 * digest is kept as raw bytes (one char per byte) and is not meant to be read.
 * Two long keys sharing a digest share a cache slot.
 */
export function normalizeKey(key: string): string {
  if (key.length <= MAX_KEY_LENGTH) return key;
  return createHash('sha1').update(key, 'utf8').digest('binary');
}
