// ─── Constants ───────────────────────────────────────────

/** Keys longer than this are replaced by their SHA-1 digest. */
export const MAX_KEY_LENGTH = 100;

/** Keys in log lines are cut to this many characters. */
export const MAX_LOGGED_KEY_LENGTH = 80;

// ─── Errors ──────────────────────────────────────────────

export class CacheConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheConfigError';
  }
}

/** A batch operation answered a different number of positions than it was asked for. */
export class BatchOperationError extends Error {
  constructor(public expected: number, public received: number) {
    super(`Batch operation returned ${received} results for ${expected} positions`);
    this.name = 'BatchOperationError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// ─── Logging ─────────────────────────────────────────────

export type CacheLogger = Pick<Console, 'log' | 'error'>;

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + '…' : text;
}

export function logKey(key: string): string {
  return truncate(key, MAX_LOGGED_KEY_LENGTH);
}

// ─── Slice helpers ───────────────────────────────────────

/**
 * Picks the elements at the given positions, in the order of `positions`.
 *
 * Batch operations receive positions into the caller's key list; this maps
 * them back to the caller's own arguments:
 *
 *   cache.multiGet(keys, (positions) => fetchMany(selectByIndices(ids, positions)))
 */
export function selectByIndices<V>(items: readonly V[], positions: readonly number[]): V[] {
  return positions.map((i) => {
    if (i < 0 || i >= items.length) {
      throw new RangeError(`Position ${i} is out of range for ${items.length} items`);
    }
    return items[i];
  });
}
