import type { CacheEntry } from './entry.js';

/**
 * Normalized key → current entry. Every method is synchronous, so a swap or
 * a sweep is never interleaved with another caller's read.
 */
export class EntryStore<T> {
  private entries = new Map<string, CacheEntry<T>>();

  get(id: string): CacheEntry<T> | undefined {
    return this.entries.get(id);
  }

  set(id: string, entry: CacheEntry<T>): void {
    this.entries.set(id, entry);
  }

  /** Removes entries past their grace window; returns how many went. */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (now >= entry.graceExpiresAt) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}
