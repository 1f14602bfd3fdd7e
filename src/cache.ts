// ─── Result cache with a grace window ────────────────────

import { resolveConfig, resolveErrorDecision, type CacheConfig, type ResolvedCacheConfig } from './config.js';
import { CacheEntry, entryState, settle, unwrap, type Outcome } from './entry.js';
import type { Evictable } from './evictor.js';
import { normalizeKey } from './keys.js';
import { BatchOperationError, errorMessage, logKey } from './lib.js';
import { EntryStore } from './store.js';

export type Operation<T> = () => Promise<T> | T;

/**
 * Computes results for several keys at once. `positions` index into the key
 * list given to `multiGet`; the returned outcomes are parallel to `positions`.
 */
export type BatchOperation<T> = (positions: number[]) => Promise<Outcome<T>[]> | Outcome<T>[];

export interface CacheStats {
  size: number;
  hits: number;
  graceHits: number;
  misses: number;
  refreshes: number;
  discarded: number;
}

/**
 * Caches results of arbitrary operations by string key.
 *
 * A fresh result is returned as is. A result past its expiration but inside
 * its grace window is returned immediately too, and the first such lookup
 * starts one refresh in the background. Anything older, or missing, is
 * computed while the caller waits.
 *
 * Failures are cached like values (a rejected `get` replays the same reason)
 * unless `errorExpiration` discards them or shortens their life.
 */
export class ResultCache<T> implements Evictable {
  private readonly config: ResolvedCacheConfig;
  private readonly store = new EntryStore<T>();
  private counters = { hits: 0, graceHits: 0, misses: 0, refreshes: 0, discarded: 0 };

  constructor(config: CacheConfig) {
    this.config = resolveConfig(config);
  }

  async get(key: string, operation: Operation<T>): Promise<T> {
    const id = normalizeKey(key);
    const entry = this.store.get(id);
    const state = entryState(entry);

    if (!entry || state === 'unusable') {
      this.counters.misses++;
      return unwrap(await this.execute(id, operation));
    }

    if (state === 'fresh') {
      this.counters.hits++;
      return unwrap(entry.outcome);
    }

    this.counters.graceHits++;
    if (entry.claimRefresh()) {
      this.refreshInBackground(logKey(key), () => this.execute(id, operation));
    }
    return unwrap(entry.outcome);
  }

  /**
   * Looks up many keys with one batch call for the misses, and at most one
   * background batch call for the keys in their grace window. The result is
   * parallel to `keys`.
   */
  async multiGet(keys: readonly string[], batchOperation: BatchOperation<T>): Promise<Outcome<T>[]> {
    const ids = keys.map(normalizeKey);
    const results = new Array<Outcome<T>>(keys.length);
    const missing: number[] = [];
    const stale: { position: number; entry: CacheEntry<T> }[] = [];
    const now = Date.now();

    ids.forEach((id, position) => {
      const entry = this.store.get(id);
      const state = entryState(entry, now);
      if (!entry || state === 'unusable') {
        this.counters.misses++;
        missing.push(position);
        return;
      }
      results[position] = entry.outcome;
      if (state === 'fresh') {
        this.counters.hits++;
      } else {
        this.counters.graceHits++;
        stale.push({ position, entry });
      }
    });

    if (missing.length) {
      const outcomes = await this.executeBatch(ids, missing, batchOperation);
      missing.forEach((position, i) => {
        results[position] = outcomes[i];
      });
    }

    // the store may have moved on while the batch ran; only the current entry can be refreshed
    const claimed = stale
      .filter(({ position, entry }) =>
        this.store.get(ids[position]) === entry && entryState(entry) === 'grace' && entry.claimRefresh(),
      )
      .map(({ position }) => position);
    if (claimed.length) {
      this.refreshInBackground(`${claimed.length} of ${keys.length} keys`, () =>
        this.executeBatch(ids, claimed, batchOperation),
      );
    }

    return results;
  }

  /** Drops entries past their grace window. */
  evict(): number {
    const removed = this.store.sweep();
    if (removed) this.config.logger.log(`[evict] ${this.config.name}: removed ${removed}`);
    return removed;
  }

  /** Stored entries, including expired ones not swept yet. */
  get size(): number {
    return this.store.size;
  }

  stats(): CacheStats {
    return { size: this.store.size, ...this.counters };
  }

  // ─── Execution ─────────────────────────────────────────

  private async execute(id: string, operation: Operation<T>): Promise<Outcome<T>> {
    const outcome = await settle(operation);
    this.storeOutcome(id, outcome, Date.now());
    return outcome;
  }

  private async executeBatch(
    ids: readonly string[],
    positions: number[],
    batchOperation: BatchOperation<T>,
  ): Promise<Outcome<T>[]> {
    const outcomes = await batchOperation([...positions]);
    if (outcomes.length !== positions.length) {
      throw new BatchOperationError(positions.length, outcomes.length);
    }
    const now = Date.now();
    positions.forEach((position, i) => this.storeOutcome(ids[position], outcomes[i], now));
    return outcomes;
  }

  private storeOutcome(id: string, outcome: Outcome<T>, now: number): void {
    let expiration = this.config.resultExpiration;
    let graceExpiration = this.config.resultGraceExpiration;

    if (outcome.status === 'rejected' && this.config.errorExpiration) {
      const decision = resolveErrorDecision(this.config.errorExpiration(outcome.reason));
      if (decision?.discard) {
        this.counters.discarded++;
        return;
      }
      expiration = decision?.expiration ?? expiration;
      graceExpiration = decision?.graceExpiration ?? graceExpiration;
    }

    this.store.set(id, new CacheEntry(outcome, expiration, graceExpiration, now));
  }

  private refreshInBackground(label: string, refresh: () => Promise<unknown>): void {
    this.counters.refreshes++;
    this.config.logger.log(`[stale refresh] ${this.config.name}: ${label}`);
    refresh().catch((e: unknown) => {
      this.config.logger.error(`[refresh failed] ${this.config.name}: ${label}: ${errorMessage(e)}`);
    });
  }
}

export function createResultCache<T>(config: CacheConfig): ResultCache<T> {
  return new ResultCache<T>(config);
}
