// ─── Outcomes ────────────────────────────────────────────

export type Outcome<T> = PromiseSettledResult<T>;

export function fulfilled<T>(value: T): PromiseFulfilledResult<T> {
  return { status: 'fulfilled', value };
}

export function rejected(reason: unknown): PromiseRejectedResult {
  return { status: 'rejected', reason };
}

/** Runs an operation and captures a throw or a rejection as its outcome. */
export async function settle<T>(operation: () => Promise<T> | T): Promise<Outcome<T>> {
  try {
    return fulfilled(await operation());
  } catch (e: unknown) {
    return rejected(e);
  }
}

/** Replays an outcome the way the operation produced it. */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (outcome.status === 'rejected') throw outcome.reason;
  return outcome.value;
}

// ─── Entries ─────────────────────────────────────────────

export type EntryState = 'fresh' | 'grace' | 'unusable';

/**
 * One stored result. Never updated in place: a refresh builds a new entry
 * and swaps it into the store. The refresh claim is the only mutable bit and
 * it only ever goes from unclaimed to claimed.
 */
export class CacheEntry<T> {
  readonly expiresAt: number;
  readonly graceExpiresAt: number;
  private refreshClaimed = false;

  constructor(
    readonly outcome: Outcome<T>,
    expiration: number,
    graceExpiration: number,
    now = Date.now(),
  ) {
    this.expiresAt = now + expiration;
    this.graceExpiresAt = this.expiresAt + graceExpiration;
  }

  /** Returns true for the first caller only. */
  claimRefresh(): boolean {
    if (this.refreshClaimed) return false;
    this.refreshClaimed = true;
    return true;
  }
}

export function entryState<T>(entry: CacheEntry<T> | undefined, now = Date.now()): EntryState {
  if (!entry || now >= entry.graceExpiresAt) return 'unusable';
  return now < entry.expiresAt ? 'fresh' : 'grace';
}
