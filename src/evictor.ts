import { resolveEvictorPeriod } from './config.js';
import { errorMessage } from './lib.js';

/** Anything with a sweep; caches of different value types can share one evictor. */
export interface Evictable {
  evict(): unknown;
}

/**
 * Sweeps every listed cache once per `period` milliseconds on a single
 * timer. Resolves when `signal` aborts; never rejects.
 *
 *   const controller = new AbortController();
 *   runEvictor(60_000, controller.signal, users, orders);
 *   // later
 *   controller.abort();
 */
export function runEvictor(period: number, signal: AbortSignal, ...caches: Evictable[]): Promise<void> {
  const ms = resolveEvictorPeriod(period);

  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const timer = setInterval(() => {
      for (const cache of caches) {
        try {
          cache.evict();
        } catch (e: unknown) {
          console.error(`[evict failed] ${errorMessage(e)}`);
        }
      }
    }, ms);

    signal.addEventListener(
      'abort',
      () => {
        clearInterval(timer);
        resolve();
      },
      { once: true },
    );
  });
}
