import { z } from 'zod';
import { CacheConfigError, type CacheLogger } from './lib.js';

/** What to do with a result whose operation failed. */
export interface ErrorExpirationDecision {
  /** Do not cache this result at all. */
  discard?: boolean;
  /** Replaces `resultExpiration` for this entry. */
  expiration?: number;
  /** Replaces `resultGraceExpiration` for this entry. */
  graceExpiration?: number;
}

/**
 * Called once per operation execution that failed, never per lookup.
 * Returning nothing keeps the default expirations.
 */
export type ErrorExpirationPolicy = (error: unknown) => ErrorExpirationDecision | undefined;

export interface CacheConfig {
  /** Results are fresh for this many milliseconds after they are stored. */
  resultExpiration: number;
  /**
   * Stale results are still served for this many milliseconds after
   * expiring, while a refresh runs in the background. 0 disables the
   * grace window and background refreshes.
   */
  resultGraceExpiration?: number;
  errorExpiration?: ErrorExpirationPolicy;
  /** Label for log lines. */
  name?: string;
  logger?: CacheLogger;
}

export interface ResolvedCacheConfig {
  readonly resultExpiration: number;
  readonly resultGraceExpiration: number;
  readonly errorExpiration?: ErrorExpirationPolicy;
  readonly name: string;
  readonly logger: CacheLogger;
}

// ─── Schemas ─────────────────────────────────────────────

const duration = z.number().finite().nonnegative();

const loggerSchema = z.custom<CacheLogger>(
  (v) =>
    typeof v === 'object' && v !== null &&
    typeof Reflect.get(v, 'log') === 'function' &&
    typeof Reflect.get(v, 'error') === 'function',
  'logger must provide log() and error()',
);

export const cacheConfigSchema = z.object({
  resultExpiration: duration.describe('Fresh window in milliseconds'),
  resultGraceExpiration: duration.default(0).describe('Grace window in milliseconds'),
  errorExpiration: z
    .custom<ErrorExpirationPolicy>((v) => typeof v === 'function', 'errorExpiration must be a function')
    .optional(),
  name: z.string().min(1).default('cache'),
  logger: loggerSchema.default(console),
});

export const errorExpirationDecisionSchema = z
  .object({
    discard: z.boolean().optional(),
    expiration: duration.optional(),
    graceExpiration: duration.optional(),
  })
  .optional();

export const evictorPeriodSchema = z.number().finite().positive().describe('Sweep period in milliseconds');

// ─── Resolution ──────────────────────────────────────────

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function resolveConfig(config: CacheConfig): ResolvedCacheConfig {
  const parsed = cacheConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new CacheConfigError(`Invalid cache config: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return Object.freeze(parsed.data);
}

export function resolveErrorDecision(decision: ErrorExpirationDecision | undefined): ErrorExpirationDecision | undefined {
  const parsed = errorExpirationDecisionSchema.safeParse(decision);
  if (!parsed.success) {
    throw new CacheConfigError(`Invalid error expiration: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function resolveEvictorPeriod(period: number): number {
  const parsed = evictorPeriodSchema.safeParse(period);
  if (!parsed.success) {
    throw new CacheConfigError(`Invalid evictor period: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}
