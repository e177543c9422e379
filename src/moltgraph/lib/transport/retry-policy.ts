/**
 * Retry decisions for the HTTP transport.
 *
 * `decideRetry` is pure: given the outcome of one attempt and the retry budget
 * spent so far it returns how long to wait before the next attempt, or that the
 * transport should give up. The transport owns the loop and the sleeping.
 */

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

/** 429 is never retried sooner than this. */
export const MIN_RATE_LIMIT_WAIT_MS = 1_000;

/** Server-directed waits beyond this are treated as bogus and clamped. */
export const MAX_SERVER_DIRECTED_WAIT_MS = 10 * 60_000;

export interface RetryPolicyConfig {
  maxAttempts: number;
  maxRateLimitWaits: number;
  backoffSeedMs: number;
  backoffCeilingMs: number;
  rateLimitCooldownMs: number;
}

export interface HeaderLookup {
  get(name: string): string | null;
}

export interface RetryState {
  /** 1-based number of the attempt that just failed (429s excluded). */
  attempt: number;
  /** Number of 429 waits already taken. */
  rateLimitWaits: number;
  now: number;
}

export type RetryReason = 'rate-limited' | 'server-unavailable' | 'network';

export type RetryDecision =
  | { kind: 'retry'; waitMs: number; reason: RetryReason }
  | { kind: 'give-up' };

/**
 * @param status HTTP status of the failed attempt, or null for a network-level failure
 */
export function decideRetry(
  status: number | null,
  headers: HeaderLookup | null,
  state: RetryState,
  config: RetryPolicyConfig
): RetryDecision {
  if (status === 429) {
    if (state.rateLimitWaits >= config.maxRateLimitWaits) return { kind: 'give-up' };
    return { kind: 'retry', waitMs: rateLimitWait(headers, state.now, config), reason: 'rate-limited' };
  }

  const reason: RetryReason | null =
    status === null ? 'network' : RETRYABLE_STATUSES.has(status) ? 'server-unavailable' : null;
  if (reason === null || state.attempt >= config.maxAttempts) {
    return { kind: 'give-up' };
  }
  return {
    kind: 'retry',
    waitMs: backoffDelay(state.attempt, config.backoffSeedMs, config.backoffCeilingMs),
    reason,
  };
}

/** seed × 2^(attempt-1), never above the ceiling. */
export function backoffDelay(attempt: number, seedMs: number, ceilingMs: number): number {
  const exponent = Math.max(attempt - 1, 0);
  return Math.min(seedMs * 2 ** exponent, ceilingMs);
}

/**
 * Retry-After first, then X-RateLimit-Reset, then the fixed cooldown.
 */
export function rateLimitWait(headers: HeaderLookup | null, now: number, config: RetryPolicyConfig): number {
  const directed =
    parseRetryAfter(headers?.get('retry-after') ?? null, now) ??
    parseRateLimitReset(headers?.get('x-ratelimit-reset') ?? null, now);

  if (directed !== null) {
    return Math.min(Math.max(directed, MIN_RATE_LIMIT_WAIT_MS), MAX_SERVER_DIRECTED_WAIT_MS);
  }
  return Math.max(config.rateLimitCooldownMs, MIN_RATE_LIMIT_WAIT_MS);
}

/** Delta-seconds or HTTP-date form. Returns milliseconds to wait. */
export function parseRetryAfter(value: string | null, now: number): number | null {
  if (value === null || value.trim() === '') return null;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const at = Date.parse(trimmed);
  return Number.isNaN(at) ? null : at - now;
}

/**
 * The platform sends an absolute epoch time in seconds. Millisecond epochs are
 * accepted too, and small values are read as a delta in seconds.
 */
export function parseRateLimitReset(value: string | null, now: number): number | null {
  if (value === null || value.trim() === '') return null;
  const n = Number(value.trim());
  if (!Number.isFinite(n) || n < 0) return null;
  if (n >= 1e12) return n - now;
  if (n >= 1e9) return n * 1000 - now;
  return n * 1000;
}
