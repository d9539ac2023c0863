import { DatastoreError } from '../errors.js';

/**
 * How the client waits between status checks of a pending request.
 *
 * `exponential` doubles the interval after every pending response (capped at
 * `maxIntervalMs`); `fixed` keeps `intervalMs` for the whole sequence. A
 * server-supplied `Retry-After` replaces the interval for that one wait.
 */
export type PollingStrategy = 'exponential' | 'fixed';

export interface PollingPolicy {
  strategy: PollingStrategy;
  /** Wait before the second status check (ms). */
  intervalMs: number;
  /** Lower bound on any single wait, including `Retry-After` (ms). */
  minIntervalMs: number;
  /** Upper bound on any single wait, including `Retry-After` (ms). */
  maxIntervalMs: number;
  /** Budget for the whole polling sequence, measured from its start (ms). */
  timeoutMs: number;
}

export const DEFAULT_POLLING_POLICY: Readonly<PollingPolicy> = {
  strategy: 'exponential',
  intervalMs: 5_000,
  minIntervalMs: 1_000,
  maxIntervalMs: 30_000,
  timeoutMs: 60_000,
};

export const POLLING_STRATEGIES: readonly PollingStrategy[] = ['exponential', 'fixed'];

export function isPollingStrategy(value: unknown): value is PollingStrategy {
  return typeof value === 'string' && (POLLING_STRATEGIES as readonly string[]).includes(value);
}

const DURATION_FIELDS = ['intervalMs', 'minIntervalMs', 'maxIntervalMs', 'timeoutMs'] as const;

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws DatastoreError when the strategy is unknown, a duration is
 *   negative/non-finite or the minimum exceeds the maximum.
 */
export function resolvePollingPolicy(overrides: Partial<PollingPolicy> = {}): PollingPolicy {
  const strategy: unknown = overrides.strategy ?? DEFAULT_POLLING_POLICY.strategy;
  if (!isPollingStrategy(strategy)) {
    throw new DatastoreError(`Unknown polling strategy: ${String(strategy)}`);
  }

  const policy: PollingPolicy = {
    strategy,
    intervalMs: overrides.intervalMs ?? DEFAULT_POLLING_POLICY.intervalMs,
    minIntervalMs: overrides.minIntervalMs ?? DEFAULT_POLLING_POLICY.minIntervalMs,
    maxIntervalMs: overrides.maxIntervalMs ?? DEFAULT_POLLING_POLICY.maxIntervalMs,
    timeoutMs: overrides.timeoutMs ?? DEFAULT_POLLING_POLICY.timeoutMs,
  };

  for (const field of DURATION_FIELDS) {
    const value = policy[field];
    if (!Number.isFinite(value) || value < 0) {
      throw new DatastoreError(`Polling ${field} must be a non-negative finite number, got ${value}`);
    }
  }

  if (policy.minIntervalMs > policy.maxIntervalMs) {
    throw new DatastoreError(
      `Polling minIntervalMs (${policy.minIntervalMs}) exceeds maxIntervalMs (${policy.maxIntervalMs})`,
    );
  }
  return policy;
}

/**
 * Parse a `Retry-After` header given in (possibly fractional) seconds.
 *
 * Returns `null` when the header is absent or unusable; the caller then keeps
 * its current interval.
 */
export function parseRetryAfter(header: string | null | undefined): number | null {
  if (header == null) return null;
  const trimmed = header.trim();
  if (trimmed === '') return null;
  if (!/^\d+(?:\.\d+)?$/.test(trimmed)) return null;
  return Math.round(Number(trimmed) * 1_000);
}

/** Duration of the next wait, clamped to the policy bounds. */
export function waitFor(policy: PollingPolicy, currentIntervalMs: number, retryAfterMs: number | null): number {
  const wait = retryAfterMs ?? currentIntervalMs;
  return Math.min(Math.max(wait, policy.minIntervalMs), policy.maxIntervalMs);
}

/** Interval to use after another pending response. */
export function nextInterval(policy: PollingPolicy, currentIntervalMs: number): number {
  if (policy.strategy === 'fixed') return currentIntervalMs;
  return Math.min(currentIntervalMs * 2, policy.maxIntervalMs);
}
