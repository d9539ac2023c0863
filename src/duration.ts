/**
 * Duration parsing utilities for human-readable durations like "5s", "250ms".
 *
 * All durations are represented as milliseconds (number).
 */

const MS_PER_SECOND = 1_000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

const UNIT_MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: MS_PER_SECOND,
  m: MS_PER_MINUTE,
  h: MS_PER_HOUR,
};

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/;

/**
 * Parse a duration string like "250ms", "5s", "1.5s", "2m" into milliseconds.
 *
 * Supported units:
 * - `ms`: milliseconds
 * - `s`: seconds
 * - `m`: minutes
 * - `h`: hours
 *
 * The input is case-insensitive and leading/trailing whitespace is trimmed.
 * Fractional results are rounded to the nearest millisecond.
 *
 * @throws {Error} on invalid input (unknown unit, negative, empty, etc.)
 */
export function parseDuration(s: string): number {
  const trimmed = s.trim().toLowerCase();

  if (trimmed.length === 0) {
    throw new Error('Duration string must not be empty');
  }

  const match = DURATION_PATTERN.exec(trimmed);
  if (match === null) {
    throw new Error(`Invalid duration '${s.trim()}': expected a number followed by ms, s, m, or h`);
  }

  const [, amount, unit] = match;
  const ms = Math.round(Number(amount) * UNIT_MULTIPLIERS[unit]);

  if (!Number.isSafeInteger(ms)) {
    throw new Error('Duration is too large');
  }

  return ms;
}

/**
 * Format a duration in milliseconds using the largest unit that divides it
 * exactly.
 *
 * @example
 * formatDuration(30_000)  // "30s"
 * formatDuration(120_000) // "2m"
 * formatDuration(1_500)   // "1500ms"
 * formatDuration(0)       // "0s"
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  if (ms % MS_PER_HOUR === 0) return `${ms / MS_PER_HOUR}h`;
  if (ms % MS_PER_MINUTE === 0) return `${ms / MS_PER_MINUTE}m`;
  if (ms % MS_PER_SECOND === 0) return `${ms / MS_PER_SECOND}s`;
  return `${ms}ms`;
}
