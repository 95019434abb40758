/**
 * Duration strings as they appear in request logs: "1.5ms", "12.3µs", "2s".
 *
 * Suffix detection is substring based and order dependent: the first suffix
 * of DURATION_SUFFIXES found anywhere in the text wins, and every occurrence
 * of it is removed before the number is parsed. "1m30s" therefore resolves to
 * "s", leaves "1m30", and parses to nothing.
 */

export type DurationUnit = 'seconds' | 'microseconds';

const MICROSECONDS_PER: Record<DurationUnit, number> = {
  seconds: 1_000_000,
  microseconds: 1,
};

// Order matters, see above.
const DURATION_SUFFIXES: ReadonlyArray<readonly [string, number]> = [
  ['us', 1],
  ['µs', 1],
  ['ms', 1_000],
  ['s', 1_000_000],
  ['m', 60_000_000],
  ['h', 3_600_000_000],
];

const NUMBER_REGEX = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

/** Finite decimal number, or null. `"1e400"` overflows and is null. */
export function parseNumber(text: string): number | null {
  if (!NUMBER_REGEX.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

/**
 * Converts a duration to the target unit. Returns 0 for empty input and
 * null when the text cannot be parsed or the result is not finite.
 */
export function parseDuration(value: unknown, unit: DurationUnit): number | null {
  if (value === undefined || value === null || value === '' || value === 0) return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  for (const [suffix, microseconds] of DURATION_SUFFIXES) {
    if (value.includes(suffix)) {
      const amount = parseNumber(value.split(suffix).join(''));
      if (amount === null) return null;
      const converted = (amount * microseconds) / MICROSECONDS_PER[unit];
      return Number.isFinite(converted) ? converted : null;
    }
  }

  return parseNumber(value);
}

export function toSeconds(value: unknown): number {
  return parseDuration(value, 'seconds') ?? 0;
}

export function toMicroseconds(value: unknown): number {
  return parseDuration(value, 'microseconds') ?? 0;
}
