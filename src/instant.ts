/**
 * Instants are whole Unix seconds held as plain numbers.
 *
 * The usable range is that of a JavaScript `Date` (±8.64e15 ms), narrowed
 * by one day on each side so that shifting into a zone stays in range.
 */

const DATE_LIMIT_SECONDS = 8_640_000_000_000;
const SECS_PER_DAY = 86_400;

export const MIN_INSTANT = -(DATE_LIMIT_SECONDS - SECS_PER_DAY);
export const MAX_INSTANT = DATE_LIMIT_SECONDS - SECS_PER_DAY;

export function isRepresentable(epochSeconds: number): boolean {
  return (
    Number.isSafeInteger(epochSeconds) &&
    epochSeconds >= MIN_INSTANT &&
    epochSeconds <= MAX_INSTANT
  );
}

/**
 * Parse a decimal Unix timestamp with an optional sign.
 *
 * Returns null for anything that is not an integer or falls outside
 * [{@link MIN_INSTANT}, {@link MAX_INSTANT}].
 */
export function parseTimestamp(input: string): number | null {
  const trimmed = input.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  const secs = Number(trimmed);
  // Number('-0') is -0; keep instants free of negative zero.
  const normalized = secs === 0 ? 0 : secs;
  return isRepresentable(normalized) ? normalized : null;
}
