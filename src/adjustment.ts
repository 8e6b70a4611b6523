/**
 * Relative time adjustments like "-30s", "+2d", "1w".
 *
 * An adjustment keeps the unit it was written in; {@link adjustmentSeconds}
 * converts it to a signed number of seconds when it is applied to an instant.
 */

const SECS_PER_MINUTE = 60;
const SECS_PER_HOUR = 60 * SECS_PER_MINUTE;
const SECS_PER_DAY = 24 * SECS_PER_HOUR;
const SECS_PER_WEEK = 7 * SECS_PER_DAY;

export type TimeUnit = 's' | 'm' | 'h' | 'd' | 'w';

const UNIT_SECONDS: Record<TimeUnit, number> = {
  s: 1,
  m: SECS_PER_MINUTE,
  h: SECS_PER_HOUR,
  d: SECS_PER_DAY,
  w: SECS_PER_WEEK,
};

export const TIME_UNITS: readonly TimeUnit[] = ['s', 'm', 'h', 'd', 'w'];

const VALID_UNITS = TIME_UNITS.join(', ');

export interface Adjustment {
  /** Signed magnitude in `unit`. */
  readonly amount: number;
  readonly unit: TimeUnit;
}

export type AdjustmentErrorKind =
  | 'empty'
  | 'missing_number'
  | 'missing_unit'
  | 'invalid_number'
  | 'unknown_unit';

export class AdjustmentError extends Error {
  public readonly kind: AdjustmentErrorKind;

  constructor(kind: AdjustmentErrorKind, message: string) {
    super(message);
    this.name = 'AdjustmentError';
    this.kind = kind;
  }
}

function isTimeUnit(s: string): s is TimeUnit {
  return Object.prototype.hasOwnProperty.call(UNIT_SECONDS, s);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Parse an adjustment string like "-30s", "+2d" or "1w".
 *
 * Supported units:
 * - `s` — seconds
 * - `m` — minutes
 * - `h` — hours
 * - `d` — days (24 hours)
 * - `w` — weeks (7 days)
 *
 * After an optional `+`/`-` sign, digits and non-digits are collected
 * separately: the digits form the magnitude and everything else the unit.
 * Units are case-sensitive.
 *
 * @throws {AdjustmentError} with a `kind` naming the first failed check
 */
export function parseAdjustment(input: string): Adjustment {
  const trimmed = input.trim();

  if (trimmed.length === 0) {
    throw new AdjustmentError('empty', 'empty adjustment string');
  }

  let negative = false;
  let rest = trimmed;
  if (rest[0] === '-' || rest[0] === '+') {
    negative = rest[0] === '-';
    rest = rest.slice(1);
  }

  let digits = '';
  let unit = '';
  for (const ch of rest) {
    if (isDigit(ch)) {
      digits += ch;
    } else {
      unit += ch;
    }
  }

  if (digits.length === 0) {
    throw new AdjustmentError('missing_number', 'missing numeric part');
  }

  if (unit.length === 0) {
    throw new AdjustmentError(
      'missing_unit',
      `missing time unit (expected one of ${VALID_UNITS})`,
    );
  }

  const magnitude = Number(digits);
  if (!Number.isSafeInteger(magnitude)) {
    throw new AdjustmentError('invalid_number', 'invalid number');
  }

  if (!isTimeUnit(unit)) {
    throw new AdjustmentError(
      'unknown_unit',
      `unknown time unit '${unit}' (expected one of ${VALID_UNITS})`,
    );
  }

  // Avoid producing -0 for "-0s".
  const amount = negative && magnitude !== 0 ? -magnitude : magnitude;
  return { amount, unit };
}

/**
 * Signed length of an adjustment in seconds.
 *
 * @throws {AdjustmentError} when the product is not a safe integer
 */
export function adjustmentSeconds(adj: Adjustment): number {
  const secs = adj.amount * UNIT_SECONDS[adj.unit];
  if (!Number.isSafeInteger(secs)) {
    throw new AdjustmentError('invalid_number', 'adjustment is too large');
  }
  return secs;
}

/**
 * Render an adjustment in the form {@link parseAdjustment} accepts.
 *
 * @example
 * formatAdjustment({ amount: -30, unit: 's' }) // "-30s"
 * formatAdjustment({ amount: 2, unit: 'd' })   // "2d"
 */
export function formatAdjustment(adj: Adjustment): string {
  return `${adj.amount}${adj.unit}`;
}
