/**
 * The closed set of zones the CLI renders in.
 *
 * JST is Asia/Tokyo, not a fixed +09:00: the offset is looked up per instant
 * from the runtime's zone data, which covers the 1948-1951 summer time
 * (+10:00) and local mean time before 1888.
 */

export type TimezoneName = 'UTC' | 'JST';

export interface Timezone {
  readonly name: TimezoneName;
  /** IANA zone the offset at each instant is read from. */
  readonly ianaName: string;
}

const TIMEZONES: Record<TimezoneName, Timezone> = {
  UTC: { name: 'UTC', ianaName: 'UTC' },
  JST: { name: 'JST', ianaName: 'Asia/Tokyo' },
};

export const TIMEZONE_NAMES: readonly TimezoneName[] = ['UTC', 'JST'];

export const DEFAULT_TIMEZONE: TimezoneName = 'JST';

export function isTimezoneName(name: string): name is TimezoneName {
  return Object.prototype.hasOwnProperty.call(TIMEZONES, name);
}

/** Look up a zone by its exact name; returns null for anything else. */
export function parseTimezone(name: string): Timezone | null {
  return isTimezoneName(name) ? TIMEZONES[name] : null;
}

// ---------------------------------------------------------------------------
// Offsets
// ---------------------------------------------------------------------------

const formatters = new Map<string, Intl.DateTimeFormat>();

function wallClockFormat(ianaName: string): Intl.DateTimeFormat {
  let dtf = formatters.get(ianaName);
  if (dtf === undefined) {
    dtf = new Intl.DateTimeFormat('en-US', {
      timeZone: ianaName,
      era: 'short',
      year: 'numeric',
      month: 'numeric',
      day: 'numeric',
      hour: 'numeric',
      minute: 'numeric',
      second: 'numeric',
      hourCycle: 'h23',
    });
    formatters.set(ianaName, dtf);
  }
  return dtf;
}

/**
 * Offset east of UTC, in seconds, that `zone` observes at `epochSeconds`.
 *
 * Formats the instant's wall-clock time in the zone and measures how far it
 * sits from the same fields read as UTC.
 */
export function offsetSecondsAt(zone: Timezone, epochSeconds: number): number {
  const parts = wallClockFormat(zone.ianaName).formatToParts(new Date(epochSeconds * 1000));
  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const value = parts.find((p) => p.type === type)?.value;
    if (value === undefined) {
      throw new Error(`missing ${type} when formatting ${epochSeconds} in ${zone.ianaName}`);
    }
    return Number(value);
  };

  const era = parts.find((p) => p.type === 'era')?.value;
  const yearOfEra = field('year');
  const year = era === 'BC' || era === 'B' ? 1 - yearOfEra : yearOfEra;

  const wall = new Date(0);
  wall.setUTCFullYear(year, field('month') - 1, field('day'));
  wall.setUTCHours(field('hour'), field('minute'), field('second'), 0);

  return Math.round(wall.getTime() / 1000) - epochSeconds;
}
