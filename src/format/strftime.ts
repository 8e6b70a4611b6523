/**
 * strftime-style rendering of an instant in a zone.
 *
 * Unknown directives, and a `%` at the end of the pattern, are echoed as
 * written.
 */

import { offsetSecondsAt } from '../timezone.js';
import type { Timezone } from '../timezone.js';

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/** Wall-clock fields of an instant as seen in a zone. */
export interface ZonedFields {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 0 = Sunday */
  weekday: number;
  /** 1-366 */
  dayOfYear: number;
  /** Unix seconds, unaffected by the zone. */
  epochSeconds: number;
  /** Offset east of UTC in effect at this instant, in seconds. */
  offsetSeconds: number;
  zone: Timezone;
}

function utcMidnight(year: number, monthIndex: number, day: number): number {
  // Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
  const d = new Date(0);
  d.setUTCFullYear(year, monthIndex, day);
  return d.getTime();
}

export function zonedFields(epochSeconds: number, zone: Timezone): ZonedFields {
  // Shift by the offset and read the UTC fields of the shifted instant.
  const offsetSeconds = offsetSecondsAt(zone, epochSeconds);
  const shifted = new Date((epochSeconds + offsetSeconds) * 1000);
  const year = shifted.getUTCFullYear();
  const startOfYear = utcMidnight(year, 0, 1);
  const startOfDay = utcMidnight(year, shifted.getUTCMonth(), shifted.getUTCDate());
  return {
    year,
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
    weekday: shifted.getUTCDay(),
    dayOfYear: Math.round((startOfDay - startOfYear) / 86_400_000) + 1,
    epochSeconds,
    offsetSeconds,
    zone,
  };
}

function pad(n: number, width = 2, fill = '0'): string {
  const sign = n < 0 ? '-' : '';
  return sign + String(Math.abs(n)).padStart(width, fill);
}

function hour12(hour: number): number {
  const h = hour % 12;
  return h === 0 ? 12 : h;
}

function formatOffset(offsetSeconds: number, colon: boolean): string {
  const sign = offsetSeconds < 0 ? '-' : '+';
  const abs = Math.abs(offsetSeconds);
  const hh = pad(Math.floor(abs / 3600));
  const mm = pad(Math.floor((abs % 3600) / 60));
  return colon ? `${sign}${hh}:${mm}` : `${sign}${hh}${mm}`;
}

function expand(code: string, f: ZonedFields): string | null {
  switch (code) {
    case 'Y':
      return f.year >= 0 && f.year <= 9999 ? pad(f.year, 4) : String(f.year);
    case 'C':
      return pad(Math.floor(f.year / 100));
    case 'y':
      return pad(((f.year % 100) + 100) % 100);
    case 'm':
      return pad(f.month);
    case 'd':
      return pad(f.day);
    case 'e':
      return pad(f.day, 2, ' ');
    case 'j':
      return pad(f.dayOfYear, 3);
    case 'H':
      return pad(f.hour);
    case 'k':
      return pad(f.hour, 2, ' ');
    case 'I':
      return pad(hour12(f.hour));
    case 'l':
      return pad(hour12(f.hour), 2, ' ');
    case 'M':
      return pad(f.minute);
    case 'S':
      return pad(f.second);
    case 'p':
      return f.hour < 12 ? 'AM' : 'PM';
    case 'P':
      return f.hour < 12 ? 'am' : 'pm';
    case 'a':
      return WEEKDAYS[f.weekday].slice(0, 3);
    case 'A':
      return WEEKDAYS[f.weekday];
    case 'b':
    case 'h':
      return MONTHS[f.month - 1].slice(0, 3);
    case 'B':
      return MONTHS[f.month - 1];
    case 'u':
      return String(f.weekday === 0 ? 7 : f.weekday);
    case 'w':
      return String(f.weekday);
    case 'z':
      return formatOffset(f.offsetSeconds, false);
    case 'Z':
      return f.zone.name;
    case 's':
      return String(f.epochSeconds);
    case 'F':
      return `${expand('Y', f)}-${pad(f.month)}-${pad(f.day)}`;
    case 'T':
      return `${pad(f.hour)}:${pad(f.minute)}:${pad(f.second)}`;
    case 'D':
      return `${pad(f.month)}/${pad(f.day)}/${expand('y', f)}`;
    case 'R':
      return `${pad(f.hour)}:${pad(f.minute)}`;
    case 'n':
      return '\n';
    case 't':
      return '\t';
    case '%':
      return '%';
    default:
      return null;
  }
}

/**
 * Render `pattern` for the instant `epochSeconds` in `zone`.
 *
 * @example
 * renderPattern(0, utc, '%Y-%m-%dT%H:%M:%S%z') // "1970-01-01T00:00:00+0000"
 */
export function renderPattern(epochSeconds: number, zone: Timezone, pattern: string): string {
  const fields = zonedFields(epochSeconds, zone);
  return pattern.replace(/%(:z|.)?/gs, (match: string, code: string | undefined) => {
    if (code === undefined) return match;
    if (code === ':z') return formatOffset(fields.offsetSeconds, true);
    return expand(code, fields) ?? match;
  });
}
