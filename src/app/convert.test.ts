import { describe, expect, it } from 'vitest';
import { FixedClock } from '../clock.js';
import { MAX_INSTANT } from '../instant.js';
import { convert, InputError } from './convert.js';
import type { ConvertRequest } from './convert.js';

const epochClock = new FixedClock(new Date(0));

function run(request: ConvertRequest, clock = epochClock): string {
  return convert(request, clock).output;
}

function inputError(request: ConvertRequest): InputError {
  try {
    convert(request, epochClock);
  } catch (err) {
    if (err instanceof InputError) return err;
    throw err;
  }
  throw new Error('expected an InputError');
}

describe('convert', () => {
  describe('timestamps', () => {
    it('renders the epoch in UTC with the default format', () => {
      expect(run({ timestamp: '0', timezone: 'UTC' })).toBe('1970-01-01');
    });

    it('renders the epoch in ISO format', () => {
      expect(run({ timestamp: '0', timezone: 'UTC', format: 'iso' })).toBe(
        '1970-01-01T00:00:00+0000',
      );
    });

    it('renders the epoch in JST', () => {
      expect(run({ timestamp: '0', timezone: 'JST', format: 'iso' })).toBe(
        '1970-01-01T09:00:00+0900',
      );
    });

    it('follows Asia/Tokyo summer time for historical JST instants', () => {
      expect(run({ timestamp: '-647049600', timezone: 'JST', format: 'iso' })).toBe(
        '1949-07-01T10:00:00+1000',
      );
    });

    it('uses the clock when no timestamp is given', () => {
      const clock = new FixedClock(new Date('2024-01-03T00:00:00Z'));
      const result = convert({ timezone: 'UTC' }, clock);
      expect(result.instant).toBe(1_704_240_000);
      expect(result.output).toBe('2024-01-03');
    });

    it('rejects a non-numeric timestamp', () => {
      const err = inputError({ timestamp: 'yesterday', timezone: 'UTC' });
      expect(err.kind).toBe('timestamp');
      expect(err.message).toBe('Invalid timestamp');
    });

    it('rejects a timestamp outside the representable range', () => {
      expect(inputError({ timestamp: '9'.repeat(15), timezone: 'UTC' }).message).toBe(
        'Invalid timestamp',
      );
    });
  });

  describe('timezones', () => {
    it('rejects an unknown timezone', () => {
      const err = inputError({ timestamp: '0', timezone: 'PST' });
      expect(err.kind).toBe('timezone');
      expect(err.message).toBe('Invalid timezone');
    });

    it('checks the timestamp before the timezone', () => {
      expect(inputError({ timestamp: 'x', timezone: 'PST' }).kind).toBe('timestamp');
    });
  });

  describe('adjustments', () => {
    it('adds a day', () => {
      expect(run({ timestamp: '0', timezone: 'UTC', adjust: '1d' })).toBe('1970-01-02');
    });

    it('adds a week', () => {
      expect(run({ timestamp: '0', timezone: 'UTC', adjust: '1w' })).toBe('1970-01-08');
    });

    it('subtracts a second', () => {
      expect(run({ timestamp: '0', timezone: 'UTC', format: 'jphms', adjust: '-1s' })).toBe(
        '1969年12月31日 23時59分59秒',
      );
    });

    it('reports the applied adjustment', () => {
      const result = convert({ timestamp: '100', timezone: 'UTC', adjust: '-2m' }, epochClock);
      expect(result.adjustment).toEqual({ amount: -2, unit: 'm' });
      expect(result.instant).toBe(-20);
    });

    it('reports no adjustment when none is given', () => {
      expect(convert({ timestamp: '0', timezone: 'UTC' }, epochClock).adjustment).toBeNull();
    });

    it('prefixes adjustment errors', () => {
      const err = inputError({ timestamp: '0', timezone: 'UTC', adjust: '10' });
      expect(err.kind).toBe('adjustment');
      expect(err.message).toBe(
        'Invalid adjustment: missing time unit (expected one of s, m, h, d, w)',
      );
    });

    it('rejects an adjustment that leaves the representable range', () => {
      const err = inputError({ timestamp: String(MAX_INSTANT), timezone: 'UTC', adjust: '1s' });
      expect(err.kind).toBe('timestamp');
    });
  });

  describe('formats', () => {
    const T = '1700000000';

    it('renders jp', () => {
      expect(run({ timestamp: T, timezone: 'JST', format: 'jp' })).toBe('2023年11月15日');
    });

    it('renders jpwd with the weekday name', () => {
      expect(run({ timestamp: T, timezone: 'JST', format: 'jpwd' })).toBe('2023年11月15日水');
    });

    it('renders jpwd for the current time', () => {
      const clock = new FixedClock(new Date('2024-01-03T00:00:00Z'));
      expect(run({ timezone: 'JST', format: 'jpwd' }, clock)).toBe('2024年01月03日水');
    });

    it('renders jphm', () => {
      expect(run({ timestamp: T, timezone: 'JST', format: 'jphm' })).toBe('2023年11月15日 07時13分');
    });

    it('renders a custom pattern', () => {
      expect(run({ timestamp: '0', timezone: 'JST', format: '%H:%M:%S' })).toBe('09:00:00');
    });

    it('does not substitute weekdays in custom patterns', () => {
      expect(run({ timestamp: '0', timezone: 'UTC', format: '(%w)' })).toBe('(4)');
    });

    it('renders a named format', () => {
      const result = convert(
        { timestamp: T, timezone: 'UTC', format: 'stamp', formats: { stamp: '%Y%m%d%H%M%S' } },
        epochClock,
      );
      expect(result.output).toBe('20231114221320');
      expect(result.pattern).toBe('%Y%m%d%H%M%S');
    });
  });
});
