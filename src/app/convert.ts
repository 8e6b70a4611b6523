/**
 * Timestamp conversion: the steps between parsed CLI options and the line
 * that gets printed.
 */

import type { Clock } from '../clock.js';
import { AdjustmentError, adjustmentSeconds, parseAdjustment } from '../adjustment.js';
import type { Adjustment } from '../adjustment.js';
import { isRepresentable, parseTimestamp } from '../instant.js';
import { needsWeekdaySubstitution, parseFormatSpec, patternFor } from '../format/pattern.js';
import type { FormatSpec } from '../format/pattern.js';
import { renderPattern } from '../format/strftime.js';
import { substituteWeekday } from '../format/weekday.js';
import { parseTimezone } from '../timezone.js';
import type { Timezone } from '../timezone.js';

export type InputErrorKind = 'timestamp' | 'timezone' | 'adjustment';

/** Bad user input. The CLI prints the message and exits with status 1. */
export class InputError extends Error {
  public readonly kind: InputErrorKind;

  constructor(kind: InputErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
    this.kind = kind;
  }
}

export interface ConvertRequest {
  /** Unix seconds as typed by the user; absent means "now". */
  timestamp?: string;
  timezone: string;
  /** Format keyword or custom pattern; absent means date only. */
  format?: string;
  /** Relative adjustment such as "-30s" or "2d". */
  adjust?: string;
  /** Named formats from the config file. */
  formats?: Readonly<Record<string, string>>;
}

export interface ConvertOutput {
  output: string;
  /** Rendered instant, after adjustment. */
  instant: number;
  timezone: Timezone;
  format: FormatSpec;
  pattern: string;
  adjustment: Adjustment | null;
}

function resolveInstant(timestamp: string | undefined, clock: Clock): number {
  if (timestamp === undefined) {
    return clock.epochSeconds();
  }
  const secs = parseTimestamp(timestamp);
  if (secs === null) {
    throw new InputError('timestamp', 'Invalid timestamp');
  }
  return secs;
}

function resolveAdjustment(adjust: string | undefined): Adjustment | null {
  if (adjust === undefined) {
    return null;
  }
  try {
    return parseAdjustment(adjust);
  } catch (err) {
    if (err instanceof AdjustmentError) {
      throw new InputError('adjustment', `Invalid adjustment: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

function applyAdjustment(instant: number, adjustment: Adjustment | null): number {
  if (adjustment === null) {
    return instant;
  }
  let offset: number;
  try {
    offset = adjustmentSeconds(adjustment);
  } catch (err) {
    if (err instanceof AdjustmentError) {
      throw new InputError('adjustment', `Invalid adjustment: ${err.message}`, { cause: err });
    }
    throw err;
  }
  const adjusted = instant + offset;
  if (!isRepresentable(adjusted)) {
    throw new InputError('timestamp', 'Invalid timestamp');
  }
  return adjusted;
}

/**
 * Convert a request into the output line.
 *
 * Inputs are checked in order: timestamp, timezone, adjustment.
 *
 * @throws {InputError} on a bad timestamp, timezone or adjustment
 */
export function convert(request: ConvertRequest, clock: Clock): ConvertOutput {
  const base = resolveInstant(request.timestamp, clock);

  const timezone = parseTimezone(request.timezone);
  if (timezone === null) {
    throw new InputError('timezone', 'Invalid timezone');
  }

  const adjustment = resolveAdjustment(request.adjust);
  const instant = applyAdjustment(base, adjustment);

  const format = parseFormatSpec(request.format, request.formats);
  const pattern = patternFor(format);
  const rendered = renderPattern(instant, timezone, pattern);
  const output = needsWeekdaySubstitution(format) ? substituteWeekday(rendered) : rendered;

  return { output, instant, timezone, format, pattern, adjustment };
}
