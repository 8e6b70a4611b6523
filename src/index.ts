/**
 * untd — Unix timestamp to formatted date.
 *
 * Re-exports the public API surface from a single entry point.
 */

// ---------------------------------------------------------------------------
// Core
// ---------------------------------------------------------------------------

export { type Clock, SystemClock, FixedClock } from './clock.js';
export {
  type Adjustment,
  type AdjustmentErrorKind,
  type TimeUnit,
  AdjustmentError,
  TIME_UNITS,
  parseAdjustment,
  adjustmentSeconds,
  formatAdjustment,
} from './adjustment.js';
export { MIN_INSTANT, MAX_INSTANT, isRepresentable, parseTimestamp } from './instant.js';
export {
  type Timezone,
  type TimezoneName,
  TIMEZONE_NAMES,
  DEFAULT_TIMEZONE,
  isTimezoneName,
  parseTimezone,
  offsetSecondsAt,
} from './timezone.js';
export { type Config, ConfigError, DEFAULT_CONFIG, parseConfig } from './config.js';

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export {
  type FormatKeyword,
  type FormatSpec,
  FORMAT_KEYWORDS,
  isFormatKeyword,
  parseFormatSpec,
  patternFor,
  resolveFormat,
  needsWeekdaySubstitution,
} from './format/pattern.js';
export { UNKNOWN_WEEKDAY, weekdayName, substituteWeekday } from './format/weekday.js';
export { type ZonedFields, zonedFields, renderPattern } from './format/strftime.js';

// ---------------------------------------------------------------------------
// Side effects
// ---------------------------------------------------------------------------

export {
  type Clipboard,
  type CopyCommand,
  type CopyOutcome,
  SystemClipboard,
  copyCommands,
} from './clipboard.js';

// ---------------------------------------------------------------------------
// App layer
// ---------------------------------------------------------------------------

export {
  type ConvertRequest,
  type ConvertOutput,
  type InputErrorKind,
  InputError,
  convert,
} from './app/convert.js';
export { type LoadedConfig, defaultConfigPath, loadConfig } from './app/config.js';
export { type CliDeps, type CliIo, consoleIo, runCli, systemDeps } from './cli/program.js';
