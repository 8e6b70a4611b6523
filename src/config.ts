/**
 * Configuration module for untd.
 *
 * Parses TOML configuration and provides defaults for every CLI flag that
 * has one. Values given on the command line always win over the file.
 */

import toml from 'toml';
import { DEFAULT_TIMEZONE, isTimezoneName, TIMEZONE_NAMES } from './timezone.js';
import type { TimezoneName } from './timezone.js';

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export interface Config {
  /** Zone used when `--timezone` is not given. */
  timezone: TimezoneName;
  /** Whether to copy the output when neither `--copy` nor `--no-copy` is given. */
  copy: boolean;
  /** Format keyword or pattern used when `--format` is not given. */
  format?: string;
  /** User-defined format names, usable with `--format <name>`. */
  formats: Record<string, string>;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: Config = {
  timezone: DEFAULT_TIMEZONE,
  copy: true,
  format: undefined,
  formats: {},
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a TOML configuration string into a `Config`.
 *
 * Missing or wrong-typed fields fall back to defaults. An unknown timezone
 * name is rejected rather than ignored.
 *
 * @throws {ConfigError} on invalid TOML or an unknown timezone
 */
export function parseConfig(tomlStr: string): Config {
  let raw: unknown = {};
  if (tomlStr.trim().length > 0) {
    try {
      raw = toml.parse(tomlStr);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Invalid config: ${detail}`, { cause: err });
    }
  }
  const root = isRecord(raw) ? raw : {};

  const config: Config = {
    timezone: DEFAULT_CONFIG.timezone,
    copy: typeof root.copy === 'boolean' ? root.copy : DEFAULT_CONFIG.copy,
    formats: {},
  };

  if (typeof root.timezone === 'string') {
    if (!isTimezoneName(root.timezone)) {
      throw new ConfigError(
        `Invalid timezone in config: '${root.timezone}' (expected one of ${TIMEZONE_NAMES.join(', ')})`,
      );
    }
    config.timezone = root.timezone;
  }

  if (typeof root.format === 'string' && root.format.length > 0) {
    config.format = root.format;
  }

  if (isRecord(root.formats)) {
    for (const [name, pattern] of Object.entries(root.formats)) {
      if (typeof pattern === 'string') {
        config.formats[name] = pattern;
      }
    }
  }

  return config;
}
