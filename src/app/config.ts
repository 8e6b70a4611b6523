/**
 * CLI-specific config loading utilities.
 *
 * Wraps the library-level config parsing (`../config.js`) with file-system
 * awareness: locating the config file and reading TOML from it.
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

import { type Config, ConfigError, DEFAULT_CONFIG, parseConfig } from '../config.js';

export interface LoadedConfig {
  /** Path that was consulted, whether or not a file existed there. */
  configPath: string;
  /** False when defaults were used because no file existed. */
  found: boolean;
  config: Config;
}

/**
 * Determine the default configuration file path.
 *
 * Resolution order:
 * 1. `./untd.toml` if it exists in the current working directory.
 * 2. `$XDG_CONFIG_HOME/untd/untd.toml` (or `~/.config/untd/untd.toml` when
 *    `XDG_CONFIG_HOME` is not set), whether or not it exists.
 */
export function defaultConfigPath(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): string {
  const localConfig = path.resolve(cwd, 'untd.toml');
  if (fs.existsSync(localConfig)) {
    return localConfig;
  }

  const xdgConfigHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(xdgConfigHome, 'untd', 'untd.toml');
}

/**
 * Load the untd configuration.
 *
 * @param configPath - Explicit path to a TOML config file. When omitted the
 *   result of {@link defaultConfigPath} is used. A missing file yields the
 *   defaults.
 * @throws {ConfigError} when the file cannot be read or parsed
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolvedPath = configPath ? path.resolve(configPath) : defaultConfigPath();

  let tomlStr: string;
  try {
    tomlStr = await fs.promises.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return {
        configPath: resolvedPath,
        found: false,
        config: { ...DEFAULT_CONFIG, formats: { ...DEFAULT_CONFIG.formats } },
      };
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config ${resolvedPath}: ${detail}`, { cause: err });
  }

  return { configPath: resolvedPath, found: true, config: parseConfig(tomlStr) };
}
