import { Command, CommanderError } from 'commander';

import { loadConfig as loadConfigFile, type LoadedConfig } from '../app/config.js';
import { convert, InputError, type ConvertOutput } from '../app/convert.js';
import { formatAdjustment } from '../adjustment.js';
import { SystemClipboard, type Clipboard } from '../clipboard.js';
import { SystemClock, type Clock } from '../clock.js';
import { ConfigError } from '../config.js';
import { FORMAT_KEYWORDS } from '../format/pattern.js';
import { TIMEZONE_NAMES } from '../timezone.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

/** Line-oriented output sink. */
export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface CliDeps {
  clock: Clock;
  clipboard: Clipboard;
  io: CliIo;
  loadConfig(configPath?: string): Promise<LoadedConfig>;
}

export function systemDeps(): CliDeps {
  return {
    clock: new SystemClock(),
    clipboard: new SystemClipboard(),
    io: consoleIo,
    loadConfig: loadConfigFile,
  };
}

interface CliOptions {
  timezone?: string;
  copy?: boolean;
  format?: string;
  adjust?: string;
  config?: string;
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function settingsLines(result: ConvertOutput): string[] {
  return [
    `instant: ${result.instant}`,
    `timezone: ${result.timezone.name}`,
    `adjustment: ${result.adjustment === null ? 'none' : formatAdjustment(result.adjustment)}`,
    `pattern: ${result.pattern}`,
  ];
}

async function execute(
  timestamp: string | undefined,
  opts: CliOptions,
  deps: CliDeps,
): Promise<number> {
  let result: ConvertOutput;
  let copy: boolean;
  try {
    const { config } = await deps.loadConfig(opts.config);
    copy = opts.copy ?? config.copy;
    result = convert(
      {
        timestamp,
        timezone: opts.timezone ?? config.timezone,
        format: opts.format ?? config.format,
        adjust: opts.adjust,
        formats: config.formats,
      },
      deps.clock,
    );
  } catch (err) {
    if (err instanceof InputError || err instanceof ConfigError) {
      deps.io.out(err.message);
      return 1;
    }
    throw err;
  }

  if (opts.verbose) {
    for (const line of settingsLines(result)) deps.io.err(line);
  }

  deps.io.out(result.output);

  if (copy) {
    const outcome = await deps.clipboard.write(result.output);
    if (outcome.type === 'copied') {
      deps.io.out('Copied to clipboard!');
    } else {
      deps.io.err(`Failed to copy to clipboard: ${outcome.reason}`);
    }
  }

  return 0;
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

/**
 * Parse `argv` (including the node and script entries) and run untd.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;

  const program = new Command();

  program
    .name('untd')
    .description('Convert a Unix timestamp to a formatted date and copy it to the clipboard')
    .version('0.1.0')
    .argument('[timestamp]', 'Unix timestamp in seconds (default: now)')
    .option('-z, --timezone <name>', `timezone: ${TIMEZONE_NAMES.join(', ')}`)
    .option('-c, --copy', 'copy output to the clipboard')
    .option('--no-copy', 'do not copy output to the clipboard')
    .option(
      '-f, --format <spec>',
      `output format: ${FORMAT_KEYWORDS.join(', ')}, a configured name, or a custom pattern`,
    )
    .option('-a, --adjust <adj>', 'relative adjustment, e.g. -30s, 2d, +1w')
    .option('--config <path>', 'path to config file')
    .option('-v, --verbose', 'print the resolved settings to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.io.out(str.replace(/\n$/, '')),
      writeErr: (str) => deps.io.err(str.replace(/\n$/, '')),
    })
    .action(async (timestamp: string | undefined, opts: CliOptions) => {
      exitCode = await execute(timestamp, opts, deps);
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  return exitCode;
}
