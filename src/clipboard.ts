import { spawn } from 'node:child_process';

export type CopyOutcome = { type: 'copied'; tool: string } | { type: 'failed'; reason: string };

/** Something the rendered output can be copied into. Never throws. */
export interface Clipboard {
  write(text: string): Promise<CopyOutcome>;
}

export interface CopyCommand {
  command: string;
  args: string[];
}

/**
 * Copy tools to try, in order, for a platform.
 *
 * On Linux `wl-copy` comes first only under a Wayland session.
 */
export function copyCommands(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv = process.env,
): CopyCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ command: 'pbcopy', args: [] }];
    case 'win32':
      return [{ command: 'clip', args: [] }];
    default: {
      const x11: CopyCommand[] = [
        { command: 'xclip', args: ['-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--input'] },
      ];
      return env.WAYLAND_DISPLAY ? [{ command: 'wl-copy', args: [] }, ...x11] : x11;
    }
  }
}

function pipeTo(cmd: CopyCommand, text: string): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const child = spawn(cmd.command, cmd.args, {
      stdio: ['pipe', 'ignore', 'pipe'],
    });

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        reject(new Error(`${cmd.command} not found in PATH`));
        return;
      }
      reject(err);
    });

    // xclip and wl-copy leave a forked child serving the selection, and it
    // inherits stderr, so success is settled on 'exit' rather than 'close'.
    child.on('exit', (code, signal) => {
      if (code === 0) {
        child.stderr.destroy();
        resolve();
        return;
      }
      const fail = () => {
        const detail = stderr.trim();
        const status = signal === null ? `exited with code ${code}` : `was killed by ${signal}`;
        reject(new Error(`${cmd.command} ${status}${detail === '' ? '' : `: ${detail}`}`));
      };
      if (child.stderr.closed) {
        fail();
      } else {
        child.stderr.once('close', fail);
      }
    });

    // The tool may exit before reading stdin; its exit status is reported above.
    child.stdin.on('error', () => undefined);
    child.stdin.setDefaultEncoding('utf8');
    child.stdin.write(text);
    child.stdin.end();
  });
}

/** System clipboard reached through the platform's copy command. */
export class SystemClipboard implements Clipboard {
  private readonly commands: CopyCommand[];

  constructor(commands: CopyCommand[] = copyCommands(process.platform)) {
    this.commands = commands;
  }

  async write(text: string): Promise<CopyOutcome> {
    if (this.commands.length === 0) {
      return { type: 'failed', reason: 'no clipboard command available' };
    }

    let reason = '';
    for (const cmd of this.commands) {
      try {
        await pipeTo(cmd, text);
        return { type: 'copied', tool: cmd.command };
      } catch (err) {
        reason = err instanceof Error ? err.message : String(err);
      }
    }
    return { type: 'failed', reason };
  }
}
