/**
 * Clipboard access through the platform's copy commands
 */

import { runCommand, type CommandRunner } from '../utils/exec.js';

export interface Clipboard {
  /** Rejects when no clipboard command accepted the text */
  write(text: string): Promise<void>;
}

interface CopyCommand {
  cmd: string;
  args: string[];
}

export function clipboardCommands(platform: NodeJS.Platform = process.platform): CopyCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ cmd: 'pbcopy', args: [] }];
    case 'win32':
      return [{ cmd: 'clip', args: [] }];
    default:
      return [
        { cmd: 'wl-copy', args: [] },
        { cmd: 'xclip', args: ['-selection', 'clipboard'] },
        { cmd: 'xsel', args: ['--clipboard', '--input'] }
      ];
  }
}

export class SystemClipboard implements Clipboard {
  private commands: CopyCommand[];
  private run: CommandRunner;

  constructor(options: { platform?: NodeJS.Platform; runner?: CommandRunner } = {}) {
    this.commands = clipboardCommands(options.platform);
    this.run = options.runner ?? runCommand;
  }

  async write(text: string): Promise<void> {
    const errors: string[] = [];
    for (const { cmd, args } of this.commands) {
      const result = await this.run(cmd, args, { input: text, timeoutMs: 5000 });
      if (result.exitCode === 0) {
        return;
      }
      errors.push(`${cmd}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`);
    }
    throw new Error(`No clipboard command succeeded (${errors.join('; ')})`);
  }
}

/**
 * In-memory clipboard for testing
 */
export class MemoryClipboard implements Clipboard {
  content: string | null = null;
  failWith: string | null = null;

  async write(text: string): Promise<void> {
    if (this.failWith) {
      throw new Error(this.failWith);
    }
    this.content = text;
  }
}
