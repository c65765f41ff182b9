/**
 * Subprocess runner for the external ssh tooling
 *
 * Never rejects on a non-zero exit: callers get the exit code and both
 * output streams and decide what a failure means for them.
 */

import { spawn } from 'node:child_process';

export interface RunOptions {
  /** Written to stdin, which is then closed. Stdin is always closed. */
  input?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  /** Output beyond this many characters per stream is dropped */
  maxBuffer?: number;
  /**
   * Starts the process in a new session, so it has no controlling terminal
   * and cannot prompt on /dev/tty. Ignored on Windows.
   */
  detached?: boolean;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the process did not run to a normal exit */
  failure?: 'not-found' | 'timeout' | 'spawn-error';
}

export type CommandRunner = (cmd: string, args: string[], options?: RunOptions) => Promise<CommandResult>;

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_BUFFER = 1024 * 1024;

export function runCommand(cmd: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
  const maxBuffer = options.maxBuffer ?? DEFAULT_MAX_BUFFER;

  return new Promise((resolve) => {
    const proc = spawn(cmd, args, {
      env: options.env ?? process.env,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      detached: options.detached === true && process.platform !== 'win32',
      stdio: ['pipe', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');
    proc.stdout?.on('data', (chunk: string) => {
      if (stdout.length < maxBuffer) stdout += chunk.slice(0, maxBuffer - stdout.length);
    });
    proc.stderr?.on('data', (chunk: string) => {
      if (stderr.length < maxBuffer) stderr += chunk.slice(0, maxBuffer - stderr.length);
    });

    proc.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        finish({ exitCode: null, stdout, stderr: stderr || `${cmd}: command not found`, failure: 'not-found' });
      } else {
        finish({ exitCode: null, stdout, stderr: stderr || err.message, failure: 'spawn-error' });
      }
    });

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== null) {
        finish({ exitCode: code, stdout, stderr });
      } else if (proc.killed) {
        finish({ exitCode: null, stdout, stderr: stderr || `${cmd}: timed out`, failure: 'timeout' });
      } else {
        finish({ exitCode: null, stdout, stderr: stderr || `${cmd}: terminated by ${signal ?? 'signal'}`, failure: 'spawn-error' });
      }
    });

    // EPIPE when the process exits before reading stdin; close reports the outcome
    proc.stdin?.on('error', () => undefined);
    if (options.input != null) {
      proc.stdin?.write(options.input);
    }
    proc.stdin?.end();
  });
}

/**
 * Renders a command line for the log, masking the values that follow
 * any of the given flags.
 */
export function formatCommand(cmd: string, args: string[], secretFlags: string[] = []): string {
  const parts = [cmd];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (secretFlags.includes(args[i - 1] ?? '')) {
      parts.push('[REDACTED]');
    } else {
      parts.push(/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`);
    }
  }
  return parts.join(' ');
}
