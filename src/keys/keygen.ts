/**
 * Key generation through ssh-keygen
 */

import { formatCommand, runCommand, type CommandRunner } from '../utils/exec.js';
import type { KeyType } from '../types.js';

export interface GenerateKeyRequest {
  keyType: KeyType;
  /** Omitted for fixed-size types */
  bits?: number;
  /** Private key destination; the public key lands next to it with .pub */
  destination: string;
  comment: string;
  /** Empty string for an unprotected key */
  passphrase: string;
}

export interface GenerateKeyResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Command line with the passphrase masked */
  command: string;
}

export interface KeyGenerator {
  generate(request: GenerateKeyRequest): Promise<GenerateKeyResult>;
}

export interface SshKeygenGeneratorOptions {
  sshKeygenPath?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export function buildKeygenArgs(request: GenerateKeyRequest): string[] {
  const args = ['-q', '-t', request.keyType];
  if (request.bits !== undefined) {
    args.push('-b', String(request.bits));
  }
  args.push('-f', request.destination, '-N', request.passphrase, '-C', request.comment);
  return args;
}

export class SshKeygenGenerator implements KeyGenerator {
  private sshKeygen: string;
  private timeoutMs?: number;
  private run: CommandRunner;

  constructor(options: SshKeygenGeneratorOptions = {}) {
    this.sshKeygen = options.sshKeygenPath ?? 'ssh-keygen';
    this.timeoutMs = options.timeoutMs;
    this.run = options.runner ?? runCommand;
  }

  async generate(request: GenerateKeyRequest): Promise<GenerateKeyResult> {
    const args = buildKeygenArgs(request);
    const command = formatCommand(this.sshKeygen, args, ['-N']);
    // stdin is closed, so an overwrite prompt answers "no" instead of hanging
    const result = await this.run(this.sshKeygen, args, { timeoutMs: this.timeoutMs });
    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      command
    };
  }
}
