/**
 * Agent bridge: lists and changes the identities held by the running
 * ssh-agent, through ssh-add.
 *
 * The agent is owned by the user's session, not by us. Every call asks it
 * again; nothing is cached between calls.
 */

import { formatCommand, runCommand, type CommandResult, type CommandRunner } from '../utils/exec.js';
import type { AgentIdentity } from '../types.js';

export type AgentListResult =
  | { reachable: true; identities: AgentIdentity[]; rawOutput: string }
  | { reachable: false; message: string; rawOutput: string };

export type AgentFailureReason =
  | 'AgentUnreachable'
  | 'PassphraseRequired'
  | 'BadPassphrase'
  | 'NotLoaded'
  | 'AgentFailed';

export type AgentResult =
  | { ok: true; changed: boolean; message: string; rawOutput: string; command?: string }
  | { ok: false; reason: AgentFailureReason; message: string; rawOutput: string; command?: string };

export interface AgentAddOptions {
  /** When already in the agent, add() is a no-op */
  fingerprint?: string;
  passphrase?: string;
}

export interface AgentBridge {
  listIdentities(): Promise<AgentListResult>;
  add(privateKeyPath: string, options?: AgentAddOptions): Promise<AgentResult>;
  remove(fingerprint: string, keyPath: string): Promise<AgentResult>;
}

export interface SshAddAgentBridgeOptions {
  /** Agent socket; without one the agent is unreachable */
  socketPath?: string;
  timeoutMs?: number;
  sshAddPath?: string;
  runner?: CommandRunner;
}

// "256 SHA256:abc user@host (ED25519)"
const IDENTITY_LINE = /^(\d+)\s+(\S+)\s+(.*?)\s*\(([^)]+)\)$/;
const UNREACHABLE_OUTPUT = /could not open a connection|error connecting to agent|connection refused|communication with agent failed/i;

export function parseIdentityList(stdout: string): AgentIdentity[] {
  const identities: AgentIdentity[] = [];
  for (const line of stdout.split('\n')) {
    const match = IDENTITY_LINE.exec(line.trim());
    if (!match) continue;
    identities.push({
      fingerprint: match[2],
      comment: match[3] === 'no comment' ? '' : match[3],
      bitLength: parseInt(match[1], 10),
      typeLabel: match[4]
    });
  }
  return identities;
}

function combinedOutput(result: CommandResult): string {
  return [result.stdout, result.stderr].map(s => s.trim()).filter(Boolean).join('\n');
}

export class SshAddAgentBridge implements AgentBridge {
  private socketPath?: string;
  private timeoutMs?: number;
  private sshAdd: string;
  private run: CommandRunner;

  constructor(options: SshAddAgentBridgeOptions = {}) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs;
    this.sshAdd = options.sshAddPath ?? 'ssh-add';
    this.run = options.runner ?? runCommand;
  }

  private env(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env, SSH_ASKPASS_REQUIRE: 'never' };
    delete env['SSH_ASKPASS'];
    delete env['DISPLAY'];
    delete env['WAYLAND_DISPLAY'];
    if (this.socketPath) {
      env['SSH_AUTH_SOCK'] = this.socketPath;
    }
    return env;
  }

  // Without a controlling terminal ssh-add reads the passphrase from stdin
  // instead of prompting on /dev/tty
  private exec(args: string[], input?: string): Promise<CommandResult> {
    return this.run(this.sshAdd, args, { env: this.env(), timeoutMs: this.timeoutMs, input, detached: true });
  }

  async listIdentities(): Promise<AgentListResult> {
    if (!this.socketPath) {
      return { reachable: false, message: 'No agent socket: SSH_AUTH_SOCK is not set', rawOutput: '' };
    }

    const result = await this.exec(['-l', '-E', 'sha256']);
    const rawOutput = combinedOutput(result);

    if (result.failure) {
      return { reachable: false, message: result.stderr.trim(), rawOutput };
    }
    if (result.exitCode === 0) {
      return { reachable: true, identities: parseIdentityList(result.stdout), rawOutput };
    }
    // Exit 1 is also used for an empty agent
    if (result.exitCode === 1 && /has no identities/i.test(rawOutput)) {
      return { reachable: true, identities: [], rawOutput };
    }
    return {
      reachable: false,
      message: rawOutput || `ssh-add exited with code ${result.exitCode}`,
      rawOutput
    };
  }

  async add(privateKeyPath: string, options: AgentAddOptions = {}): Promise<AgentResult> {
    const listed = await this.listIdentities();
    if (!listed.reachable) {
      return { ok: false, reason: 'AgentUnreachable', message: listed.message, rawOutput: listed.rawOutput };
    }
    if (options.fingerprint && listed.identities.some(id => id.fingerprint === options.fingerprint)) {
      return { ok: true, changed: false, message: 'Key is already loaded in the agent', rawOutput: '' };
    }

    const args = [privateKeyPath];
    const command = formatCommand(this.sshAdd, args);
    const input = options.passphrase !== undefined ? `${options.passphrase}\n` : undefined;
    const result = await this.exec(args, input);
    const rawOutput = combinedOutput(result);

    if (result.exitCode === 0) {
      return { ok: true, changed: true, message: 'Key added to the agent', rawOutput, command };
    }
    if (UNREACHABLE_OUTPUT.test(rawOutput) || result.failure === 'not-found') {
      return { ok: false, reason: 'AgentUnreachable', message: rawOutput, rawOutput, command };
    }
    if (/passphrase/i.test(rawOutput) || result.failure === 'timeout') {
      return options.passphrase !== undefined
        ? { ok: false, reason: 'BadPassphrase', message: 'Bad passphrase', rawOutput, command }
        : { ok: false, reason: 'PassphraseRequired', message: 'Key is protected by a passphrase', rawOutput, command };
    }
    return {
      ok: false,
      reason: 'AgentFailed',
      message: rawOutput || `ssh-add exited with code ${result.exitCode}`,
      rawOutput,
      command
    };
  }

  async remove(fingerprint: string, keyPath: string): Promise<AgentResult> {
    const listed = await this.listIdentities();
    if (!listed.reachable) {
      return { ok: false, reason: 'AgentUnreachable', message: listed.message, rawOutput: listed.rawOutput };
    }
    if (!listed.identities.some(id => id.fingerprint === fingerprint)) {
      return { ok: false, reason: 'NotLoaded', message: 'Key is not loaded in the agent', rawOutput: '' };
    }

    const args = ['-d', keyPath];
    const command = formatCommand(this.sshAdd, args);
    const result = await this.exec(args);
    const rawOutput = combinedOutput(result);

    if (result.exitCode === 0) {
      return { ok: true, changed: true, message: 'Key removed from the agent', rawOutput, command };
    }
    if (UNREACHABLE_OUTPUT.test(rawOutput) || result.failure === 'not-found') {
      return { ok: false, reason: 'AgentUnreachable', message: rawOutput, rawOutput, command };
    }
    return {
      ok: false,
      reason: 'AgentFailed',
      message: rawOutput || `ssh-add exited with code ${result.exitCode}`,
      rawOutput,
      command
    };
  }
}

export interface MemoryAgentBridgeOptions {
  /** Resolves a key path to its fingerprint when add() is not given one */
  fingerprintOf?: (keyPath: string) => string | undefined;
}

/**
 * In-memory agent for testing
 */
export class MemoryAgentBridge implements AgentBridge {
  reachable = true;
  private identities = new Map<string, AgentIdentity>();
  private passphrases = new Map<string, string>();
  private fingerprintOf: (keyPath: string) => string | undefined;

  constructor(options: MemoryAgentBridgeOptions = {}) {
    this.fingerprintOf = options.fingerprintOf ?? (() => undefined);
  }

  /** Makes add() require this passphrase for the key */
  protect(keyPath: string, passphrase: string): void {
    this.passphrases.set(keyPath, passphrase);
  }

  /** Loads an identity as another process would */
  load(identity: AgentIdentity): void {
    this.identities.set(identity.fingerprint, identity);
  }

  loaded(): AgentIdentity[] {
    return [...this.identities.values()];
  }

  async listIdentities(): Promise<AgentListResult> {
    if (!this.reachable) {
      return { reachable: false, message: 'Could not open a connection to your authentication agent.', rawOutput: '' };
    }
    return { reachable: true, identities: this.loaded(), rawOutput: '' };
  }

  async add(privateKeyPath: string, options: AgentAddOptions = {}): Promise<AgentResult> {
    if (!this.reachable) {
      return { ok: false, reason: 'AgentUnreachable', message: 'Could not open a connection to your authentication agent.', rawOutput: '' };
    }
    const fingerprint = options.fingerprint ?? this.fingerprintOf(privateKeyPath);
    if (!fingerprint) {
      return { ok: false, reason: 'AgentFailed', message: `Error loading key "${privateKeyPath}"`, rawOutput: '' };
    }
    if (this.identities.has(fingerprint)) {
      return { ok: true, changed: false, message: 'Key is already loaded in the agent', rawOutput: '' };
    }

    const required = this.passphrases.get(privateKeyPath);
    if (required !== undefined && options.passphrase !== required) {
      return options.passphrase === undefined
        ? { ok: false, reason: 'PassphraseRequired', message: 'Key is protected by a passphrase', rawOutput: '' }
        : { ok: false, reason: 'BadPassphrase', message: 'Bad passphrase', rawOutput: '' };
    }

    this.identities.set(fingerprint, { fingerprint, comment: privateKeyPath });
    return { ok: true, changed: true, message: 'Key added to the agent', rawOutput: `Identity added: ${privateKeyPath}` };
  }

  async remove(fingerprint: string, keyPath: string): Promise<AgentResult> {
    if (!this.reachable) {
      return { ok: false, reason: 'AgentUnreachable', message: 'Could not open a connection to your authentication agent.', rawOutput: '' };
    }
    if (!this.identities.delete(fingerprint)) {
      return { ok: false, reason: 'NotLoaded', message: 'Key is not loaded in the agent', rawOutput: '' };
    }
    return { ok: true, changed: true, message: 'Key removed from the agent', rawOutput: `Identity removed: ${keyPath}` };
  }

  clear(): void {
    this.identities.clear();
  }
}

export function createAgentBridge(options: SshAddAgentBridgeOptions): AgentBridge {
  return new SshAddAgentBridge(options);
}
