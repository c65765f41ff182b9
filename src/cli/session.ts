/**
 * Wiring of the core components from configuration, terminal prompts and
 * the interactive key-binding loop.
 */

import * as readline from 'node:readline';
import { createAgentBridge } from '../agent/bridge.js';
import { createCommandLog, type CommandLog } from '../audit/command-log.js';
import { SystemClipboard } from '../clipboard/index.js';
import { SshKeygenGenerator } from '../keys/keygen.js';
import { createKeyStore } from '../keys/store.js';
import { createKeyOrchestrator, type KeyOrchestrator, type PassphraseProvider } from '../orchestrator/orchestrator.js';
import { ensureKeyDirectories } from '../utils/config.js';
import { formatAgentStatus, formatKeyTable, formatLogEntry, resultMessage } from './format.js';
import type { ActionResult, SshDeckConfig } from '../types.js';

export interface Session {
  orchestrator: KeyOrchestrator;
  log: CommandLog;
  config: SshDeckConfig;
}

export interface OpenSessionOptions {
  passphraseProvider?: PassphraseProvider;
}

/**
 * Creates the key and trash directories and wires the components.
 * Throws ConfigError when a directory cannot be created.
 */
export function openSession(config: SshDeckConfig, options: OpenSessionOptions = {}): Session {
  ensureKeyDirectories(config);

  const log = createCommandLog({
    maxEntries: config.log.maxEntries,
    rawOutputLimit: config.log.rawOutputLimit,
    persistPath: config.log.persist ? config.log.path : undefined
  });
  log.initialize();

  const orchestrator = createKeyOrchestrator({
    store: createKeyStore({ directory: config.keys.directory, ignore: config.keys.ignore }),
    agent: createAgentBridge({ socketPath: config.agent.socketPath, timeoutMs: config.exec.timeoutMs }),
    log,
    generator: new SshKeygenGenerator({ timeoutMs: config.exec.timeoutMs }),
    clipboard: new SystemClipboard(),
    trashDir: config.keys.trashDir,
    passphraseProvider: options.passphraseProvider,
    maxPending: config.queue.maxPending,
    defaults: config.defaults
  });

  return { orchestrator, log, config };
}

export interface Prompter {
  /** Resolves null at end of input */
  ask(question: string): Promise<string | null>;
  /** Like ask, without echoing what is typed */
  askSecret(question: string): Promise<string | null>;
}

export type SessionConsole = Pick<Console, 'log' | 'warn' | 'error'>;

function ask(question: string): Promise<string | null> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve(null);
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

function askSecret(question: string): Promise<string | null> {
  const stdin = process.stdin;
  if (!stdin.isTTY) {
    return ask(question);
  }

  return new Promise((resolve) => {
    process.stdout.write(question);
    stdin.setRawMode(true);
    stdin.resume();
    let input = '';

    const finish = (value: string | null) => {
      stdin.setRawMode(false);
      stdin.removeListener('data', onData);
      stdin.pause();
      process.stdout.write('\n');
      resolve(value);
    };

    const onData = (data: Buffer) => {
      for (const char of data.toString('utf-8')) {
        if (char === '\n' || char === '\r') {
          finish(input);
          return;
        } else if (char === '\x7f' || char === '\b') {
          input = input.slice(0, -1);
        } else if (char === '\x03' || char === '\x04') {
          // Ctrl+C / Ctrl+D cancel the prompt
          finish(null);
          return;
        } else {
          input += char;
        }
      }
    };
    stdin.on('data', onData);
  });
}

export function createTerminalPrompter(): Prompter {
  return { ask, askSecret };
}

export function passphraseProviderFor(prompter: Prompter): PassphraseProvider {
  return async (keyPath) => {
    const answer = await prompter.askSecret(`Passphrase for ${keyPath}: `);
    return answer ?? undefined;
  };
}

export const INTERACTIVE_HELP = [
  'n [name]        create a key',
  'd <key>         delete a key (moved to trash)',
  'a <key>         add a key to the agent',
  'r <key>         remove a key from the agent',
  'c <key>         copy a public key to the clipboard',
  'v <key> [private]  view a key',
  'l               list keys and the agent',
  'h               recent command log',
  '?               this help',
  'q               quit'
].join('\n');

export interface InteractiveSessionOptions {
  /** Log entries shown by the history command */
  logCount?: number;
}

export class InteractiveSession {
  private logCount: number;

  constructor(
    private session: Session,
    private prompter: Prompter,
    private out: SessionConsole = console,
    options: InteractiveSessionOptions = {}
  ) {
    this.logCount = options.logCount ?? 10;
  }

  async run(): Promise<void> {
    await this.showKeys(true);
    this.out.log('\nType ? for help.');
    for (;;) {
      const line = await this.prompter.ask('sshdeck> ');
      if (line === null || !(await this.handle(line))) {
        break;
      }
    }
    await this.session.orchestrator.close();
  }

  /**
   * Runs one command line. Returns false when the session should end.
   */
  async handle(line: string): Promise<boolean> {
    const [command = '', ...rest] = line.trim().split(/\s+/);
    const arg = rest.join(' ');

    switch (command) {
      case '':
        return true;
      case 'q':
      case 'quit':
        return false;
      case '?':
      case 'help':
        this.out.log(INTERACTIVE_HELP);
        return true;
      case 'l':
        await this.showKeys(true);
        return true;
      case 'h':
        this.showLog();
        return true;
      case 'n':
        await this.createKey(arg);
        return true;
      case 'd':
        await this.deleteKey(arg);
        return true;
      case 'a':
        await this.withTarget(arg, target => this.session.orchestrator.agentAdd(target));
        return true;
      case 'r':
        await this.withTarget(arg, target => this.session.orchestrator.agentRemove(target));
        return true;
      case 'c':
        await this.copyKey(arg);
        return true;
      case 'v':
        await this.viewKey(rest);
        return true;
      default:
        this.out.error(`Unknown command "${command}" (? for help)`);
        return true;
    }
  }

  private async target(arg: string): Promise<string | null> {
    if (arg) return arg;
    const answer = await this.prompter.ask('Key: ');
    return answer ? answer : null;
  }

  private async withTarget<T>(arg: string, action: (target: string) => Promise<ActionResult<T>>): Promise<void> {
    const target = await this.target(arg);
    if (!target) return;
    this.report(await action(target));
  }

  private async showKeys(rescan: boolean): Promise<void> {
    if (rescan) {
      const refreshed = await this.session.orchestrator.refresh();
      if (!refreshed.ok) {
        this.report(refreshed);
      }
    }
    const snapshot = await this.session.orchestrator.snapshot(0);
    this.out.log(formatKeyTable(snapshot.keys, this.session.config.keys.directory));
    this.out.log(formatAgentStatus(snapshot.agent));
  }

  private showLog(): void {
    const entries = this.session.log.tail(this.logCount);
    if (entries.length === 0) {
      this.out.log('No commands run yet.');
      return;
    }
    for (const entry of entries) {
      this.out.log(formatLogEntry(entry));
    }
  }

  private async createKey(arg: string): Promise<void> {
    const name = arg || (await this.prompter.ask('Key name: '));
    if (!name) return;

    const defaults = this.session.config.defaults;
    const type = await this.prompter.ask(`Type (rsa, ed25519, ecdsa, dsa) [${defaults.keyType}]: `);
    if (type === null) return;
    const bits = await this.prompter.ask('Bits (blank for default): ');
    if (bits === null) return;
    const comment = await this.prompter.ask('Comment: ');
    if (comment === null) return;

    const passphrase = await this.prompter.askSecret('Passphrase (empty for none): ');
    if (passphrase === null) return;
    if (passphrase) {
      const repeated = await this.prompter.askSecret('Repeat passphrase: ');
      if (repeated !== passphrase) {
        this.out.error('Passphrases do not match; nothing created.');
        return;
      }
    }

    this.report(await this.session.orchestrator.create({
      name,
      type: type || undefined,
      bits: bits ? Number(bits) : undefined,
      comment,
      passphrase
    }));
  }

  private async deleteKey(arg: string): Promise<void> {
    const target = await this.target(arg);
    if (!target) return;
    const answer = await this.prompter.ask(`Delete ${target}? It will be recoverable from the trash [y/N]: `);
    if (answer === null || !/^y(es)?$/i.test(answer)) {
      this.out.log('Cancelled.');
      return;
    }
    this.report(await this.session.orchestrator.delete(target));
  }

  private async copyKey(arg: string): Promise<void> {
    const target = await this.target(arg);
    if (!target) return;
    const result = await this.session.orchestrator.copy(target);
    this.report(result);
    if (result.ok && !result.value.copied) {
      this.out.log(result.value.content);
    }
  }

  private async viewKey(args: string[]): Promise<void> {
    const part = args[args.length - 1] === 'private' ? 'private' : 'public';
    const target = await this.target(part === 'private' ? args.slice(0, -1).join(' ') : args.join(' '));
    if (!target) return;
    const result = await this.session.orchestrator.view(target, { part });
    if (result.ok) {
      this.out.log(result.value.content.trimEnd());
    }
    this.report(result);
  }

  report<T>(result: ActionResult<T>): void {
    if (result.ok) {
      this.out.log(resultMessage(result));
    } else if (result.reason === 'NotLoaded') {
      this.out.warn(`Warning: ${result.message}`);
    } else {
      this.out.error(`Error (${result.reason}): ${result.message}`);
    }
    for (const warning of result.warnings) {
      this.out.warn(`Warning: ${warning}`);
    }
  }
}
