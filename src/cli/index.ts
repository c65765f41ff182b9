#!/usr/bin/env node

/**
 * sshdeck CLI - manage SSH keys and the ssh-agent from the terminal
 */

import { Command } from 'commander';
import { stringify as yamlStringify } from 'yaml';
import { ConfigError } from '../errors.js';
import { loadConfig, getConfigPath } from '../utils/config.js';
import { formatAgentStatus, formatKeyTable, formatLogEntry } from './format.js';
import {
  InteractiveSession,
  createTerminalPrompter,
  openSession,
  passphraseProviderFor,
  type Session
} from './session.js';
import type { LogEntry } from '../types.js';

interface CreateOptions {
  type?: string;
  bits?: string;
  comment?: string;
  passphrasePrompt?: boolean;
}

interface LogOptions {
  lines: string;
  action?: string;
  failures?: boolean;
}

const prompter = createTerminalPrompter();

function startSession(): Session {
  try {
    const config = loadConfig();
    return openSession(config, {
      passphraseProvider: process.stdin.isTTY ? passphraseProviderFor(prompter) : undefined
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Runs a one-shot command and sets the exit code from its outcome.
 */
async function oneShot(run: (ui: InteractiveSession, session: Session) => Promise<boolean>): Promise<void> {
  const session = startSession();
  const ui = new InteractiveSession(session, prompter);
  try {
    const ok = await run(ui, session);
    if (!ok) {
      process.exitCode = 1;
    }
  } finally {
    await session.orchestrator.close();
  }
}

const program = new Command();

program
  .name('sshdeck')
  .description('Manage SSH keys on disk and in the ssh-agent, with a log of every command run')
  .version('0.1.0');

program
  .command('list')
  .description('List keys in the key directory and whether the agent holds them')
  .action(async () => {
    await oneShot(async (ui, session) => {
      const refreshed = await session.orchestrator.refresh();
      if (!refreshed.ok) {
        ui.report(refreshed);
        return false;
      }
      const snapshot = await session.orchestrator.snapshot(0);
      console.log(formatKeyTable(snapshot.keys, session.config.keys.directory));
      console.log(formatAgentStatus(snapshot.agent));
      for (const warning of refreshed.warnings) {
        console.warn(`Warning: ${warning}`);
      }
      return true;
    });
  });

program
  .command('create <name>')
  .description('Generate a key pair with ssh-keygen')
  .option('-t, --type <type>', 'Key type: rsa, ed25519, ecdsa or dsa')
  .option('-b, --bits <bits>', 'Key size in bits')
  .option('-C, --comment <comment>', 'Key comment', '')
  .option('--passphrase-prompt', 'Ask for a passphrase to protect the key')
  .action(async (name: string, options: CreateOptions) => {
    await oneShot(async (ui, session) => {
      let passphrase = '';
      if (options.passphrasePrompt) {
        const first = await prompter.askSecret('Passphrase: ');
        const second = first ? await prompter.askSecret('Repeat passphrase: ') : first;
        if (first === null || first !== second) {
          console.error('Passphrases do not match; nothing created.');
          return false;
        }
        passphrase = first;
      }
      const result = await session.orchestrator.create({
        name,
        type: options.type,
        bits: options.bits !== undefined ? Number(options.bits) : undefined,
        comment: options.comment,
        passphrase
      });
      ui.report(result);
      return result.ok;
    });
  });

program
  .command('delete <key>')
  .description('Move a key pair to the trash, removing it from the agent first')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(async (key: string, options: { yes?: boolean }) => {
    await oneShot(async (ui, session) => {
      if (!options.yes) {
        const answer = await prompter.ask(`Delete ${key}? It will be recoverable from ${session.config.keys.trashDir} [y/N]: `);
        if (answer === null || !/^y(es)?$/i.test(answer)) {
          console.log('Cancelled.');
          return true;
        }
      }
      const result = await session.orchestrator.delete(key);
      ui.report(result);
      return result.ok;
    });
  });

program
  .command('add <key>')
  .description('Add a key to the ssh-agent')
  .action(async (key: string) => {
    await oneShot(async (ui, session) => {
      const result = await session.orchestrator.agentAdd(key);
      ui.report(result);
      return result.ok;
    });
  });

program
  .command('remove <key>')
  .description('Remove a key from the ssh-agent')
  .action(async (key: string) => {
    await oneShot(async (ui, session) => {
      const result = await session.orchestrator.agentRemove(key);
      ui.report(result);
      return result.ok;
    });
  });

program
  .command('view <key>')
  .description('Print a public key, or the private key with --private')
  .option('--private', 'Print the private key')
  .action(async (key: string, options: { private?: boolean }) => {
    await oneShot(async (ui, session) => {
      const result = await session.orchestrator.view(key, { part: options.private ? 'private' : 'public' });
      if (result.ok) {
        process.stdout.write(result.value.content);
      } else {
        ui.report(result);
      }
      return result.ok;
    });
  });

program
  .command('copy <key>')
  .description('Copy a public key to the clipboard')
  .action(async (key: string) => {
    await oneShot(async (ui, session) => {
      const result = await session.orchestrator.copy(key);
      ui.report(result);
      if (result.ok && !result.value.copied) {
        console.log(result.value.content);
      }
      return result.ok;
    });
  });

program
  .command('log')
  .description('Show the command log (persisted entries when log.persist is on)')
  .option('-n, --lines <count>', 'Number of entries', '20')
  .option('--action <action>', 'Only entries for this action')
  .option('--failures', 'Only failed commands')
  .action(async (options: LogOptions) => {
    await oneShot(async (_ui, session) => {
      const predicate = (entry: LogEntry) =>
        (!options.action || entry.action === options.action) &&
        (!options.failures || entry.outcome.status === 'failure');
      const matching = [...session.log.find(predicate)];
      const count = parseInt(options.lines, 10);
      const shown = Number.isNaN(count) ? matching : count > 0 ? matching.slice(-count) : [];

      if (shown.length === 0) {
        console.log(session.log.persistent
          ? 'No matching log entries.'
          : 'No log entries. The log is kept in memory only; set log.persist: true to keep it between runs.');
      }
      for (const entry of shown) {
        console.log(formatLogEntry(entry));
      }
      for (const warning of session.log.drainWarnings()) {
        console.warn(`Warning: ${warning}`);
      }
      return true;
    });
  });

program
  .command('config')
  .description('Print the effective configuration')
  .action(() => {
    try {
      const config = loadConfig();
      console.log(`# ${getConfigPath()}`);
      console.log(yamlStringify(config));
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(error.message);
        process.exit(1);
      }
      throw error;
    }
  });

program
  .command('interactive')
  .description('Start the interactive session')
  .action(async () => {
    await runInteractive();
  });

program.action(async () => {
  if (process.stdin.isTTY) {
    await runInteractive();
  } else {
    program.help();
  }
});

async function runInteractive(): Promise<void> {
  const session = startSession();
  await new InteractiveSession(session, prompter).run();
}

await program.parseAsync(process.argv);
