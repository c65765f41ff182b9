/**
 * Key orchestrator
 *
 * Accepts intents from the session, runs them one at a time through the
 * intent queue and turns every outcome, including thrown errors, into an
 * ActionResult and a command log entry. Before each intent the key
 * directory is rescanned and the agent asked for its identities, since
 * both can change behind our back.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { SshDeckError, errorMessage } from '../errors.js';
import { moveKeyToTrash } from '../keys/trash.js';
import { IntentQueue } from './queue.js';
import type { AgentBridge, AgentResult } from '../agent/bridge.js';
import type { CommandLog } from '../audit/command-log.js';
import type { Clipboard } from '../clipboard/index.js';
import type { KeyGenerator } from '../keys/keygen.js';
import type { KeyStore } from '../keys/store.js';
import {
  KEY_TYPES,
  type ActionResult,
  type AgentStatus,
  type DefaultsConfig,
  type FailureReason,
  type KeyRecord,
  type KeyType,
  type LogAction,
  type LogEntry,
  type LogEntryDraft,
  type Outcome,
  type SessionSnapshot,
  type StepOutcome
} from '../types.js';

/** Asked for a passphrase after the agent reports one is needed */
export type PassphraseProvider = (keyPath: string) => Promise<string | undefined>;

export interface CreateKeyParams {
  name: string;
  /** Defaults to the configured key type */
  type?: string;
  bits?: number;
  comment?: string;
  passphrase?: string;
}

export type KeyPart = 'public' | 'private';

export interface ViewOptions {
  part?: KeyPart;
}

export interface KeyContent {
  record: KeyRecord;
  part: KeyPart;
  path: string;
  content: string;
}

export interface DeletedKey {
  record: KeyRecord;
  /** Where the files went in the trash */
  trashed: string[];
}

export interface AgentChange {
  record: KeyRecord;
  /** False when the agent already was in the requested state */
  changed: boolean;
}

export interface CopiedKey {
  record: KeyRecord;
  content: string;
  copied: boolean;
}

export interface KeyOrchestratorOptions {
  store: KeyStore;
  agent: AgentBridge;
  log: CommandLog;
  generator: KeyGenerator;
  clipboard: Clipboard;
  trashDir: string;
  passphraseProvider?: PassphraseProvider;
  maxPending?: number;
  defaults?: Partial<DefaultsConfig>;
}

interface EntryDetails {
  rawOutput?: string;
  command?: string;
  steps?: StepOutcome[];
  warnings?: string[];
}

type BitsCheck = { ok: true; bits?: number } | { ok: false; message: string };

const KEY_NAME = /^[A-Za-z0-9_][A-Za-z0-9._-]*$/;
const ECDSA_BITS = [256, 384, 521];
const RSA_MIN_BITS = 2048;
const RSA_MAX_BITS = 16384;
const DEFAULT_MAX_PENDING = 16;

function isKeyType(value: string): value is KeyType {
  return KEY_TYPES.some(type => type === value);
}

export function checkKeyName(name: string): string | null {
  if (!KEY_NAME.test(name)) {
    return `Invalid key name "${name}": use letters, digits, dot, dash and underscore, not starting with a dot or dash`;
  }
  if (name.endsWith('.pub')) {
    return `Invalid key name "${name}": must not end in .pub`;
  }
  return null;
}

/**
 * Resolves the bit length passed to ssh-keygen; undefined means no -b.
 */
export function checkKeyBits(keyType: KeyType, bits: number | undefined, rsaDefault: number): BitsCheck {
  if (bits !== undefined && !Number.isInteger(bits)) {
    return { ok: false, message: `Invalid bit length ${bits}` };
  }
  switch (keyType) {
    case 'rsa': {
      const value = bits ?? rsaDefault;
      if (value < RSA_MIN_BITS || value > RSA_MAX_BITS) {
        return { ok: false, message: `rsa keys take ${RSA_MIN_BITS} to ${RSA_MAX_BITS} bits, got ${value}` };
      }
      return { ok: true, bits: value };
    }
    case 'ecdsa': {
      const value = bits ?? 256;
      if (!ECDSA_BITS.includes(value)) {
        return { ok: false, message: `ecdsa keys take ${ECDSA_BITS.join(', ')} bits, got ${value}` };
      }
      return { ok: true, bits: value };
    }
    case 'ed25519':
      return bits === undefined || bits === 256
        ? { ok: true }
        : { ok: false, message: `ed25519 keys have a fixed size of 256 bits, got ${bits}` };
    case 'dsa':
      return bits === undefined || bits === 1024
        ? { ok: true }
        : { ok: false, message: `dsa keys have a fixed size of 1024 bits, got ${bits}` };
  }
}

function joinOutput(...parts: string[]): string {
  return parts.map(part => part.trim()).filter(Boolean).join('\n');
}

export class KeyOrchestrator {
  private store: KeyStore;
  private agent: AgentBridge;
  private log: CommandLog;
  private generator: KeyGenerator;
  private clipboard: Clipboard;
  private trashDir: string;
  private passphraseProvider?: PassphraseProvider;
  private defaults: DefaultsConfig;
  private queue: IntentQueue;
  private scanWarnings: string[] = [];

  constructor(options: KeyOrchestratorOptions) {
    this.store = options.store;
    this.agent = options.agent;
    this.log = options.log;
    this.generator = options.generator;
    this.clipboard = options.clipboard;
    this.trashDir = path.resolve(options.trashDir);
    this.passphraseProvider = options.passphraseProvider;
    this.defaults = {
      keyType: options.defaults?.keyType ?? 'ed25519',
      rsaBits: options.defaults?.rsaBits ?? 3072
    };
    this.queue = new IntentQueue(options.maxPending ?? DEFAULT_MAX_PENDING);
  }

  create(params: CreateKeyParams): Promise<ActionResult<KeyRecord>> {
    return this.submit('create', params.name, () => this.runCreate(params));
  }

  delete(target: string): Promise<ActionResult<DeletedKey>> {
    return this.submit('delete', target, () => this.runDelete(target));
  }

  agentAdd(target: string): Promise<ActionResult<AgentChange>> {
    return this.submit('agent-add', target, () => this.runAgentAdd(target));
  }

  agentRemove(target: string): Promise<ActionResult<AgentChange>> {
    return this.submit('agent-remove', target, () => this.runAgentRemove(target));
  }

  view(target: string, options: ViewOptions = {}): Promise<ActionResult<KeyContent>> {
    return this.submit('view', target, () => this.runView(target, options.part ?? 'public'));
  }

  copy(target: string): Promise<ActionResult<CopiedKey>> {
    return this.submit('copy', target, () => this.runCopy(target));
  }

  /** Rescans the key directory and the agent; not logged */
  refresh(): Promise<ActionResult<KeyRecord[]>> {
    return this.submit(null, '', async () => this.success(null, '', this.store.list(), 'Rescanned'));
  }

  /**
   * Read-only view for the session. Asks the agent again so loaded flags are
   * current, but does not rescan the directory. Loaded flags are set on the
   * returned copies; only queued intents change the store.
   */
  async snapshot(logCount: number = 10): Promise<SessionSnapshot> {
    const listed = await this.agent.listIdentities();
    const keys = this.store.list();
    let agent: AgentStatus;
    if (listed.reachable) {
      const loaded = new Set(listed.identities.map(identity => identity.fingerprint));
      for (const key of keys) {
        const fingerprint = this.store.fingerprint(key.path);
        key.fingerprint = fingerprint;
        key.loadedInAgent = fingerprint !== undefined && loaded.has(fingerprint);
      }
      agent = { status: 'ok', identities: listed.identities.map(identity => ({ ...identity })) };
    } else {
      agent = { status: 'unknown', message: listed.message };
    }
    return { keys, agent, log: this.log.tail(logCount) };
  }

  /** Intents waiting behind the running one */
  get pending(): number {
    return this.queue.length;
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  private submit<T>(
    action: LogAction | null,
    target: string,
    work: () => Promise<ActionResult<T>>
  ): Promise<ActionResult<T>> {
    const queued = this.queue.enqueue(() => this.execute(action, target, work), () => this.cancelled<T>());
    if (queued) {
      return queued;
    }
    if (this.queue.isClosed) {
      return Promise.resolve(this.cancelled<T>());
    }
    return Promise.resolve(this.busy<T>(action, target));
  }

  private async execute<T>(
    action: LogAction | null,
    target: string,
    work: () => Promise<ActionResult<T>>
  ): Promise<ActionResult<T>> {
    try {
      await this.reconcile();
      return await work();
    } catch (error) {
      const reason: FailureReason = error instanceof SshDeckError ? error.reason : 'Unexpected';
      return this.failure<T>(action, target, reason, errorMessage(error));
    }
  }

  private async reconcile(): Promise<void> {
    this.scanWarnings = [];
    this.store.refresh();
    this.scanWarnings = [...this.store.warnings];
    await this.syncAgent();
  }

  private async syncAgent(): Promise<void> {
    const listed = await this.agent.listIdentities();
    // Loaded flags keep their last known value while the agent is unreachable
    if (listed.reachable) {
      this.store.setAgentMembership(new Set(listed.identities.map(identity => identity.fingerprint)));
    }
  }

  private async runCreate(params: CreateKeyParams): Promise<ActionResult<KeyRecord>> {
    const { name } = params;
    const keyTypeName = params.type ?? this.defaults.keyType;

    const nameProblem = checkKeyName(name);
    if (nameProblem) {
      return this.failure('create', name, 'InvalidParameters', nameProblem);
    }
    if (!isKeyType(keyTypeName)) {
      return this.failure('create', name, 'InvalidParameters', `Unknown key type "${keyTypeName}" (expected ${KEY_TYPES.join(', ')})`);
    }
    const keyType = keyTypeName;
    const bits = checkKeyBits(keyType, params.bits, this.defaults.rsaBits);
    if (!bits.ok) {
      return this.failure('create', name, 'InvalidParameters', bits.message);
    }

    const destination = path.join(this.store.keyDirectory, name);
    const publicDestination = `${destination}.pub`;
    if (fs.existsSync(destination) || fs.existsSync(publicDestination)) {
      return this.failure('create', name, 'InvalidParameters', `A file named ${name} already exists in ${this.store.keyDirectory}`);
    }

    const generated = await this.generator.generate({
      keyType,
      bits: bits.bits,
      destination,
      comment: params.comment ?? '',
      passphrase: params.passphrase ?? ''
    });
    const rawOutput = joinOutput(generated.stdout, generated.stderr);

    if (generated.exitCode !== 0) {
      const warnings: string[] = [];
      for (const partial of [destination, publicDestination]) {
        try {
          fs.rmSync(partial, { force: true });
        } catch (error) {
          warnings.push(`Could not remove partial file ${partial}: ${errorMessage(error)}`);
        }
      }
      const message = generated.stderr.trim() || `ssh-keygen exited with code ${generated.exitCode ?? 'unknown'}`;
      return this.failure('create', name, 'KeygenFailed', message, { rawOutput, command: generated.command, warnings });
    }

    const record = this.store.inspectKeyFile(destination);
    this.store.insert(record);
    return this.success('create', name, record, `Created ${keyType} key ${name}`, {
      rawOutput,
      command: generated.command
    });
  }

  private async runDelete(target: string): Promise<ActionResult<DeletedKey>> {
    const record = this.store.resolve(target);
    if (!record) {
      return this.failure('delete', target, 'NotFound', `No key named ${target}`);
    }

    const steps: StepOutcome[] = [];
    let rawOutput = '';
    let command: string | undefined;

    const fingerprint = this.store.fingerprint(record.path);
    if (!record.loadedInAgent) {
      steps.push({ step: 'agent-remove', status: 'skipped', message: 'Key is not loaded in the agent' });
    } else if (!fingerprint) {
      steps.push({ step: 'agent-remove', status: 'skipped', message: 'Fingerprint unknown' });
    } else {
      const removed = await this.agent.remove(fingerprint, record.path);
      rawOutput = removed.rawOutput;
      command = removed.command;
      steps.push({ step: 'agent-remove', status: removed.ok ? 'ok' : 'failed', message: removed.message });
      if (removed.ok) {
        this.store.setLoaded(record.path, false);
      }
    }

    let trashed: string[];
    try {
      trashed = moveKeyToTrash(this.trashDir, record.path, record.hasPublicKey ? record.publicPath : null);
    } catch (error) {
      steps.push({ step: 'trash', status: 'failed', message: errorMessage(error) });
      return this.failure('delete', record.name, 'DeleteError', `Cannot move ${record.name} to the trash: ${errorMessage(error)}`, {
        rawOutput,
        command,
        steps
      });
    }
    steps.push({ step: 'trash', status: 'ok', message: `Moved to ${trashed.join(', ')}` });

    this.store.remove(record.path);
    return this.success(
      'delete',
      record.name,
      { record: { ...record, loadedInAgent: false }, trashed },
      `Deleted ${record.name} (recoverable from ${this.trashDir})`,
      { rawOutput, command, steps }
    );
  }

  private async runAgentAdd(target: string): Promise<ActionResult<AgentChange>> {
    const record = this.store.resolve(target);
    if (!record) {
      return this.failure('agent-add', target, 'NotFound', `No key named ${target}`);
    }

    const fingerprint = this.store.fingerprint(record.path);
    let result = await this.agent.add(record.path, { fingerprint });
    let rawOutput = result.rawOutput;

    if (!result.ok && result.reason === 'PassphraseRequired' && this.passphraseProvider) {
      const passphrase = await this.passphraseProvider(record.path);
      if (passphrase !== undefined) {
        result = await this.agent.add(record.path, { fingerprint, passphrase });
        rawOutput = joinOutput(rawOutput, result.rawOutput);
      }
    }

    return this.agentOutcome('agent-add', record, result, rawOutput, true);
  }

  private async runAgentRemove(target: string): Promise<ActionResult<AgentChange>> {
    const record = this.store.resolve(target);
    if (!record) {
      return this.failure('agent-remove', target, 'NotFound', `No key named ${target}`);
    }

    const fingerprint = this.store.fingerprint(record.path);
    if (!fingerprint) {
      return this.failure('agent-remove', record.name, 'NotLoaded', `Cannot match ${record.name} to an agent identity without its public key`);
    }
    const result = await this.agent.remove(fingerprint, record.path);
    return this.agentOutcome('agent-remove', record, result, result.rawOutput, false);
  }

  private agentOutcome(
    action: LogAction,
    record: KeyRecord,
    result: AgentResult,
    rawOutput: string,
    loaded: boolean
  ): ActionResult<AgentChange> {
    if (!result.ok) {
      return this.failure(action, record.name, result.reason, result.message, { rawOutput, command: result.command });
    }
    this.store.setLoaded(record.path, loaded);
    return this.success(
      action,
      record.name,
      { record: { ...record, loadedInAgent: loaded }, changed: result.changed },
      result.message,
      { rawOutput, command: result.command }
    );
  }

  private async runView(target: string, part: KeyPart): Promise<ActionResult<KeyContent>> {
    const record = this.store.resolve(target);
    if (!record) {
      return this.failure('view', target, 'NotFound', `No key named ${target}`);
    }

    const file = part === 'public' ? record.publicPath : record.path;
    let content: string;
    try {
      content = fs.readFileSync(file, 'utf-8');
    } catch (error) {
      return this.failure('view', record.name, 'ReadError', `Cannot read ${file}: ${errorMessage(error)}`);
    }
    // Key material stays out of the log
    return this.success('view', record.name, { record, part, path: file, content }, `Viewed ${part} key ${record.name}`);
  }

  private async runCopy(target: string): Promise<ActionResult<CopiedKey>> {
    const record = this.store.resolve(target);
    if (!record) {
      return this.failure('copy', target, 'NotFound', `No key named ${target}`);
    }
    if (!record.hasPublicKey) {
      return this.failure('copy', record.name, 'NoPublicKey', `${record.name} has no public key file`);
    }

    let content: string;
    try {
      content = fs.readFileSync(record.publicPath, 'utf-8').trim();
    } catch (error) {
      return this.failure('copy', record.name, 'ReadError', `Cannot read ${record.publicPath}: ${errorMessage(error)}`);
    }

    try {
      await this.clipboard.write(content);
    } catch (error) {
      const warning = `Clipboard unavailable: ${errorMessage(error)}`;
      return this.success('copy', record.name, { record, content, copied: false }, `Read public key ${record.name}`, {
        warnings: [warning]
      });
    }
    return this.success('copy', record.name, { record, content, copied: true }, `Copied public key ${record.name} to the clipboard`);
  }

  private record(action: LogAction | null, target: string, outcome: Outcome, details: EntryDetails): LogEntry | null {
    if (!action) {
      return null;
    }
    const draft: LogEntryDraft = { action, target, outcome, rawOutput: details.rawOutput ?? '' };
    if (details.command) draft.command = details.command;
    if (details.steps && details.steps.length > 0) draft.steps = details.steps;
    if (details.warnings && details.warnings.length > 0) draft.warnings = details.warnings;
    return this.log.append(draft);
  }

  private collectWarnings(details: EntryDetails): string[] {
    const warnings = [...this.scanWarnings, ...(details.warnings ?? []), ...this.log.drainWarnings()];
    this.scanWarnings = [];
    return warnings;
  }

  private success<T>(
    action: LogAction | null,
    target: string,
    value: T,
    message: string,
    details: EntryDetails = {}
  ): ActionResult<T> {
    const entry = this.record(action, target, { status: 'success', message }, details);
    return { ok: true, value, entry, warnings: this.collectWarnings(details) };
  }

  private failure<T>(
    action: LogAction | null,
    target: string,
    reason: FailureReason,
    message: string,
    details: EntryDetails = {}
  ): ActionResult<T> {
    const entry = this.record(action, target, { status: 'failure', reason, message }, details);
    return { ok: false, reason, message, entry, warnings: this.collectWarnings(details) };
  }

  private busy<T>(action: LogAction | null, target: string): ActionResult<T> {
    const message = `Too many pending actions (${this.queue.length} queued); try again shortly`;
    const entry = action ? this.log.append({ action, target, outcome: { status: 'failure', reason: 'Busy', message }, rawOutput: '' }) : null;
    return { ok: false, reason: 'Busy', message, entry, warnings: this.log.drainWarnings() };
  }

  private cancelled<T>(): ActionResult<T> {
    return { ok: false, reason: 'Cancelled', message: 'Session closed before the action ran', entry: null, warnings: [] };
  }
}

export function createKeyOrchestrator(options: KeyOrchestratorOptions): KeyOrchestrator {
  return new KeyOrchestrator(options);
}
