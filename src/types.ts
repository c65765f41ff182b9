/**
 * Core types for sshdeck
 *
 * Shared by the key store, the agent bridge, the command log and the
 * orchestrator that ties them together.
 */

export type KeyType = 'rsa' | 'ed25519' | 'ecdsa' | 'dsa';

export const KEY_TYPES: readonly KeyType[] = ['rsa', 'ed25519', 'ecdsa', 'dsa'];

export interface KeyRecord {
  /** Absolute path of the private key */
  path: string;
  publicPath: string;
  name: string;
  keyType: KeyType;
  /** Only set for rsa and ecdsa keys */
  bitLength?: number;
  comment?: string;
  hasPublicKey: boolean;
  fingerprint?: string;
  loadedInAgent: boolean;
}

export interface AgentIdentity {
  fingerprint: string;
  comment: string;
  bitLength?: number;
  /** Type label as printed by the agent, e.g. ED25519 */
  typeLabel?: string;
}

export type LogAction = 'create' | 'delete' | 'agent-add' | 'agent-remove' | 'view' | 'copy';

export const LOG_ACTIONS: readonly LogAction[] = ['create', 'delete', 'agent-add', 'agent-remove', 'view', 'copy'];

export type FailureReason =
  | 'ScanError'
  | 'NotFound'
  | 'InvalidParameters'
  | 'AgentUnreachable'
  | 'PassphraseRequired'
  | 'BadPassphrase'
  | 'NotLoaded'
  | 'AgentFailed'
  | 'KeygenFailed'
  | 'DeleteError'
  | 'ReadError'
  | 'NoPublicKey'
  | 'Busy'
  | 'Cancelled'
  | 'Unexpected';

export const FAILURE_REASONS: readonly FailureReason[] = [
  'ScanError',
  'NotFound',
  'InvalidParameters',
  'AgentUnreachable',
  'PassphraseRequired',
  'BadPassphrase',
  'NotLoaded',
  'AgentFailed',
  'KeygenFailed',
  'DeleteError',
  'ReadError',
  'NoPublicKey',
  'Busy',
  'Cancelled',
  'Unexpected'
];

export type Outcome =
  | { status: 'success'; message: string }
  | { status: 'failure'; reason: FailureReason; message: string };

export interface StepOutcome {
  step: string;
  status: 'ok' | 'skipped' | 'failed';
  message: string;
}

export interface LogEntry {
  id: string;
  seq: number;
  timestamp: Date;
  action: LogAction;
  target: string;
  outcome: Outcome;
  rawOutput: string;
  command?: string;
  steps?: StepOutcome[];
  warnings?: string[];
}

export type LogEntryDraft = Omit<LogEntry, 'id' | 'seq' | 'timestamp'>;

export type ActionResult<T> =
  | { ok: true; value: T; entry: LogEntry | null; warnings: string[] }
  | { ok: false; reason: FailureReason; message: string; entry: LogEntry | null; warnings: string[] };

export type AgentStatus =
  | { status: 'ok'; identities: AgentIdentity[] }
  | { status: 'unknown'; message: string };

export interface SessionSnapshot {
  keys: readonly Readonly<KeyRecord>[];
  agent: AgentStatus;
  log: readonly LogEntry[];
}

export interface KeysConfig {
  directory: string;
  trashDir: string;
  ignore: string[];
}

export interface AgentConfig {
  socketPath?: string;
}

export interface LogConfig {
  persist: boolean;
  path: string;
  maxEntries: number;
  rawOutputLimit: number;
}

export interface QueueConfig {
  maxPending: number;
}

export interface ExecConfig {
  timeoutMs: number;
}

export interface DefaultsConfig {
  keyType: KeyType;
  rsaBits: number;
}

export interface SshDeckConfig {
  keys: KeysConfig;
  agent: AgentConfig;
  log: LogConfig;
  queue: QueueConfig;
  exec: ExecConfig;
  defaults: DefaultsConfig;
}
