/**
 * sshdeck - SSH key and agent management with a command log
 */

export * from './types.js';
export { SshDeckError, ConfigError, errorMessage } from './errors.js';

export { KeyStore, createKeyStore, type KeyStoreOptions } from './keys/store.js';
export {
  parsePublicBlob,
  parsePublicKeyLine,
  parsePrivateKey,
  formatPublicKeyLine,
  publicBlobFromKeyObject,
  type PublicKeyInfo,
  type PublicKeyLine,
  type PrivateKeyInfo
} from './keys/openssh.js';
export {
  SshKeygenGenerator,
  buildKeygenArgs,
  type KeyGenerator,
  type GenerateKeyRequest,
  type GenerateKeyResult
} from './keys/keygen.js';
export { moveKeyToTrash, trashTargets } from './keys/trash.js';

export {
  SshAddAgentBridge,
  MemoryAgentBridge,
  createAgentBridge,
  parseIdentityList,
  type AgentBridge,
  type AgentListResult,
  type AgentResult,
  type AgentAddOptions
} from './agent/bridge.js';

export { CommandLog, createCommandLog, type CommandLogOptions } from './audit/command-log.js';

export { SystemClipboard, MemoryClipboard, type Clipboard } from './clipboard/index.js';

export {
  KeyOrchestrator,
  createKeyOrchestrator,
  checkKeyName,
  checkKeyBits,
  type KeyOrchestratorOptions,
  type CreateKeyParams,
  type KeyPart,
  type ViewOptions,
  type KeyContent,
  type DeletedKey,
  type AgentChange,
  type CopiedKey,
  type PassphraseProvider
} from './orchestrator/orchestrator.js';
export { IntentQueue } from './orchestrator/queue.js';

export { computeFingerprint } from './utils/hash.js';
export { runCommand, formatCommand, type CommandRunner, type CommandResult, type RunOptions } from './utils/exec.js';
export {
  loadConfig,
  mergeConfig,
  applyEnvOverrides,
  getDefaultConfig,
  getConfigDir,
  getConfigPath,
  expandPath,
  saveConfig,
  ensureConfigDir,
  ensureKeyDirectories
} from './utils/config.js';
