/**
 * Configuration loader and validator for sshdeck
 *
 * Sources, later ones winning:
 * - built-in defaults
 * - ~/.sshdeck/config.yaml
 * - environment variables
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ConfigError, errorMessage } from '../errors.js';
import { isConfigShape, validateConfigShape } from './config-schema.js';
import type { SshDeckConfig } from '../types.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.sshdeck');
const CONFIG_FILE = 'config.yaml';
const TRASH_SUBDIR = '.trash';

export const DEFAULT_IGNORE = [
  'config',
  'config.*',
  'known_hosts*',
  'authorized_keys*',
  'environment',
  'rc',
  '*.bak',
  '*.old'
];

export function getConfigDir(): string {
  return process.env['SSHDECK_CONFIG_DIR'] || DEFAULT_CONFIG_DIR;
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), CONFIG_FILE);
}

export function expandPath(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(1));
  }
  if (p.includes('${HOME}')) {
    return p.replace('${HOME}', os.homedir());
  }
  return p;
}

export function getDefaultConfig(): SshDeckConfig {
  const directory = path.join(os.homedir(), '.ssh');
  return {
    keys: {
      directory,
      trashDir: path.join(directory, TRASH_SUBDIR),
      ignore: [...DEFAULT_IGNORE]
    },
    agent: {},
    log: {
      persist: false,
      path: path.join(getConfigDir(), 'command-log.jsonl'),
      maxEntries: 500,
      rawOutputLimit: 4096
    },
    queue: {
      maxPending: 16
    },
    exec: {
      timeoutMs: 60000
    },
    defaults: {
      keyType: 'ed25519',
      rsaBits: 3072
    }
  };
}

export function loadConfig(): SshDeckConfig {
  const configPath = getConfigPath();
  let config = getDefaultConfig();

  if (fs.existsSync(configPath)) {
    let userConfig: unknown;
    try {
      userConfig = parseYaml(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Failed to parse ${configPath}`, [errorMessage(error)]);
    }
    config = mergeConfig(config, userConfig, configPath);
  }

  config = applyEnvOverrides(config);

  const problems = validateConfigShape(config);
  if (problems.length > 0) {
    throw new ConfigError('Invalid configuration', problems);
  }

  return resolvePaths(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Section-wise merge of a parsed YAML document over a config.
 * Throws ConfigError when the result does not satisfy the schema.
 */
export function mergeConfig(base: SshDeckConfig, override: unknown, source = 'config'): SshDeckConfig {
  if (override === null || override === undefined) {
    return base;
  }
  if (!isRecord(override)) {
    throw new ConfigError(`Invalid configuration in ${source}`, ['/: expected a mapping']);
  }

  const section = (name: keyof SshDeckConfig): Record<string, unknown> => {
    const value = override[name];
    return isRecord(value) ? value : {};
  };

  const keys = section('keys');
  const merged = {
    keys: {
      ...base.keys,
      ...keys,
      // Trash follows the key directory unless placed explicitly
      trashDir: keys['trashDir'] ?? (
        typeof keys['directory'] === 'string'
          ? path.join(expandPath(keys['directory']), TRASH_SUBDIR)
          : base.keys.trashDir
      )
    },
    agent: { ...base.agent, ...section('agent') },
    log: { ...base.log, ...section('log') },
    queue: { ...base.queue, ...section('queue') },
    exec: { ...base.exec, ...section('exec') },
    defaults: { ...base.defaults, ...section('defaults') }
  };

  const unknownSections = Object.keys(override)
    .filter(name => !(name in merged))
    .map(name => `/${name}: unknown section`);

  if (isConfigShape(merged) && unknownSections.length === 0) {
    return merged;
  }
  throw new ConfigError(`Invalid configuration in ${source}`, [
    ...validateConfigShape(merged),
    ...unknownSections
  ]);
}

export function applyEnvOverrides(config: SshDeckConfig): SshDeckConfig {
  const env = process.env;

  if (env['SSHDECK_KEY_DIR']) {
    const derivedTrash = path.join(expandPath(config.keys.directory), TRASH_SUBDIR);
    config.keys.directory = env['SSHDECK_KEY_DIR'];
    if (config.keys.trashDir === derivedTrash) {
      config.keys.trashDir = path.join(env['SSHDECK_KEY_DIR'], TRASH_SUBDIR);
    }
  }

  if (env['SSHDECK_TRASH_DIR']) {
    config.keys.trashDir = env['SSHDECK_TRASH_DIR'];
  }

  if (env['SSHDECK_LOG_PERSIST']) {
    config.log.persist = env['SSHDECK_LOG_PERSIST'] === 'true';
  }

  if (env['SSHDECK_LOG_PATH']) {
    config.log.path = env['SSHDECK_LOG_PATH'];
  }

  if (env['SSHDECK_LOG_MAX_ENTRIES']) {
    const max = parseInt(env['SSHDECK_LOG_MAX_ENTRIES'], 10);
    if (!isNaN(max) && max >= 0) config.log.maxEntries = max;
  }

  if (!config.agent.socketPath && env['SSH_AUTH_SOCK']) {
    config.agent.socketPath = env['SSH_AUTH_SOCK'];
  }

  return config;
}

function resolvePaths(config: SshDeckConfig): SshDeckConfig {
  return {
    ...config,
    keys: {
      ...config.keys,
      directory: path.resolve(expandPath(config.keys.directory)),
      trashDir: path.resolve(expandPath(config.keys.trashDir))
    },
    agent: config.agent.socketPath
      ? { socketPath: expandPath(config.agent.socketPath) }
      : {},
    log: {
      ...config.log,
      path: path.resolve(expandPath(config.log.path))
    }
  };
}

/**
 * Creates the key and trash directories (mode 0700) when missing.
 * Failure here is fatal at startup.
 */
export function ensureKeyDirectories(config: SshDeckConfig): void {
  for (const dir of [config.keys.directory, config.keys.trashDir]) {
    try {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    } catch (error) {
      throw new ConfigError(`Cannot create directory ${dir}`, [errorMessage(error)]);
    }
  }
}

export function ensureConfigDir(): void {
  const configDir = getConfigDir();
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
  }
}

export function saveConfig(config: SshDeckConfig): void {
  ensureConfigDir();
  fs.writeFileSync(getConfigPath(), stringifyYaml(config), { encoding: 'utf-8', mode: 0o600 });
}
