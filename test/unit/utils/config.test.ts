/**
 * Tests for config utilities
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as os from 'node:os';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  getDefaultConfig,
  expandPath,
  applyEnvOverrides,
  ensureConfigDir,
  ensureKeyDirectories,
  loadConfig,
  mergeConfig,
  saveConfig
} from '../../../src/utils/config.js';
import { validateConfigShape } from '../../../src/utils/config-schema.js';
import { ConfigError } from '../../../src/errors.js';
import { createTempEnv, type TempEnv } from '../../helpers/temp-env.js';

const ENV_KEYS = [
  'SSHDECK_CONFIG_DIR',
  'SSHDECK_KEY_DIR',
  'SSHDECK_TRASH_DIR',
  'SSHDECK_LOG_PERSIST',
  'SSHDECK_LOG_PATH',
  'SSHDECK_LOG_MAX_ENTRIES',
  'SSH_AUTH_SOCK'
];

function catchConfigError(fn: () => unknown): ConfigError | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  return null;
}

describe('config utilities', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
    Object.assign(process.env, originalEnv);
  });

  describe('getDefaultConfig', () => {
    it('manages ~/.ssh with a trash inside it', () => {
      const config = getDefaultConfig();

      expect(config.keys.directory).toBe(path.join(os.homedir(), '.ssh'));
      expect(config.keys.trashDir).toBe(path.join(os.homedir(), '.ssh', '.trash'));
      expect(config.keys.ignore).toContain('known_hosts*');
    });

    it('keeps the log in memory by default', () => {
      const config = getDefaultConfig();

      expect(config.log.persist).toBe(false);
      expect(config.log.maxEntries).toBe(500);
      expect(config.queue.maxPending).toBe(16);
      expect(config.exec.timeoutMs).toBe(60000);
      expect(config.defaults).toEqual({ keyType: 'ed25519', rsaBits: 3072 });
    });

    it('satisfies its own schema', () => {
      expect(validateConfigShape(getDefaultConfig())).toEqual([]);
    });
  });

  describe('applyEnvOverrides', () => {
    it('moves the key directory and the trash that follows it', () => {
      process.env['SSHDECK_KEY_DIR'] = '/srv/keys';
      const config = applyEnvOverrides(getDefaultConfig());

      expect(config.keys.directory).toBe('/srv/keys');
      expect(config.keys.trashDir).toBe(path.join('/srv/keys', '.trash'));
    });

    it('places the trash explicitly', () => {
      process.env['SSHDECK_KEY_DIR'] = '/srv/keys';
      process.env['SSHDECK_TRASH_DIR'] = '/srv/trash';
      const config = applyEnvOverrides(getDefaultConfig());

      expect(config.keys.trashDir).toBe('/srv/trash');
    });

    it('turns on log persistence', () => {
      process.env['SSHDECK_LOG_PERSIST'] = 'true';
      process.env['SSHDECK_LOG_PATH'] = '/var/tmp/sshdeck.jsonl';
      process.env['SSHDECK_LOG_MAX_ENTRIES'] = '25';
      const config = applyEnvOverrides(getDefaultConfig());

      expect(config.log).toMatchObject({ persist: true, path: '/var/tmp/sshdeck.jsonl', maxEntries: 25 });
    });

    it('ignores a malformed entry limit', () => {
      process.env['SSHDECK_LOG_MAX_ENTRIES'] = 'lots';
      expect(applyEnvOverrides(getDefaultConfig()).log.maxEntries).toBe(500);
    });

    it('takes SSH_AUTH_SOCK only when no socket is configured', () => {
      process.env['SSH_AUTH_SOCK'] = '/tmp/agent.env.sock';

      expect(applyEnvOverrides(getDefaultConfig()).agent.socketPath).toBe('/tmp/agent.env.sock');

      const configured = getDefaultConfig();
      configured.agent.socketPath = '/tmp/agent.file.sock';
      expect(applyEnvOverrides(configured).agent.socketPath).toBe('/tmp/agent.file.sock');
    });
  });

  describe('mergeConfig', () => {
    it('merges section by section', () => {
      const merged = mergeConfig(getDefaultConfig(), { log: { maxEntries: 50 }, defaults: { keyType: 'rsa' } });

      expect(merged.log.maxEntries).toBe(50);
      expect(merged.log.rawOutputLimit).toBe(4096);
      expect(merged.defaults).toEqual({ keyType: 'rsa', rsaBits: 3072 });
    });

    it('moves the trash with a configured key directory', () => {
      const merged = mergeConfig(getDefaultConfig(), { keys: { directory: '/data/ssh' } });

      expect(merged.keys.trashDir).toBe(path.join('/data/ssh', '.trash'));
    });

    it('treats an empty document as no overrides', () => {
      expect(mergeConfig(getDefaultConfig(), null)).toEqual(getDefaultConfig());
    });

    it('lists unknown sections', () => {
      const error = catchConfigError(() => mergeConfig(getDefaultConfig(), { colors: { theme: 'dark' } }, 'config.yaml'));

      expect(error?.problems).toEqual(['/colors: unknown section']);
      expect(error?.message).toBe('Invalid configuration in config.yaml:\n  /colors: unknown section');
    });

    it('reports the path of each invalid value', () => {
      const error = catchConfigError(() => mergeConfig(getDefaultConfig(), { queue: { maxPending: 0 }, defaults: { keyType: 'x448' } }));

      const paths = (error?.problems ?? []).map(problem => problem.split(':')[0]);
      expect(paths).toContain('/queue/maxPending');
      expect(paths).toContain('/defaults/keyType');
    });

    it('rejects a document that is not a mapping', () => {
      const error = catchConfigError(() => mergeConfig(getDefaultConfig(), ['a', 'b']));
      expect(error?.problems).toEqual(['/: expected a mapping']);
    });
  });

  describe('loadConfig', () => {
    let env: TempEnv;

    afterEach(() => {
      env.cleanup();
    });

    it('loads defaults when there is no config file', () => {
      env = createTempEnv();
      Object.assign(process.env, env.env);

      const config = loadConfig();

      expect(config.keys.directory).toBe(env.keyDir);
      expect(config.keys.trashDir).toBe(env.trashDir);
      expect(config.log.path).toBe(path.join(env.configDir, 'command-log.jsonl'));
      expect(config.agent).toEqual({});
    });

    it('reads config.yaml', () => {
      env = createTempEnv({
        configYaml: ['log:', '  persist: true', '  maxEntries: 100', 'agent:', '  socketPath: /tmp/agent.sock', ''].join('\n')
      });
      process.env['SSHDECK_CONFIG_DIR'] = env.configDir;

      const config = loadConfig();

      expect(config.log.persist).toBe(true);
      expect(config.log.maxEntries).toBe(100);
      expect(config.agent.socketPath).toBe('/tmp/agent.sock');
    });

    it('fails on YAML that does not parse', () => {
      env = createTempEnv({ configYaml: 'log: [unclosed\n' });
      process.env['SSHDECK_CONFIG_DIR'] = env.configDir;

      const error = catchConfigError(() => loadConfig());

      expect(error?.message.startsWith(`Failed to parse ${path.join(env.configDir, 'config.yaml')}`)).toBe(true);
    });

    it('round-trips through saveConfig', () => {
      env = createTempEnv();
      process.env['SSHDECK_CONFIG_DIR'] = env.configDir;
      const config = getDefaultConfig();
      config.keys.directory = env.keyDir;
      config.keys.trashDir = env.trashDir;
      config.defaults.rsaBits = 4096;

      saveConfig(config);

      expect(loadConfig()).toEqual(config);
    });
  });

  describe('directories', () => {
    let tmpDir: string;

    afterEach(() => {
      if (tmpDir && fs.existsSync(tmpDir)) {
        fs.rmSync(tmpDir, { recursive: true, force: true });
      }
    });

    it('ensureConfigDir creates directory with mode 0o700', () => {
      tmpDir = path.join(os.tmpdir(), `sshdeck-perm-test-${Date.now()}`);
      process.env['SSHDECK_CONFIG_DIR'] = tmpDir;
      ensureConfigDir();
      const stat = fs.statSync(tmpDir);
      expect(stat.mode & 0o777).toBe(0o700);
    });

    it('saveConfig writes file with mode 0o600', () => {
      tmpDir = path.join(os.tmpdir(), `sshdeck-perm-test-${Date.now()}`);
      process.env['SSHDECK_CONFIG_DIR'] = tmpDir;
      saveConfig(getDefaultConfig());
      const stat = fs.statSync(path.join(tmpDir, 'config.yaml'));
      expect(stat.mode & 0o777).toBe(0o600);
    });

    it('creates the key and trash directories', () => {
      tmpDir = path.join(os.tmpdir(), `sshdeck-keys-test-${Date.now()}`);
      const config = getDefaultConfig();
      config.keys.directory = path.join(tmpDir, 'ssh');
      config.keys.trashDir = path.join(tmpDir, 'ssh', '.trash');

      ensureKeyDirectories(config);

      expect(fs.statSync(config.keys.trashDir).isDirectory()).toBe(true);
    });

    it('fails with ConfigError when a directory cannot be created', () => {
      tmpDir = path.join(os.tmpdir(), `sshdeck-keys-test-${Date.now()}`);
      fs.mkdirSync(tmpDir, { recursive: true });
      fs.writeFileSync(path.join(tmpDir, 'file'), '');
      const config = getDefaultConfig();
      config.keys.directory = path.join(tmpDir, 'file', 'ssh');

      const error = catchConfigError(() => ensureKeyDirectories(config));

      expect(error?.message.startsWith(`Cannot create directory ${config.keys.directory}`)).toBe(true);
    });
  });
});
