/**
 * Key store: the in-memory model of SSH key pairs in the key directory
 *
 * The directory is shared with ssh-keygen, other tools and the user, so
 * the model is rebuilt from disk by refresh() rather than trusted across
 * operations.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { SshDeckError, errorMessage } from '../errors.js';
import { computeFingerprint } from '../utils/hash.js';
import { isPrivateKeyContent, parsePrivateKey, parsePublicKeyLine } from './openssh.js';
import type { KeyRecord, KeyType } from '../types.js';

const PUBLIC_SUFFIX = '.pub';
// Anything bigger is not a key file
const MAX_KEY_FILE_SIZE = 256 * 1024;

export interface KeyStoreOptions {
  directory: string;
  /** Glob patterns (matched against file names) that are never keys */
  ignore?: string[];
}

export class KeyStore {
  private directory: string;
  private ignore: string[];
  private records = new Map<string, KeyRecord>();
  private blobs = new Map<string, Buffer>();
  private fingerprints = new Map<string, string>();
  private lastWarnings: string[] = [];

  constructor(options: KeyStoreOptions) {
    this.directory = path.resolve(options.directory);
    this.ignore = options.ignore ?? [];
  }

  get keyDirectory(): string {
    return this.directory;
  }

  /** Per-file problems from the last refresh */
  get warnings(): readonly string[] {
    return this.lastWarnings;
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Rebuilds the record set from the key directory.
   * Throws ScanError when the directory itself cannot be read.
   */
  refresh(directory?: string): void {
    if (directory) {
      this.directory = path.resolve(directory);
    }

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(this.directory, { withFileTypes: true });
    } catch (error) {
      throw new SshDeckError('ScanError', `Cannot read key directory ${this.directory}: ${errorMessage(error)}`, { cause: error });
    }

    const previous = this.records;
    const warnings: string[] = [];
    this.records = new Map();
    this.blobs = new Map();

    for (const entry of entries) {
      if (!this.isCandidate(entry)) continue;

      const keyPath = path.join(this.directory, entry.name);
      try {
        const record = this.readKey(keyPath);
        if (record) {
          record.loadedInAgent = previous.get(keyPath)?.loadedInAgent ?? false;
          this.records.set(keyPath, record);
        }
      } catch (error) {
        warnings.push(`Skipped ${entry.name}: ${errorMessage(error)}`);
      }
    }

    this.lastWarnings = warnings;
  }

  // Symlinks are followed when the file is read; a dangling one becomes a warning
  private isCandidate(entry: fs.Dirent): boolean {
    if (!entry.isFile() && !entry.isSymbolicLink()) return false;
    if (entry.name.startsWith('.')) return false;
    if (entry.name.endsWith(PUBLIC_SUFFIX)) return false;
    return !this.ignore.some(pattern => minimatch(entry.name, pattern, { dot: true }));
  }

  /**
   * Builds a record for one private key file, or null when the file is
   * not a private key. Throws when the file cannot be read.
   */
  private readKey(keyPath: string): KeyRecord | null {
    const stat = fs.statSync(keyPath);
    if (!stat.isFile() || stat.size > MAX_KEY_FILE_SIZE) return null;

    const content = fs.readFileSync(keyPath, 'utf-8');
    if (!isPrivateKeyContent(content)) return null;

    const publicPath = keyPath + PUBLIC_SUFFIX;
    let publicContent: string | null = null;
    try {
      publicContent = fs.readFileSync(publicPath, 'utf-8');
    } catch {
      // Private key without a readable public half
    }

    const publicLine = publicContent ? parsePublicKeyLine(publicContent) : null;
    const privateInfo = publicLine ? null : parsePrivateKey(content);

    let keyType: KeyType;
    let bitLength: number | undefined;
    let blob: Buffer | undefined;
    let comment: string | undefined;

    if (publicLine) {
      ({ keyType, bitLength, blob, comment } = publicLine);
    } else if (privateInfo) {
      ({ keyType, bitLength, blob } = privateInfo);
    } else {
      throw new Error('unrecognised private key format');
    }

    if (blob) {
      this.blobs.set(keyPath, blob);
    }

    return {
      path: keyPath,
      publicPath,
      name: path.basename(keyPath),
      keyType,
      ...(bitLength !== undefined && (keyType === 'rsa' || keyType === 'ecdsa') ? { bitLength } : {}),
      ...(comment ? { comment } : {}),
      hasPublicKey: publicContent !== null,
      loadedInAgent: false
    };
  }

  /**
   * Reads a single key file into a record without inserting it.
   */
  inspectKeyFile(keyPath: string): KeyRecord {
    const absolute = path.resolve(keyPath);
    let record: KeyRecord | null;
    try {
      record = this.readKey(absolute);
    } catch (error) {
      throw new SshDeckError('ReadError', `Cannot read ${absolute}: ${errorMessage(error)}`, { cause: error });
    }
    if (!record) {
      throw new SshDeckError('ReadError', `${absolute} is not a private key`);
    }
    return record;
  }

  get(keyPath: string): KeyRecord | undefined {
    const record = this.records.get(path.resolve(keyPath));
    return record ? { ...record } : undefined;
  }

  /**
   * Looks a key up by path, by name in the key directory, or by the
   * name of its public half.
   */
  resolve(target: string): KeyRecord | undefined {
    const withoutSuffix = target.endsWith(PUBLIC_SUFFIX) ? target.slice(0, -PUBLIC_SUFFIX.length) : target;
    const candidate = path.isAbsolute(withoutSuffix) || withoutSuffix.includes(path.sep)
      ? path.resolve(withoutSuffix)
      : path.join(this.directory, withoutSuffix);
    return this.get(candidate);
  }

  list(): KeyRecord[] {
    return [...this.records.values()]
      .map(record => ({ ...record }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  insert(record: KeyRecord): void {
    const keyPath = path.resolve(record.path);
    this.records.set(keyPath, { ...record, path: keyPath });
  }

  remove(keyPath: string): void {
    const absolute = path.resolve(keyPath);
    if (!this.records.delete(absolute)) {
      throw new SshDeckError('NotFound', `No key at ${absolute}`);
    }
    this.blobs.delete(absolute);
  }

  /**
   * Fingerprint of the key's public blob, computed on first use.
   * Undefined when the blob cannot be read without a passphrase.
   */
  fingerprint(keyPath: string): string | undefined {
    const absolute = path.resolve(keyPath);
    const record = this.records.get(absolute);
    if (!record) return undefined;
    if (record.fingerprint) return record.fingerprint;

    const blob = this.blobs.get(absolute);
    if (!blob) return undefined;

    const cacheKey = blob.toString('base64');
    let fingerprint = this.fingerprints.get(cacheKey);
    if (!fingerprint) {
      fingerprint = computeFingerprint(blob);
      this.fingerprints.set(cacheKey, fingerprint);
    }
    record.fingerprint = fingerprint;
    return fingerprint;
  }

  /**
   * Marks each record loaded or not according to the agent's fingerprints.
   */
  setAgentMembership(agentFingerprints: ReadonlySet<string>): void {
    for (const record of this.records.values()) {
      const fingerprint = this.fingerprint(record.path);
      record.loadedInAgent = fingerprint !== undefined && agentFingerprints.has(fingerprint);
    }
  }

  setLoaded(keyPath: string, loaded: boolean): void {
    const record = this.records.get(path.resolve(keyPath));
    if (record) {
      record.loadedInAgent = loaded;
    }
  }
}

export function createKeyStore(options: KeyStoreOptions): KeyStore {
  return new KeyStore(options);
}
