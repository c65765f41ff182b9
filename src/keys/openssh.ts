/**
 * OpenSSH key file codec
 *
 * Reads just enough of public key lines, `openssh-key-v1` private keys and
 * PEM private keys to tell the key type, its size and its public blob.
 * Nothing here decrypts key material.
 */

import * as crypto from 'node:crypto';
import type { KeyType } from '../types.js';

const OPENSSH_MAGIC = Buffer.from('openssh-key-v1\0', 'latin1');
const ARMOUR = /-----BEGIN ([A-Z0-9 ]*)PRIVATE KEY-----([\s\S]*?)-----END \1PRIVATE KEY-----/;

const ECDSA_CURVE_BITS: Record<string, number> = {
  nistp256: 256,
  nistp384: 384,
  nistp521: 521
};

const JWK_CURVES: Record<string, string> = {
  'P-256': 'nistp256',
  'P-384': 'nistp384',
  'P-521': 'nistp521'
};

export interface PublicKeyInfo {
  keyType: KeyType;
  /** Wire name, e.g. ssh-ed25519 */
  typeName: string;
  bitLength?: number;
  blob: Buffer;
}

export interface PublicKeyLine extends PublicKeyInfo {
  comment?: string;
}

export interface PrivateKeyInfo {
  keyType: KeyType;
  format: 'openssh' | 'pem' | 'pkcs8';
  encrypted: boolean;
  bitLength?: number;
  /** Public blob, when it can be read without a passphrase */
  blob?: Buffer;
}

/**
 * Reader for the SSH wire encoding (RFC 4251 section 5).
 */
class WireReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  uint32(): number {
    if (this.offset + 4 > this.buf.length) {
      throw new RangeError('truncated uint32');
    }
    const value = this.buf.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  bytes(): Buffer {
    const length = this.uint32();
    if (this.offset + length > this.buf.length) {
      throw new RangeError('truncated string');
    }
    const value = this.buf.subarray(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  string(): string {
    return this.bytes().toString('latin1');
  }
}

function wireString(value: Buffer | string): Buffer {
  const body = typeof value === 'string' ? Buffer.from(value, 'latin1') : value;
  const length = Buffer.alloc(4);
  length.writeUInt32BE(body.length);
  return Buffer.concat([length, body]);
}

function wireMpint(unsigned: Buffer): Buffer {
  let start = 0;
  while (start < unsigned.length - 1 && unsigned[start] === 0) start++;
  const trimmed = unsigned.subarray(start);
  // A set high bit would read as negative
  return wireString(trimmed[0] & 0x80 ? Buffer.concat([Buffer.from([0]), trimmed]) : trimmed);
}

function mpintBits(mpint: Buffer): number {
  let start = 0;
  while (start < mpint.length && mpint[start] === 0) start++;
  if (start === mpint.length) return 0;
  return (mpint.length - start - 1) * 8 + (32 - Math.clz32(mpint[start]));
}

export function keyTypeFromName(typeName: string): KeyType | null {
  if (typeName === 'ssh-rsa') return 'rsa';
  if (typeName === 'ssh-dss') return 'dsa';
  if (typeName === 'ssh-ed25519' || typeName === 'sk-ssh-ed25519@openssh.com') return 'ed25519';
  if (typeName.startsWith('ecdsa-sha2-') || typeName.startsWith('sk-ecdsa-sha2-')) return 'ecdsa';
  return null;
}

/**
 * Decodes a public key blob. Returns null for unsupported or malformed blobs.
 */
export function parsePublicBlob(blob: Buffer): PublicKeyInfo | null {
  try {
    const reader = new WireReader(blob);
    const typeName = reader.string();
    const keyType = keyTypeFromName(typeName);
    if (!keyType) return null;

    switch (keyType) {
      case 'rsa': {
        reader.bytes(); // e
        return { keyType, typeName, blob, bitLength: mpintBits(reader.bytes()) };
      }
      case 'ecdsa': {
        const curve = reader.string();
        return { keyType, typeName, blob, bitLength: ECDSA_CURVE_BITS[curve] };
      }
      case 'dsa':
      case 'ed25519':
        return { keyType, typeName, blob };
    }
  } catch {
    return null;
  }
}

/**
 * Parses one line of a `.pub` file: `<type> <base64> [comment]`.
 */
export function parsePublicKeyLine(content: string): PublicKeyLine | null {
  const line = content.split(/\r?\n/).find(l => l.trim().length > 0 && !l.trim().startsWith('#'));
  if (!line) return null;

  const [typeName, encoded, ...rest] = line.trim().split(/\s+/);
  if (!typeName || !encoded || !/^[A-Za-z0-9+/]+=*$/.test(encoded)) return null;

  const info = parsePublicBlob(Buffer.from(encoded, 'base64'));
  if (!info || info.typeName !== typeName) return null;

  const comment = rest.join(' ');
  return comment ? { ...info, comment } : info;
}

export function isPrivateKeyContent(content: string): boolean {
  return ARMOUR.test(content);
}

/**
 * Reads the unencrypted header of a private key file.
 * Returns null when the content is not a recognisable private key.
 */
export function parsePrivateKey(content: string): PrivateKeyInfo | null {
  const match = ARMOUR.exec(content);
  if (!match) return null;

  const label = match[1].trim();
  if (label === 'OPENSSH') {
    return parseOpenSshPrivate(match[2]);
  }
  if (label === 'RSA' || label === 'EC' || label === 'DSA') {
    const keyType: KeyType = label === 'RSA' ? 'rsa' : label === 'EC' ? 'ecdsa' : 'dsa';
    const encrypted = /Proc-Type:\s*4,ENCRYPTED/.test(match[2]);
    return encrypted
      ? { keyType, format: 'pem', encrypted }
      : { ...describeKeyObject(match[0]), keyType, format: 'pem', encrypted };
  }
  if (label === '') {
    const described = describeKeyObject(match[0]);
    return described.keyType
      ? { ...described, keyType: described.keyType, format: 'pkcs8', encrypted: false }
      : null;
  }
  // ENCRYPTED PRIVATE KEY: the algorithm is inside the encrypted payload
  return null;
}

function parseOpenSshPrivate(body: string): PrivateKeyInfo | null {
  try {
    const decoded = Buffer.from(body.replace(/\s+/g, ''), 'base64');
    if (!decoded.subarray(0, OPENSSH_MAGIC.length).equals(OPENSSH_MAGIC)) return null;

    const reader = new WireReader(decoded.subarray(OPENSSH_MAGIC.length));
    const cipherName = reader.string();
    reader.string(); // kdfname
    reader.bytes(); // kdfoptions
    if (reader.uint32() < 1) return null;

    const info = parsePublicBlob(reader.bytes());
    if (!info) return null;
    return {
      keyType: info.keyType,
      format: 'openssh',
      encrypted: cipherName !== 'none',
      bitLength: info.bitLength,
      blob: info.blob
    };
  } catch {
    return null;
  }
}

function describeKeyObject(pem: string): { keyType?: KeyType; bitLength?: number; blob?: Buffer } {
  let key: crypto.KeyObject;
  try {
    key = crypto.createPublicKey(crypto.createPrivateKey(pem));
  } catch {
    return {};
  }
  const blob = publicBlobFromKeyObject(key);
  const info = blob ? parsePublicBlob(blob) : null;
  if (info) {
    return { keyType: info.keyType, bitLength: info.bitLength, blob: info.blob };
  }
  return key.asymmetricKeyType === 'dsa' ? { keyType: 'dsa' } : {};
}

function jwkPart(value: string | undefined): Buffer {
  if (!value) throw new TypeError('incomplete JWK');
  return Buffer.from(value, 'base64url');
}

/**
 * Builds the SSH public key blob for an rsa, ed25519 or ec KeyObject.
 */
export function publicBlobFromKeyObject(key: crypto.KeyObject): Buffer | null {
  const publicKey = key.type === 'private' ? crypto.createPublicKey(key) : key;
  try {
    const jwk = publicKey.export({ format: 'jwk' });
    switch (publicKey.asymmetricKeyType) {
      case 'rsa':
        return Buffer.concat([wireString('ssh-rsa'), wireMpint(jwkPart(jwk.e)), wireMpint(jwkPart(jwk.n))]);
      case 'ed25519':
        return Buffer.concat([wireString('ssh-ed25519'), wireString(jwkPart(jwk.x))]);
      case 'ec': {
        const curve = JWK_CURVES[jwk.crv ?? ''];
        if (!curve) return null;
        const point = Buffer.concat([Buffer.from([4]), jwkPart(jwk.x), jwkPart(jwk.y)]);
        return Buffer.concat([wireString(`ecdsa-sha2-${curve}`), wireString(curve), wireString(point)]);
      }
      default:
        return null;
    }
  } catch {
    return null;
  }
}

/**
 * Formats a `.pub` line for a KeyObject, as ssh-keygen writes it.
 */
export function formatPublicKeyLine(key: crypto.KeyObject, comment?: string): string | null {
  const blob = publicBlobFromKeyObject(key);
  const info = blob ? parsePublicBlob(blob) : null;
  if (!info) return null;
  const line = `${info.typeName} ${info.blob.toString('base64')}`;
  return comment ? `${line} ${comment}\n` : `${line}\n`;
}
