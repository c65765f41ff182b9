/**
 * Hashing helpers for key fingerprints and log entry ids
 */

import * as crypto from 'node:crypto';

const FINGERPRINT_ALGORITHM = 'sha256';

/**
 * Fingerprint of an SSH public key blob, in the same form that
 * `ssh-keygen -l -E sha256` and `ssh-add -l -E sha256` print.
 */
export function computeFingerprint(blob: Buffer): string {
  const digest = crypto.createHash(FINGERPRINT_ALGORITHM).update(blob).digest('base64');
  return `SHA256:${digest.replace(/=+$/, '')}`;
}

export function generateId(): string {
  return crypto.randomUUID();
}
