/**
 * Moves key pairs into the trash directory instead of unlinking them
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { errorMessage } from '../errors.js';

export interface TrashTargets {
  privateDest: string;
  publicDest: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * First free pair of names in the trash: the key's own basename, then
 * name.1, name.2 and so on. Both halves always share the suffix.
 */
export function trashTargets(trashDir: string, keyPath: string): TrashTargets {
  const base = path.basename(keyPath);
  for (let n = 0; ; n++) {
    const name = n === 0 ? base : `${base}.${n}`;
    const privateDest = path.join(trashDir, name);
    const publicDest = `${privateDest}.pub`;
    if (!fs.existsSync(privateDest) && !fs.existsSync(publicDest)) {
      return { privateDest, publicDest };
    }
  }
}

/**
 * rename(2), falling back to copy and unlink across filesystems.
 */
export function moveFile(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    fs.copyFileSync(from, to, fs.constants.COPYFILE_EXCL);
    fs.unlinkSync(from);
  }
}

/**
 * Moves the private key, then its public half when present. Returns the
 * trash paths. If the public move fails the private key is put back.
 */
export function moveKeyToTrash(trashDir: string, keyPath: string, publicPath: string | null): string[] {
  fs.mkdirSync(trashDir, { recursive: true, mode: 0o700 });
  const { privateDest, publicDest } = trashTargets(trashDir, keyPath);

  moveFile(keyPath, privateDest);
  if (publicPath === null || !fs.existsSync(publicPath)) {
    return [privateDest];
  }

  try {
    moveFile(publicPath, publicDest);
  } catch (error) {
    try {
      moveFile(privateDest, keyPath);
    } catch (rollbackError) {
      throw new Error(
        `${errorMessage(error)}; private key left at ${privateDest}: ${errorMessage(rollbackError)}`,
        { cause: error }
      );
    }
    throw error;
  }
  return [privateDest, publicDest];
}
