import { open } from 'node:fs/promises';

import type { BackupStore } from './types';
import { BackupFailureError } from '../errors';

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Backs up each file next to itself as `<path><suffix>`.
 *
 * An existing backup is kept: it holds the oldest pre-rewrite text, which is
 * the copy worth recovering after repeated runs.
 *
 * @param suffix - Appended to the original path.
 * @default suffix '.bak'
 */
export function createSiblingBackup(suffix = '.bak'): BackupStore {
  return {
    async save(path, original) {
      const backupPath = `${path}${suffix}`;

      try {
        const handle = await open(backupPath, 'wx');
        try {
          await handle.writeFile(original, { encoding: 'utf8' });
        } finally {
          await handle.close();
        }
      } catch (error) {
        if (isAlreadyExists(error)) return;
        throw new BackupFailureError(path, { cause: error });
      }
    }
  };
}
