import { open, rename, rm } from 'node:fs/promises';

import type { SourceStore } from './types';
import { IOFailureError } from '../errors';

/**
 * Reads a file through a scoped handle, closed on every exit path.
 */
async function readWithHandle(path: string): Promise<string> {
  const handle = await open(path, 'r');
  try {
    return await handle.readFile({ encoding: 'utf8' });
  } finally {
    await handle.close();
  }
}

/**
 * Writes `text` to a temporary sibling, then renames it over `path`, so the
 * file is replaced in one step or not at all.
 */
async function replaceWithHandle(path: string, text: string): Promise<void> {
  const temporaryPath = `${path}.${process.pid}.tmp`;

  try {
    const handle = await open(temporaryPath, 'wx');
    try {
      await handle.writeFile(text, { encoding: 'utf8' });
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(temporaryPath, path);
  } catch (error) {
    await rm(temporaryPath, { force: true });
    throw error;
  }
}

/**
 * The file-system source store.
 */
export function createFileSourceStore(): SourceStore {
  return {
    async read(path) {
      try {
        return await readWithHandle(path);
      } catch (error) {
        throw new IOFailureError(path, 'read', { cause: error });
      }
    },

    async write(path, text) {
      try {
        await replaceWithHandle(path, text);
      } catch (error) {
        throw new IOFailureError(path, 'write', { cause: error });
      }
    }
  };
}
