import type { BackupStore, SourceStore } from '../types';
import { BackupFailureError, IOFailureError } from '../../errors';

export type MemoryStore = SourceStore & {
  files: Map<string, string>;
  writes: string[];
};

/**
 * In-process source store. Paths listed in `failWrites` reject on write;
 * unknown paths reject on read.
 */
export function createMemoryStore(
  initial: Record<string, string>,
  failWrites: readonly string[] = []
): MemoryStore {
  const files = new Map(Object.entries(initial));
  const writes: string[] = [];

  return {
    files,
    writes,
    async read(path) {
      const text = files.get(path);
      if (text === undefined) throw new IOFailureError(path, 'read');
      return text;
    },
    async write(path, text) {
      if (failWrites.includes(path)) throw new IOFailureError(path, 'write');
      writes.push(path);
      files.set(path, text);
    }
  };
}

export type MemoryBackup = BackupStore & {
  saved: Map<string, string>;
};

export function createMemoryBackup(failOn: readonly string[] = []): MemoryBackup {
  const saved = new Map<string, string>();

  return {
    saved,
    async save(path, original) {
      if (failOn.includes(path)) throw new BackupFailureError(path);
      saved.set(path, original);
    }
  };
}
