import type { Logger } from '../logger';
import type { RewriteErrorKind } from '../errors';
import type { Diagnostic } from '../types';

/**
 * Reads and writes whole source files.
 *
 * Implementations throw `IOFailureError` on failure.
 */
export type SourceStore = {
  read(path: string): Promise<string>;
  write(path: string, text: string): Promise<void>;
};

/**
 * Persists a recoverable copy of a file's original text.
 *
 * Called once per changed file, before the write. Implementations throw
 * `BackupFailureError` on failure; the runner then skips the write.
 */
export type BackupStore = {
  save(path: string, original: string): Promise<void>;
};

/**
 * A pure, per-file transformation.
 */
export type FileTransform = (source: string, path: string) => TransformOutcome;

export type TransformOutcome = {
  text: string;
  changed: boolean;

  /**
   * Number of rewrites (or substitutions) applied.
   */
  count: number;

  diagnostics: readonly Diagnostic[];
};

export type RunOptions = {
  /**
   * Maximum number of files processed at once.
   * @default 4
   */
  concurrency?: number;

  /**
   * Computes every rewrite without taking backups or writing.
   * @default false
   */
  dryRun?: boolean;

  /**
   * @default the file system (`createFileSourceStore()`)
   */
  store?: SourceStore;

  /**
   * @default sibling `.bak` files (`createSiblingBackup()`)
   */
  backup?: BackupStore;

  /**
   * @default a silent logger
   */
  logger?: Logger;
};

export type FileStatus =
  /**
   * At least one rewrite applied (and written, unless `dryRun`).
   */
  | 'rewritten'

  /**
   * Nothing to rewrite; the file was not backed up or written.
   */
  | 'unchanged'

  /**
   * A fatal per-file error; see `error`.
   */
  | 'failed';

export type FileReport = {
  path: string;
  status: FileStatus;
  count: number;
  written: boolean;
  diagnostics: readonly Diagnostic[];
  error?: {
    kind: RewriteErrorKind;
    message: string;
  };
};

export type RunSummary = {
  filesScanned: number;
  filesChanged: number;
  filesFailed: number;
  totalRewrites: number;

  /**
   * One report per input path, in input order.
   */
  files: FileReport[];
};
