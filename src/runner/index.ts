import type { PerFileAtomicityPolicy } from '../architecture';
import type { Logger } from '../logger';
import type { RewriteOptions } from '../types';
import type { CallPrefixSubstitution } from '../substitution';
import type {
  BackupStore,
  FileReport,
  FileTransform,
  RunOptions,
  RunSummary,
  SourceStore,
  TransformOutcome
} from './types';

import {
  BackupFailureError,
  IOFailureError,
  RewriteError,
  RewriteFailureError,
  describeError
} from '../errors';
import { createSilentLogger } from '../logger';
import { rewriteSource } from '../rewriter';
import { substituteCallPrefix } from '../substitution';
import { createSiblingBackup } from './backup';
import { mapWithConcurrency } from './pool';
import { createFileSourceStore } from './store';

export type {
  BackupStore,
  FileReport,
  FileStatus,
  FileTransform,
  RunOptions,
  RunSummary,
  SourceStore,
  TransformOutcome
} from './types';
export { createFileSourceStore } from './store';
export { createSiblingBackup } from './backup';
export { mapWithConcurrency } from './pool';
export { walkSourceFiles, expandPaths, DEFAULT_EXCLUDED_DIRECTORIES } from './walker';
export type { WalkOptions } from './walker';

const DEFAULT_CONCURRENCY = 4;

type FileContext = {
  transform: FileTransform;
  store: SourceStore;
  backup: BackupStore;
  logger: Logger;
  dryRun: boolean;
};

function failedReport(
  path: string,
  error: unknown,
  fallback: (cause: unknown) => RewriteError
): FileReport {
  const failure = error instanceof RewriteError ? error : fallback(error);
  return {
    path,
    status: 'failed',
    count: 0,
    written: false,
    diagnostics: [],
    error: { kind: failure.kind, message: describeError(failure) }
  };
}

/**
 * Processes one file: read → transform → backup → write.
 *
 * The new text is computed completely in memory before anything is written;
 * a backup failure prevents the write. See {@link PerFileAtomicityPolicy}.
 */
async function processFile(path: string, context: FileContext): Promise<FileReport> {
  const { transform, store, backup, logger, dryRun } = context;

  // 1. Read
  let source: string;
  try {
    source = await store.read(path);
  } catch (error) {
    return failedReport(path, error, cause => new IOFailureError(path, 'read', { cause }));
  }

  // 2. Transform (pure, in memory)
  let outcome: TransformOutcome;
  try {
    outcome = transform(source, path);
  } catch (error) {
    return failedReport(
      path,
      error,
      cause => new RewriteFailureError(`Cannot rewrite "${path}".`, { cause })
    );
  }

  for (const diagnostic of outcome.diagnostics) {
    if (diagnostic.kind === 'Skipped') continue;
    logger.warn(
      { path, line: diagnostic.line, kind: diagnostic.kind, reason: diagnostic.reason },
      diagnostic.message
    );
  }

  if (!outcome.changed) {
    return {
      path,
      status: 'unchanged',
      count: 0,
      written: false,
      diagnostics: outcome.diagnostics
    };
  }

  if (dryRun) {
    return {
      path,
      status: 'rewritten',
      count: outcome.count,
      written: false,
      diagnostics: outcome.diagnostics
    };
  }

  // 3. Backup (abort the write on failure)
  try {
    await backup.save(path, source);
  } catch (error) {
    return failedReport(path, error, cause => new BackupFailureError(path, { cause }));
  }

  // 4. Single write of the final buffer
  try {
    await store.write(path, outcome.text);
  } catch (error) {
    return failedReport(path, error, cause => new IOFailureError(path, 'write', { cause }));
  }

  return {
    path,
    status: 'rewritten',
    count: outcome.count,
    written: true,
    diagnostics: outcome.diagnostics
  };
}

/**
 * Aggregates per-file reports into the run summary.
 */
export function summarizeRun(files: FileReport[]): RunSummary {
  return {
    filesScanned: files.length,
    filesChanged: files.filter(file => file.status === 'rewritten').length,
    filesFailed: files.filter(file => file.status === 'failed').length,
    totalRewrites: files.reduce((total, file) => total + file.count, 0),
    files
  };
}

/**
 * Applies a per-file transform to every path with a bounded worker pool.
 *
 * Run contract
 * ------------
 * - Each file is independent: a failure (`IOFailure`, `BackupFailure`,
 *   `RewriteFailure`) is reported for that file and the run continues.
 * - Unchanged files are neither backed up nor written.
 * - Reports are collected per file and summarized once the pool drains; no
 *   counter is shared between workers.
 *
 * @param paths - Files to process (expanded by the caller's walker).
 * @param transform - Pure text transform.
 * @param options - Concurrency, dry-run mode and collaborators.
 */
export async function runFileTransform(
  paths: readonly string[],
  transform: FileTransform,
  options: RunOptions = {}
): Promise<RunSummary> {
  const logger = options.logger ?? createSilentLogger();
  const context: FileContext = {
    transform,
    store: options.store ?? createFileSourceStore(),
    backup: options.backup ?? createSiblingBackup(),
    logger,
    dryRun: options.dryRun ?? false
  };

  const files = await mapWithConcurrency(
    paths,
    options.concurrency ?? DEFAULT_CONCURRENCY,
    async path => {
      const report = await processFile(path, context);

      if (report.status === 'failed') {
        logger.error({ path, kind: report.error?.kind }, report.error?.message ?? 'failed');
      } else if (report.status === 'rewritten') {
        logger.info(
          { path, count: report.count, written: report.written },
          report.written ? 'rewrote file' : 'would rewrite file'
        );
      } else {
        logger.debug({ path }, 'unchanged');
      }

      return report;
    }
  );

  return summarizeRun(files);
}

/**
 * Rewrites construction expressions in every file.
 */
export function rewriteFiles(
  paths: readonly string[],
  rewriteOptions: RewriteOptions,
  options: RunOptions = {}
): Promise<RunSummary> {
  return runFileTransform(
    paths,
    source => {
      const result = rewriteSource(source, rewriteOptions);
      return {
        text: result.text,
        changed: result.changed,
        count: result.rewrites.length,
        diagnostics: result.diagnostics
      };
    },
    options
  );
}

/**
 * Renames call prefixes (e.g. `console.log(`) in every file.
 */
export function substituteFiles(
  paths: readonly string[],
  substitution: CallPrefixSubstitution,
  options: RunOptions = {}
): Promise<RunSummary> {
  return runFileTransform(
    paths,
    source => {
      const { text, count } = substituteCallPrefix(source, substitution);
      return { text, changed: count > 0, count, diagnostics: [] };
    },
    options
  );
}
