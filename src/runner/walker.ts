import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';

import type { Logger } from '../logger';
import { createSilentLogger } from '../logger';

export type WalkOptions = {
  /**
   * File extensions to collect (e.g. `['.go']`).
   */
  extensions: readonly string[];

  /**
   * Directory names never descended into.
   * @default DEFAULT_EXCLUDED_DIRECTORIES
   */
  excludeDirectories?: readonly string[];

  /**
   * Skip files whose name contains `.min.`.
   * @default true
   */
  skipMinified?: boolean;

  logger?: Logger;
};

export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = [
  'static',
  'flatpickr',
  'vendor',
  'node_modules',
  'docs',
  '.git'
];

/**
 * Collects candidate source files below `root`, sorted by path.
 *
 * Filtering
 * ---------
 * - Directories named in `excludeDirectories` are pruned (matched by name,
 *   case-insensitively).
 * - Only names ending with one of `extensions` are kept.
 * - Minified files (`*.min.*`) are dropped unless `skipMinified` is `false`.
 *
 * A directory that cannot be read is logged as a warning and skipped; the
 * walk continues with its siblings.
 */
export async function walkSourceFiles(
  root: string,
  options: WalkOptions
): Promise<string[]> {
  const logger = options.logger ?? createSilentLogger();
  const excluded = new Set(
    (options.excludeDirectories ?? DEFAULT_EXCLUDED_DIRECTORIES).map(name =>
      name.toLowerCase()
    )
  );
  const skipMinified = options.skipMinified ?? true;
  const results: string[] = [];

  const visit = async (directory: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      logger.warn({ directory, err: error }, 'skipping unreadable directory');
      return;
    }

    for (const entry of entries) {
      const path = join(directory, entry.name);

      if (entry.isDirectory()) {
        if (!excluded.has(entry.name.toLowerCase())) await visit(path);
        continue;
      }

      if (!entry.isFile()) continue;
      if (skipMinified && entry.name.toLowerCase().includes('.min.')) continue;
      if (options.extensions.some(extension => entry.name.endsWith(extension))) {
        results.push(path);
      }
    }
  };

  await visit(root);
  return results.sort();
}

/**
 * Expands command-line operands: directories are walked, anything else is
 * kept as given (a missing file is then reported by the runner as an
 * `IOFailure`). Duplicates are dropped; first occurrence wins.
 */
export async function expandPaths(
  operands: readonly string[],
  options: WalkOptions
): Promise<string[]> {
  const expanded: string[] = [];

  for (const operand of operands) {
    const isDirectory = await stat(operand).then(
      stats => stats.isDirectory(),
      () => false
    );
    if (isDirectory) {
      expanded.push(...(await walkSourceFiles(operand, options)));
    } else {
      expanded.push(operand);
    }
  }

  return Array.from(new Set(expanded));
}
