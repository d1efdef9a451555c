import { Command, InvalidArgumentError, Option } from 'commander';

import type { LoadedConfig } from '../config';
import type { LogLevel, Logger } from '../logger';
import type { BackupStore, RunSummary, SourceStore } from '../runner';
import { DEFAULT_CONFIG_FILE, loadConfig, toRewriteOptions } from '../config';
import { LOG_LEVELS, createLogger } from '../logger';
import { formatActionableDiagnostics, formatRunSummary } from '../report';
import {
  DEFAULT_EXCLUDED_DIRECTORIES,
  createSiblingBackup,
  expandPaths,
  rewriteFiles,
  substituteFiles
} from '../runner';
import { DEFAULT_METHODS } from '../substitution';

/**
 * Collaborators of the command-line program. Only `print` is required; the
 * rest default to the real process, file system and logger.
 */
export type ProgramContext = {
  /**
   * Receives every line meant for stdout.
   */
  print: (text: string) => void;

  setExitCode?: (code: number) => void;
  createLogger?: (level: LogLevel) => Logger;
  readConfig?: (path: string) => Promise<LoadedConfig>;
  store?: SourceStore;
  backup?: BackupStore;
};

type CommonOptions = {
  dryRun?: boolean;
  concurrency?: number;
  ext?: string[];
  logLevel?: LogLevel;
};

type RewriteCommandOptions = CommonOptions & {
  config: string;
};

type SubstituteCommandOptions = CommonOptions & {
  from: string;
  to: string;
  methods: string[];
  backupSuffix: string;
};

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function addCommonOptions(command: Command): Command {
  return command
    .option('--dry-run', 'Compute every change without writing or backing up')
    .option('--concurrency <n>', 'Files processed at once', parseConcurrency)
    .option('--ext <extensions...>', 'File extensions collected from directories')
    .addOption(new Option('--log-level <level>', 'Log level').choices(LOG_LEVELS));
}

/**
 * Builds the `literal-rewrite` program.
 *
 * Commands
 * --------
 * - `rewrite <paths...>`: structural rewrite of construction expressions,
 *   driven by the JSON configuration (`--config`).
 * - `substitute <paths...>`: verbatim call-prefix renaming
 *   (`--from log --to logger`).
 *
 * Both print the run summary followed by the actionable diagnostics, and set
 * exit code 1 when a file failed.
 */
export function createProgram(context: ProgramContext): Command {
  const setExitCode =
    context.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });
  const makeLogger = context.createLogger ?? createLogger;
  const readConfig = context.readConfig ?? loadConfig;

  const finish = (summary: RunSummary): void => {
    context.print(formatRunSummary(summary));
    for (const line of formatActionableDiagnostics(summary)) {
      context.print(line);
    }
    if (summary.filesFailed > 0) setExitCode(1);
  };

  const program = new Command();

  program
    .name('literal-rewrite')
    .description('Rewrite composite-literal construction expressions into helper calls')
    .version('0.1.0');

  addCommonOptions(
    program
      .command('rewrite')
      .description('Replace construction expressions with helper constructor calls')
      .argument('<paths...>', 'Files or directories')
  )
    .option('-c, --config <file>', 'Run configuration (JSON)', DEFAULT_CONFIG_FILE)
    .action(async (paths: string[], options: RewriteCommandOptions) => {
      const { config, warnings } = await readConfig(options.config);
      const logger = makeLogger(options.logLevel ?? config.logLevel);

      for (const warning of warnings) logger.warn(warning);

      const files = await expandPaths(paths, {
        extensions: options.ext ?? config.walk.extensions,
        excludeDirectories: config.walk.excludeDirectories,
        skipMinified: config.walk.skipMinified,
        logger
      });

      const summary = await rewriteFiles(files, toRewriteOptions(config), {
        concurrency: options.concurrency ?? config.concurrency,
        dryRun: options.dryRun ?? false,
        store: context.store,
        backup: context.backup ?? createSiblingBackup(config.backupSuffix),
        logger
      });

      finish(summary);
    });

  addCommonOptions(
    program
      .command('substitute')
      .description('Rename call prefixes, e.g. log.info( to logger.info(')
      .argument('<paths...>', 'Files or directories')
  )
    .requiredOption('--from <prefix>', 'Receiver to replace')
    .requiredOption('--to <prefix>', 'Replacement receiver')
    .option('--methods <names...>', 'Method names to rename', [...DEFAULT_METHODS])
    .option('--backup-suffix <suffix>', 'Suffix of sibling backups', '.bak')
    .action(async (paths: string[], options: SubstituteCommandOptions) => {
      const logger = makeLogger(options.logLevel ?? 'info');

      const files = await expandPaths(paths, {
        extensions: options.ext ?? ['.js'],
        excludeDirectories: DEFAULT_EXCLUDED_DIRECTORIES,
        logger
      });

      const summary = await substituteFiles(
        files,
        { from: options.from, to: options.to, methods: options.methods },
        {
          concurrency: options.concurrency,
          dryRun: options.dryRun ?? false,
          store: context.store,
          backup: context.backup ?? createSiblingBackup(options.backupSuffix),
          logger
        }
      );

      finish(summary);
    });

  return program;
}
