export type {
  Span,
  Field,
  Rewrite,
  QuoteForm,
  LexicalGrammar,
  OptionalParameter,
  RewriteRule,
  LiteralShape,
  RewriteOptions,
  ScanResult,
  MalformedReason,
  ExtractResult,
  SkipReason,
  RewriteDecision,
  ConstructionSite,
  DiagnosticKind,
  Diagnostic,
  SourceRewriteResult
} from './types';
export { DEFAULT_GRAMMAR, resolveGrammar, defineRule, defineShape } from './types';

export { scanConstruction, findMarker, findClosingDelimiter } from './scanner';
export { extractFields } from './extractor';
export { decideRewrite } from './policy';
export { renderHelperCall, renderRewrite, normalizeLineBreaks } from './emitter';
export { resolveSite } from './site';
export { declaresHelper, hasHelperDeclarations, needsHelperDeclaration } from './guard';
export { rewriteSource } from './rewriter';
export { substituteCallPrefix, DEFAULT_METHODS } from './substitution';
export type { CallPrefixSubstitution } from './substitution';

export {
  runFileTransform,
  rewriteFiles,
  substituteFiles,
  summarizeRun,
  createFileSourceStore,
  createSiblingBackup,
  walkSourceFiles,
  expandPaths
} from './runner';
export type {
  BackupStore,
  FileReport,
  FileStatus,
  FileTransform,
  RunOptions,
  RunSummary,
  SourceStore,
  TransformOutcome,
  WalkOptions
} from './runner';

export {
  defineConfig,
  loadConfig,
  parseConfig,
  toRewriteOptions,
  validateRule,
  validateShape,
  validateRewriteOptions
} from './config';
export type { LoadedConfig, RunConfig, RunConfigInput } from './config';

export {
  RewriteError,
  BackupFailureError,
  IOFailureError,
  RewriteFailureError,
  ConfigError
} from './errors';
export type { RewriteErrorKind } from './errors';

export { createLogger, createSilentLogger } from './logger';
export type { Logger, LogLevel } from './logger';

export { formatRunSummary, formatDiagnostic } from './report';
