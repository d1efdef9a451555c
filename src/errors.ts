import type { PerFileAtomicityPolicy } from './architecture';

/**
 * Error kinds thrown by the engine.
 *
 * - `BackupFailure` / `IOFailure` / `RewriteFailure`: fatal for one file; the
 *   runner reports the file as failed and continues with the next one.
 * - `ConfigError`: fatal for the run; raised before any file is touched.
 *
 * Literal-level problems (`MalformedLiteral`, `UnterminatedLiteral`) are not
 * thrown: the rewriter records them as diagnostics and keeps scanning.
 */
export type RewriteErrorKind =
  | 'BackupFailure'
  | 'IOFailure'
  | 'RewriteFailure'
  | 'ConfigError';

/**
 * Base class of every error the engine raises on purpose.
 *
 * `kind` is the discriminant callers branch on; `message` is prefixed with
 * `[literal-rewrite]`.
 */
export class RewriteError extends Error {
  readonly kind: RewriteErrorKind;

  constructor(kind: RewriteErrorKind, message: string, options?: ErrorOptions) {
    super(`[literal-rewrite] ${message}`, options);
    this.name = 'RewriteError';
    this.kind = kind;
  }
}

/**
 * The backup collaborator could not persist the original text.
 *
 * No write happens for the file. See {@link PerFileAtomicityPolicy}.
 */
export class BackupFailureError extends RewriteError {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super('BackupFailure', `Cannot back up "${path}"; the file was not written.`, options);
    this.name = 'BackupFailureError';
    this.path = path;
  }
}

export class IOFailureError extends RewriteError {
  readonly path: string;
  readonly operation: 'read' | 'write';

  constructor(path: string, operation: 'read' | 'write', options?: ErrorOptions) {
    super('IOFailure', `Cannot ${operation} "${path}".`, options);
    this.name = 'IOFailureError';
    this.path = path;
    this.operation = operation;
  }
}

/**
 * The in-memory transform of one file failed (e.g. rewriting did not
 * converge). The file is left untouched.
 */
export class RewriteFailureError extends RewriteError {
  constructor(message: string, options?: ErrorOptions) {
    super('RewriteFailure', message, options);
    this.name = 'RewriteFailureError';
  }
}

export class ConfigError extends RewriteError {
  constructor(message: string, options?: ErrorOptions) {
    super('ConfigError', message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Appends the cause's message to a short error description, for reports.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}
