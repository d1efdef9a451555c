import type { Diagnostic } from './types';
import type { FileReport, RunSummary } from './runner';

/**
 * Report policy
 * -------------
 * Not every finding is actionable. The summary separates them by what the
 * user can do about it:
 *
 * - Failures (`IOFailure`, `BackupFailure`): the file was not written.
 *   Re-running after fixing permissions or disk space is safe, because
 *   rewriting is convergent.
 *
 * - `MalformedLiteral` / `UnterminatedLiteral`: the literal was left
 *   unchanged and needs a manual edit (or is not a construction expression
 *   at all, e.g. a marker inside generated code).
 *
 * - `Skipped`: expected outcomes (`already-rewritten`, `no-matching-rule`,
 *   `no-receiver`, `inside-helper`). Counted, never previewed.
 */

export type RunReportOptions = {
  /**
   * Maximum number of failing files to list in the summary.
   * @default 5
   */
  maxPreviewPaths?: number;
};

/**
 * Counts entries per key, in first-seen order (`IOFailure=2, BackupFailure=1`).
 *
 * @returns Formatted distribution; undefined for an empty input.
 */
function formatDistribution(keys: readonly string[]): string | undefined {
  if (keys.length === 0) return undefined;

  const countByKey = new Map<string, number>();
  for (const key of keys) {
    countByKey.set(key, (countByKey.get(key) ?? 0) + 1);
  }

  return Array.from(countByKey.entries())
    .map(([key, count]) => `${key}=${count}`)
    .join(', ');
}

/**
 * Formats a limited preview list of failed files with their error kinds.
 */
function formatFailurePreview(
  failed: readonly FileReport[],
  limit: number
): string | undefined {
  if (failed.length === 0 || limit <= 0) return undefined;

  const items = failed
    .slice(0, limit)
    .map(file => `"${file.path}" (${file.error?.kind ?? 'unknown'})`);

  // Truncation indicator
  if (failed.length > limit) {
    items.push(`… (${failed.length - limit} more)`);
  }

  return `preview: ${items.join(', ')}`;
}

/**
 * Formats one diagnostic as `path:line: Kind (reason) message`.
 */
export function formatDiagnostic(path: string, diagnostic: Diagnostic): string {
  return `${path}:${diagnostic.line}: ${diagnostic.kind} (${diagnostic.reason}) ${diagnostic.message}`;
}

/**
 * Formats the end-of-run summary printed by the CLI.
 *
 * Layout
 * ------
 * ```
 * Summary: scanned=3, rewritten=1, failed=1, rewrites=2
 * failures: IOFailure=1
 * preview: "b.go" (IOFailure)
 * diagnostics: MalformedLiteral=1, Skipped=4
 * ```
 * Lines after the first appear only when they have content.
 *
 * @param summary - Aggregated run result.
 * @param options - Display configuration.
 */
export function formatRunSummary(
  summary: RunSummary,
  options: RunReportOptions = {}
): string {
  const failed = summary.files.filter(file => file.status === 'failed');

  const lines = [
    `Summary: scanned=${summary.filesScanned}, rewritten=${summary.filesChanged}, ` +
      `failed=${summary.filesFailed}, rewrites=${summary.totalRewrites}`
  ];

  const failures = formatDistribution(
    failed.map(file => file.error?.kind ?? 'unknown')
  );
  if (failures) lines.push(`failures: ${failures}`);

  const preview = formatFailurePreview(failed, options.maxPreviewPaths ?? 5);
  if (preview) lines.push(preview);

  const diagnostics = formatDistribution(
    summary.files.flatMap(file => file.diagnostics.map(diagnostic => diagnostic.kind))
  );
  if (diagnostics) lines.push(`diagnostics: ${diagnostics}`);

  return lines.join('\n');
}

/**
 * Lists the actionable diagnostics of a run (everything but `Skipped`), one
 * per line, in file order.
 */
export function formatActionableDiagnostics(summary: RunSummary): string[] {
  return summary.files.flatMap(file =>
    file.diagnostics
      .filter(diagnostic => diagnostic.kind !== 'Skipped')
      .map(diagnostic => formatDiagnostic(file.path, diagnostic))
  );
}
