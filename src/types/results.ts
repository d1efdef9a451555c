import type { Field, Rewrite, Span } from './primitives';
import type { RewriteRule } from './rules';
import type { Simplify } from './types-helper';

/**
 * Outcome of a single scanner call.
 *
 * - `found`: a balanced construction expression.
 * - `not-found`: no further marker; the caller stops scanning.
 * - `unterminated`: a marker whose body never balances before end-of-buffer.
 *   The caller treats the remainder of the buffer as unmatched.
 */
export type ScanResult =
  | {
      kind: 'found';
      span: Span;

      /**
       * Offset just past the opening delimiter.
       */
      bodyStart: number;
    }
  | { kind: 'not-found' }
  | { kind: 'unterminated'; start: number };

export type MalformedReason =
  | 'missing-separator'
  | 'invalid-name'
  | 'missing-value'
  | 'duplicate-field';

/**
 * Outcome of field extraction for one span.
 */
export type ExtractResult =
  | { kind: 'ok'; fields: Field[] }
  | {
      kind: 'malformed';
      reason: MalformedReason;

      /**
       * The segment text that could not be split (comments removed, trimmed).
       */
      segment: string;
    };

export type SkipReason =
  /**
   * The literal has no fields; it is already in output form
   * (e.g. `d := &Device{}` inside a helper body), or the rendered
   * replacement equals the original text.
   */
  | 'already-rewritten'

  /**
   * No rule's required fields are all present.
   */
  | 'no-matching-rule'

  /**
   * The literal sits in an expression position (call argument, return
   * value) and has extra fields: there is no receiver to assign them to.
   */
  | 'no-receiver'

  /**
   * The literal lies in the body of the helper the matched rule would call;
   * rewriting it would make the helper call itself.
   */
  | 'inside-helper';

/**
 * Output of the rewrite policy.
 */
export type RewriteDecision =
  | {
      kind: 'rewrite';
      rule: RewriteRule;

      /**
       * Fields consumed as helper arguments, in the rule's parameter order.
       */
      coreFields: Field[];

      /**
       * Remaining fields, in source order.
       */
      extraFields: Field[];
    }
  | { kind: 'skip'; reason: Exclude<SkipReason, 'no-receiver' | 'inside-helper'> };

/**
 * Where a construction expression sits in its statement.
 */
export type ConstructionSite =
  | {
      kind: 'declaration';

      /**
       * Left-hand side of the declaration or assignment (e.g. `d`,
       * `cfg.Device`); receives the extra-field assignments.
       */
      receiver: string;

      /**
       * Leading whitespace of the statement's line.
       */
      indent: string;
    }
  | { kind: 'inline'; indent: string };

export type DiagnosticKind =
  | 'MalformedLiteral'
  | 'UnterminatedLiteral'
  | 'Skipped';

/**
 * A per-literal finding surfaced with the file's report.
 */
export type Diagnostic = Simplify<{
  kind: DiagnosticKind;
  marker: string;

  /**
   * 1-based line of the literal's marker.
   */
  line: number;

  /**
   * Machine-readable detail: a {@link MalformedReason}, a
   * {@link SkipReason}, or `'end-of-buffer'`.
   */
  reason: string;

  message: string;
}>;

/**
 * Result of rewriting one source buffer.
 */
export type SourceRewriteResult = {
  /**
   * The new buffer. Identical (`===`) to the input when nothing changed.
   */
  text: string;

  changed: boolean;

  /**
   * Applied rewrites, grouped by pass and ascending within a pass.
   */
  rewrites: Rewrite[];

  /**
   * Helper names whose declaration was inserted.
   */
  helpersInserted: string[];

  diagnostics: Diagnostic[];
};
