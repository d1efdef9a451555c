import type { BalancedSpanDefinition } from '../architecture';
import type { Simplify } from './types-helper';

/**
 * A half-open `[start, end)` offset pair into a source buffer.
 *
 * Spans returned by the scanner cover a whole construction expression,
 * marker and delimiters included, and are always balanced.
 *
 * @see {@link BalancedSpanDefinition}
 */
export type Span = {
  start: number;
  end: number;
};

/**
 * A single `name: value` pair of a construction expression.
 */
export type Field = {
  /**
   * The field identifier (e.g. `Serial`). Unique within one literal.
   */
  name: string;

  /**
   * Value text between the name/value separator and the terminating
   * comma (or closing delimiter).
   *
   * - Surrounding whitespace is trimmed.
   * - Comments are removed.
   * - Internal line breaks are preserved; the emitter normalizes them.
   */
  rawValue: string;

  /**
   * Where the value lives in the source buffer (trimmed of whitespace and
   * surrounding comments).
   */
  valueSpan: Span;
};

/**
 * The atomic unit applied to a buffer.
 *
 * Rewrites produced by one pass are non-overlapping and ascending; the
 * rewriter rebuilds the buffer left-to-right instead of shifting offsets.
 */
export type Rewrite = Simplify<{
  /**
   * The matched construction expression in the buffer of the pass that
   * produced this rewrite.
   */
  span: Span;

  /**
   * The text spliced in place of `span`.
   */
  replacementText: string;

  /**
   * Helper invoked by the replacement.
   */
  helperName: string;

  /**
   * The construction marker of the shape that matched (e.g. `&Device`).
   */
  marker: string;

  /**
   * 1-based line of `span.start`.
   */
  line: number;
}>;
