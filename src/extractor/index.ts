import type {
  ExtractResult,
  Field,
  LexicalGrammar,
  MalformedReason,
  Span
} from '../types';

import { stripComments, trimToCode } from '../scanner';
import { findTopLevel, splitTopLevel } from './splitter';

export { splitTopLevel, findTopLevel } from './splitter';

const FIELD_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

function malformed(reason: MalformedReason, segment: string): ExtractResult {
  return { kind: 'malformed', reason, segment };
}

/**
 * Splits a construction expression into its ordered `name: value` fields.
 *
 * Pipeline
 * --------
 * 1. Body
 *    The region between the opening delimiter that follows the marker and
 *    the closing delimiter that ends the span.
 *
 * 2. Segments
 *    The body is split on item separators at nesting depth zero. Segments
 *    holding only whitespace or comments (e.g. after a trailing separator)
 *    are dropped.
 *
 * 3. Fields
 *    Each segment is split on its first top-level name/value separator.
 *    - Name: comments removed, trimmed, must be an identifier.
 *    - Value: comments removed, trimmed; internal line breaks preserved.
 *
 * Malformed input
 * ---------------
 * The first segment that cannot be split (no separator, e.g. a positional
 * literal `&Device{"s1", "10.0.0.1"}`), has an invalid name or an empty value,
 * or repeats an earlier name yields `malformed`. The caller leaves the whole
 * span untouched rather than guessing.
 *
 * @param buffer - Source text.
 * @param span - A balanced span returned by the scanner.
 * @param grammar - Lexical surface.
 */
export function extractFields(
  buffer: string,
  span: Span,
  grammar: LexicalGrammar
): ExtractResult {
  // 1. Body
  const bodyStart = buffer.indexOf(grammar.open, span.start) + grammar.open.length;
  const bodyEnd = span.end - grammar.close.length;

  // 2. Segments
  const segments = splitTopLevel(
    buffer,
    bodyStart,
    bodyEnd,
    grammar.itemSeparator,
    grammar
  ).filter(segment => {
    const code = trimToCode(buffer, segment.start, segment.end, grammar);
    return code.end > code.start;
  });

  // 3. Fields
  const fields: Field[] = [];
  const seen = new Set<string>();

  for (const segment of segments) {
    const separatorAt = findTopLevel(
      buffer,
      segment.start,
      segment.end,
      grammar.fieldSeparator,
      grammar
    );

    if (separatorAt === -1) {
      return malformed(
        'missing-separator',
        stripComments(buffer, segment.start, segment.end, grammar).trim()
      );
    }

    const name = stripComments(buffer, segment.start, separatorAt, grammar).trim();
    if (!FIELD_NAME.test(name)) {
      return malformed(
        'invalid-name',
        stripComments(buffer, segment.start, segment.end, grammar).trim()
      );
    }

    const valueStart = separatorAt + grammar.fieldSeparator.length;
    const valueSpan = trimToCode(buffer, valueStart, segment.end, grammar);
    const rawValue = stripComments(
      buffer,
      valueSpan.start,
      valueSpan.end,
      grammar
    ).trim();

    if (rawValue === '') {
      return malformed(
        'missing-value',
        stripComments(buffer, segment.start, segment.end, grammar).trim()
      );
    }

    if (seen.has(name)) {
      return malformed('duplicate-field', name);
    }

    seen.add(name);
    fields.push({ name, rawValue, valueSpan });
  }

  return { kind: 'ok', fields };
}
