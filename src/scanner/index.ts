import type { BalancedSpanDefinition } from '../architecture';
import type { LexicalGrammar, ScanResult } from '../types';

import { isIdentifierChar, readLexeme } from './lexical';

export { readLexeme, stripComments, trimToCode, isIdentifierChar } from './lexical';
export type { Lexeme } from './lexical';

/**
 * Checks that a marker occurrence is not the tail of a longer identifier.
 *
 * `Device` must not match inside `TestDevice{`, while `&Device` (whose first
 * character is not an identifier character) needs no boundary.
 */
function isMarkerBoundary(
  buffer: string,
  index: number,
  marker: string
): boolean {
  if (!isIdentifierChar(marker.charAt(0))) return true;
  return !isIdentifierChar(buffer[index - 1]);
}

/**
 * Finds the next occurrence of `marker` immediately followed by the opening
 * delimiter, outside strings and comments.
 *
 * @param buffer - Source text.
 * @param from - Offset to start from; must not lie inside a string or comment.
 * @param marker - Prefix token of the construction expression.
 * @param grammar - Lexical surface.
 * @returns Offset of the marker's first character, or `-1`.
 */
export function findMarker(
  buffer: string,
  from: number,
  marker: string,
  grammar: LexicalGrammar
): number {
  const opener = marker + grammar.open;
  let index = from;

  while (index < buffer.length) {
    const lexeme = readLexeme(buffer, index, buffer.length, grammar);

    if (
      lexeme.kind === 'code' &&
      buffer.startsWith(opener, index) &&
      isMarkerBoundary(buffer, index, marker)
    ) {
      return index;
    }

    index = lexeme.end;
  }

  return -1;
}

/**
 * Finds the closing delimiter matching the opening delimiter at `openIndex`.
 *
 * Maintains a nesting counter: each opening delimiter increments it, each
 * closing delimiter decrements it, and delimiters inside strings or comments
 * are ignored. The scan succeeds when the counter returns to zero.
 *
 * @returns Offset just past the matching closer, or `null` when the buffer
 *          ends first.
 */
export function findClosingDelimiter(
  buffer: string,
  openIndex: number,
  grammar: LexicalGrammar
): number | null {
  let depth = 0;
  let index = openIndex;

  while (index < buffer.length) {
    const lexeme = readLexeme(buffer, index, buffer.length, grammar);

    if (lexeme.kind === 'code') {
      if (buffer.startsWith(grammar.open, index)) {
        depth++;
      } else if (buffer.startsWith(grammar.close, index)) {
        depth--;
        if (depth === 0) return index + grammar.close.length;
      }
    }

    index = lexeme.end;
  }

  return null;
}

/**
 * Scans forward from `fromPosition` for the next construction expression.
 *
 * 1. Locate the marker followed by the opening delimiter (outside strings
 *    and comments).
 * 2. Balance the delimiters from there.
 *
 * `not-found` means "no more candidates"; it is not an error. `unterminated`
 * reports a marker whose body never closes, so the caller can warn and leave
 * the remainder of the buffer untouched.
 *
 * @see {@link BalancedSpanDefinition}
 */
export function scanConstruction(
  buffer: string,
  fromPosition: number,
  marker: string,
  grammar: LexicalGrammar
): ScanResult {
  const start = findMarker(buffer, fromPosition, marker, grammar);
  if (start === -1) return { kind: 'not-found' };

  const openIndex = start + marker.length;
  const end = findClosingDelimiter(buffer, openIndex, grammar);
  if (end === null) return { kind: 'unterminated', start };

  return {
    kind: 'found',
    span: { start, end },
    bodyStart: openIndex + grammar.open.length
  };
}
