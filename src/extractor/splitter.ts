import type { LexicalGrammar, Span } from '../types';

import { readLexeme } from '../scanner';

const NESTING_OPENERS = '([{';
const NESTING_CLOSERS = ')]}';

/**
 * Splits `[start, end)` on a separator at nesting depth zero.
 *
 * Depth is tracked over all bracket pairs (`()`, `[]`, `{}`) plus the
 * grammar's own delimiters, so `max(1, 2)` or `map[string]int{"a": 1, "b": 2}`
 * stay in one segment. Separators inside strings or comments never split.
 *
 * Segments are returned as raw ranges, including whitespace and comments;
 * the trailing segment after a final separator is returned as well (it is
 * usually blank and dropped by the caller).
 */
export function splitTopLevel(
  buffer: string,
  start: number,
  end: number,
  separator: string,
  grammar: LexicalGrammar
): Span[] {
  const segments: Span[] = [];
  let depth = 0;
  let segmentStart = start;
  let index = start;

  while (index < end) {
    const lexeme = readLexeme(buffer, index, end, grammar);

    if (lexeme.kind === 'code') {
      const char = buffer.charAt(index);

      if (NESTING_OPENERS.includes(char) || buffer.startsWith(grammar.open, index)) {
        depth++;
      } else if (
        NESTING_CLOSERS.includes(char) ||
        buffer.startsWith(grammar.close, index)
      ) {
        depth--;
      } else if (depth === 0 && buffer.startsWith(separator, index)) {
        segments.push({ start: segmentStart, end: index });
        segmentStart = index + separator.length;
        index = segmentStart;
        continue;
      }
    }

    index = lexeme.end;
  }

  segments.push({ start: segmentStart, end });
  return segments;
}

/**
 * Returns the offset of the first `separator` at nesting depth zero within
 * `[start, end)`, or `-1`.
 */
export function findTopLevel(
  buffer: string,
  start: number,
  end: number,
  separator: string,
  grammar: LexicalGrammar
): number {
  const [first] = splitTopLevel(buffer, start, end, separator, grammar);
  return first && first.end < end ? first.end : -1;
}
