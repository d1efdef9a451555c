import type { LexicalGrammar, QuoteForm } from '../types';

/**
 * A lexical unit as seen by the structural scan.
 *
 * - `code`: a single character outside any string or comment.
 * - `string`: a whole quoted literal, quotes included.
 * - `comment`: a whole comment; a line comment stops before its line break.
 *
 * `end` is exclusive. `terminated` is `false` when a string or block comment
 * ran into the scan limit before closing.
 */
export type Lexeme = {
  kind: 'code' | 'string' | 'comment';
  start: number;
  end: number;
  terminated: boolean;
};

const IDENTIFIER_CHAR = /[A-Za-z0-9_$]/;

export function isIdentifierChar(char: string | undefined): boolean {
  return char !== undefined && IDENTIFIER_CHAR.test(char);
}

function findQuoteForm(
  char: string,
  grammar: LexicalGrammar
): QuoteForm | undefined {
  return grammar.quotes.find(quote => quote.char === char);
}

function readQuoted(
  buffer: string,
  start: number,
  limit: number,
  quote: QuoteForm
): Lexeme {
  let index = start + quote.char.length;

  while (index < limit) {
    const char = buffer[index];

    if (quote.escapes && char === '\\') {
      index += 2;
      continue;
    }

    if (buffer.startsWith(quote.char, index)) {
      return {
        kind: 'string',
        start,
        end: index + quote.char.length,
        terminated: true
      };
    }

    // A single-line literal cannot swallow the rest of the file.
    if (!quote.multiline && char === '\n') {
      return { kind: 'string', start, end: index, terminated: false };
    }

    index++;
  }

  return { kind: 'string', start, end: limit, terminated: false };
}

/**
 * Reads the lexeme starting at `index`, never reading past `limit`.
 *
 * @param buffer - Source text.
 * @param index - Position of the lexeme's first character (`index < limit`).
 * @param limit - Exclusive upper bound of the region being scanned.
 * @param grammar - Lexical surface (quotes, comment introducers).
 */
export function readLexeme(
  buffer: string,
  index: number,
  limit: number,
  grammar: LexicalGrammar
): Lexeme {
  const { lineComment, blockComment } = grammar;

  if (lineComment && buffer.startsWith(lineComment, index)) {
    const lineBreak = buffer.indexOf('\n', index);
    const end = lineBreak === -1 || lineBreak > limit ? limit : lineBreak;
    return { kind: 'comment', start: index, end, terminated: true };
  }

  if (blockComment && buffer.startsWith(blockComment[0], index)) {
    const [opener, closer] = blockComment;
    const closeAt = buffer.indexOf(closer, index + opener.length);
    if (closeAt === -1 || closeAt + closer.length > limit) {
      return { kind: 'comment', start: index, end: limit, terminated: false };
    }
    return {
      kind: 'comment',
      start: index,
      end: closeAt + closer.length,
      terminated: true
    };
  }

  const quote = findQuoteForm(buffer.charAt(index), grammar);
  if (quote) {
    return readQuoted(buffer, index, limit, quote);
  }

  return { kind: 'code', start: index, end: index + 1, terminated: true };
}

/**
 * Returns `buffer[start, end)` with every comment removed.
 *
 * Strings are copied verbatim; a line comment's terminating line break is
 * kept, so line structure survives.
 */
export function stripComments(
  buffer: string,
  start: number,
  end: number,
  grammar: LexicalGrammar
): string {
  let result = '';
  let index = start;

  while (index < end) {
    const lexeme = readLexeme(buffer, index, end, grammar);
    if (lexeme.kind !== 'comment') {
      result += buffer.slice(lexeme.start, lexeme.end);
    }
    index = lexeme.end;
  }

  return result;
}

/**
 * Narrows `[start, end)` to the code it contains, dropping leading and
 * trailing whitespace and comments.
 *
 * Returns an empty range at `start` when the region holds no code.
 */
export function trimToCode(
  buffer: string,
  start: number,
  end: number,
  grammar: LexicalGrammar
): { start: number; end: number } {
  let first = -1;
  let last = start;
  let index = start;

  while (index < end) {
    const lexeme = readLexeme(buffer, index, end, grammar);
    const isCode =
      lexeme.kind === 'string' ||
      (lexeme.kind === 'code' && buffer.charAt(lexeme.start).trim() !== '');

    if (isCode) {
      if (first === -1) first = lexeme.start;
      last = lexeme.end;
    }

    index = lexeme.end;
  }

  return first === -1 ? { start, end: start } : { start: first, end: last };
}
