import type { ConvergentRewritingLifecycle } from './architecture';
import type { LexicalGrammar, Span } from './types';

import { DEFAULT_GRAMMAR } from './types';
import {
  findClosingDelimiter,
  findMarker,
  isIdentifierChar,
  readLexeme
} from './scanner';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Checks whether `buffer` declares a function named `helperName`
 * (`func newTestDevice(` or, with type parameters, `func newTestDevice[`).
 */
export function declaresHelper(
  buffer: string,
  helperName: string,
  grammar: LexicalGrammar
): boolean {
  const pattern = new RegExp(
    `(^|[^\\w$])${escapeRegExp(grammar.declarationKeyword)}\\s+${escapeRegExp(helperName)}\\s*[(\\[<]`
  );
  return pattern.test(buffer);
}

/**
 * Checks whether `offset` lies in code rather than in a string or comment.
 */
function isCodeOffset(
  buffer: string,
  offset: number,
  grammar: LexicalGrammar
): boolean {
  let index = 0;

  while (index <= offset && index < buffer.length) {
    const lexeme = readLexeme(buffer, index, buffer.length, grammar);
    if (lexeme.end > offset) return lexeme.kind === 'code';
    index = lexeme.end;
  }

  return false;
}

/**
 * A declared helper's body, delimiters included.
 */
export type HelperBody = {
  helperName: string;
  span: Span;
};

/**
 * Locates the bodies of declared helpers.
 *
 * For each `func <name>(` the parameter list is balanced first (parameter
 * types may contain delimiters, e.g. `interface{}`), then the body is the
 * next delimited block. Declarations inside strings or comments are ignored.
 */
export function findHelperBodies(
  buffer: string,
  helperNames: readonly string[],
  grammar: LexicalGrammar
): HelperBody[] {
  const bodies: HelperBody[] = [];

  for (const helperName of new Set(helperNames)) {
    const pattern = new RegExp(
      `(^|[^\\w$])${escapeRegExp(grammar.declarationKeyword)}\\s+${escapeRegExp(helperName)}\\s*\\(`,
      'g'
    );

    for (const match of buffer.matchAll(pattern)) {
      const paramsOpen = (match.index ?? 0) + match[0].length - 1;
      if (!isCodeOffset(buffer, paramsOpen, grammar)) continue;

      const paramsEnd = findClosingDelimiter(buffer, paramsOpen, {
        ...grammar,
        open: '(',
        close: ')'
      });
      if (paramsEnd === null) continue;

      // Next opening delimiter in code: an empty marker matches it directly.
      const bodyOpen = findMarker(buffer, paramsEnd, '', grammar);
      if (bodyOpen === -1) continue;

      const bodyEnd = findClosingDelimiter(buffer, bodyOpen, grammar);
      if (bodyEnd === null) continue;

      bodies.push({ helperName, span: { start: bodyOpen, end: bodyEnd } });
    }
  }

  return bodies;
}

/**
 * Lists the helpers that still need a declaration in `buffer`.
 *
 * An empty result means every helper is already declared and no declaration
 * block must be inserted.
 *
 * @see {@link ConvergentRewritingLifecycle}
 */
export function needsHelperDeclaration(
  buffer: string,
  helperNames: readonly string[],
  grammar: LexicalGrammar
): string[] {
  return helperNames.filter(name => !declaresHelper(buffer, name, grammar));
}

/**
 * Boolean view of {@link needsHelperDeclaration}.
 */
export function hasHelperDeclarations(
  buffer: string,
  helperNames: readonly string[],
  grammar: LexicalGrammar
): boolean {
  return needsHelperDeclaration(buffer, helperNames, grammar).length === 0;
}

/**
 * Checks whether any construction marker occurs in code (outside strings
 * and comments). A buffer without candidates is never rewritten.
 */
export function hasCandidates(
  buffer: string,
  grammar: LexicalGrammar,
  markers: readonly string[]
): boolean {
  return markers.some(marker => findMarker(buffer, 0, marker, grammar) !== -1);
}

const HEADER_KEYWORDS = ['package', 'import'] as const;

function isHeaderClause(buffer: string, index: number): boolean {
  return HEADER_KEYWORDS.some(
    keyword =>
      buffer.startsWith(keyword, index) &&
      !isIdentifierChar(buffer[index + keyword.length])
  );
}

/**
 * Offset just past the line break that ends the header clause starting at
 * `index`. A parenthesized group (`import ( ... )`) ends at the first line
 * break after its closing parenthesis; comments and strings are read whole.
 */
function findClauseEnd(
  buffer: string,
  index: number,
  grammar: LexicalGrammar
): number {
  let depth = 0;
  let offset = index;

  while (offset < buffer.length) {
    const lexeme = readLexeme(buffer, offset, buffer.length, grammar);

    if (lexeme.kind === 'code') {
      const char = buffer.charAt(offset);
      if (char === '(') depth++;
      else if (char === ')') depth--;
      else if (char === '\n' && depth <= 0) return offset + 1;
    }

    offset = lexeme.end;
  }

  return buffer.length;
}

/**
 * Finds the stable insertion point for helper declarations: the offset just
 * after the last top-level `package` / `import` block of the file header.
 *
 * The header is read lexeme by lexeme: whitespace and comments (block
 * comments spanning several lines included) are skipped, parenthesized
 * import groups are balanced. Scanning stops at the first code that starts
 * neither a `package` nor an `import` clause.
 *
 * @returns Offset after the header's final line break, `buffer.length` when
 *          the header is the last line, or `0` when the file has no header.
 */
export function findHelperAnchor(
  buffer: string,
  grammar: LexicalGrammar = DEFAULT_GRAMMAR
): number {
  let anchor = 0;
  let offset = 0;

  while (offset < buffer.length) {
    const lexeme = readLexeme(buffer, offset, buffer.length, grammar);

    if (
      lexeme.kind === 'comment' ||
      (lexeme.kind === 'code' && buffer.charAt(offset).trim() === '')
    ) {
      offset = lexeme.end;
      continue;
    }

    if (lexeme.kind !== 'code' || !isHeaderClause(buffer, offset)) break;

    anchor = findClauseEnd(buffer, offset, grammar);
    offset = anchor;
  }

  return anchor;
}
