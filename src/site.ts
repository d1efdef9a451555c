import type { ConstructionSite, LexicalGrammar, Span } from './types';

import { DEFAULT_GRAMMAR } from './types';
import { readLexeme } from './scanner';

/**
 * Statement prefix that turns a literal into a declaration site:
 *
 *   d := &Device{...}
 *   d = &Device{...}
 *   var d = &Device{...}
 *   cfg.Device = &Device{...}
 *
 * Group 1: indentation. Group 2: receiver (identifier or selector chain).
 */
const DECLARATION_PREFIX =
  /^([ \t]*)(?:var[ \t]+)?([A-Za-z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*)[ \t]*:?=[ \t]*$/;

const LEADING_WHITESPACE = /^[ \t]*/;

/**
 * Checks whether `offset` sits directly inside a block, i.e. the innermost
 * delimiter still open at `offset` is the block opener.
 *
 * Package level (nothing open) and grouped declarations such as `var ( ... )`
 * or a call's argument list (a parenthesis open) are not statement positions.
 */
function isInsideBlock(
  buffer: string,
  offset: number,
  grammar: LexicalGrammar
): boolean {
  const pairs: ReadonlyArray<readonly [string, string]> = [
    [grammar.open, grammar.close],
    ['(', ')'],
    ['[', ']']
  ];
  const open: string[] = [];
  let index = 0;

  while (index < offset) {
    const lexeme = readLexeme(buffer, index, offset, grammar);

    if (lexeme.kind === 'code') {
      for (const [opener, closer] of pairs) {
        if (buffer.startsWith(opener, index)) {
          open.push(opener);
          break;
        }
        if (buffer.startsWith(closer, index)) {
          open.pop();
          break;
        }
      }
    }

    index = lexeme.end;
  }

  return open.at(-1) === grammar.open;
}

/**
 * Classifies where a construction expression sits.
 *
 * The text between the start of the literal's line and the marker must be
 * exactly `<receiver> :=` (or `=`, optionally behind `var`), and the line
 * must be a statement of a block (a function body). Only then is the literal
 * a `declaration` whose extra fields can be assigned to the receiver.
 * Anything else (a call argument, a `return`, a composite element, a
 * package-level `var`) is `inline`.
 *
 * @param buffer - Source text.
 * @param span - The literal's span.
 */
export function resolveSite(
  buffer: string,
  span: Span,
  grammar: LexicalGrammar = DEFAULT_GRAMMAR
): ConstructionSite {
  const lineStart = buffer.lastIndexOf('\n', span.start - 1) + 1;
  const prefix = buffer.slice(lineStart, span.start);

  const declaration = DECLARATION_PREFIX.exec(prefix);
  if (declaration && isInsideBlock(buffer, lineStart, grammar)) {
    const [, indent = '', receiver = ''] = declaration;
    return { kind: 'declaration', receiver, indent };
  }

  const [indent = ''] = LEADING_WHITESPACE.exec(prefix) ?? [];
  return { kind: 'inline', indent };
}

/**
 * 1-based line number of `offset`.
 */
export function lineOf(buffer: string, offset: number): number {
  let line = 1;
  let index = buffer.indexOf('\n');

  while (index !== -1 && index < offset) {
    line++;
    index = buffer.indexOf('\n', index + 1);
  }

  return line;
}
