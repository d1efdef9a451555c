/**
 * A quoted-literal form recognized by the lexical scanner.
 */
export type QuoteForm = {
  /**
   * Opening and closing character (e.g. `"`, `'`, `` ` ``).
   */
  char: string;

  /**
   * Whether a backslash escapes the next character inside the literal.
   * Raw strings (Go back-quotes) set this to `false`.
   */
  escapes: boolean;

  /**
   * Whether the literal may span lines. A non-multiline literal that meets a
   * line break before its closing quote ends at that line break.
   */
  multiline: boolean;
};

/**
 * The lexical surface the structural scan understands.
 *
 * The scan is grammar-agnostic: it never builds a syntax tree, it only needs
 * to know which regions are strings or comments (inert for nesting) and which
 * characters delimit a construction expression.
 */
export type LexicalGrammar = {
  /**
   * Opening delimiter of a construction expression body.
   * @default '{'
   */
  open: string;

  /**
   * Closing delimiter matching {@link LexicalGrammar.open}.
   * @default '}'
   */
  close: string;

  /**
   * Separator between a field name and its value.
   * @default ':'
   */
  fieldSeparator: string;

  /**
   * Separator between fields.
   * @default ','
   */
  itemSeparator: string;

  quotes: readonly QuoteForm[];

  /**
   * Line comment introducer, or `null` when the language has none.
   * @default '//'
   */
  lineComment: string | null;

  /**
   * Block comment delimiters, or `null` when the language has none.
   * @default ['/*', '*\/']
   */
  blockComment: readonly [string, string] | null;

  /**
   * Keyword introducing a function declaration; used to detect helpers that
   * are already declared in a file.
   * @default 'func'
   */
  declarationKeyword: string;
};

/**
 * Brace-delimited, C-family lexical grammar (Go by default).
 */
export const DEFAULT_GRAMMAR: LexicalGrammar = {
  open: '{',
  close: '}',
  fieldSeparator: ':',
  itemSeparator: ',',
  quotes: [
    { char: '"', escapes: true, multiline: false },
    { char: "'", escapes: true, multiline: false },
    { char: '`', escapes: false, multiline: true }
  ],
  lineComment: '//',
  blockComment: ['/*', '*/'],
  declarationKeyword: 'func'
};

/**
 * Completes a partial grammar with {@link DEFAULT_GRAMMAR}.
 */
export function resolveGrammar(
  grammar: Partial<LexicalGrammar> | undefined
): LexicalGrammar {
  return { ...DEFAULT_GRAMMAR, ...grammar };
}
