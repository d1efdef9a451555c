import type {
  ConstructionSite,
  Field,
  LexicalGrammar,
  RewriteRule
} from './types';

import { DEFAULT_GRAMMAR } from './types';
import { readLexeme } from './scanner';

const LINE_BREAK_RUN = /[ \t]*\r?\n\s*/g;

/**
 * Collapses every line break in `value` (with the indentation around it)
 * into a single space.
 *
 * String literals are copied verbatim, so a multi-line raw string keeps its
 * line breaks. Nothing else is reinterpreted: the value is only relocated.
 *
 * @example
 * normalizeLineBreaks('map[string]int{\n\t\t"x": 1,\n\t}')
 * // → 'map[string]int{ "x": 1, }'
 */
export function normalizeLineBreaks(
  value: string,
  grammar: LexicalGrammar = DEFAULT_GRAMMAR
): string {
  let result = '';
  let pendingCode = '';
  let index = 0;

  while (index < value.length) {
    const lexeme = readLexeme(value, index, value.length, grammar);

    if (lexeme.kind === 'code') {
      pendingCode += value.charAt(index);
    } else {
      result += pendingCode.replace(LINE_BREAK_RUN, ' ');
      pendingCode = '';
      result += value.slice(lexeme.start, lexeme.end);
    }

    index = lexeme.end;
  }

  return result + pendingCode.replace(LINE_BREAK_RUN, ' ');
}

/**
 * Renders `helperName(arg1, arg2, ...)`.
 *
 * Argument order: required fields, optional fields (value or fallback),
 * fixed arguments.
 *
 * @throws If a required field is missing from `coreFields` (the policy
 *         guarantees it is present).
 */
export function renderHelperCall(
  rule: RewriteRule,
  coreFields: readonly Field[],
  grammar: LexicalGrammar = DEFAULT_GRAMMAR
): string {
  const valueByName = new Map(
    coreFields.map(field => [
      field.name,
      normalizeLineBreaks(field.rawValue, grammar)
    ])
  );

  const required = rule.requiredFieldNames.map(name => {
    const value = valueByName.get(name);
    if (value === undefined) {
      throw new Error(
        `[literal-rewrite] Cannot render ${rule.helperName}: required field "${name}" is not among the core fields.`
      );
    }
    return value;
  });

  const optional = (rule.optionalFields ?? []).map(
    parameter => valueByName.get(parameter.field) ?? parameter.fallback
  );

  const args = [...required, ...optional, ...(rule.fixedArguments ?? [])];

  return `${rule.helperName}(${args.join(', ')})`;
}

/**
 * Renders the replacement text for one construction expression.
 *
 * Output
 * ------
 * 1. The helper call, replacing the literal in place (the declaration prefix
 *    `d := ` stays outside the span and is not re-emitted).
 * 2. One `<receiver>.<Field> = <value>` line per extra field, indented like
 *    the statement holding the literal.
 *
 * @example
 * // site: { kind: 'declaration', receiver: 'w', indent: '\t' }
 * // → 'newWidget("a", 3)\n\tw.Color = "red"'
 *
 * @throws If extra fields are given for an inline site (no receiver).
 */
export function renderRewrite(
  site: ConstructionSite,
  rule: RewriteRule,
  coreFields: readonly Field[],
  extraFields: readonly Field[],
  grammar: LexicalGrammar = DEFAULT_GRAMMAR
): string {
  const call = renderHelperCall(rule, coreFields, grammar);
  if (extraFields.length === 0) return call;

  if (site.kind !== 'declaration') {
    throw new Error(
      `[literal-rewrite] Cannot render ${rule.helperName}: extra fields need a receiver, but the literal is inline.`
    );
  }

  const assignments = extraFields.map(
    field =>
      `${site.indent}${site.receiver}.${field.name} = ${normalizeLineBreaks(field.rawValue, grammar)}`
  );

  return [call, ...assignments].join('\n');
}

/**
 * Joins helper declarations into the block inserted after the import
 * section, separated by blank lines.
 */
export function renderHelperBlock(declarations: readonly string[]): string {
  return declarations.map(declaration => declaration.trim()).join('\n\n');
}
