import type { LexicalGrammar } from './grammar';
import type { LiteralShape, RewriteRule } from './rules';

/**
 * Creates a rewrite rule with strict type inference.
 *
 * Acts as an identity function that validates the input against
 * {@link RewriteRule} without widening the type, so the specific rule shape
 * is preserved for downstream tooling.
 *
 * @example
 * ```ts
 * const widgetRule = defineRule({
 *   requiredFieldNames: ['Name', 'Size'],
 *   helperName: 'newWidget'
 * });
 * ```
 */
export function defineRule<R extends RewriteRule>(rule: R): R {
  return rule;
}

/**
 * Creates a literal shape (marker plus ordered rules).
 */
export function defineShape<S extends LiteralShape>(shape: S): S {
  return shape;
}

export type RewriteOptions = {
  /**
   * Shapes to migrate. Each shape is applied as its own pass over the buffer
   * produced by the previous one, in the given order.
   */
  shapes: readonly LiteralShape[];

  /**
   * Lexical overrides; missing entries fall back to the default brace
   * grammar.
   */
  grammar?: Partial<LexicalGrammar>;

  /**
   * Controls whether helper declarations are inserted for rules that carry
   * one and whose helper the file does not yet declare.
   *
   * @default true
   */
  insertHelperDeclarations?: boolean;
};
