import type { FirstMatchWinsPolicy } from '../architecture';

/**
 * A helper parameter that may be absent from the literal.
 *
 * When the field is present its value is passed (and the field counts as a
 * core field); otherwise `fallback` is passed verbatim.
 *
 * @example { field: 'IsSaved', fallback: 'false' }
 */
export type OptionalParameter = {
  field: string;
  fallback: string;
};

/**
 * One entry of the rewrite table: which fields a literal must carry for the
 * rule to apply, and which helper constructor replaces it.
 *
 * Argument order of the emitted call:
 * 1. `requiredFieldNames`, in declared order
 * 2. `optionalFields`, in declared order (value or fallback)
 * 3. `fixedArguments`, verbatim
 *
 * Every field not consumed above is emitted as a follow-on assignment.
 *
 * @example
 * ```ts
 * defineRule({
 *   requiredFieldNames: ['Serial', 'IP'],
 *   optionalFields: [{ field: 'IsSaved', fallback: 'false' }],
 *   fixedArguments: ['true'],
 *   helperName: 'newTestDevice'
 * })
 * // &Device{Serial: "s1", IP: "10.0.0.1", Model: "X"}
 * //   → newTestDevice("s1", "10.0.0.1", false, true) + `d.Model = "X"`
 * ```
 */
export type RewriteRule = {
  /**
   * Field names that must all be present (case-sensitive) for the rule to
   * match. Never empty.
   */
  requiredFieldNames: readonly string[];

  /**
   * Name of the helper constructor invoked by the replacement.
   */
  helperName: string;

  optionalFields?: readonly OptionalParameter[];

  /**
   * Literal argument texts appended after the field-derived arguments.
   */
  fixedArguments?: readonly string[];

  /**
   * Source text declaring the helper.
   *
   * When provided and the file does not already declare `helperName`, the
   * declaration is inserted once after the file's import block.
   */
  declaration?: string;
};

/**
 * A literal "shape" being migrated: the marker that opens its construction
 * expressions and the ordered rule table applied to them.
 *
 * Rules are tried in order and the first satisfied rule wins; order them from
 * most required fields to fewest.
 *
 * @see {@link FirstMatchWinsPolicy}
 */
export type LiteralShape = {
  /**
   * Prefix token immediately followed by the opening delimiter
   * (e.g. `&Device` for `&Device{...}`).
   */
  marker: string;

  rules: readonly RewriteRule[];
};
