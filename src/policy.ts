import type { FirstMatchWinsPolicy } from './architecture';
import type { Field, RewriteDecision, RewriteRule } from './types';

/**
 * Lists the field names a rule consumes as helper arguments for a given
 * field set: all required fields, then the optional ones that are present.
 */
export function coreFieldNames(
  rule: RewriteRule,
  present: ReadonlySet<string>
): string[] {
  const optional = (rule.optionalFields ?? [])
    .map(parameter => parameter.field)
    .filter(name => present.has(name));

  return [...rule.requiredFieldNames, ...optional];
}

/**
 * Chooses the output shape for an extracted field set.
 *
 * Decision protocol
 * -----------------
 * 1. Output form
 *    A literal without fields (`&Device{}`) is what the engine itself leaves
 *    behind inside helper bodies; it is `already-rewritten`.
 *
 * 2. Rule selection
 *    Rules are tried in configured order; a rule matches when every required
 *    field name is present (case-sensitive). The first match wins.
 *    See {@link FirstMatchWinsPolicy}.
 *
 * 3. Partition
 *    - Core fields: required fields, then present optional fields, in the
 *      rule's parameter order.
 *    - Extra fields: everything else, in source order.
 *
 * No match yields `no-matching-rule`.
 *
 * @param fields - Fields in source order, as extracted.
 * @param rules - The shape's ordered rule table.
 */
export function decideRewrite(
  fields: readonly Field[],
  rules: readonly RewriteRule[]
): RewriteDecision {
  // 1. Output form
  if (fields.length === 0) {
    return { kind: 'skip', reason: 'already-rewritten' };
  }

  const byName = new Map(fields.map(field => [field.name, field]));

  // 2. Rule selection
  const rule = rules.find(candidate =>
    candidate.requiredFieldNames.every(name => byName.has(name))
  );

  if (!rule) {
    return { kind: 'skip', reason: 'no-matching-rule' };
  }

  // 3. Partition
  const coreNames = coreFieldNames(rule, new Set(byName.keys()));
  const coreFields = coreNames.flatMap(name => {
    const field = byName.get(name);
    return field ? [field] : [];
  });

  const consumed = new Set(coreNames);
  const extraFields = fields.filter(field => !consumed.has(field.name));

  return { kind: 'rewrite', rule, coreFields, extraFields };
}
