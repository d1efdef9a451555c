import type { FirstMatchWinsPolicy } from '../architecture';
import type { LexicalGrammar, LiteralShape, RewriteOptions, RewriteRule } from '../types';
import { resolveGrammar } from '../types';
import { ConfigError } from '../errors';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Validates the runtime integrity of a {@link RewriteRule}.
 *
 * @param rule - The rule object from the shape's table.
 * @param context - Marker and position, for error reporting.
 * @returns The validated rule object.
 * @throws ConfigError if the rule cannot produce a well-formed helper call.
 */
export function validateRule(rule: RewriteRule, context: string): RewriteRule {
  // 1. Validate the helper name
  if (!IDENTIFIER.test(rule.helperName)) {
    throw new ConfigError(
      `Invalid rule ${context}: helperName "${rule.helperName}" is not an identifier.`
    );
  }

  // 2. Validate the required fields
  if (rule.requiredFieldNames.length === 0) {
    throw new ConfigError(
      `Invalid rule ${context}: requiredFieldNames is empty. ` +
        `A rule must name at least one field.`
    );
  }

  // 3. Every parameter maps to exactly one field
  const seen = new Set<string>();
  const parameters = [
    ...rule.requiredFieldNames,
    ...(rule.optionalFields ?? []).map(optional => optional.field)
  ];

  for (const name of parameters) {
    if (!IDENTIFIER.test(name)) {
      throw new ConfigError(`Invalid rule ${context}: field "${name}" is not an identifier.`);
    }
    if (seen.has(name)) {
      throw new ConfigError(
        `Invalid rule ${context}: field "${name}" is used for more than one parameter.`
      );
    }
    seen.add(name);
  }

  return rule;
}

/**
 * Returns `true` when every literal matching `later` also matches `earlier`,
 * i.e. `later` can never win.
 */
function isShadowedBy(later: RewriteRule, earlier: RewriteRule): boolean {
  const required = new Set(later.requiredFieldNames);
  return earlier.requiredFieldNames.every(name => required.has(name));
}

/**
 * Validates a shape and returns warnings for rules that can never match.
 *
 * Since the first satisfied rule wins (see {@link FirstMatchWinsPolicy}), a
 * rule whose required fields are a superset of an earlier rule's is dead.
 * This is reported, not rejected: the table is still deterministic.
 *
 * @throws ConfigError for an empty marker or table, a marker containing the
 * opening delimiter, or an invalid rule.
 */
export function validateShape(shape: LiteralShape, grammar: LexicalGrammar): string[] {
  if (shape.marker.length === 0) {
    throw new ConfigError('Invalid shape: the marker is empty.');
  }
  if (shape.marker.includes(grammar.open)) {
    throw new ConfigError(
      `Invalid shape "${shape.marker}": the marker must not contain "${grammar.open}".`
    );
  }
  if (shape.rules.length === 0) {
    throw new ConfigError(`Invalid shape "${shape.marker}": the rule table is empty.`);
  }

  const warnings: string[] = [];

  shape.rules.forEach((rule, index) => {
    validateRule(rule, `#${index} of "${shape.marker}"`);

    const shadowIndex = shape.rules
      .slice(0, index)
      .findIndex(earlier => isShadowedBy(rule, earlier));

    if (shadowIndex !== -1) {
      warnings.push(
        `Rule #${index} of "${shape.marker}" (${rule.helperName}) is shadowed by ` +
          `rule #${shadowIndex} (${shape.rules[shadowIndex].helperName}) and never applies.`
      );
    }
  });

  return warnings;
}

/**
 * Validates every shape of a rewrite configuration.
 *
 * @returns Shadowed-rule warnings, in shape and rule order.
 * @throws ConfigError for an invalid shape or a marker declared twice.
 */
export function validateRewriteOptions(options: RewriteOptions): string[] {
  const grammar = resolveGrammar(options.grammar);
  const markers = new Set<string>();
  const warnings: string[] = [];

  for (const shape of options.shapes) {
    if (markers.has(shape.marker)) {
      throw new ConfigError(`The marker "${shape.marker}" is declared by more than one shape.`);
    }
    markers.add(shape.marker);
    warnings.push(...validateShape(shape, grammar));
  }

  return warnings;
}
