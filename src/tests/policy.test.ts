import { describe, expect, test } from 'vitest';

import type { Field, RewriteRule } from '../types';
import type { TestScenario } from './types';
import { defineRule } from '../types';
import { decideRewrite } from '../policy';

const field = (name: string, rawValue: string): Field => ({
  name,
  rawValue,
  valueSpan: { start: 0, end: 0 }
});

const fullRule = defineRule({
  requiredFieldNames: ['Serial', 'IP'],
  optionalFields: [{ field: 'IsSaved', fallback: 'false' }],
  helperName: 'newTestDevice'
});

const serialRule = defineRule({
  requiredFieldNames: ['Serial'],
  helperName: 'newSerialDevice'
});

const rules: RewriteRule[] = [fullRule, serialRule];

type Outcome =
  | { kind: 'rewrite'; helperName: string; core: string[]; extra: string[] }
  | { kind: 'skip'; reason: string };

/**
 * Test suite: first-match-wins rule selection and field partitioning.
 */
describe('Rewrite Policy', () => {
  const decide = (fields: Field[]): Outcome => {
    const decision = decideRewrite(fields, rules);
    if (decision.kind === 'skip') return decision;
    return {
      kind: 'rewrite',
      helperName: decision.rule.helperName,
      core: decision.coreFields.map(({ name }) => name),
      extra: decision.extraFields.map(({ name }) => name)
    };
  };

  const scenarios: TestScenario<Field[], Outcome>[] = [
    {
      id: 'First Match',
      description: 'The first rule whose required fields are present wins.',
      input: [field('Serial', '"s1"'), field('IP', '"10.0.0.1"'), field('Model', '"X"')],
      expected: {
        kind: 'rewrite',
        helperName: 'newTestDevice',
        core: ['Serial', 'IP'],
        extra: ['Model']
      }
    },
    {
      id: 'Optional Present',
      description: 'A present optional field is consumed in parameter order.',
      input: [field('Serial', '"s1"'), field('IsSaved', 'true'), field('IP', '"10.0.0.1"')],
      expected: {
        kind: 'rewrite',
        helperName: 'newTestDevice',
        core: ['Serial', 'IP', 'IsSaved'],
        extra: []
      }
    },
    {
      id: 'Fallback Rule',
      description: 'A later rule applies when earlier ones are unsatisfied.',
      input: [field('Model', '"X"'), field('Serial', '"s1"')],
      expected: {
        kind: 'rewrite',
        helperName: 'newSerialDevice',
        core: ['Serial'],
        extra: ['Model']
      }
    },
    {
      id: 'Case Sensitive',
      description: 'Field names must match exactly.',
      input: [field('serial', '"s1"')],
      expected: { kind: 'skip', reason: 'no-matching-rule' }
    },
    {
      id: 'Output Form',
      description: 'A literal without fields is already rewritten.',
      input: [],
      expected: { kind: 'skip', reason: 'already-rewritten' }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(decide(input)).toEqual(expected);
  });

  test('extra fields keep source order', () => {
    const decision = decideRewrite(
      [field('Zone', '1'), field('Serial', '"s1"'), field('Alias', '"a"')],
      rules
    );
    expect(decision.kind === 'rewrite' && decision.extraFields.map(({ name }) => name)).toEqual([
      'Zone',
      'Alias'
    ]);
  });
});
