import { describe, expect, test } from 'vitest';

import type { Field } from '../types';
import { defineRule } from '../types';
import {
  normalizeLineBreaks,
  renderHelperBlock,
  renderHelperCall,
  renderRewrite
} from '../emitter';

const field = (name: string, rawValue: string): Field => ({
  name,
  rawValue,
  valueSpan: { start: 0, end: 0 }
});

const widgetRule = defineRule({
  requiredFieldNames: ['Name', 'Size'],
  helperName: 'newWidget'
});

describe('Emitter', () => {
  describe('Helper Call', () => {
    test('orders required, optional and fixed arguments', () => {
      const rule = defineRule({
        requiredFieldNames: ['Serial', 'IP'],
        optionalFields: [{ field: 'IsSaved', fallback: 'false' }],
        fixedArguments: ['true'],
        helperName: 'newTestDevice'
      });

      expect(
        renderHelperCall(rule, [field('Serial', '"s1"'), field('IP', '"10.0.0.1"')])
      ).toBe('newTestDevice("s1", "10.0.0.1", false, true)');
    });

    test('passes a present optional value instead of the fallback', () => {
      const rule = defineRule({
        requiredFieldNames: ['Serial'],
        optionalFields: [{ field: 'IsSaved', fallback: 'false' }],
        helperName: 'newTestDevice'
      });

      expect(
        renderHelperCall(rule, [field('Serial', '"s1"'), field('IsSaved', 'saved')])
      ).toBe('newTestDevice("s1", saved)');
    });

    test('rejects a missing required field', () => {
      expect(() => renderHelperCall(widgetRule, [field('Name', '"a"')])).toThrow(
        '[literal-rewrite] Cannot render newWidget: required field "Size" is not among the core fields.'
      );
    });
  });

  describe('Line Breaks', () => {
    test('collapses line breaks in relocated values', () => {
      expect(normalizeLineBreaks('map[string]int{\n\t\t"x": 1,\n\t}')).toBe(
        'map[string]int{ "x": 1, }'
      );
    });

    test('keeps line breaks inside raw strings', () => {
      expect(normalizeLineBreaks('`a\n  b`')).toBe('`a\n  b`');
    });
  });

  describe('Replacement', () => {
    test('appends one assignment per extra field', () => {
      expect(
        renderRewrite(
          { kind: 'declaration', receiver: 'w', indent: '\t' },
          widgetRule,
          [field('Name', '"a"'), field('Size', '3')],
          [field('Color', '"red"'), field('Tags', '[]string{"x"}')]
        )
      ).toBe('newWidget("a", 3)\n\tw.Color = "red"\n\tw.Tags = []string{"x"}');
    });

    test('renders only the call for an inline literal without extras', () => {
      expect(
        renderRewrite({ kind: 'inline', indent: '' }, widgetRule, [
          field('Name', '"a"'),
          field('Size', '3')
        ], [])
      ).toBe('newWidget("a", 3)');
    });

    test('rejects extra fields without a receiver', () => {
      expect(() =>
        renderRewrite(
          { kind: 'inline', indent: '' },
          widgetRule,
          [field('Name', '"a"'), field('Size', '3')],
          [field('Color', '"red"')]
        )
      ).toThrow('extra fields need a receiver');
    });
  });

  test('joins helper declarations with blank lines', () => {
    expect(renderHelperBlock(['func a() {}\n', '\nfunc b() {}'])).toBe(
      'func a() {}\n\nfunc b() {}'
    );
  });
});
