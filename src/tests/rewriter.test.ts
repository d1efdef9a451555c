import { describe, expect, test } from 'vitest';

import type { RewriteOptions } from '../types';
import { defineRule, defineShape } from '../types';
import { RewriteFailureError } from '../errors';
import { rewriteSource } from '../rewriter';

const lines = (...rows: string[]): string => rows.join('\n');

const widgetShape = defineShape({
  marker: '&Widget',
  rules: [defineRule({ requiredFieldNames: ['Name', 'Size'], helperName: 'newWidget' })]
});

const options: RewriteOptions = { shapes: [widgetShape] };

const WIDGET_HELPER = lines(
  'func newWidget(name string, size int) *Widget {',
  '\treturn &Widget{Name: name, Size: size}',
  '}'
);

/**
 * Test suite: whole-buffer rewriting.
 *
 * Scope:
 * - Inline and declaration sites, extra-field assignments.
 * - Convergence (a second run is a no-op).
 * - Diagnostics for malformed, unterminated and skipped literals.
 * - Helper declaration insertion.
 */
describe('Source Rewriter', () => {
  describe('Rewrites', () => {
    test('replaces an inline literal with the helper call', () => {
      const source = lines(
        'package main',
        '',
        'func build() *Widget {',
        '\treturn &Widget{ Name: "a", Size: 3, }',
        '}',
        ''
      );

      const result = rewriteSource(source, options);

      expect(result.text).toBe(
        lines('package main', '', 'func build() *Widget {', '\treturn newWidget("a", 3)', '}', '')
      );
      expect(result.changed).toBe(true);
      expect(result.rewrites).toEqual([
        {
          span: { start: 45, end: 75 },
          replacementText: 'newWidget("a", 3)',
          helperName: 'newWidget',
          marker: '&Widget',
          line: 4
        }
      ]);
      expect(result.diagnostics).toEqual([]);
    });

    test('assigns extra fields to the declared receiver', () => {
      const source = lines(
        'func f() {',
        '\tw := &Widget{Name: "a", Size: 3, Color: "red"}',
        '\tuse(w)',
        '}'
      );

      expect(rewriteSource(source, options).text).toBe(
        lines(
          'func f() {',
          '\tw := newWidget("a", 3)',
          '\tw.Color = "red"',
          '\tuse(w)',
          '}'
        )
      );
    });

    test('relocates a nested literal intact', () => {
      const source = lines(
        'func f() {',
        '\tw := &Widget{',
        '\t\tName: "a",',
        '\t\tSize: 3,',
        '\t\tMeta: map[string]int{"x": 1},',
        '\t}',
        '}'
      );

      expect(rewriteSource(source, options).text).toBe(
        lines('func f() {', '\tw := newWidget("a", 3)', '\tw.Meta = map[string]int{"x": 1}', '}')
      );
    });

    test('reaches a literal relocated into an assignment', () => {
      const source = lines(
        'func f() {',
        '\tw := &Widget{Name: "a", Size: 3, Child: &Widget{Name: "b", Size: 4}}',
        '}'
      );
      const result = rewriteSource(source, options);

      expect(result.text).toBe(
        lines('func f() {', '\tw := newWidget("a", 3)', '\tw.Child = newWidget("b", 4)', '}')
      );
      expect(result.rewrites.map(rewrite => rewrite.replacementText)).toEqual([
        'newWidget("a", 3)\n\tw.Child = &Widget{Name: "b", Size: 4}',
        'newWidget("b", 4)'
      ]);
    });

    test('applies every configured shape', () => {
      const gadgetShape = defineShape({
        marker: '&Gadget',
        rules: [defineRule({ requiredFieldNames: ['ID'], helperName: 'newGadget' })]
      });
      const source = lines('func f() {', '\tw := &Widget{Name: "a", Size: 3, Part: &Gadget{ID: 7}}', '}');

      expect(rewriteSource(source, { shapes: [widgetShape, gadgetShape] }).text).toBe(
        lines('func f() {', '\tw := newWidget("a", 3)', '\tw.Part = newGadget(7)', '}')
      );
    });

    test('rewrites literals nested in a literal it leaves in place', () => {
      const source = 'use(&Widget{Name: "p", Kids: []*Widget{&Widget{Name: "c", Size: 1}}})\n';
      const result = rewriteSource(source, options);

      expect(result.text).toBe('use(&Widget{Name: "p", Kids: []*Widget{newWidget("c", 1)}})\n');
      expect(result.diagnostics.map(({ kind, reason, line }) => ({ kind, reason, line }))).toEqual([
        { kind: 'Skipped', reason: 'no-matching-rule', line: 1 }
      ]);
    });

    test('preserves text outside the rewritten spans', () => {
      const head = '// keep: &Widget{Name: "x", Size: 0}\nconst s = "&Widget{Name: \\"y\\"}"\n';
      const tail = '\n/* &Widget{Name: "z", Size: 9} */\n';
      const result = rewriteSource(`${head}v := &Widget{Name: "a", Size: 3}${tail}`, options);

      expect(result.text).toBe(`${head}v := newWidget("a", 3)${tail}`);
    });
  });

  describe('Convergence', () => {
    test('leaves an already rewritten file untouched', () => {
      const source = lines('func f() {', '\tw := newWidget("a", 3)', '\tw.Color = "red"', '}', '');
      const result = rewriteSource(source, options);

      expect(result).toEqual({
        text: source,
        changed: false,
        rewrites: [],
        helpersInserted: [],
        diagnostics: []
      });
    });

    test('a second run over the output changes nothing', () => {
      const source = lines(
        'package main',
        '',
        'func f() {',
        '\tw := &Widget{Name: "a", Size: 3, Color: "red"}',
        '\tv := &Widget{Name: "b", Size: 4}',
        '\tuse(&Widget{Name: "c", Size: 5})',
        '}',
        ''
      );

      const first = rewriteSource(source, {
        shapes: [
          defineShape({
            marker: '&Widget',
            rules: [{ ...widgetShape.rules[0], declaration: WIDGET_HELPER }]
          })
        ]
      });
      const second = rewriteSource(first.text, {
        shapes: [
          defineShape({
            marker: '&Widget',
            rules: [{ ...widgetShape.rules[0], declaration: WIDGET_HELPER }]
          })
        ]
      });

      expect(first.changed).toBe(true);
      expect(second.changed).toBe(false);
      expect(second.text).toBe(first.text);
      expect(second.rewrites).toEqual([]);
    });

    test('skips the output form inside a helper body', () => {
      const source = lines(
        'func newWidget(name string, size int) *Widget {',
        '\tw := &Widget{}',
        '\tw.Name = name',
        '\tw.Size = size',
        '\treturn w',
        '}'
      );
      const result = rewriteSource(source, options);

      expect(result.text).toBe(source);
      expect(result.changed).toBe(false);
      expect(result.diagnostics.map(({ kind, reason, line }) => ({ kind, reason, line }))).toEqual([
        { kind: 'Skipped', reason: 'already-rewritten', line: 2 }
      ]);
    });

    test('never turns a helper body into a call to itself', () => {
      const source = `${WIDGET_HELPER}\n`;
      const result = rewriteSource(source, options);

      expect(result.text).toBe(source);
      expect(result.diagnostics.map(({ kind, reason, line }) => ({ kind, reason, line }))).toEqual([
        { kind: 'Skipped', reason: 'inside-helper', line: 2 }
      ]);
    });
  });

  describe('Diagnostics', () => {
    test('reports a malformed literal and rewrites the next one', () => {
      const source = lines('\tw := &Widget{"a", 3}', '\tv := &Widget{Name: "b", Size: 4}', '');
      const result = rewriteSource(source, options);

      expect(result.text).toBe(lines('\tw := &Widget{"a", 3}', '\tv := newWidget("b", 4)', ''));
      expect(result.diagnostics).toEqual([
        {
          kind: 'MalformedLiteral',
          marker: '&Widget',
          line: 1,
          reason: 'missing-separator',
          message: 'Cannot split &Widget{...} into fields (missing-separator): "a"'
        }
      ]);
    });

    test('leaves the rest of the file after an unterminated literal', () => {
      const source = lines('a := &Widget{Name: "a", Size: 1}', 'b := &Widget{Name: "b"', '');
      const result = rewriteSource(source, options);

      expect(result.text).toBe(lines('a := newWidget("a", 1)', 'b := &Widget{Name: "b"', ''));
      expect(result.diagnostics).toEqual([
        {
          kind: 'UnterminatedLiteral',
          marker: '&Widget',
          line: 2,
          reason: 'end-of-buffer',
          message: '&Widget{ is never closed; the rest of the file is left unchanged.'
        }
      ]);
    });

    test('skips a literal no rule matches', () => {
      const source = '\tw := &Widget{Name: "a"}\n';
      const result = rewriteSource(source, options);

      expect(result.text).toBe(source);
      expect(result.diagnostics).toEqual([
        {
          kind: 'Skipped',
          marker: '&Widget',
          line: 1,
          reason: 'no-matching-rule',
          message: 'Left &Widget{...} unchanged (no-matching-rule).'
        }
      ]);
    });

    test('skips an inline literal whose extra fields have no receiver', () => {
      const source = '\tuse(&Widget{Name: "a", Size: 3, Color: "red"})\n';
      const result = rewriteSource(source, options);

      expect(result.text).toBe(source);
      expect(result.diagnostics).toEqual([
        {
          kind: 'Skipped',
          marker: '&Widget',
          line: 1,
          reason: 'no-receiver',
          message: 'Left inline &Widget{...} unchanged: extra fields (Color) have no receiver.'
        }
      ]);
    });

    test('skips a package-level declaration with extra fields', () => {
      const source = 'package main\n\nvar w = &Widget{Name: "a", Size: 3, Color: "red"}\n';
      const result = rewriteSource(source, options);

      expect(result.text).toBe(source);
      expect(result.changed).toBe(false);
      expect(result.diagnostics).toEqual([
        {
          kind: 'Skipped',
          marker: '&Widget',
          line: 3,
          reason: 'no-receiver',
          message: 'Left inline &Widget{...} unchanged: extra fields (Color) have no receiver.'
        }
      ]);
    });

    test('throws a RewriteFailureError when rounds do not converge', () => {
      const nested = (depth: number): string =>
        depth === 0
          ? '&Widget{Name: "a", Size: 1}'
          : `&Widget{Name: "a", Size: 1, Child: ${nested(depth - 1)}}`;
      const source = `func f() {\n\tw := ${nested(33)}\n}\n`;

      expect(() => rewriteSource(source, options)).toThrow(RewriteFailureError);
      expect(() => rewriteSource(source, options)).toThrow(
        'Rewriting did not converge after 32 rounds.'
      );
    });

    test.for(['&Widget{', '&Widget{{{', '&Widget{:}', '&Widget{Name: "a}', '}&Widget{,,}', ''])(
      'does not throw on %j',
      source => {
        expect(() => rewriteSource(source, options)).not.toThrow();
      }
    );
  });

  describe('Helper Declarations', () => {
    const withDeclaration: RewriteOptions = {
      shapes: [
        defineShape({
          marker: '&Widget',
          rules: [
            defineRule({
              requiredFieldNames: ['Name', 'Size'],
              helperName: 'newWidget',
              declaration: WIDGET_HELPER
            })
          ]
        })
      ]
    };

    test('inserts a missing helper after the imports', () => {
      const source = lines(
        'package main',
        '',
        'import "fmt"',
        '',
        'func main() {',
        '\tw := &Widget{Name: "a", Size: 3}',
        '\tfmt.Println(w)',
        '}',
        ''
      );
      const result = rewriteSource(source, withDeclaration);

      expect(result.text).toBe(
        lines(
          'package main',
          '',
          'import "fmt"',
          '',
          'func newWidget(name string, size int) *Widget {',
          '\treturn &Widget{Name: name, Size: size}',
          '}',
          '',
          'func main() {',
          '\tw := newWidget("a", 3)',
          '\tfmt.Println(w)',
          '}',
          ''
        )
      );
      expect(result.helpersInserted).toEqual(['newWidget']);
    });

    test('inserts after a block comment header', () => {
      const header = lines('/*', 'Copyright 2024 Example Authors.', '*/', '', 'package main', '', 'import "fmt"', '');
      const source = `${header}\nfunc main() {\n\tfmt.Println(&Widget{Name: "a", Size: 3})\n}\n`;

      expect(rewriteSource(source, withDeclaration).text).toBe(
        `${header}\n${WIDGET_HELPER}\n\nfunc main() {\n\tfmt.Println(newWidget("a", 3))\n}\n`
      );
    });

    test('does not insert a helper the file declares', () => {
      const source = lines(WIDGET_HELPER, '', 'var w = &Widget{Name: "a", Size: 3}', '');
      const result = rewriteSource(source, withDeclaration);

      expect(result.text).toBe(lines(WIDGET_HELPER, '', 'var w = newWidget("a", 3)', ''));
      expect(result.helpersInserted).toEqual([]);
    });

    test('can be switched off', () => {
      const source = 'w := &Widget{Name: "a", Size: 3}';
      const result = rewriteSource(source, {
        ...withDeclaration,
        insertHelperDeclarations: false
      });

      expect(result.text).toBe('w := newWidget("a", 3)');
      expect(result.helpersInserted).toEqual([]);
    });
  });
});
