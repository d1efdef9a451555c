import { z } from 'zod';

import { LOG_LEVELS } from '../logger';
import { DEFAULT_EXCLUDED_DIRECTORIES } from '../runner/walker';

const identifier = z
  .string()
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'must be an identifier');

export const optionalParameterSchema = z.object({
  field: identifier,
  fallback: z.string().min(1)
});

export const rewriteRuleSchema = z.object({
  requiredFieldNames: z.array(identifier).min(1),
  helperName: identifier,
  optionalFields: z.array(optionalParameterSchema).optional(),
  fixedArguments: z.array(z.string().min(1)).optional(),
  declaration: z.string().min(1).optional()
});

export const literalShapeSchema = z.object({
  marker: z.string().min(1),
  rules: z.array(rewriteRuleSchema).min(1)
});

export const grammarSchema = z
  .object({
    open: z.string().min(1),
    close: z.string().min(1),
    fieldSeparator: z.string().min(1),
    itemSeparator: z.string().min(1),
    quotes: z.array(
      z.object({
        char: z.string().length(1),
        escapes: z.boolean(),
        multiline: z.boolean()
      })
    ),
    lineComment: z.string().min(1).nullable(),
    blockComment: z.tuple([z.string().min(1), z.string().min(1)]).nullable(),
    declarationKeyword: z.string().min(1)
  })
  .partial();

export const walkSchema = z.object({
  extensions: z.array(z.string().min(1)).min(1).default(['.go']),
  excludeDirectories: z
    .array(z.string().min(1))
    .default([...DEFAULT_EXCLUDED_DIRECTORIES]),
  skipMinified: z.boolean().default(true)
});

/**
 * The run configuration file (`literal-rewrite.json`).
 *
 * @example
 * ```json
 * {
 *   "shapes": [
 *     {
 *       "marker": "&Widget",
 *       "rules": [{ "requiredFieldNames": ["Name", "Size"], "helperName": "newWidget" }]
 *     }
 *   ],
 *   "walk": { "extensions": [".go"] }
 * }
 * ```
 */
export const runConfigSchema = z.object({
  shapes: z.array(literalShapeSchema).min(1),
  grammar: grammarSchema.optional(),
  insertHelperDeclarations: z.boolean().default(true),
  walk: walkSchema.default({}),
  backupSuffix: z.string().min(1).default('.bak'),
  concurrency: z.number().int().min(1).max(64).default(4),
  logLevel: z.enum(LOG_LEVELS).default('info')
});

export type RunConfigInput = z.input<typeof runConfigSchema>;
export type RunConfig = z.output<typeof runConfigSchema>;
