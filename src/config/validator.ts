import type { StandardSchemaV1 } from '@standard-schema/spec';

import { ConfigError } from '../errors';

/**
 * Formats a Standard Schema issue path (`shapes.0.rules.1.helperName`).
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string {
  if (!path || path.length === 0) return '(root)';
  return path
    .map(segment => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');
}

/**
 * Validates and transforms input using a Standard Schema V1 compliant
 * validator.
 *
 * About `~standard`:
 * - Purpose:
 *   It acts as a universal adapter, so configuration can be described with
 *   Zod (as here) or any other Standard Schema library without adapters.
 * - Result Pattern:
 *   `validate` returns `{ value }` or `{ issues }` and does not throw.
 *
 * @param schema - The schema instance (must contain `~standard`).
 * @param input - Raw input (e.g. parsed JSON).
 * @param label - What is being validated (used for error reporting).
 * @returns The validated (and defaulted) value.
 *
 * @throws ConfigError
 * - If the schema object is invalid (missing `~standard`).
 * - If the validator returns a Promise (async validation is not supported).
 * - If validation fails; the message names every failing path.
 */

/**
 * Public Overload:
 * Establishes the strict type contract using generics.
 *
 * Implementation Note - Overloads:
 * The return type `StandardSchemaV1.InferOutput<S>` depends on `S`.
 * TypeScript cannot verify inside the function body that the runtime value
 * (which is `unknown`) satisfies it; separating the signature from the
 * implementation avoids a type assertion on the return statement.
 */
export function validateWithSchema<S extends StandardSchemaV1>(
  schema: S,
  input: unknown,
  label: string
): StandardSchemaV1.InferOutput<S>;

export function validateWithSchema(
  schema: StandardSchemaV1,
  input: unknown,
  label: string
): unknown {
  // A plain object is not a schema.
  if (!('~standard' in schema)) {
    throw new ConfigError(
      `The schema for ${label} is invalid. Expected an object with the "~standard" property.`
    );
  }

  const result = schema['~standard'].validate(input);

  // Configuration is validated once, before any file is touched.
  if (result instanceof Promise) {
    throw new ConfigError(`Async schema validation is not supported for ${label}.`);
  }

  if (result.issues && result.issues.length > 0) {
    const details = result.issues
      .map(issue => `at "${formatIssuePath(issue.path)}": ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${label} ${details}`);
  }

  return 'value' in result ? result.value : input;
}
