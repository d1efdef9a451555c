import { readFile } from 'node:fs/promises';

import type { RewriteOptions } from '../types';
import type { RunConfig, RunConfigInput } from './schema';
import { ConfigError } from '../errors';
import { runConfigSchema } from './schema';
import { validateRewriteOptions } from './rule-validator';
import { validateWithSchema } from './validator';

export type { RunConfig, RunConfigInput } from './schema';
export { runConfigSchema } from './schema';
export { validateWithSchema } from './validator';
export { validateRule, validateShape, validateRewriteOptions } from './rule-validator';

export const DEFAULT_CONFIG_FILE = 'literal-rewrite.json';

export type LoadedConfig = {
  config: RunConfig;

  /**
   * Non-fatal findings (shadowed rules).
   */
  warnings: string[];
};

/**
 * Identity helper for typed configuration objects.
 */
export function defineConfig(config: RunConfigInput): RunConfigInput {
  return config;
}

/**
 * Projects a run configuration onto the options of the pure rewriter.
 */
export function toRewriteOptions(config: RunConfig): RewriteOptions {
  return {
    shapes: config.shapes,
    grammar: config.grammar,
    insertHelperDeclarations: config.insertHelperDeclarations
  };
}

/**
 * Validates raw configuration input.
 *
 * Pipeline
 * --------
 * 1. Schema validation and defaults (`runConfigSchema` via `~standard`).
 * 2. Semantic validation of the shapes (identifiers, duplicate markers,
 *    shadowed rules).
 *
 * @throws ConfigError on the first failing step.
 */
export function parseConfig(input: unknown): LoadedConfig {
  const config = validateWithSchema(runConfigSchema, input, 'configuration');
  const warnings = validateRewriteOptions(toRewriteOptions(config));
  return { config, warnings };
}

/**
 * Reads and validates a JSON configuration file.
 *
 * @throws ConfigError if the file is missing, is not JSON, or is invalid.
 */
export async function loadConfig(path: string): Promise<LoadedConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read the configuration file "${path}".`, { cause: error });
  }

  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`The configuration file "${path}" is not valid JSON.`, {
      cause: error
    });
  }

  return parseConfig(input);
}
