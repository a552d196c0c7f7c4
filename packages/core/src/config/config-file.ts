import { Ajv } from 'ajv';

import { formatAjvErrors } from '../openapi/document.js';
import { ConfigError } from '../types/errors.js';
import type { CompilerOptions } from '../types/options.js';

export const CONFIG_FILE_NAME = 'openapi-ir.config.json';

const stringList = { type: 'array', items: { type: 'string' } } as const;

const selector = {
  type: 'object',
  additionalProperties: false,
  properties: {
    paths: stringList,
    tags: stringList,
    operationIds: stringList,
    schemaProperties: {
      type: 'object',
      additionalProperties: stringList,
    },
  },
} as const;

/** JSON Schema of the configuration file; mirrors CompilerOptions */
export const CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    $schema: { type: 'string' },
    filter: {
      type: 'object',
      additionalProperties: false,
      properties: { include: selector, exclude: selector },
    },
    prune: {
      type: 'object',
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        maxIterations: { type: 'integer', minimum: 1 },
      },
    },
    naming: {
      type: 'object',
      additionalProperties: false,
      properties: { suffixes: stringList },
    },
    extensions: {
      type: 'object',
      additionalProperties: false,
      properties: {
        allowed: { type: 'array', items: { type: 'string', pattern: '^x-' } },
      },
    },
    errors: {
      type: 'object',
      additionalProperties: false,
      properties: { collect: { type: 'boolean' } },
    },
    maxDepth: { type: 'integer', minimum: 1 },
  },
} as const;

interface ConfigFileContents extends CompilerOptions {
  $schema?: string;
}

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<ConfigFileContents>(CONFIG_SCHEMA);

/**
 * Validate parsed configuration file contents.
 *
 * @throws {ConfigError} Listing every schema violation
 */
export function parseCompilerConfig(
  contents: unknown,
  source = CONFIG_FILE_NAME
): CompilerOptions {
  if (!validateConfig(contents)) {
    const problems = formatAjvErrors(validateConfig.errors);
    throw new ConfigError({
      message: `Invalid configuration in ${source}: ${problems.join('; ')}`,
      context: { setting: source, problems },
    });
  }
  const { $schema: _schema, ...options } = contents;
  return options;
}
