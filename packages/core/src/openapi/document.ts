import { Ajv, type ErrorObject } from 'ajv';

import type { OpenApiDocument } from '../types/document.js';
import { ParseError } from '../types/errors.js';

/**
 * Structural guard for loaded documents. Only the containers the compiler
 * walks are checked; schema nodes themselves are taken as they come.
 */
const DOCUMENT_SHAPE = {
  type: 'object',
  required: ['openapi'],
  properties: {
    openapi: { type: 'string', pattern: '^3\\.' },
    paths: {
      type: 'object',
      additionalProperties: { type: 'object' },
    },
    components: {
      type: 'object',
      properties: {
        schemas: { type: 'object', additionalProperties: { type: 'object' } },
        parameters: { type: 'object', additionalProperties: { type: 'object' } },
        requestBodies: {
          type: 'object',
          additionalProperties: { type: 'object' },
        },
        responses: { type: 'object', additionalProperties: { type: 'object' } },
        headers: { type: 'object', additionalProperties: { type: 'object' } },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
const validateShape = ajv.compile(DOCUMENT_SHAPE);

export function formatAjvErrors(
  errors: readonly ErrorObject[] | null | undefined
): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
  );
}

export function isOpenApiDocument(value: unknown): value is OpenApiDocument {
  return validateShape(value);
}

/**
 * @throws {ParseError} When `value` is not an OpenAPI 3.x document
 */
export function assertOpenApiDocument(
  value: unknown,
  input?: string
): OpenApiDocument {
  if (isOpenApiDocument(value)) return value;
  const problems = formatAjvErrors(validateShape.errors);
  throw new ParseError({
    message: `Invalid OpenAPI document: ${problems.join('; ')}`,
    context: input !== undefined ? { input } : undefined,
  });
}
