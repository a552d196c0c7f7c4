import { describe, it, expect } from 'vitest';

import { DiagnosticCollector } from '../../diag/collector.js';
import { DIAGNOSTIC_CODES } from '../../diag/codes.js';
import type { OpenApiDocument } from '../../types/document.js';
import { cleanupDocument } from '../cleanup.js';
import { collectReferences } from '../collect-refs.js';

function noisyDocument(): OpenApiDocument {
  return {
    openapi: '3.1.0',
    webhooks: { newPet: {} },
    paths: {
      '/a': {
        get: {
          operationId: 'getA',
          'x-codegen': 'skip',
          responses: {
            '200': {
              description: 'ok',
              content: {
                'application/json': {
                  example: { n: 1 },
                  schema: {
                    type: 'object',
                    properties: {
                      'x-literal-name': { type: 'string', example: 'e' },
                      n: { type: 'integer', 'x-display-name': 'N', 'x-type-name': 'Num' },
                    },
                  },
                },
              },
            },
          },
        },
      },
    },
    components: {
      schemas: {
        Thing: {
          type: 'object',
          default: { 'x-kept': true, example: 'kept' },
        },
      },
      securitySchemes: { key: { type: 'apiKey' } },
      examples: { sample: { value: 1 } },
      callbacks: { hook: {} },
    },
  };
}

describe('cleanupDocument', () => {
  it('drops the sections the compiler never reads', () => {
    const document = noisyDocument();
    cleanupDocument(document, []);

    expect(document.webhooks).toBeUndefined();
    expect(Object.keys(document.components ?? {})).toEqual(['schemas']);
  });

  it('strips unknown extensions and examples but keeps data and names', () => {
    const document = noisyDocument();
    const diagnostics = new DiagnosticCollector();

    const stats = cleanupDocument(document, [], diagnostics);

    expect(stats).toEqual({ extensionsStripped: 2, examplesRemoved: 2 });
    const operation = document.paths?.['/a']?.get;
    expect(operation?.['x-codegen']).toBeUndefined();
    const media = operation?.responses?.['200'];
    expect(media).toEqual({
      description: 'ok',
      content: {
        'application/json': {
          schema: {
            type: 'object',
            properties: {
              'x-literal-name': { type: 'string' },
              n: { type: 'integer', 'x-type-name': 'Num' },
            },
          },
        },
      },
    });
    expect(document.components?.schemas?.Thing?.default).toEqual({
      'x-kept': true,
      example: 'kept',
    });
    expect(diagnostics.byCode(DIAGNOSTIC_CODES.EXTENSION_STRIPPED)[0]).toEqual({
      code: 'EXTENSION_STRIPPED',
      phase: 'prune',
      path: '#/paths/~1a/get/x-codegen',
      details: { key: 'x-codegen' },
    });
  });

  it('keeps allowed extensions', () => {
    const document = noisyDocument();
    const stats = cleanupDocument(document, ['x-display-name']);

    expect(stats.extensionsStripped).toBe(1);
  });
});

describe('collectReferences', () => {
  it('collects references and the components they land in', () => {
    const refs = collectReferences({
      openapi: '3.0.3',
      paths: {
        '/a': {
          parameters: [{ $ref: '#/components/parameters/Trace' }],
          get: {
            responses: {
              '200': {
                description: 'ok',
                content: {
                  'application/json': {
                    schema: { $ref: '#/components/schemas/Pet/properties/tag' },
                  },
                },
              },
            },
          },
        },
      },
      components: {
        schemas: {
          Pet: {
            type: 'object',
            default: { $ref: '#/components/schemas/NotAReference' },
            properties: { tag: { type: 'string' } },
          },
        },
      },
    });

    expect([...refs].sort()).toEqual([
      '#/components/parameters/Trace',
      '#/components/schemas/Pet',
      '#/components/schemas/Pet/properties/tag',
    ]);
  });
});
