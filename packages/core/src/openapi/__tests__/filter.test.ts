import { describe, it, expect } from 'vitest';

import { DiagnosticCollector } from '../../diag/collector.js';
import { DIAGNOSTIC_CODES } from '../../diag/codes.js';
import { jsonGet, ref, schemaDocument } from '../../test-utils/documents.js';
import type { OpenApiDocument } from '../../types/document.js';
import { resolveOptions, type FilterOptions } from '../../types/options.js';
import { filterOperations } from '../filter.js';

function api(): OpenApiDocument {
  return schemaDocument(
    {
      Pet: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'string' },
          name: { type: 'string' },
          secret: { type: 'string' },
          nickname: { type: 'string' },
        },
      },
    },
    {
      '/pets': {
        get: {
          operationId: 'listPets',
          tags: ['pets'],
          responses: { '200': { description: 'ok' } },
        },
        post: {
          operationId: 'createPet',
          tags: ['pets', 'admin'],
          responses: { '201': { description: 'created' } },
        },
      },
      '/users': jsonGet('listUsers', ref('Pet'), ['users']),
      '/health': { get: { responses: { '200': { description: 'up' } } } },
      '/shared': { $ref: '#/components/pathItems/Shared' },
    }
  );
}

function run(filter: FilterOptions, diagnostics?: DiagnosticCollector) {
  return filterOperations(api(), resolveOptions({ filter }).filter, diagnostics);
}

describe('filterOperations', () => {
  it('keeps everything without rules', () => {
    const result = run({});
    expect(result.removed).toEqual([]);
    expect(result.propertiesRemoved).toBe(0);
    expect(result.document).toEqual(api());
  });

  it('keeps only operations carrying an included tag', () => {
    const result = run({ include: { tags: ['pets'] } });

    expect(result.removed).toEqual([
      { path: '/users', method: 'get', operationId: 'listUsers', reason: 'include.tags' },
      { path: '/health', method: 'get', reason: 'include.tags' },
    ]);
    expect(Object.keys(result.document.paths ?? {})).toEqual(['/pets', '/shared']);
  });

  it('lets an excluded tag win over an included one', () => {
    const result = run({ include: { tags: ['pets'] }, exclude: { tags: ['admin'] } });

    expect(result.removed[0]).toEqual({
      path: '/pets',
      method: 'post',
      operationId: 'createPet',
      reason: 'exclude.tags',
    });
    expect(Object.keys(result.document.paths?.['/pets'] ?? {})).toEqual(['get']);
  });

  it('matches path templates verbatim', () => {
    expect(run({ include: { paths: ['/pets'] } }).removed.map((entry) => entry.reason)).toEqual([
      'include.paths',
      'include.paths',
    ]);
    expect(run({ exclude: { paths: ['/pets'] } }).removed.map((entry) => entry.method)).toEqual([
      'get',
      'post',
    ]);
  });

  it('drops operations without an id when ids are included', () => {
    const result = run({ include: { operationIds: ['listPets'] } });

    expect(result.removed.map((entry) => entry.operationId ?? entry.path)).toEqual([
      'createPet',
      'listUsers',
      '/health',
    ]);
  });

  it('records a diagnostic per removed operation', () => {
    const diagnostics = new DiagnosticCollector();
    run({ exclude: { operationIds: ['listUsers'] } }, diagnostics);

    expect(diagnostics.byCode(DIAGNOSTIC_CODES.OPERATION_FILTERED)).toEqual([
      {
        code: 'OPERATION_FILTERED',
        phase: 'filter',
        path: '#/paths/~1users/get',
        details: {
          path: '/users',
          method: 'get',
          operationId: 'listUsers',
          reason: 'exclude.operationIds',
        },
      },
    ]);
  });

  it('leaves its input alone', () => {
    const document = api();
    filterOperations(document, resolveOptions({ filter: { include: { tags: ['none'] } } }).filter);
    expect(document).toEqual(api());
  });

  describe('schema properties', () => {
    it('keeps included properties and every required one', () => {
      const result = run({ include: { schemaProperties: { Pet: ['name'] } } });

      expect(result.propertiesRemoved).toBe(2);
      expect(Object.keys(result.document.components?.schemas?.Pet?.properties ?? {})).toEqual([
        'id',
        'name',
      ]);
    });

    it('never removes a required property', () => {
      const diagnostics = new DiagnosticCollector();
      const result = run(
        { exclude: { schemaProperties: { Pet: ['id', 'secret'], Ghost: ['x'] } } },
        diagnostics
      );

      expect(result.propertiesRemoved).toBe(1);
      expect(diagnostics.byCode(DIAGNOSTIC_CODES.SCHEMA_PROPERTY_FILTERED)).toEqual([
        {
          code: 'SCHEMA_PROPERTY_FILTERED',
          phase: 'filter',
          path: '#/components/schemas/Pet/properties/secret',
          details: { schema: 'Pet', property: 'secret' },
        },
      ]);
    });
  });
});
