import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import {
  resolveFixture,
  schemaDocument,
  typeNamed,
  typeNames,
} from '../../test-utils/documents.js';
import type { SchemaObject } from '../../types/document.js';

const COMPONENTS: Array<[string, SchemaObject]> = [
  [
    'Owner',
    {
      type: 'object',
      properties: {
        address: { type: 'object', properties: { city: { type: 'string' } } },
      },
    },
  ],
  [
    'Pet',
    {
      type: 'object',
      properties: {
        tags: {
          type: 'array',
          items: { type: 'object', properties: { label: { type: 'string' } } },
        },
      },
    },
  ],
  [
    'Order',
    {
      type: 'object',
      properties: { state: { type: 'string', enum: ['open', 'closed'] } },
    },
  ],
];

const EXPECTED_NAMES = ['Order', 'Order_State', 'Owner', 'Owner_Address', 'Pet', 'Pet_Tags_Item'];

describe('type naming', () => {
  it('derives the same names on every run', () => {
    const document = schemaDocument(Object.fromEntries(COMPONENTS));
    const first = typeNames(resolveFixture(document).types);
    const second = typeNames(resolveFixture(document).types);

    expect(second).toEqual(first);
    expect([...first].sort()).toEqual(EXPECTED_NAMES);
  });

  it('does not depend on declaration order', () => {
    fc.assert(
      fc.property(
        fc.shuffledSubarray(COMPONENTS, {
          minLength: COMPONENTS.length,
          maxLength: COMPONENTS.length,
        }),
        (ordered) => {
          const { types } = resolveFixture(schemaDocument(Object.fromEntries(ordered)));
          expect(typeNames(types).sort()).toEqual(EXPECTED_NAMES);
        }
      )
    );
  });

  it('keeps a component name away from a derived type that wants it', () => {
    const { types } = resolveFixture(
      schemaDocument({
        Owner: {
          type: 'object',
          properties: {
            address: { type: 'object', properties: { city: { type: 'string' } } },
          },
        },
        Street: { type: 'string', 'x-type-name': 'Owner_Address' },
      })
    );

    expect(typeNames(types)).toEqual(['Owner_Address1', 'Owner', 'Owner_Address']);
    expect(typeNamed(types, 'Owner').schema.typeDecl).toBe(
      'record{address?:Owner_Address1}'
    );
    expect(typeNamed(types, 'Owner_Address').schema.typeDecl).toBe('string');
  });

  it('tries the configured suffixes before counting', () => {
    const { types } = resolveFixture(
      schemaDocument({
        Owner: {
          type: 'object',
          properties: {
            address: { type: 'object', properties: { city: { type: 'string' } } },
          },
        },
        Street: { type: 'string', 'x-type-name': 'Owner_Address' },
      }),
      { naming: { suffixes: ['Inline'] } }
    );

    expect(typeNames(types)).toContain('Owner_AddressInline');
  });
});
