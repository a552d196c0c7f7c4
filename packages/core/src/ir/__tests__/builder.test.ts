import { describe, it, expect } from 'vitest';

import { DIAGNOSTIC_CODES } from '../../diag/codes.js';
import {
  ref,
  resolveFixture,
  schemaDocument,
  typeNamed,
  typeNames,
} from '../../test-utils/documents.js';

describe('buildSchemaIR', () => {
  describe('primitives', () => {
    it('maps type and format pairs to declarations', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Scalars: {
            type: 'object',
            required: ['id'],
            properties: {
              id: { type: 'string', format: 'uuid' },
              created: { type: 'string', format: 'date-time' },
              count: { type: 'integer', format: 'int64' },
              ratio: { type: 'number', format: 'float' },
              blob: { type: 'string', format: 'byte' },
              flag: { type: 'boolean' },
            },
          },
        })
      );

      expect(typeNamed(types, 'Scalars').schema.typeDecl).toBe(
        'record{id:uuid,created?:datetime,count?:int64,ratio?:float32,blob?:bytes,flag?:boolean}'
      );
    });

    it('lets x-type replace the declaration', () => {
      const { types } = resolveFixture(
        schemaDocument({ Money: { type: 'string', 'x-type': 'decimal' } })
      );
      expect(typeNamed(types, 'Money').schema.typeDecl).toBe('decimal');
    });

    it('treats a schema without keywords as any', () => {
      const { types } = resolveFixture(schemaDocument({ Anything: {} }));
      expect(typeNamed(types, 'Anything').schema.typeDecl).toBe('any');
    });
  });

  describe('objects and maps', () => {
    it('renders additionalProperties as a map', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Labels: { type: 'object', additionalProperties: { type: 'string' } },
          Free: { type: 'object' },
          Closed: { type: 'object', additionalProperties: false },
        })
      );

      const labels = typeNamed(types, 'Labels').schema;
      expect(labels.typeDecl).toBe('map<string,string>');
      expect(labels.hasAdditionalProperties).toBe(true);
      expect(typeNamed(types, 'Free').schema.typeDecl).toBe('map<string,any>');
      expect(typeNamed(types, 'Closed').schema.typeDecl).toBe('record{}');
    });

    it('keeps named fields next to an open key set', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Bag: {
            type: 'object',
            additionalProperties: true,
            properties: { name: { type: 'string' } },
          },
        })
      );

      const bag = typeNamed(types, 'Bag');
      expect(bag.schema.typeDecl).toBe('record{name?:string,[key:string]:any}');
      expect(bag.needsCustomSerializer).toBe(true);
    });

    it('hoists inline objects under their property path', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Owner: {
            type: 'object',
            properties: {
              address: {
                type: 'object',
                properties: { city: { type: 'string' } },
              },
            },
          },
        })
      );

      expect(typeNames(types)).toEqual(['Owner_Address', 'Owner']);
      expect(typeNamed(types, 'Owner').schema.typeDecl).toBe(
        'record{address?:Owner_Address}'
      );
      expect(typeNamed(types, 'Owner_Address').schemaPath).toBe(
        '#/components/schemas/Owner/properties/address'
      );
    });
  });

  describe('enums', () => {
    it('names members after their values', () => {
      const { types } = resolveFixture(
        schemaDocument({ Status: { type: 'string', enum: ['active', 'on-hold'] } })
      );

      const status = typeNamed(types, 'Status').schema;
      expect(status.typeDecl).toBe('string');
      expect(status.enumValues).toEqual([
        { name: 'Active', value: 'active' },
        { name: 'OnHold', value: 'on-hold' },
      ]);
    });

    it('takes member names from x-enum-names', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Priority: { type: 'integer', enum: [1, 2], 'x-enum-names': ['Low', 'High'] },
        })
      );

      expect(typeNamed(types, 'Priority').schema.enumValues).toEqual([
        { name: 'Low', value: 1 },
        { name: 'High', value: 2 },
      ]);
    });

    it('turns a null member into nullability', () => {
      const { types } = resolveFixture(
        schemaDocument({ Choice: { enum: ['yes', null] } })
      );

      const choice = typeNamed(types, 'Choice').schema;
      expect(choice.typeDecl).toBe('string');
      expect(choice.enumValues).toEqual([{ name: 'Yes', value: 'yes' }]);
      expect(choice.constraints.nullable).toBe(true);
    });

    it('hoists an inline property enum', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Order: {
            type: 'object',
            properties: { state: { type: 'string', enum: ['open', 'closed'] } },
          },
        })
      );

      expect(typeNames(types)).toEqual(['Order_State', 'Order']);
      expect(typeNamed(types, 'Order').schema.typeDecl).toBe('record{state?:Order_State}');
    });
  });

  describe('arrays', () => {
    it('declares the element type', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Tags: { type: 'array', items: { type: 'string' } },
          Rows: {
            type: 'array',
            items: { type: 'object', properties: { label: { type: 'string' } } },
          },
        })
      );

      expect(typeNamed(types, 'Tags').schema.typeDecl).toBe('array<string>');
      expect(typeNamed(types, 'Rows').schema.typeDecl).toBe('array<Rows_Item>');
      expect(typeNamed(types, 'Rows_Item').schema.typeDecl).toBe('record{label?:string}');
    });
  });

  describe('references', () => {
    it('aliases components under their x-type-name', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Owner: { type: 'object', properties: { pet: ref('Pet') } },
          Pet: {
            type: 'object',
            'x-type-name': 'Animal',
            properties: { name: { type: 'string' } },
          },
        })
      );

      expect(typeNames(types)).toEqual(['Owner', 'Animal']);
      expect(typeNamed(types, 'Owner').schema.typeDecl).toBe('record{pet?:Animal}');
      expect(typeNamed(types, 'Animal').jsonName).toBe('Pet');
    });

    it('shares one type between a path reference and the property it points at', () => {
      const { types, diagnostics } = resolveFixture(
        schemaDocument({
          Owner: {
            type: 'object',
            properties: {
              home: { $ref: '#/components/schemas/Pet/properties/address' },
            },
          },
          Pet: {
            type: 'object',
            properties: {
              address: { type: 'object', properties: { city: { type: 'string' } } },
            },
          },
        })
      );

      expect(typeNames(types)).toEqual(['Pet_Address', 'Owner', 'Pet']);
      expect(typeNamed(types, 'Owner').schema.typeDecl).toBe('record{home?:Pet_Address}');
      expect(typeNamed(types, 'Pet').schema.typeDecl).toBe('record{address?:Pet_Address}');
      expect(diagnostics.byCode(DIAGNOSTIC_CODES.TYPE_MERGED_EQUIVALENT)).toHaveLength(1);
    });
  });

  describe('properties', () => {
    it('carries field extensions onto the property', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Account: {
            type: 'object',
            properties: {
              secret: {
                type: 'string',
                'x-sensitive-data': true,
                'x-field-name': 'SecretValue',
              },
              legacy: {
                type: 'string',
                deprecated: true,
                'x-deprecated-reason': 'use id',
              },
            },
          },
        })
      );

      const account = typeNamed(types, 'Account');
      const [secret, legacy] = account.schema.properties;
      expect(secret?.fieldName).toBe('SecretValue');
      expect(secret?.sensitiveData).toEqual({ type: 'full' });
      expect(legacy?.fieldName).toBe('Legacy');
      expect(legacy?.deprecated).toBe(true);
      expect(legacy?.deprecatedReason).toBe('use id');
      expect(account.hasSensitiveField).toBe(true);
      expect(account.needsCustomSerializer).toBe(true);
    });

    it('orders validation tags with presence first', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Limits: {
            type: 'object',
            required: ['size'],
            properties: {
              size: { type: 'integer', minimum: 1, maximum: 10 },
              code: { type: 'string', minLength: 2, maxLength: 3 },
            },
          },
        })
      );

      const [size, code] = typeNamed(types, 'Limits').schema.properties;
      expect(size?.constraints.tags).toEqual(['required', 'gte=1', 'lte=10']);
      expect(code?.constraints.tags).toEqual(['omitempty', 'max=3', 'min=2']);
    });
  });

  describe('x-type next to combinators', () => {
    it('keeps x-type over an anyOf and embeds the union', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Amount: {
            'x-type': 'Decimal',
            anyOf: [{ type: 'string' }, { type: 'number' }],
          },
        })
      );

      expect(typeNames(types)).toEqual(['Amount_AnyOf', 'Amount']);
      const amount = typeNamed(types, 'Amount').schema;
      expect(amount.typeDecl).toBe('Decimal');
      expect(amount.defineViaAlias).toBe(false);
      expect(amount.properties.map((p) => p.fieldName)).toEqual(['Amount_AnyOf']);
    });

    it('keeps x-type over a oneOf', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Either: {
            'x-type': 'Either',
            oneOf: [{ type: 'string' }, { type: 'integer' }],
          },
        })
      );

      expect(typeNames(types)).toEqual(['Either_OneOf', 'Either']);
      const either = typeNamed(types, 'Either').schema;
      expect(either.typeDecl).toBe('Either');
      expect(either.properties.map((p) => p.fieldName)).toEqual(['Either_OneOf']);
    });

    it('adds the merged allOf properties to the x-type declaration', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Base: { type: 'object', properties: { id: { type: 'string' } } },
          Stamped: {
            'x-type': 'Timestamped',
            allOf: [ref('Base'), { properties: { at: { type: 'string' } } }],
          },
        })
      );

      const stamped = typeNamed(types, 'Stamped').schema;
      expect(stamped.typeDecl).toBe('Timestamped');
      expect(stamped.properties.map((p) => p.jsonName)).toEqual(['id', 'at']);
    });

    it('leaves an allOf of one reference an alias', () => {
      const { types } = resolveFixture(
        schemaDocument({
          Base: { type: 'object', properties: { id: { type: 'string' } } },
          Tagged: { 'x-type': 'Label', allOf: [ref('Base')] },
        })
      );

      const tagged = typeNamed(types, 'Tagged').schema;
      expect(tagged.defineViaAlias).toBe(true);
      expect(tagged.refType).toBe('Base');
    });
  });
});
