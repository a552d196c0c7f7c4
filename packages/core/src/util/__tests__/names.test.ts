import { describe, it, expect } from 'vitest';

import {
  enumMemberName,
  pathToTypeName,
  refToObjectName,
  refToTypeName,
  toFieldName,
  toTypeName,
} from '../names.js';

describe('toTypeName', () => {
  it.each([
    ['pet', 'Pet'],
    ['pet-store_item', 'PetStoreItem'],
    ['get /pets/{petId}', 'GetPetsPetId'],
    ['2fa code', 'N2faCode'],
    ['__', 'Type'],
  ])('%s -> %s', (input, expected) => {
    expect(toTypeName(input)).toBe(expected);
  });

  it('uses its own fallback for fields', () => {
    expect(toFieldName('-')).toBe('Field');
    expect(toFieldName('created_at')).toBe('CreatedAt');
  });
});

describe('pathToTypeName', () => {
  it('keeps index segments numeric', () => {
    expect(pathToTypeName(['Pet', 'oneOf', '0'])).toBe('Pet_OneOf_0');
    expect(pathToTypeName(['200'])).toBe('N200');
  });
});

describe('refToTypeName', () => {
  it('starts at the component name', () => {
    expect(refToTypeName('#/components/schemas/pet_owner')).toBe('PetOwner');
  });

  it('drops property hops and renames containers', () => {
    expect(refToTypeName('#/components/schemas/Pet/properties/address')).toBe(
      'Pet_Address'
    );
    expect(refToTypeName('#/components/schemas/Pet/properties/tags/items')).toBe(
      'Pet_Tags_Item'
    );
    expect(
      refToTypeName('#/components/schemas/Labels/additionalProperties')
    ).toBe('Labels_AdditionalProperties');
  });

  it('decodes escaped tokens', () => {
    expect(refToObjectName('#/components/schemas/a~1b')).toBe('a/b');
    expect(refToObjectName('other.yaml')).toBe('other.yaml');
  });
});

describe('enumMemberName', () => {
  it('names every literal kind', () => {
    expect(enumMemberName('in-stock')).toBe('InStock');
    expect(enumMemberName('')).toBe('Empty');
    expect(enumMemberName(-3)).toBe('Minus3');
    expect(enumMemberName(0)).toBe('N0');
    expect(enumMemberName(1.5)).toBe('N1_5');
    expect(enumMemberName(true)).toBe('True');
  });
});
