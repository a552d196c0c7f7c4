import { describe, it, expect } from 'vitest';
import fc from 'fast-check';

import { structuralHash, structurallyEqual } from '../struct-hash.js';

describe('structuralHash', () => {
  it('ignores key order', () => {
    const left = { type: 'object', properties: { a: { type: 'string' }, b: { type: 'integer' } } };
    const right = { properties: { b: { type: 'integer' }, a: { type: 'string' } }, type: 'object' };

    expect(structuralHash(left).digest).toBe(structuralHash(right).digest);
    expect(structurallyEqual(left, right)).toBe(true);
  });

  it('tells different schemas apart', () => {
    expect(structurallyEqual({ type: 'string' }, { type: 'string', format: 'uuid' })).toBe(false);
    expect(structurallyEqual({ enum: [1, 2] }, { enum: [2, 1] })).toBe(false);
  });

  it('is a sha256 hex digest', () => {
    expect(structuralHash({}).digest).toMatch(/^[0-9a-f]{64}$/);
  });

  it('is deterministic for any JSON value', () => {
    fc.assert(
      fc.property(fc.jsonValue(), (value) => {
        expect(structuralHash(value)).toEqual(structuralHash(structuredClone(value)));
      })
    );
  });
});
