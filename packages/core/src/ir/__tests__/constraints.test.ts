import { describe, it, expect } from 'vitest';

import {
  countActiveConstraints,
  extractConstraints,
  nodeConstraints,
} from '../constraints.js';

describe('extractConstraints', () => {
  it('treats optional fields as nullable', () => {
    expect(extractConstraints({ type: 'string' })).toEqual({
      required: false,
      nullable: true,
      tags: [],
    });
  });

  it('keeps required fields non-nullable unless the schema admits null', () => {
    expect(extractConstraints({ type: 'string' }, { required: true }).nullable).toBe(false);
    expect(
      extractConstraints({ type: 'string', nullable: true }, { required: true }).nullable
    ).toBe(true);
    expect(
      extractConstraints({ type: ['string', 'null'] }, { required: true }).nullable
    ).toBe(true);
    expect(
      extractConstraints({ type: 'string' }, { required: true, hasNilType: true }).nullable
    ).toBe(true);
  });

  it('reads 3.0 boolean exclusive bounds', () => {
    const constraints = extractConstraints(
      { type: 'number', minimum: 0, exclusiveMinimum: true, maximum: 1.5 },
      { required: true }
    );
    expect(constraints.minimum).toBe(0);
    expect(constraints.exclusiveMinimum).toBe(true);
    expect(constraints.maximum).toBe(1.5);
    expect(constraints.tags).toEqual(['required', 'gt=0', 'lte=1.5']);
  });

  it('reads 3.1 numeric exclusive bounds', () => {
    const constraints = extractConstraints({
      type: 'integer',
      exclusiveMinimum: 0,
      exclusiveMaximum: 100,
    });
    expect(constraints.minimum).toBe(0);
    expect(constraints.maximum).toBe(100);
    expect(constraints.tags).toEqual(['omitempty', 'gt=0', 'lt=100']);
  });

  it('only tags numeric bounds on numeric types', () => {
    const constraints = extractConstraints({ minimum: 3 });
    expect(constraints.minimum).toBe(3);
    expect(constraints.tags).toEqual([]);
  });

  it('tags item counts and keeps the remaining facts untagged', () => {
    const constraints = extractConstraints(
      {
        type: 'array',
        minItems: 1,
        maxItems: 5,
        multipleOf: 2,
        minProperties: 1,
        readOnly: true,
      },
      { required: true }
    );
    expect(constraints.tags).toEqual(['required', 'max=5', 'min=1']);
    expect(constraints.multipleOf).toBe(2);
    expect(constraints.minProperties).toBe(1);
    expect(constraints.readOnly).toBe(true);
  });
});

describe('nodeConstraints', () => {
  it('drops presence from the node view', () => {
    const constraints = nodeConstraints({ type: 'string', maxLength: 3 });
    expect(constraints.required).toBe(false);
    expect(constraints.nullable).toBe(false);
    expect(constraints.tags).toEqual(['max=3']);
  });
});

describe('countActiveConstraints', () => {
  it('counts the validation facts that are set', () => {
    expect(
      countActiveConstraints(
        extractConstraints({ type: 'string', minLength: 1, maxLength: 2, pattern: '^a' })
      )
    ).toBe(3);
    expect(countActiveConstraints(extractConstraints({ type: 'string' }))).toBe(0);
  });
});
