import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import {
  AmbiguousDiscriminatorMappingError,
  CompilerError,
  DiscriminatorNotAllMappedError,
  DuplicateTypeNameError,
  IncompatibleMergeError,
  InternalError,
  InvalidExtensionError,
  PruneIterationLimitExceededError,
  UnresolvableReferenceError,
  isCompilerError,
} from '../errors.js';

describe('compiler errors', () => {
  it('carry code, name and location', () => {
    const error = new DuplicateTypeNameError('Pet', '#/components/schemas/pet');

    expect(error).toBeInstanceOf(CompilerError);
    expect(error.name).toBe('DuplicateTypeNameError');
    expect(error.errorCode).toBe(ErrorCode.DUPLICATE_TYPE_NAME);
    expect(error.typeName).toBe('Pet');
    expect(error.schemaPath).toBe('#/components/schemas/pet');
    expect(error.getExitCode()).toBe(40);
  });

  it('format their messages from the offending values', () => {
    expect(new PruneIterationLimitExceededError(5).message).toBe(
      'Component pruning did not reach a fixed point within 5 iterations'
    );
    expect(
      new DiscriminatorNotAllMappedError({ propertyName: 'kind', unmapped: ['Cat', 'Dog'] })
        .message
    ).toBe('Discriminator "kind" does not map union element(s): Cat, Dog');
    expect(
      new AmbiguousDiscriminatorMappingError({
        propertyName: 'kind',
        element: 'Pet_OneOf_1',
      }).message
    ).toBe('Discriminator "kind" has no single value for union element Pet_OneOf_1');
    expect(
      new InvalidExtensionError({ key: 'x-omitempty', expected: 'a boolean' }).message
    ).toBe('Invalid value for extension "x-omitempty": expected a boolean');
  });

  it('expose the merge keyword', () => {
    const error = new IncompatibleMergeError({
      message: 'allOf members disagree on type',
      keyword: 'type',
      left: 'string',
      right: 'integer',
    });

    expect(error.keyword).toBe('type');
    expect(error.context?.left).toBe('string');
  });

  it('serialize without the stack in production', () => {
    const cause = new TypeError('boom');
    const error = new InternalError('unexpected', cause);

    expect(error.toJSON('prod')).toEqual({
      name: 'InternalError',
      message: 'unexpected',
      errorCode: 'E500',
      severity: 'error',
      context: undefined,
      cause: { name: 'TypeError', message: 'boom' },
    });
    expect(error.toJSON().stack).toBeDefined();
  });

  it('reduce to a user facing view', () => {
    const error = new UnresolvableReferenceError('#/components/schemas/Gone', '#/paths/~1a');

    expect(error.toUserError()).toEqual({
      message: 'Unresolvable reference "#/components/schemas/Gone"',
      code: 'E010',
      severity: 'error',
      schemaPath: '#/paths/~1a',
      ref: '#/components/schemas/Gone',
    });
  });

  it('are recognized by the guard', () => {
    expect(isCompilerError(new InternalError('x'))).toBe(true);
    expect(isCompilerError(new Error('x'))).toBe(false);
    expect(isCompilerError('x')).toBe(false);
  });
});
