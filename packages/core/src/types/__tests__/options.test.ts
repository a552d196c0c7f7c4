import { describe, it, expect } from 'vitest';

import { ConfigError } from '../errors.js';
import { DEFAULT_OPTIONS, resolveOptions } from '../options.js';

describe('resolveOptions', () => {
  it('returns the defaults for no options', () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it('merges nested settings over the defaults', () => {
    const options = resolveOptions({
      prune: { maxIterations: 10 },
      filter: { exclude: { tags: ['internal'] } },
      naming: { suffixes: ['Dto', 'Model'] },
    });

    expect(options.prune).toEqual({ enabled: true, maxIterations: 10 });
    expect(options.filter.exclude.tags).toEqual(['internal']);
    expect(options.filter.include.tags).toEqual([]);
    expect(options.naming.suffixes).toEqual(['Dto', 'Model']);
  });

  it('never shares arrays with the defaults', () => {
    const options = resolveOptions();
    options.filter.include.tags.push('mutated');
    options.extensions.allowed.push('x-mutated');

    expect(DEFAULT_OPTIONS.filter.include.tags).toEqual([]);
    expect(DEFAULT_OPTIONS.extensions.allowed).toEqual([]);
  });

  it.each([
    [{ prune: { maxIterations: 0 } }, 'prune.maxIterations must be a positive integer'],
    [{ prune: { maxIterations: 2.5 } }, 'prune.maxIterations must be a positive integer'],
    [{ maxDepth: -1 }, 'maxDepth must be a positive integer'],
    [
      { naming: { suffixes: ['Dto', 'Dto'] } },
      'naming.suffixes entry "Dto" is duplicated',
    ],
    [
      { naming: { suffixes: ['Data-Model'] } },
      'naming.suffixes entry "Data-Model" must contain only letters, digits or underscores',
    ],
    [
      { extensions: { allowed: ['display-name'] } },
      'extensions.allowed entry "display-name" must start with "x-"',
    ],
  ])('rejects %j', (userOptions, message) => {
    expect(() => resolveOptions(userOptions)).toThrow(message);
  });

  it('names the offending setting', () => {
    let thrown: unknown;
    try {
      resolveOptions({ maxDepth: 0 });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    if (thrown instanceof ConfigError) {
      expect(thrown.setting).toBe('maxDepth');
      expect(thrown.getExitCode()).toBe(70);
    }
  });
});
