/* eslint-disable complexity */
import {
  ConfigError,
  type CompilerOptions,
  type FilterOptions,
  type OperationSelector,
  type PruneOptions,
} from '@openapi-ir/core';

export type EmitFormat = 'types' | 'document';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  config?: string;
  includeTag?: string[];
  excludeTag?: string[];
  includeOperation?: string[];
  excludeOperation?: string[];
  includePath?: string[];
  excludePath?: string[];
  /** false when --no-prune is given */
  prune?: boolean;
  collectErrors?: boolean;
  maxPruneIterations?: string | number;
  emit?: string;
  out?: string;
  debug?: boolean;
  printMetrics?: boolean;
}

/** Commander argument parser for repeatable options */
export function collectList(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(name: string, value: unknown): number {
  const num = typeof value === 'number' ? value : Number(String(value));
  if (!Number.isInteger(num) || num <= 0) {
    throw new ConfigError({
      message: `Invalid --${name} value "${String(value)}". Expected a positive integer.`,
      context: { setting: name },
    });
  }
  return num;
}

/**
 * Resolve the --emit flag into a known output or throw.
 */
export function resolveEmitFormat(value: unknown): EmitFormat {
  if (value === undefined || value === null || value === '') {
    return 'types';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'types' || raw === 'document') {
    return raw;
  }
  throw new ConfigError({
    message: `Invalid --emit value "${String(value)}". Supported outputs are "types" and "document".`,
    context: { setting: 'emit' },
  });
}

function selector(
  paths: string[] | undefined,
  tags: string[] | undefined,
  operationIds: string[] | undefined
): OperationSelector | undefined {
  const result: OperationSelector = {};
  if (paths && paths.length > 0) result.paths = paths;
  if (tags && tags.length > 0) result.tags = tags;
  if (operationIds && operationIds.length > 0) result.operationIds = operationIds;
  return Object.keys(result).length > 0 ? result : undefined;
}

/**
 * Parse CLI options into CompilerOptions. Only flags that were given show
 * up, so the result can be laid over a configuration file.
 */
export function parseCompilerOptions(options: CliOptions): CompilerOptions {
  const compilerOptions: CompilerOptions = {};

  const include = selector(options.includePath, options.includeTag, options.includeOperation);
  const exclude = selector(options.excludePath, options.excludeTag, options.excludeOperation);
  if (include || exclude) {
    const filter: FilterOptions = {};
    if (include) filter.include = include;
    if (exclude) filter.exclude = exclude;
    compilerOptions.filter = filter;
  }

  const prune: PruneOptions = {};
  if (options.prune === false) {
    prune.enabled = false;
  }
  if (options.maxPruneIterations !== undefined) {
    prune.maxIterations = parsePositiveInt('max-prune-iterations', options.maxPruneIterations);
  }
  if (Object.keys(prune).length > 0) {
    compilerOptions.prune = prune;
  }

  if (options.collectErrors === true) {
    compilerOptions.errors = { collect: true };
  }

  return compilerOptions;
}

function mergeSelector(
  base: OperationSelector | undefined,
  override: OperationSelector | undefined
): OperationSelector | undefined {
  if (!override) return base;
  return { ...base, ...override };
}

/**
 * Lay `overrides` over `base`. Selector lists replace each other per field;
 * nested settings merge key by key.
 */
export function mergeCompilerOptions(
  base: CompilerOptions,
  overrides: CompilerOptions
): CompilerOptions {
  const merged: CompilerOptions = { ...base, ...overrides };

  if (base.filter || overrides.filter) {
    const include = mergeSelector(base.filter?.include, overrides.filter?.include);
    const exclude = mergeSelector(base.filter?.exclude, overrides.filter?.exclude);
    merged.filter = {};
    if (include) merged.filter.include = include;
    if (exclude) merged.filter.exclude = exclude;
  }
  if (base.prune || overrides.prune) {
    merged.prune = { ...base.prune, ...overrides.prune };
  }
  if (base.errors || overrides.errors) {
    merged.errors = { ...base.errors, ...overrides.errors };
  }

  return merged;
}
