/* eslint-disable complexity */
/**
 * Configuration options for one compilation
 *
 * All options are optional with conservative defaults.
 */

import { ConfigError } from './errors.js';

/**
 * Predicates an operation is matched against. Empty lists match nothing
 * for `exclude` and everything for `include`.
 */
export interface OperationSelector {
  /** Path templates, compared verbatim (e.g. '/pets/{petId}') */
  paths?: string[];
  tags?: string[];
  operationIds?: string[];
  /**
   * Optional properties of component schemas, keyed by component name.
   * Required properties are never removed.
   */
  schemaProperties?: Record<string, string[]>;
}

export interface FilterOptions {
  include?: OperationSelector;
  exclude?: OperationSelector;
}

/**
 * Component reachability pruning
 */
export interface PruneOptions {
  /** Run the pruner at all (default: true) */
  enabled?: boolean;
  /** Safety cap on fixed-point passes (default: 1000) */
  maxIterations?: number;
}

export interface NamingOptions {
  /**
   * Suffixes tried, in order, when a derived name is taken by a different
   * schema. Numbers are appended after every suffix has been tried.
   * (default: [] which behaves like [''])
   */
  suffixes?: string[];
}

export interface ExtensionOptions {
  /** Extension keys kept by document cleanup besides the recognized ones */
  allowed?: string[];
}

export interface ErrorHandlingOptions {
  /**
   * Keep resolving independent schema sites after a failure and report
   * every error at the end (default: false)
   */
  collect?: boolean;
}

export interface CompilerOptions {
  filter?: FilterOptions;
  prune?: PruneOptions;
  naming?: NamingOptions;
  extensions?: ExtensionOptions;
  errors?: ErrorHandlingOptions;
  /** Recursion guard for schema resolution (default: 256) */
  maxDepth?: number;
}

export interface ResolvedSelector {
  paths: string[];
  tags: string[];
  operationIds: string[];
  schemaProperties: Record<string, string[]>;
}

export interface ResolvedCompilerOptions {
  filter: {
    include: ResolvedSelector;
    exclude: ResolvedSelector;
  };
  prune: Required<PruneOptions>;
  naming: Required<NamingOptions>;
  extensions: Required<ExtensionOptions>;
  errors: Required<ErrorHandlingOptions>;
  maxDepth: number;
}

export const DEFAULT_OPTIONS: ResolvedCompilerOptions = {
  filter: {
    include: { paths: [], tags: [], operationIds: [], schemaProperties: {} },
    exclude: { paths: [], tags: [], operationIds: [], schemaProperties: {} },
  },
  prune: {
    enabled: true,
    maxIterations: 1000,
  },
  naming: {
    suffixes: [],
  },
  extensions: {
    allowed: [],
  },
  errors: {
    collect: false,
  },
  maxDepth: 256,
};

function resolveSelector(
  base: ResolvedSelector,
  user: OperationSelector | undefined
): ResolvedSelector {
  return {
    paths: [...(user?.paths ?? base.paths)],
    tags: [...(user?.tags ?? base.tags)],
    operationIds: [...(user?.operationIds ?? base.operationIds)],
    schemaProperties: { ...(user?.schemaProperties ?? base.schemaProperties) },
  };
}

/**
 * Merge user options over the defaults and validate the result
 *
 * @throws {ConfigError} When a value is out of range
 */
export function resolveOptions(
  userOptions: CompilerOptions = {}
): ResolvedCompilerOptions {
  const resolved: ResolvedCompilerOptions = {
    filter: {
      include: resolveSelector(
        DEFAULT_OPTIONS.filter.include,
        userOptions.filter?.include
      ),
      exclude: resolveSelector(
        DEFAULT_OPTIONS.filter.exclude,
        userOptions.filter?.exclude
      ),
    },
    prune: { ...DEFAULT_OPTIONS.prune, ...userOptions.prune },
    naming: {
      suffixes: [
        ...(userOptions.naming?.suffixes ?? DEFAULT_OPTIONS.naming.suffixes),
      ],
    },
    extensions: {
      allowed: [
        ...(userOptions.extensions?.allowed ??
          DEFAULT_OPTIONS.extensions.allowed),
      ],
    },
    errors: { ...DEFAULT_OPTIONS.errors, ...userOptions.errors },
    maxDepth: userOptions.maxDepth ?? DEFAULT_OPTIONS.maxDepth,
  };

  validateOptions(resolved);
  return resolved;
}

function invalid(setting: string, message: string): ConfigError {
  return new ConfigError({
    message: `${setting} ${message}`,
    context: { setting },
  });
}

/**
 * @throws {ConfigError} When invalid values are detected
 */
export function validateOptions(options: ResolvedCompilerOptions): void {
  if (
    !Number.isInteger(options.prune.maxIterations) ||
    options.prune.maxIterations <= 0
  ) {
    throw invalid('prune.maxIterations', 'must be a positive integer');
  }
  if (typeof options.prune.enabled !== 'boolean') {
    throw invalid('prune.enabled', 'must be boolean');
  }
  if (!Number.isInteger(options.maxDepth) || options.maxDepth <= 0) {
    throw invalid('maxDepth', 'must be a positive integer');
  }
  if (typeof options.errors.collect !== 'boolean') {
    throw invalid('errors.collect', 'must be boolean');
  }

  const seen = new Set<string>();
  for (const suffix of options.naming.suffixes) {
    if (!/^[A-Za-z0-9_]*$/.test(suffix)) {
      throw invalid(
        'naming.suffixes',
        `entry "${suffix}" must contain only letters, digits or underscores`
      );
    }
    if (seen.has(suffix)) {
      throw invalid('naming.suffixes', `entry "${suffix}" is duplicated`);
    }
    seen.add(suffix);
  }

  for (const key of options.extensions.allowed) {
    if (!key.startsWith('x-')) {
      throw invalid('extensions.allowed', `entry "${key}" must start with "x-"`);
    }
  }
}
