/* eslint-disable max-lines */
/**
 * Error hierarchy for the schema compiler
 * Every failure carries a stable code and the location it was detected at.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  schemaPath?: string; // JSON Pointer into the source document (e.g., '#/components/schemas/Pet')
  ref?: string; // Reference string involved in the failure
  typeName?: string; // Candidate type name
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  schemaPath?: string;
  ref?: string;
}

export interface CompilerErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all compiler errors
 */
export abstract class CompilerError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;

  public suggestions?: string[];

  constructor(params: CompilerErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      schemaPath: this.context?.schemaPath,
      ref: this.context?.ref,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  get schemaPath(): string | undefined {
    return this.context?.schemaPath;
  }
}

/**
 * A `$ref` that does not point at anything inside the document
 */
export class UnresolvableReferenceError extends CompilerError {
  constructor(ref: string, schemaPath?: string) {
    super({
      message: `Unresolvable reference "${ref}"`,
      errorCode: ErrorCode.UNRESOLVABLE_REFERENCE,
      context: {
        ref,
        schemaPath,
        suggestion:
          'Bundle external files into the document and check the component name',
      },
    });
  }

  get ref(): string | undefined {
    return this.context?.ref;
  }
}

/**
 * allOf members whose declared types, formats or flags disagree
 */
export class IncompatibleMergeError extends CompilerError {
  constructor(params: {
    message: string;
    schemaPath?: string;
    keyword: string;
    left?: unknown;
    right?: unknown;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.INCOMPATIBLE_MERGE,
      context: {
        schemaPath: params.schemaPath,
        keyword: params.keyword,
        left: params.left,
        right: params.right,
      },
    });
  }

  get keyword(): string | undefined {
    const keyword = this.context?.keyword;
    return typeof keyword === 'string' ? keyword : undefined;
  }
}

/**
 * An inline union member without a single discriminator value while an
 * explicit mapping table is present
 */
export class AmbiguousDiscriminatorMappingError extends CompilerError {
  constructor(params: {
    schemaPath?: string;
    propertyName: string;
    element: string;
  }) {
    super({
      message: `Discriminator "${params.propertyName}" has no single value for union element ${params.element}`,
      errorCode: ErrorCode.AMBIGUOUS_DISCRIMINATOR_MAPPING,
      context: {
        schemaPath: params.schemaPath,
        propertyName: params.propertyName,
        element: params.element,
        suggestion:
          'Declare a one-value enum for the discriminator property or reference the element by $ref',
      },
    });
  }
}

/**
 * Some union element type never appears among the discriminator mapping values
 */
export class DiscriminatorNotAllMappedError extends CompilerError {
  public readonly unmapped: string[];

  constructor(params: {
    schemaPath?: string;
    propertyName: string;
    unmapped: string[];
  }) {
    super({
      message: `Discriminator "${params.propertyName}" does not map union element(s): ${params.unmapped.join(', ')}`,
      errorCode: ErrorCode.DISCRIMINATOR_NOT_ALL_MAPPED,
      context: {
        schemaPath: params.schemaPath,
        propertyName: params.propertyName,
        suggestion: 'Add a mapping entry for every oneOf/anyOf element',
      },
    });
    this.unmapped = params.unmapped;
  }
}

/**
 * Two structurally different definitions want the same name
 */
export class DuplicateTypeNameError extends CompilerError {
  constructor(typeName: string, schemaPath?: string) {
    super({
      message: `Type name "${typeName}" is already used by a different schema`,
      errorCode: ErrorCode.DUPLICATE_TYPE_NAME,
      context: {
        typeName,
        schemaPath,
        suggestion: 'Assign an explicit name with the x-type-name extension',
      },
    });
  }

  get typeName(): string | undefined {
    return this.context?.typeName;
  }
}

export class PruneIterationLimitExceededError extends CompilerError {
  constructor(limit: number) {
    super({
      message: `Component pruning did not reach a fixed point within ${limit} iterations`,
      errorCode: ErrorCode.PRUNE_ITERATION_LIMIT_EXCEEDED,
      context: { limit },
    });
  }
}

/**
 * A recognized extension key carrying a value of the wrong shape
 */
export class InvalidExtensionError extends CompilerError {
  constructor(params: { key: string; expected: string; schemaPath?: string }) {
    super({
      message: `Invalid value for extension "${params.key}": expected ${params.expected}`,
      errorCode: ErrorCode.INVALID_EXTENSION,
      context: {
        schemaPath: params.schemaPath,
        extension: params.key,
      },
    });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends CompilerError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

/**
 * Document loading and shape errors
 */
export class ParseError extends CompilerError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { input?: string };
    cause?: Error;
  }) {
    super({
      message: params.message,
      errorCode: ErrorCode.PARSE_ERROR,
      context: params.context,
      cause: params.cause,
    });
  }
}

/**
 * Invariant violations and unexpected failures
 */
export class InternalError extends CompilerError {
  constructor(message: string, cause?: Error) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, cause });
  }
}

export function isCompilerError(error: unknown): error is CompilerError {
  return error instanceof CompilerError;
}
