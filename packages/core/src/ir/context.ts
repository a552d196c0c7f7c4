import type { DiagnosticCollector } from '../diag/collector.js';
import {
  isSchemaObject,
  type OpenApiDocument,
  type SchemaObject,
} from '../types/document.js';
import { InternalError, UnresolvableReferenceError } from '../types/errors.js';
import type { ResolvedCompilerOptions } from '../types/options.js';
import { appendPointer, getByPointer, referenceTokens } from '../util/pointer.js';
import type { TypeRegistry } from './registry.js';

/**
 * State threaded through the builder and the combinator resolver. A new
 * context is derived for every child site; the registry, diagnostics and
 * in-flight set are shared by reference within one compilation.
 */
export interface ResolveContext {
  readonly document: OpenApiDocument;
  readonly registry: TypeRegistry;
  readonly diagnostics: DiagnosticCollector;
  readonly options: ResolvedCompilerOptions;
  /** Naming path: ['Pet', 'owner'] names a hoisted type 'Pet_Owner' */
  readonly path: readonly string[];
  /** JSON Pointer of the node being resolved */
  readonly schemaPath: string;
  /** The caller already knows this node is a reference to `reference` */
  readonly reference?: string;
  /** Reference of the type currently being defined (self-reference guard) */
  readonly currentRef?: string;
  readonly depth: number;
  /** Path references whose target type is being built */
  readonly inFlight: Set<string>;
}

export interface DescendOptions {
  reference?: string;
  /** Combinator members still belong to the type being defined */
  keepCurrentRef?: boolean;
}

function nextDepth(ctx: ResolveContext): number {
  const depth = ctx.depth + 1;
  if (depth > ctx.options.maxDepth) {
    throw new InternalError(
      `Schema nesting exceeds maxDepth (${ctx.options.maxDepth}) at ${ctx.schemaPath}`
    );
  }
  return depth;
}

export function descend(
  ctx: ResolveContext,
  nameSegments: readonly string[],
  pointerSegments: readonly string[],
  options: DescendOptions = {}
): ResolveContext {
  return {
    ...ctx,
    path: [...ctx.path, ...nameSegments],
    schemaPath: appendPointer(ctx.schemaPath, ...pointerSegments),
    reference: options.reference,
    currentRef: options.keepCurrentRef ? ctx.currentRef : undefined,
    depth: nextDepth(ctx),
  };
}

/**
 * Move to an unrelated site, e.g. the target of a path reference, which
 * defines its own type.
 */
export function relocate(
  ctx: ResolveContext,
  path: readonly string[],
  schemaPath: string,
  currentRef?: string
): ResolveContext {
  return {
    ...ctx,
    path,
    schemaPath,
    reference: undefined,
    currentRef,
    depth: nextDepth(ctx),
  };
}

/**
 * Target of a local reference. Anything outside the document, or a missing
 * target, is an UnresolvableReferenceError.
 */
export function resolveReference(
  document: OpenApiDocument,
  ref: string,
  schemaPath?: string
): unknown {
  const tokens = referenceTokens(ref);
  if (tokens === undefined) {
    throw new UnresolvableReferenceError(ref, schemaPath);
  }
  const target = getByPointer(document, tokens);
  if (target === undefined) {
    throw new UnresolvableReferenceError(ref, schemaPath);
  }
  return target;
}

export function resolveSchemaRef(
  ctx: Pick<ResolveContext, 'document' | 'schemaPath'>,
  ref: string
): SchemaObject {
  const target = resolveReference(ctx.document, ref, ctx.schemaPath);
  if (!isSchemaObject(target)) {
    throw new UnresolvableReferenceError(ref, ctx.schemaPath);
  }
  return target;
}

/**
 * Follow `$ref` chains down to a schema with content of its own.
 */
export function deref(
  ctx: Pick<ResolveContext, 'document' | 'schemaPath'>,
  schema: SchemaObject
): SchemaObject {
  const seen = new Set<string>();
  let current = schema;
  while (typeof current.$ref === 'string') {
    if (seen.has(current.$ref)) {
      throw new UnresolvableReferenceError(current.$ref, ctx.schemaPath);
    }
    seen.add(current.$ref);
    current = resolveSchemaRef(ctx, current.$ref);
  }
  return current;
}
