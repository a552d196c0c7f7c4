import type { DiagnosticCollector } from '../diag/collector.js';
import { parseExtensions } from '../extensions/extensions.js';
import type { OpenApiDocument } from '../types/document.js';
import { isCompilerError, type CompilerError } from '../types/errors.js';
import type { ResolvedCompilerOptions } from '../types/options.js';
import { componentReference, toPointer } from '../util/pointer.js';
import { refToTypeName } from '../util/names.js';
import { buildSchemaIR } from './builder.js';
import { relocate, type ResolveContext } from './context.js';
import { collectOperationSites, type DefinitionSite } from './operations.js';
import { TypeRegistry } from './registry.js';
import { defineType, type TypeDefinition } from './types.js';

export interface ResolveResult {
  types: TypeDefinition[];
  /** Per-site failures; only ever non-empty with `errors.collect` */
  errors: CompilerError[];
}

function componentSites(document: OpenApiDocument): DefinitionSite[] {
  return Object.entries(document.components?.schemas ?? {}).map(
    ([key, schema]) => {
      const ref = componentReference('schemas', key);
      return {
        schemaPath: ref,
        define(root: ResolveContext) {
          const name =
            parseExtensions(schema, ref).typeName ?? refToTypeName(ref);
          const ir = buildSchemaIR(schema, relocate(root, [name], ref, ref));
          root.registry.register(
            defineType({
              name,
              jsonName: key,
              schema: ir,
              location: 'schema',
              schemaPath: ref,
            })
          );
        },
      };
    }
  );
}

/**
 * Resolve every component schema and every operation of a (filtered and
 * pruned) document into type definitions.
 *
 * Component names are reserved up front so that types hoisted while
 * resolving earlier sites never take a name a component declares.
 *
 * @throws {CompilerError} The first site failure, unless errors are collected
 */
export function resolveDocument(
  document: OpenApiDocument,
  options: ResolvedCompilerOptions,
  diagnostics: DiagnosticCollector
): ResolveResult {
  const registry = new TypeRegistry({
    suffixes: options.naming.suffixes,
    diagnostics,
  });
  for (const [key, schema] of Object.entries(document.components?.schemas ?? {})) {
    const ref = componentReference('schemas', key);
    registry.reserve(parseExtensions(schema, ref).typeName ?? refToTypeName(ref));
  }

  const root: ResolveContext = {
    document,
    registry,
    diagnostics,
    options,
    path: [],
    schemaPath: toPointer([]),
    depth: 0,
    inFlight: new Set(),
  };

  const errors: CompilerError[] = [];
  const sites = [...componentSites(document), ...collectOperationSites(document)];
  for (const site of sites) {
    const checkpoint = registry.checkpoint();
    try {
      site.define(root);
    } catch (error) {
      registry.rollback(checkpoint);
      if (!options.errors.collect || !isCompilerError(error)) throw error;
      errors.push(error);
    }
  }

  return { types: registry.list(), errors };
}
