import { DiagnosticCollector } from '../diag/collector.js';
import { resolveDocument, type ResolveResult } from '../ir/resolve.js';
import type { TypeDefinition } from '../ir/types.js';
import type {
  OpenApiDocument,
  PathItemObject,
  SchemaObject,
} from '../types/document.js';
import { resolveOptions, type CompilerOptions } from '../types/options.js';

export function ref(name: string): SchemaObject {
  return { $ref: `#/components/schemas/${name}` };
}

export function schemaDocument(
  schemas: Record<string, SchemaObject>,
  paths: Record<string, PathItemObject> = {}
): OpenApiDocument {
  return { openapi: '3.0.3', paths, components: { schemas } };
}

/** A GET operation answering 200 with `schema` as JSON */
export function jsonGet(
  operationId: string,
  schema: SchemaObject,
  tags: string[] = []
): PathItemObject {
  return {
    get: {
      operationId,
      tags,
      responses: {
        '200': {
          description: 'ok',
          content: { 'application/json': { schema } },
        },
      },
    },
  };
}

export interface ResolvedFixture extends ResolveResult {
  diagnostics: DiagnosticCollector;
}

export function resolveFixture(
  document: OpenApiDocument,
  options: CompilerOptions = {}
): ResolvedFixture {
  const diagnostics = new DiagnosticCollector();
  const result = resolveDocument(document, resolveOptions(options), diagnostics);
  return { ...result, diagnostics };
}

export function typeNamed(
  types: readonly TypeDefinition[],
  name: string
): TypeDefinition {
  const found = types.find((definition) => definition.name === name);
  if (found === undefined) {
    throw new Error(
      `no type "${name}" among ${types.map((t) => t.name).join(', ')}`
    );
  }
  return found;
}

export function typeNames(types: readonly TypeDefinition[]): string[] {
  return types.map((definition) => definition.name);
}
