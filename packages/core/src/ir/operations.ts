/* eslint-disable complexity */
import {
  HTTP_METHODS,
  isRecord,
  isSchemaObject,
  type HttpMethod,
  type MediaTypeObject,
  type OpenApiDocument,
  type OperationObject,
  type ParameterLocation,
  type ParameterObject,
  type Referenceable,
  type RequestBodyObject,
  type ResponseObject,
  type SchemaObject,
} from '../types/document.js';
import { UnresolvableReferenceError } from '../types/errors.js';
import { toTypeName } from '../util/names.js';
import { appendPointer, toPointer } from '../util/pointer.js';
import { buildProperty, buildSchemaIR } from './builder.js';
import { relocate, resolveReference, type ResolveContext } from './context.js';
import {
  createIR,
  defineType,
  renderRecordDecl,
  type Property,
  type SpecLocation,
} from './types.js';

/**
 * Type definitions contributed by operations: grouped parameters, the JSON
 * request body and every JSON response.
 */

/** One independently resolvable unit; errors never cross sites */
export interface DefinitionSite {
  schemaPath: string;
  define(ctx: ResolveContext): void;
}

const GROUPED_LOCATIONS = [
  ['path', 'PathParams'],
  ['query', 'QueryParams'],
  ['header', 'HeaderParams'],
] as const satisfies ReadonlyArray<readonly [ParameterLocation & SpecLocation, string]>;

const PARAMETER_LOCATIONS: ReadonlySet<unknown> = new Set([
  'query',
  'header',
  'path',
  'cookie',
]);

function isParameterObject(value: unknown): value is ParameterObject {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    PARAMETER_LOCATIONS.has(value.in)
  );
}

function isRequestBodyObject(value: unknown): value is RequestBodyObject {
  return isRecord(value);
}

function isResponseObject(value: unknown): value is ResponseObject {
  return isRecord(value);
}

interface Located<T> {
  value: T;
  pointer: string;
}

/**
 * Follow references between reusable components (parameters, bodies,
 * responses) until a concrete object is reached.
 */
function derefComponent<T extends object>(
  document: OpenApiDocument,
  entry: Referenceable<T>,
  pointer: string,
  guard: (value: unknown) => value is T
): Located<T> {
  const seen = new Set<string>();
  let current: unknown = entry;
  let location = pointer;
  while (isRecord(current) && typeof current.$ref === 'string') {
    const ref = current.$ref;
    if (seen.has(ref)) throw new UnresolvableReferenceError(ref, location);
    seen.add(ref);
    current = resolveReference(document, ref, location);
    location = ref;
  }
  if (!guard(current)) {
    throw new UnresolvableReferenceError(location, pointer);
  }
  return { value: current, pointer: location };
}

/** application/json first, then any other JSON-flavoured media type */
function jsonMedia(
  content: Record<string, MediaTypeObject> | undefined,
  pointer: string
): Located<SchemaObject> | undefined {
  if (content === undefined) return undefined;
  const key =
    'application/json' in content
      ? 'application/json'
      : Object.keys(content).find((mediaType) => /json/i.test(mediaType));
  if (key === undefined) return undefined;
  const schema = content[key]?.schema;
  if (schema === undefined || !isSchemaObject(schema)) return undefined;
  return {
    value: schema,
    pointer: appendPointer(pointer, 'content', key, 'schema'),
  };
}

export function operationTypeName(
  path: string,
  method: HttpMethod,
  operation: OperationObject
): string {
  return toTypeName(operation.operationId ?? `${method} ${path}`);
}

/** '200' -> '200', '4XX' -> '4XX', 'default' -> 'Default' */
function statusName(status: string): string {
  if (/^[0-9]/.test(status)) return status.replace(/[^A-Za-z0-9]/g, '');
  return toTypeName(status);
}

interface ResolvedParameter {
  parameter: ParameterObject;
  pointer: string;
}

/** Path-level parameters overridden by operation-level ones (same name and location) */
function effectiveParameters(
  document: OpenApiDocument,
  pathItemParameters: ReadonlyArray<Referenceable<ParameterObject>>,
  operationParameters: ReadonlyArray<Referenceable<ParameterObject>>,
  pathPointer: string,
  operationPointer: string
): ResolvedParameter[] {
  const byKey = new Map<string, ResolvedParameter>();
  const collect = (
    list: ReadonlyArray<Referenceable<ParameterObject>>,
    base: string
  ): void => {
    list.forEach((entry, index) => {
      const { value, pointer } = derefComponent(
        document,
        entry,
        appendPointer(base, 'parameters', String(index)),
        isParameterObject
      );
      byKey.set(`${value.in}:${value.name}`, { parameter: value, pointer });
    });
  };
  collect(pathItemParameters, pathPointer);
  collect(operationParameters, operationPointer);
  return [...byKey.values()];
}

function parameterSchema(
  resolved: ResolvedParameter
): Located<SchemaObject> | undefined {
  const { parameter, pointer } = resolved;
  if (parameter.schema !== undefined) {
    return { value: parameter.schema, pointer: appendPointer(pointer, 'schema') };
  }
  return jsonMedia(parameter.content, pointer);
}

function parameterGroupSite(
  groupName: string,
  location: 'path' | 'query' | 'header',
  parameters: readonly ResolvedParameter[],
  operationPointer: string
): DefinitionSite {
  return {
    schemaPath: operationPointer,
    define(root) {
      const properties: Property[] = [];
      for (const resolved of parameters) {
        const schema = parameterSchema(resolved);
        const { parameter } = resolved;
        const node: SchemaObject = schema?.value ?? {};
        const child = relocate(
          root,
          [groupName, parameter.name],
          schema?.pointer ?? resolved.pointer
        );
        const property = buildProperty(
          parameter.name,
          node,
          location === 'path' || parameter.required === true,
          child
        );
        if (property.description === undefined && parameter.description !== undefined) {
          property.description = parameter.description;
        }
        if (parameter.deprecated === true) property.deprecated = true;
        properties.push(property);
      }

      const ir = createIR(renderRecordDecl({ properties }), {
        properties,
        additionalTypes: properties.flatMap(
          (property) => property.schema.additionalTypes
        ),
      });
      root.registry.claim(
        defineType({
          name: groupName,
          schema: ir,
          location,
          schemaPath: operationPointer,
        })
      );
    },
  };
}

function schemaSite(
  name: string,
  location: 'body' | 'response',
  schema: Located<SchemaObject>
): DefinitionSite {
  return {
    schemaPath: schema.pointer,
    define(root) {
      const ctx = relocate(root, [name], schema.pointer);
      const ir = buildSchemaIR(schema.value, ctx);
      root.registry.claim(
        defineType({ name, schema: ir, location, schemaPath: schema.pointer })
      );
    },
  };
}

/**
 * Sites for one operation. Locating the schemas (following parameter,
 * body and response references) is itself part of the first site that
 * needs it, so a broken reference fails that site alone.
 */
function operationSites(
  document: OpenApiDocument,
  path: string,
  method: HttpMethod,
  operation: OperationObject,
  pathItemParameters: ReadonlyArray<Referenceable<ParameterObject>>
): DefinitionSite[] {
  const pathPointer = toPointer(['paths', path]);
  const operationPointer = appendPointer(pathPointer, method);
  const name = operationTypeName(path, method, operation);
  const sites: DefinitionSite[] = [];

  sites.push({
    schemaPath: operationPointer,
    define(root) {
      const parameters = effectiveParameters(
        document,
        pathItemParameters,
        operation.parameters ?? [],
        pathPointer,
        operationPointer
      );
      for (const [location, suffix] of GROUPED_LOCATIONS) {
        const group = parameters.filter(
          (resolved) => resolved.parameter.in === location
        );
        if (group.length === 0) continue;
        parameterGroupSite(
          `${name}${suffix}`,
          location,
          group,
          operationPointer
        ).define(root);
      }
    },
  });

  const { requestBody } = operation;
  if (requestBody !== undefined) {
    sites.push({
      schemaPath: appendPointer(operationPointer, 'requestBody'),
      define(root) {
        const body = derefComponent(
          document,
          requestBody,
          appendPointer(operationPointer, 'requestBody'),
          isRequestBodyObject
        );
        const schema = jsonMedia(body.value.content, body.pointer);
        if (schema !== undefined) {
          schemaSite(`${name}Body`, 'body', schema).define(root);
        }
      },
    });
  }

  for (const [status, response] of Object.entries(operation.responses ?? {})) {
    const responsePointer = appendPointer(operationPointer, 'responses', status);
    sites.push({
      schemaPath: responsePointer,
      define(root) {
        const resolved = derefComponent(
          document,
          response,
          responsePointer,
          isResponseObject
        );
        const schema = jsonMedia(resolved.value.content, resolved.pointer);
        if (schema !== undefined) {
          schemaSite(
            `${name}${statusName(status)}Response`,
            'response',
            schema
          ).define(root);
        }
      },
    });
  }

  return sites;
}

/** Every operation site of the document, in path then method order */
export function collectOperationSites(
  document: OpenApiDocument
): DefinitionSite[] {
  const sites: DefinitionSite[] = [];
  for (const [path, pathItem] of Object.entries(document.paths ?? {})) {
    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (operation === undefined) continue;
      sites.push(
        ...operationSites(
          document,
          path,
          method,
          operation,
          pathItem.parameters ?? []
        )
      );
    }
  }
  return sites;
}
