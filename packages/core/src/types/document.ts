/**
 * OpenAPI 3.x document model as consumed by the compiler.
 * Only the parts the compiler reads are typed; everything else passes
 * through untouched.
 */

export type SchemaType =
  | 'string'
  | 'number'
  | 'integer'
  | 'boolean'
  | 'array'
  | 'object'
  | 'null';

export type ExtensionKey = `x-${string}`;

export interface ReferenceObject {
  $ref: string;
  summary?: string;
  description?: string;
}

export type Referenceable<T> = T | ReferenceObject;

export interface DiscriminatorObject {
  propertyName: string;
  mapping?: Record<string, string>;
}

export interface SchemaObject {
  $ref?: string;
  type?: SchemaType | SchemaType[];
  format?: string;
  title?: string;
  description?: string;

  properties?: Record<string, SchemaObject>;
  required?: string[];
  additionalProperties?: boolean | SchemaObject;
  minProperties?: number;
  maxProperties?: number;

  items?: SchemaObject;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;

  allOf?: SchemaObject[];
  anyOf?: SchemaObject[];
  oneOf?: SchemaObject[];
  not?: SchemaObject;
  discriminator?: DiscriminatorObject;

  enum?: unknown[];
  const?: unknown;
  default?: unknown;
  example?: unknown;
  examples?: unknown;

  minimum?: number;
  maximum?: number;
  // boolean in 3.0, number in 3.1
  exclusiveMinimum?: boolean | number;
  exclusiveMaximum?: boolean | number;
  multipleOf?: number;
  minLength?: number;
  maxLength?: number;
  pattern?: string;

  nullable?: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  deprecated?: boolean;

  [extension: ExtensionKey]: unknown;
}

export interface MediaTypeObject {
  schema?: SchemaObject;
  example?: unknown;
  examples?: Record<string, unknown>;
  encoding?: Record<string, unknown>;
  [extension: ExtensionKey]: unknown;
}

export type ParameterLocation = 'query' | 'header' | 'path' | 'cookie';

export interface ParameterObject {
  name: string;
  in: ParameterLocation;
  description?: string;
  required?: boolean;
  deprecated?: boolean;
  schema?: SchemaObject;
  content?: Record<string, MediaTypeObject>;
  example?: unknown;
  examples?: Record<string, unknown>;
  [extension: ExtensionKey]: unknown;
}

export interface HeaderObject {
  description?: string;
  required?: boolean;
  schema?: SchemaObject;
  content?: Record<string, MediaTypeObject>;
  example?: unknown;
  examples?: Record<string, unknown>;
  [extension: ExtensionKey]: unknown;
}

export interface RequestBodyObject {
  description?: string;
  required?: boolean;
  content?: Record<string, MediaTypeObject>;
  [extension: ExtensionKey]: unknown;
}

export interface LinkObject {
  operationRef?: string;
  operationId?: string;
  parameters?: Record<string, unknown>;
  requestBody?: unknown;
  description?: string;
  [extension: ExtensionKey]: unknown;
}

export interface ResponseObject {
  description?: string;
  headers?: Record<string, Referenceable<HeaderObject>>;
  content?: Record<string, MediaTypeObject>;
  links?: Record<string, Referenceable<LinkObject>>;
  [extension: ExtensionKey]: unknown;
}

export type ResponsesObject = Record<string, Referenceable<ResponseObject>>;

// Runtime expression -> path item
export type CallbackObject = Record<string, PathItemObject>;

export interface OperationObject {
  operationId?: string;
  tags?: string[];
  summary?: string;
  description?: string;
  parameters?: Referenceable<ParameterObject>[];
  requestBody?: Referenceable<RequestBodyObject>;
  responses?: ResponsesObject;
  callbacks?: Record<string, Referenceable<CallbackObject>>;
  deprecated?: boolean;
  [extension: ExtensionKey]: unknown;
}

export const HTTP_METHODS = [
  'get',
  'put',
  'post',
  'delete',
  'options',
  'head',
  'patch',
  'trace',
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface PathItemObject {
  $ref?: string;
  summary?: string;
  description?: string;
  get?: OperationObject;
  put?: OperationObject;
  post?: OperationObject;
  delete?: OperationObject;
  options?: OperationObject;
  head?: OperationObject;
  patch?: OperationObject;
  trace?: OperationObject;
  parameters?: Referenceable<ParameterObject>[];
  [extension: ExtensionKey]: unknown;
}

export interface ComponentsObject {
  schemas?: Record<string, SchemaObject>;
  responses?: Record<string, Referenceable<ResponseObject>>;
  parameters?: Record<string, Referenceable<ParameterObject>>;
  examples?: Record<string, unknown>;
  requestBodies?: Record<string, Referenceable<RequestBodyObject>>;
  headers?: Record<string, Referenceable<HeaderObject>>;
  securitySchemes?: Record<string, unknown>;
  links?: Record<string, Referenceable<LinkObject>>;
  callbacks?: Record<string, Referenceable<CallbackObject>>;
  [extension: ExtensionKey]: unknown;
}

export interface OpenApiDocument {
  openapi: string;
  info?: Record<string, unknown>;
  servers?: unknown[];
  paths?: Record<string, PathItemObject>;
  webhooks?: Record<string, unknown>;
  components?: ComponentsObject;
  security?: unknown[];
  tags?: unknown[];
  externalDocs?: unknown;
  [extension: ExtensionKey]: unknown;
}

/** Component collections whose entries can be addressed by `#/components/<kind>/<name>` */
export const PRUNABLE_COMPONENT_KINDS = [
  'schemas',
  'parameters',
  'requestBodies',
  'responses',
  'headers',
  'links',
  'callbacks',
] as const;

export type PrunableComponentKind = (typeof PRUNABLE_COMPONENT_KINDS)[number];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function isReference<T extends object>(
  value: T | ReferenceObject
): value is ReferenceObject {
  return '$ref' in value && typeof value.$ref === 'string';
}

/**
 * Any JSON object is accepted as a schema node once the document itself
 * passed shape validation; only the `type` keyword is checked here.
 */
export function isSchemaObject(value: unknown): value is SchemaObject {
  if (!isRecord(value)) return false;
  const type = value.type;
  return (
    type === undefined || typeof type === 'string' || Array.isArray(type)
  );
}
