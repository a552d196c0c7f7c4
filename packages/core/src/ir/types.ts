import type { SchemaObject } from '../types/document.js';
import type { SensitiveDataConfig } from '../extensions/extensions.js';

/**
 * Intermediate representation produced by schema resolution. Every IR node
 * is language neutral; the `typeDecl` strings use a small notation:
 *
 * - primitives: `string`, `integer`, `int64`, `datetime`, ...
 * - `array<T>` and `map<string,T>`
 * - `record{name?:T,...Embedded,[key:string]:T,union(A|B)}`
 * - a bare type name for references
 */

/** Where a type definition was declared */
export type SpecLocation =
  | 'schema'
  | 'path'
  | 'query'
  | 'header'
  | 'body'
  | 'response'
  | 'union';

export interface Constraints {
  required: boolean;
  nullable: boolean;
  readOnly?: boolean;
  writeOnly?: boolean;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  exclusiveMinimum?: boolean;
  exclusiveMaximum?: boolean;
  minItems?: number;
  maxItems?: number;
  minProperties?: number;
  maxProperties?: number;
  pattern?: string;
  multipleOf?: number;
  /** Ordered validation tags: presence first, then the rest sorted */
  tags: string[];
}

export interface Property {
  fieldName: string;
  /** Wire name; empty for embedded (mixin) fields */
  jsonName: string;
  description?: string;
  schema: SchemaIR;
  constraints: Constraints;
  deprecated: boolean;
  deprecatedReason?: string;
  sensitiveData?: SensitiveDataConfig;
  omitEmpty?: boolean;
  jsonIgnore?: boolean;
  extraTags?: Record<string, string>;
}

export interface UnionElement {
  typeName: string;
  schema: SchemaIR;
}

export interface Discriminator {
  propertyName: string;
  /** discriminator value -> union element type name */
  mapping: Record<string, string>;
}

export interface EnumMember {
  name: string;
  value: string | number | boolean;
}

export interface SchemaIR {
  typeDecl: string;
  refType?: string;
  /** Another name for an existing type; never carries properties */
  defineViaAlias: boolean;
  properties: Property[];
  arrayType?: SchemaIR;
  additionalPropertiesType?: SchemaIR;
  hasAdditionalProperties: boolean;
  enumValues: EnumMember[];
  unionElements: UnionElement[];
  discriminator?: Discriminator;
  /** Definitions hoisted while resolving this node */
  additionalTypes: TypeDefinition[];
  constraints: Constraints;
  description?: string;
  deprecated: boolean;
  /** Schema node the IR was built from, used for equivalence checks */
  source?: SchemaObject;
}

export interface TypeDefinition {
  name: string;
  jsonName?: string;
  schema: SchemaIR;
  location: SpecLocation;
  /** JSON Pointer of the declaration */
  schemaPath: string;
  needsCustomSerializer: boolean;
  hasSensitiveField: boolean;
}

export const EMPTY_RECORD_DECL = 'record{}';
export const ANY_DECL = 'any';

export const PRIMITIVE_DECLS: ReadonlySet<string> = new Set([
  'string',
  'integer',
  'int32',
  'int64',
  'number',
  'float32',
  'float64',
  'boolean',
  'datetime',
  'date',
  'uuid',
  'bytes',
  'binary',
  ANY_DECL,
]);

export function isPrimitiveDecl(typeDecl: string): boolean {
  return PRIMITIVE_DECLS.has(typeDecl);
}

export function emptyConstraints(): Constraints {
  return { required: false, nullable: false, tags: [] };
}

export function createIR(
  typeDecl: string,
  overrides: Partial<SchemaIR> = {}
): SchemaIR {
  return {
    typeDecl,
    defineViaAlias: false,
    properties: [],
    hasAdditionalProperties: false,
    enumValues: [],
    unionElements: [],
    additionalTypes: [],
    constraints: emptyConstraints(),
    deprecated: false,
    ...overrides,
  };
}

/** IR that names an existing type */
export function aliasIR(
  name: string,
  additionalTypes: TypeDefinition[] = []
): SchemaIR {
  return createIR(name, {
    refType: name,
    defineViaAlias: true,
    additionalTypes,
  });
}

export function renderRecordDecl(parts: {
  properties: readonly Property[];
  additionalPropertiesType?: SchemaIR;
  unionElements?: readonly UnionElement[];
}): string {
  const fields: string[] = parts.properties.map((property) => {
    if (property.jsonName === '') {
      return `...${property.schema.typeDecl}`;
    }
    const optional = property.constraints.nullable ? '?' : '';
    return `${property.jsonName}${optional}:${property.schema.typeDecl}`;
  });
  if (parts.additionalPropertiesType) {
    fields.push(`[key:string]:${parts.additionalPropertiesType.typeDecl}`);
  }
  const union = parts.unionElements ?? [];
  if (union.length > 0) {
    fields.push(`union(${union.map((element) => element.typeName).join('|')})`);
  }
  return `record{${fields.join(',')}}`;
}

export function renderArrayDecl(element: SchemaIR): string {
  return `array<${element.typeDecl}>`;
}

export function renderMapDecl(value: SchemaIR): string {
  return `map<string,${value.typeDecl}>`;
}

export function defineType(params: {
  name: string;
  jsonName?: string;
  schema: SchemaIR;
  location: SpecLocation;
  schemaPath: string;
}): TypeDefinition {
  const { schema } = params;
  const hasSensitiveField = schema.properties.some(
    (property) => property.sensitiveData !== undefined
  );
  const needsCustomSerializer =
    hasSensitiveField ||
    schema.unionElements.length > 0 ||
    schema.properties.some((property) => property.jsonName === '') ||
    (schema.hasAdditionalProperties && schema.properties.length > 0);

  const definition: TypeDefinition = {
    name: params.name,
    schema,
    location: params.location,
    schemaPath: params.schemaPath,
    needsCustomSerializer,
    hasSensitiveField,
  };
  if (params.jsonName !== undefined) {
    definition.jsonName = params.jsonName;
  }
  return definition;
}
