/* eslint-disable complexity */
/* eslint-disable max-lines */
import { parseExtensions } from '../extensions/extensions.js';
import type { SchemaObject, SchemaType } from '../types/document.js';
import { isComponentReference } from '../util/pointer.js';
import {
  enumMemberName,
  pathToTypeName,
  referenceNamePath,
  refToTypeName,
  toFieldName,
} from '../util/names.js';
import { resolveCollision } from './registry.js';
import { resolveCombinators } from './combinators.js';
import { extractConstraints, nodeConstraints } from './constraints.js';
import {
  deref,
  descend,
  relocate,
  resolveSchemaRef,
  type ResolveContext,
} from './context.js';
import {
  ANY_DECL,
  EMPTY_RECORD_DECL,
  aliasIR,
  createIR,
  defineType,
  renderArrayDecl,
  renderMapDecl,
  renderRecordDecl,
  type EnumMember,
  type Property,
  type SchemaIR,
  type SpecLocation,
  type TypeDefinition,
} from './types.js';

/**
 * Schema IR builder
 *
 * Converts one schema node into IR. Mutually recursive with the combinator
 * resolver through the shared ResolveContext.
 */

function declaredTypes(node: SchemaObject): SchemaType[] {
  if (node.type === undefined) return [];
  return Array.isArray(node.type) ? node.type : [node.type];
}

function hasCombinators(node: SchemaObject): boolean {
  return (
    (node.allOf?.length ?? 0) > 0 ||
    (node.anyOf?.length ?? 0) > 0 ||
    (node.oneOf?.length ?? 0) > 0
  );
}

/** Keywords that give a node structure beyond its combinators */
function hasOwnStructure(node: SchemaObject): boolean {
  return (
    node.type !== undefined ||
    node.properties !== undefined ||
    node.items !== undefined ||
    node.additionalProperties !== undefined ||
    node.enum !== undefined
  );
}

function collectAdditionalTypes(
  irs: ReadonlyArray<SchemaIR | undefined>
): TypeDefinition[] {
  return irs.flatMap((ir) => ir?.additionalTypes ?? []);
}

/**
 * Register `ir` as a named type and return an alias to it. An explicit
 * name (`x-type-name`) is taken verbatim; a path-derived one moves aside
 * on collisions.
 */
export function hoist(
  ir: SchemaIR,
  ctx: ResolveContext,
  location: SpecLocation,
  explicitName?: string
): SchemaIR {
  const definition = defineType({
    name: explicitName ?? pathToTypeName(ctx.path),
    schema: ir,
    location,
    schemaPath: ctx.schemaPath,
  });
  const finalName =
    explicitName !== undefined
      ? ctx.registry.register(definition)
      : ctx.registry.claim(definition);
  return aliasIR(finalName, [ctx.registry.get(finalName) ?? definition]);
}

export function isHoistable(ir: SchemaIR): boolean {
  return (
    !ir.defineViaAlias &&
    (ir.properties.length > 0 ||
      ir.enumValues.length > 0 ||
      ir.unionElements.length > 0)
  );
}

/** Build a nested site (property, item, map value); inline composites are hoisted */
export function buildNestedIR(
  node: SchemaObject,
  ctx: ResolveContext
): SchemaIR {
  const ir = buildSchemaIR(node, ctx);
  if (!isHoistable(ir)) return ir;
  return hoist(ir, ctx, 'schema', parseExtensions(node, ctx.schemaPath).typeName);
}

/**
 * Make sure a path reference (one that does not name a component) has a
 * registered type under its reference-derived name.
 */
function ensurePathReferenceType(
  ref: string,
  target: SchemaObject,
  name: string,
  ctx: ResolveContext
): void {
  if (ctx.registry.hasDefinition(name) || ctx.inFlight.has(ref)) return;

  ctx.inFlight.add(ref);
  try {
    const targetCtx = relocate(ctx, referenceNamePath(ref), ref, ref);
    const ir = buildSchemaIR(target, targetCtx);
    if (ir.defineViaAlias && ir.refType === name) return;
    ctx.registry.register(
      defineType({ name, schema: ir, location: 'schema', schemaPath: ref })
    );
  } finally {
    ctx.inFlight.delete(ref);
  }
}

function referenceIR(
  ref: string,
  node: SchemaObject,
  ctx: ResolveContext
): SchemaIR {
  const target = resolveSchemaRef(ctx, ref);
  const component = isComponentReference(ref);
  // components are registered under their x-type-name when they carry one
  const name = component
    ? (parseExtensions(target, ref).typeName ?? refToTypeName(ref))
    : refToTypeName(ref);
  if (!component) {
    ensurePathReferenceType(ref, target, name, ctx);
  }
  const ir = aliasIR(name);
  ir.constraints = nodeConstraints(deref(ctx, target));
  const description = node.description ?? target.description;
  if (description !== undefined) ir.description = description;
  if (node.deprecated === true || target.deprecated === true) {
    ir.deprecated = true;
  }
  return ir;
}

export function embeddedProperty(ir: SchemaIR, nullable: boolean): Property {
  return {
    fieldName: ir.refType ?? ir.typeDecl,
    jsonName: '',
    schema: ir,
    constraints: { required: !nullable, nullable, tags: [] },
    deprecated: false,
  };
}

/**
 * Append combinator results (properties, union elements, discriminator)
 * to a node's own IR. The result is a structural type, never an alias.
 */
function enhance(
  ir: SchemaIR,
  merged: SchemaIR | undefined,
  rerender: boolean
): SchemaIR {
  if (merged === undefined) return ir;
  const mergedProperties = merged.defineViaAlias
    ? [embeddedProperty(merged, false)]
    : merged.properties;
  if (mergedProperties.length === 0 && merged.unionElements.length === 0) {
    return ir;
  }

  const properties = [...ir.properties, ...mergedProperties];
  const unionElements = [...ir.unionElements, ...merged.unionElements];
  const enhanced: SchemaIR = {
    ...ir,
    properties,
    unionElements,
    additionalTypes: [...ir.additionalTypes, ...merged.additionalTypes],
    defineViaAlias: false,
    refType: undefined,
  };
  const discriminator = merged.discriminator ?? ir.discriminator;
  if (discriminator !== undefined) enhanced.discriminator = discriminator;
  if (rerender) {
    enhanced.typeDecl = renderRecordDecl({
      properties,
      additionalPropertiesType: ir.additionalPropertiesType,
      unionElements,
    });
  }
  return enhanced;
}

/**
 * Build one named field. `child` is already positioned at the field's own
 * site, which lets parameters reuse this for their grouped records.
 */
export function buildProperty(
  jsonName: string,
  node: SchemaObject,
  required: boolean,
  child: ResolveContext
): Property {
  const extensions = parseExtensions(node, child.schemaPath);
  const built = buildSchemaIR(node, child);
  const schema = isHoistable(built)
    ? hoist(built, child, 'schema', extensions.typeName)
    : built;
  const target = node.$ref !== undefined ? deref(child, node) : node;

  const property: Property = {
    fieldName: extensions.fieldName ?? toFieldName(jsonName),
    jsonName,
    schema,
    constraints: extractConstraints(target, {
      required,
      hasNilType: built.constraints.nullable,
    }),
    deprecated: node.deprecated === true,
  };
  const description = node.description ?? target.description;
  if (description !== undefined) property.description = description;
  if (extensions.deprecatedReason !== undefined) {
    property.deprecatedReason = extensions.deprecatedReason;
  }
  if (extensions.sensitiveData !== undefined) {
    property.sensitiveData = extensions.sensitiveData;
  }
  if (extensions.omitEmpty !== undefined) {
    property.omitEmpty = extensions.omitEmpty;
  }
  if (extensions.jsonIgnore !== undefined) {
    property.jsonIgnore = extensions.jsonIgnore;
  }
  if (extensions.extraTags !== undefined) {
    property.extraTags = extensions.extraTags;
  }
  return property;
}

function createObjectIR(node: SchemaObject, ctx: ResolveContext): SchemaIR {
  const required = new Set(node.required ?? []);
  const properties = Object.entries(node.properties ?? {}).map(
    ([jsonName, propertyNode]) =>
      buildProperty(
        jsonName,
        propertyNode,
        required.has(jsonName),
        descend(ctx, [jsonName], ['properties', jsonName])
      )
  );

  let additionalPropertiesType: SchemaIR | undefined;
  const additional = node.additionalProperties;
  if (additional === true) {
    additionalPropertiesType = createIR(ANY_DECL);
  } else if (typeof additional === 'object') {
    additionalPropertiesType = buildNestedIR(
      additional,
      descend(ctx, ['AdditionalProperties'], ['additionalProperties'])
    );
  }

  const base = {
    properties,
    hasAdditionalProperties: additionalPropertiesType !== undefined,
    additionalTypes: collectAdditionalTypes([
      ...properties.map((property) => property.schema),
      additionalPropertiesType,
    ]),
    constraints: nodeConstraints(node),
  };

  if (properties.length > 0) {
    return createIR(
      renderRecordDecl({ properties, additionalPropertiesType }),
      { ...base, additionalPropertiesType }
    );
  }
  if (additionalPropertiesType !== undefined) {
    return createIR(renderMapDecl(additionalPropertiesType), {
      ...base,
      additionalPropertiesType,
    });
  }
  if (additional === false || hasCombinators(node)) {
    return createIR(EMPTY_RECORD_DECL, base);
  }
  if (node.type === undefined) {
    return createIR(ANY_DECL, base);
  }
  // a bare `type: object` admits any keys
  return createIR(renderMapDecl(createIR(ANY_DECL)), {
    ...base,
    hasAdditionalProperties: true,
  });
}

function primitiveDecl(type: SchemaType | undefined, format?: string): string {
  switch (type) {
    case 'integer':
      if (format === 'int32' || format === 'int64') return format;
      return 'integer';
    case 'number':
      if (format === 'float') return 'float32';
      if (format === 'double') return 'float64';
      return 'number';
    case 'boolean':
      return 'boolean';
    case 'string':
      switch (format) {
        case 'date-time':
          return 'datetime';
        case 'date':
          return 'date';
        case 'uuid':
          return 'uuid';
        case 'byte':
          return 'bytes';
        case 'binary':
          return 'binary';
        default:
          return 'string';
      }
    default:
      return ANY_DECL;
  }
}

function singleValueType(node: SchemaObject): SchemaType | undefined {
  const types = declaredTypes(node).filter((type) => type !== 'null');
  return types.length === 1 ? types[0] : undefined;
}

function createPrimitiveIR(node: SchemaObject): SchemaIR {
  return createIR(primitiveDecl(singleValueType(node), node.format), {
    constraints: nodeConstraints(node),
  });
}

function isEnumValue(value: unknown): value is string | number | boolean {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

function inferEnumType(values: ReadonlyArray<string | number | boolean>): SchemaType {
  if (values.length > 0 && values.every((value) => typeof value === 'boolean')) {
    return 'boolean';
  }
  if (values.length > 0 && values.every((value) => Number.isInteger(value))) {
    return 'integer';
  }
  if (values.length > 0 && values.every((value) => typeof value === 'number')) {
    return 'number';
  }
  return 'string';
}

function createEnumIR(node: SchemaObject, ctx: ResolveContext): SchemaIR {
  const raw = node.enum ?? [];
  const values = raw.filter(isEnumValue);
  const { enumNames } = parseExtensions(node, ctx.schemaPath);

  const taken = new Set<string>();
  const enumValues: EnumMember[] = values.map((value, index) => {
    const preferred = enumNames?.[index] ?? enumMemberName(value);
    const name = resolveCollision(preferred, taken);
    taken.add(name);
    return { name, value };
  });

  const constraints = nodeConstraints(node);
  if (raw.includes(null)) constraints.nullable = true;

  return createIR(
    primitiveDecl(singleValueType(node) ?? inferEnumType(values), node.format),
    { enumValues, constraints }
  );
}

function createArrayIR(node: SchemaObject, ctx: ResolveContext): SchemaIR {
  const items =
    node.items !== undefined
      ? buildNestedIR(node.items, descend(ctx, ['Item'], ['items']))
      : createIR(ANY_DECL);
  return createIR(renderArrayDecl(items), {
    arrayType: items,
    additionalTypes: collectAdditionalTypes([items]),
    constraints: nodeConstraints(node),
  });
}

function isObjectNode(node: SchemaObject): boolean {
  const types = declaredTypes(node);
  if (types.includes('object')) return true;
  if (types.length > 0) return false;
  return node.enum === undefined && node.items === undefined;
}

function withNodeMetadata(ir: SchemaIR, node: SchemaObject): SchemaIR {
  const result: SchemaIR = { ...ir };
  if (result.description === undefined && node.description !== undefined) {
    result.description = node.description;
  }
  if (node.deprecated === true) result.deprecated = true;
  if (!result.defineViaAlias && result.source === undefined) {
    result.source = node;
  }
  return result;
}

/**
 * Resolve one schema node. Priority:
 * 1. references become aliases, as do combinators that reduce to one
 * 2. `x-type` replaces the type, still enhanced with combinator results
 * 3. combinator results on a node without structure of its own
 * 4. object / enum / array / primitive
 */
export function buildSchemaIR(
  node: SchemaObject | undefined,
  ctx: ResolveContext
): SchemaIR {
  if (node === undefined) return createIR(ANY_DECL);

  const ref = ctx.reference ?? node.$ref;
  if (ref !== undefined) return referenceIR(ref, node, ctx);

  const merged = resolveCombinators(node, ctx);
  if (merged?.defineViaAlias === true && node.properties === undefined) {
    return withNodeMetadata(merged, node);
  }

  const { typeOverride } = parseExtensions(node, ctx.schemaPath);
  if (typeOverride !== undefined) {
    const override = createIR(typeOverride, {
      constraints: nodeConstraints(node),
    });
    return withNodeMetadata(enhance(override, merged, false), node);
  }

  if (merged !== undefined && !merged.defineViaAlias && !hasOwnStructure(node)) {
    return withNodeMetadata(merged, node);
  }

  let ir: SchemaIR;
  if (isObjectNode(node)) {
    ir = createObjectIR(node, ctx);
  } else if (node.enum !== undefined) {
    ir = createEnumIR(node, ctx);
  } else if (declaredTypes(node).includes('array') || node.items !== undefined) {
    ir = createArrayIR(node, ctx);
  } else {
    ir = createPrimitiveIR(node);
  }
  return withNodeMetadata(enhance(ir, merged, true), node);
}
