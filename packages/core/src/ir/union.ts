/* eslint-disable complexity */
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { parseExtensions } from '../extensions/extensions.js';
import type { DiscriminatorObject, SchemaObject } from '../types/document.js';
import {
  AmbiguousDiscriminatorMappingError,
  DiscriminatorNotAllMappedError,
} from '../types/errors.js';
import { refToObjectName } from '../util/names.js';
import { buildSchemaIR, hoist } from './builder.js';
import { countActiveConstraints } from './constraints.js';
import { deref, descend, type ResolveContext } from './context.js';
import { effectiveTypes } from './merge.js';
import {
  ANY_DECL,
  EMPTY_RECORD_DECL,
  createIR,
  emptyConstraints,
  isPrimitiveDecl,
  renderRecordDecl,
  type SchemaIR,
  type TypeDefinition,
  type UnionElement,
} from './types.js';

/**
 * anyOf / oneOf union synthesis
 */

interface IndexedElement {
  schema: SchemaObject;
  index: number;
}

function isNullSchema(schema: SchemaObject, ctx: ResolveContext): boolean {
  const types = effectiveTypes(deref(ctx, schema));
  return types.length === 1 && types[0] === 'null';
}

function isSelfReference(schema: SchemaObject, ctx: ResolveContext): boolean {
  return schema.$ref !== undefined && schema.$ref === ctx.currentRef;
}

function withNullable(ir: SchemaIR): SchemaIR {
  return { ...ir, constraints: { ...ir.constraints, nullable: true } };
}

/** The element's IR alone, as used when a union collapses */
function buildCollapsed(
  element: IndexedElement,
  ctx: ResolveContext
): SchemaIR {
  return buildSchemaIR(
    element.schema,
    descend(ctx, [], [String(element.index)])
  );
}

/**
 * Single discriminator value of an inline element: a one-value enum or a
 * const on the property, searched through the element's allOf members too.
 */
export function discriminatorValue(
  schema: SchemaObject,
  propertyName: string,
  ctx: ResolveContext,
  seen: ReadonlySet<string> = new Set()
): string | undefined {
  if (schema.$ref !== undefined && seen.has(schema.$ref)) return undefined;
  const nextSeen =
    schema.$ref !== undefined ? new Set([...seen, schema.$ref]) : seen;
  const resolved = deref(ctx, schema);

  const property = resolved.properties?.[propertyName];
  if (property !== undefined) {
    const target = deref(ctx, property);
    const candidates =
      target.const !== undefined ? [target.const] : (target.enum ?? []);
    const [only] = candidates;
    if (
      candidates.length === 1 &&
      (typeof only === 'string' ||
        typeof only === 'number' ||
        typeof only === 'boolean')
    ) {
      return String(only);
    }
    return undefined;
  }

  for (const member of resolved.allOf ?? []) {
    const value = discriminatorValue(member, propertyName, ctx, nextSeen);
    if (value !== undefined) return value;
  }
  return undefined;
}

/**
 * Name every element is known by. Primitives go by their declaration,
 * references by their alias, anything else is hoisted under its path name.
 */
function elementTypeName(
  ir: SchemaIR,
  schema: SchemaObject,
  ctx: ResolveContext
): { typeName: string; hoisted?: SchemaIR } {
  if (ir.defineViaAlias && ir.refType !== undefined) {
    return { typeName: ir.refType };
  }
  if (ir.typeDecl === EMPTY_RECORD_DECL) {
    return { typeName: EMPTY_RECORD_DECL };
  }
  if (isPrimitiveDecl(ir.typeDecl) && ir.enumValues.length === 0) {
    return { typeName: ir.typeDecl };
  }
  const hoisted = hoist(
    ir,
    ctx,
    'union',
    parseExtensions(schema, ctx.schemaPath).typeName
  );
  return { typeName: hoisted.typeDecl, hoisted };
}

function mapElement(
  mapping: Record<string, string>,
  discriminator: DiscriminatorObject,
  element: SchemaObject,
  typeName: string,
  ctx: ResolveContext
): void {
  const explicit = Object.entries(discriminator.mapping ?? {});

  if (element.$ref !== undefined) {
    const ref = element.$ref;
    const objectName = refToObjectName(ref);
    const keys = explicit
      .filter(([, target]) => target === ref || target === objectName)
      .map(([key]) => key);
    for (const key of keys) mapping[key] = typeName;
    // implicit names only apply when there is no explicit table
    if (keys.length === 0 && explicit.length === 0) {
      mapping[objectName] = typeName;
    }
    return;
  }

  const value = discriminatorValue(element, discriminator.propertyName, ctx);
  if (value === undefined) {
    if (explicit.length > 0) {
      throw new AmbiguousDiscriminatorMappingError({
        schemaPath: ctx.schemaPath,
        propertyName: discriminator.propertyName,
        element: typeName,
      });
    }
    return;
  }
  mapping[value] = typeName;
}

/**
 * Collapse elements sharing a type name, keeping the one with more active
 * constraints (ties keep the first), then drop empty records.
 */
function dedupeElements(
  elements: readonly UnionElement[],
  ctx: ResolveContext
): UnionElement[] {
  const byName = new Map<string, number>();
  const result: UnionElement[] = [];
  for (const element of elements) {
    const position = byName.get(element.typeName);
    const kept = position === undefined ? undefined : result[position];
    if (position === undefined || kept === undefined) {
      byName.set(element.typeName, result.length);
      result.push(element);
      continue;
    }
    if (
      countActiveConstraints(element.schema.constraints) >
      countActiveConstraints(kept.schema.constraints)
    ) {
      result[position] = element;
    }
    ctx.diagnostics.record({
      code: DIAGNOSTIC_CODES.UNION_ELEMENT_DEDUPLICATED,
      phase: DIAGNOSTIC_PHASES.RESOLVE,
      path: ctx.schemaPath,
      details: { typeName: element.typeName },
    });
  }

  return result.filter((element) => {
    if (element.schema.typeDecl !== EMPTY_RECORD_DECL) return true;
    ctx.diagnostics.record({
      code: DIAGNOSTIC_CODES.UNION_EMPTY_RECORD_DROPPED,
      phase: DIAGNOSTIC_PHASES.RESOLVE,
      path: ctx.schemaPath,
    });
    return false;
  });
}

/**
 * Turn an anyOf/oneOf element list into a union IR, or into the single
 * element's IR when the union collapses. `ctx` is positioned at the
 * combinator keyword.
 */
export function resolveUnion(
  elements: readonly SchemaObject[],
  discriminator: DiscriminatorObject | undefined,
  ctx: ResolveContext
): SchemaIR {
  const indexed: IndexedElement[] = elements.map((schema, index) => ({
    schema,
    index,
  }));

  const [single] = indexed;
  if (
    indexed.length === 1 &&
    single !== undefined &&
    discriminator === undefined &&
    !isSelfReference(single.schema, ctx)
  ) {
    return buildCollapsed(single, ctx);
  }

  const nonNull = indexed.filter(
    (element) => !isNullSchema(element.schema, ctx)
  );
  const hadNull = nonNull.length < indexed.length;
  if (nonNull.length === 0) {
    return createIR(ANY_DECL, {
      constraints: { ...emptyConstraints(), nullable: true },
    });
  }
  const [sole] = nonNull;
  if (
    nonNull.length === 1 &&
    sole !== undefined &&
    discriminator === undefined &&
    !isSelfReference(sole.schema, ctx)
  ) {
    const ir = buildCollapsed(sole, ctx);
    return hadNull ? withNullable(ir) : ir;
  }

  const mapping: Record<string, string> = {};
  const collected: UnionElement[] = [];
  const additionalTypes: TypeDefinition[] = [];

  for (const element of nonNull) {
    const elementCtx = descend(
      ctx,
      [String(element.index)],
      [String(element.index)]
    );
    const ir = buildSchemaIR(element.schema, elementCtx);
    const { typeName, hoisted } = elementTypeName(ir, element.schema, elementCtx);
    additionalTypes.push(...(hoisted ?? ir).additionalTypes);
    collected.push({ typeName, schema: ir });
    if (discriminator !== undefined) {
      mapElement(mapping, discriminator, element.schema, typeName, elementCtx);
    }
  }

  const unionElements = dedupeElements(collected, ctx);

  if (discriminator !== undefined) {
    const mapped = new Set(Object.values(mapping));
    const unmapped = unionElements
      .map((element) => element.typeName)
      .filter((typeName) => !mapped.has(typeName));
    if (unmapped.length > 0) {
      throw new DiscriminatorNotAllMappedError({
        schemaPath: ctx.schemaPath,
        propertyName: discriminator.propertyName,
        unmapped,
      });
    }
  }

  const union = createIR(renderRecordDecl({ properties: [], unionElements }), {
    unionElements,
    additionalTypes,
  });
  if (hadNull) union.constraints = { ...union.constraints, nullable: true };
  if (discriminator !== undefined) {
    union.discriminator = {
      propertyName: discriminator.propertyName,
      mapping,
    };
  }
  return union;
}
