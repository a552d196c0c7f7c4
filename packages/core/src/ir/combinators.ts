/* eslint-disable complexity */
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { parseExtensions } from '../extensions/extensions.js';
import type { SchemaObject } from '../types/document.js';
import { IncompatibleMergeError } from '../types/errors.js';
import { appendPointer } from '../util/pointer.js';
import {
  buildSchemaIR,
  embeddedProperty,
  hoist,
} from './builder.js';
import { deref, descend, type ResolveContext } from './context.js';
import { mergeSchemaNodes } from './merge.js';
import {
  ANY_DECL,
  EMPTY_RECORD_DECL,
  createIR,
  renderRecordDecl,
  type Property,
  type SchemaIR,
  type TypeDefinition,
} from './types.js';
import { resolveUnion } from './union.js';

/**
 * Combinator resolver: allOf merge and anyOf/oneOf union synthesis.
 */

function containsUnion(
  schema: SchemaObject,
  ctx: ResolveContext,
  seen: ReadonlySet<string> = new Set()
): boolean {
  if (schema.$ref !== undefined && seen.has(schema.$ref)) return false;
  const nextSeen =
    schema.$ref !== undefined ? new Set([...seen, schema.$ref]) : seen;
  const resolved = deref(ctx, schema);
  if ((resolved.anyOf?.length ?? 0) > 0 || (resolved.oneOf?.length ?? 0) > 0) {
    return true;
  }
  return (resolved.allOf ?? []).some((member) =>
    containsUnion(member, ctx, nextSeen)
  );
}

/** Description, title, examples and the like; nothing that shapes a type */
function isMetadataOnly(schema: SchemaObject): boolean {
  return (
    schema.type === undefined &&
    (schema.properties === undefined ||
      Object.keys(schema.properties).length === 0) &&
    schema.items === undefined &&
    schema.additionalProperties === undefined &&
    (schema.allOf?.length ?? 0) === 0 &&
    (schema.anyOf?.length ?? 0) === 0 &&
    (schema.oneOf?.length ?? 0) === 0 &&
    schema.not === undefined
  );
}

/**
 * Dereferenced member plus, transitively, the members of its own allOf.
 * A reference cycle through allOf cannot be merged.
 */
function flattenAllOf(
  member: SchemaObject,
  ctx: ResolveContext,
  seen: ReadonlySet<string>
): SchemaObject[] {
  let nextSeen = seen;
  if (member.$ref !== undefined) {
    if (seen.has(member.$ref)) {
      throw new IncompatibleMergeError({
        message: `circular allOf through "${member.$ref}"`,
        schemaPath: ctx.schemaPath,
        keyword: 'allOf',
      });
    }
    nextSeen = new Set([...seen, member.$ref]);
  }
  const resolved = deref(ctx, member);
  const { allOf, ...rest } = resolved;
  if (allOf === undefined || allOf.length === 0) return [resolved];
  return [
    rest,
    ...allOf.flatMap((nested) => flattenAllOf(nested, ctx, nextSeen)),
  ];
}

function isEmptyIR(ir: SchemaIR): boolean {
  return (
    ir.properties.length === 0 &&
    ir.unionElements.length === 0 &&
    ir.enumValues.length === 0 &&
    (ir.typeDecl === ANY_DECL || ir.typeDecl === EMPTY_RECORD_DECL)
  );
}

function mergeStructurally(
  members: readonly SchemaObject[],
  ctx: ResolveContext
): SchemaIR {
  const refs = members.filter((member) => member.$ref !== undefined);
  const [onlyRef] = refs;
  if (
    refs.length === 1 &&
    onlyRef !== undefined &&
    members.every((member) => member.$ref !== undefined || isMetadataOnly(member))
  ) {
    return buildSchemaIR(onlyRef, { ...ctx, reference: onlyRef.$ref });
  }

  const schemaPath = appendPointer(ctx.schemaPath, 'allOf');
  let merged: SchemaObject | undefined;
  let lastRef: string | undefined;
  for (const member of members) {
    if (member.$ref !== undefined) lastRef = member.$ref;
    for (const part of flattenAllOf(member, ctx, new Set())) {
      merged =
        merged === undefined
          ? part
          : mergeSchemaNodes(merged, part, {
              schemaPath,
              onPropertyOverride: (property) => {
                ctx.diagnostics.record({
                  code: DIAGNOSTIC_CODES.ALLOF_PROPERTY_OVERRIDDEN,
                  phase: DIAGNOSTIC_PHASES.RESOLVE,
                  path: schemaPath,
                  details: { property },
                });
              },
            });
    }
  }

  if (merged === undefined) return createIR(ANY_DECL);
  if (lastRef !== undefined && merged.properties === undefined) {
    return buildSchemaIR(merged, { ...ctx, reference: lastRef });
  }
  return buildSchemaIR(merged, { ...ctx, reference: undefined });
}

/**
 * Members that carry unions are not merged field by field: each member
 * becomes an embedded field pointing at its own type.
 */
function mergeAsMixins(
  members: readonly SchemaObject[],
  ctx: ResolveContext
): SchemaIR {
  const properties: Property[] = [];
  const additionalTypes: TypeDefinition[] = [];

  members.forEach((member, index) => {
    const memberCtx = descend(
      ctx,
      ['allOf', String(index)],
      ['allOf', String(index)],
      { keepCurrentRef: true }
    );
    const resolved = buildSchemaIR(member, memberCtx);
    if (resolved.defineViaAlias) {
      properties.push(embeddedProperty(resolved, member.$ref === undefined));
      additionalTypes.push(...resolved.additionalTypes);
      return;
    }
    if (isEmptyIR(resolved)) return;

    const alias = hoist(
      resolved,
      memberCtx,
      'union',
      parseExtensions(member, memberCtx.schemaPath).typeName
    );
    properties.push(embeddedProperty(alias, true));
    additionalTypes.push(...alias.additionalTypes);
  });

  return createIR(renderRecordDecl({ properties }), {
    properties,
    additionalTypes,
  });
}

export function mergeAllOf(
  members: readonly SchemaObject[],
  ctx: ResolveContext
): SchemaIR {
  const mergeable = !members.some((member) => containsUnion(member, ctx));
  return mergeable
    ? mergeStructurally(members, ctx)
    : mergeAsMixins(members, ctx);
}

const UNION_KEYWORDS = ['anyOf', 'oneOf'] as const;

/**
 * Resolve the combinators of a node.
 *
 * @returns undefined when the node has none; otherwise either a complete
 * IR (merged allOf, collapsed union) or a record whose properties embed
 * the synthesized union wrappers.
 */
export function resolveCombinators(
  node: SchemaObject,
  ctx: ResolveContext
): SchemaIR | undefined {
  const present = {
    allOf: (node.allOf?.length ?? 0) > 0,
    anyOf: (node.anyOf?.length ?? 0) > 0,
    oneOf: (node.oneOf?.length ?? 0) > 0,
  };
  if (!present.allOf && !present.anyOf && !present.oneOf) return undefined;

  const properties: Property[] = [];
  const additionalTypes: TypeDefinition[] = [];

  if (node.allOf !== undefined && present.allOf) {
    const merged = mergeAllOf(node.allOf, ctx);
    if (!present.anyOf && !present.oneOf && merged.properties.length === 0) {
      return merged;
    }
    if (merged.defineViaAlias) {
      properties.push(embeddedProperty(merged, false));
    } else {
      properties.push(...merged.properties);
    }
    additionalTypes.push(...merged.additionalTypes);
  }

  for (const keyword of UNION_KEYWORDS) {
    const elements = node[keyword];
    if (elements === undefined || !present[keyword]) continue;

    const unionCtx = descend(ctx, [keyword], [keyword], {
      keepCurrentRef: true,
    });
    const union = resolveUnion(elements, node.discriminator, unionCtx);
    const others = UNION_KEYWORDS.some(
      (other) => other !== keyword && present[other]
    );
    if (union.unionElements.length === 0 && !present.allOf && !others) {
      return union;
    }

    const alias = hoist({ ...union, source: node }, unionCtx, 'union');
    properties.push(embeddedProperty(alias, true));
    additionalTypes.push(...union.additionalTypes, ...alias.additionalTypes);
  }

  return createIR(renderRecordDecl({ properties }), {
    properties,
    additionalTypes,
  });
}
