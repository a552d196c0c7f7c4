import type { SchemaObject, SchemaType } from '../types/document.js';
import type { Constraints } from './types.js';

export interface ConstraintContext {
  /** The owning object lists this field as required */
  required?: boolean;
  /** The field's resolved type already admits null (e.g. anyOf [T, null]) */
  hasNilType?: boolean;
}

const PRESENCE_TAGS = new Set(['required', 'omitempty']);

function declaresType(schema: SchemaObject, type: SchemaType): boolean {
  const declared = schema.type;
  if (declared === undefined) return false;
  return Array.isArray(declared) ? declared.includes(type) : declared === type;
}

function formatBound(value: number, integer: boolean): string {
  return integer ? String(Math.trunc(value)) : String(value);
}

interface Bound {
  value: number;
  exclusive: boolean;
}

// 3.0 pairs a boolean flag with minimum/maximum; 3.1 puts the bound itself
// in exclusiveMinimum/exclusiveMaximum.
function lowerBound(schema: SchemaObject): Bound | undefined {
  if (typeof schema.exclusiveMinimum === 'number') {
    return { value: schema.exclusiveMinimum, exclusive: true };
  }
  if (schema.minimum === undefined) return undefined;
  return { value: schema.minimum, exclusive: schema.exclusiveMinimum === true };
}

function upperBound(schema: SchemaObject): Bound | undefined {
  if (typeof schema.exclusiveMaximum === 'number') {
    return { value: schema.exclusiveMaximum, exclusive: true };
  }
  if (schema.maximum === undefined) return undefined;
  return { value: schema.maximum, exclusive: schema.exclusiveMaximum === true };
}

function orderTags(tags: string[]): string[] {
  const presence = tags.filter((tag) => PRESENCE_TAGS.has(tag));
  const rest = tags.filter((tag) => !PRESENCE_TAGS.has(tag)).sort();
  return [...presence, ...rest];
}

/**
 * Validation facts of one schema node as seen from its use site.
 */
export function extractConstraints(
  schema: SchemaObject,
  context: ConstraintContext = {}
): Constraints {
  const required = context.required ?? false;
  const nullable =
    !required ||
    context.hasNilType === true ||
    declaresType(schema, 'null') ||
    schema.nullable === true;

  const constraints: Constraints = { required, nullable, tags: [] };
  const tags: string[] = [];

  if (schema.readOnly !== undefined) constraints.readOnly = schema.readOnly;
  if (schema.writeOnly !== undefined) constraints.writeOnly = schema.writeOnly;

  const isInteger = declaresType(schema, 'integer');
  const isNumeric = isInteger || declaresType(schema, 'number');

  const lower = lowerBound(schema);
  if (lower) {
    constraints.minimum = lower.value;
    if (lower.exclusive) constraints.exclusiveMinimum = true;
    if (isNumeric) {
      tags.push(
        `${lower.exclusive ? 'gt' : 'gte'}=${formatBound(lower.value, isInteger)}`
      );
    }
  }
  const upper = upperBound(schema);
  if (upper) {
    constraints.maximum = upper.value;
    if (upper.exclusive) constraints.exclusiveMaximum = true;
    if (isNumeric) {
      tags.push(
        `${upper.exclusive ? 'lt' : 'lte'}=${formatBound(upper.value, isInteger)}`
      );
    }
  }

  if (schema.minLength !== undefined) {
    constraints.minLength = schema.minLength;
    tags.push(`min=${schema.minLength}`);
  }
  if (schema.maxLength !== undefined) {
    constraints.maxLength = schema.maxLength;
    tags.push(`max=${schema.maxLength}`);
  }
  if (schema.minItems !== undefined) {
    constraints.minItems = schema.minItems;
    tags.push(`min=${schema.minItems}`);
  }
  if (schema.maxItems !== undefined) {
    constraints.maxItems = schema.maxItems;
    tags.push(`max=${schema.maxItems}`);
  }
  if (schema.minProperties !== undefined) {
    constraints.minProperties = schema.minProperties;
  }
  if (schema.maxProperties !== undefined) {
    constraints.maxProperties = schema.maxProperties;
  }
  if (schema.pattern !== undefined) constraints.pattern = schema.pattern;
  if (schema.multipleOf !== undefined) {
    constraints.multipleOf = schema.multipleOf;
  }

  if (required) {
    tags.push('required');
  } else if (tags.length > 0) {
    tags.push('omitempty');
  }

  constraints.tags = orderTags(tags);
  return constraints;
}

const COUNTED_FIELDS = [
  'minLength',
  'maxLength',
  'minimum',
  'maximum',
  'minItems',
  'maxItems',
  'minProperties',
  'maxProperties',
  'pattern',
  'multipleOf',
] as const satisfies ReadonlyArray<keyof Constraints>;

/** Strictness score used to pick between duplicate union elements */
export function countActiveConstraints(constraints: Constraints): number {
  return COUNTED_FIELDS.filter((field) => constraints[field] !== undefined)
    .length;
}

/**
 * Constraints of a node on its own, before a use site decides presence.
 * Only the node's own null admission makes it nullable here.
 */
export function nodeConstraints(schema: SchemaObject): Constraints {
  const constraints = extractConstraints(schema, { required: true });
  return {
    ...constraints,
    required: false,
    nullable: declaresType(schema, 'null') || schema.nullable === true,
    tags: constraints.tags.filter((tag) => tag !== 'required'),
  };
}
