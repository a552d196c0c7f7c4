/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */
import type { SchemaObject, SchemaType } from '../types/document.js';
import { IncompatibleMergeError } from '../types/errors.js';
import { structurallyEqual } from '../util/struct-hash.js';

export interface MergeOptions {
  /** Pointer of the allOf site, used for errors */
  schemaPath?: string;
  /** Called when a later member redefines a property with a different schema */
  onPropertyOverride?: (property: string) => void;
}

/** Declared type, or the one implied by properties/items */
export function effectiveTypes(schema: SchemaObject): SchemaType[] {
  if (schema.type !== undefined) {
    const types = Array.isArray(schema.type) ? schema.type : [schema.type];
    return [...new Set(types)].sort();
  }
  if (schema.properties !== undefined) return ['object'];
  if (schema.items !== undefined) return ['array'];
  return [];
}

function sameTypes(left: SchemaType[], right: SchemaType[]): boolean {
  return (
    left.length === right.length &&
    left.every((type, index) => type === right[index])
  );
}

function clash(
  keyword: string,
  left: unknown,
  right: unknown,
  options: MergeOptions
): IncompatibleMergeError {
  return new IncompatibleMergeError({
    message: `allOf members disagree on "${keyword}": ${JSON.stringify(left)} vs ${JSON.stringify(right)}`,
    schemaPath: options.schemaPath,
    keyword,
    left,
    right,
  });
}

type FlagKeyword = 'uniqueItems' | 'readOnly' | 'writeOnly';

function mergeFlag(
  keyword: FlagKeyword,
  s1: SchemaObject,
  s2: SchemaObject,
  options: MergeOptions
): boolean | undefined {
  const left = s1[keyword];
  const right = s2[keyword];
  if (left !== undefined && right !== undefined && left !== right) {
    throw clash(keyword, left, right, options);
  }
  return left ?? right;
}

function mergeExclusive(
  keyword: 'exclusiveMinimum' | 'exclusiveMaximum',
  s1: SchemaObject,
  s2: SchemaObject,
  options: MergeOptions
): boolean | number | undefined {
  const left = s1[keyword];
  const right = s2[keyword];
  if (left === undefined) return right;
  if (right === undefined) return left;
  if (typeof left === 'number' && typeof right === 'number') {
    return keyword === 'exclusiveMinimum'
      ? Math.max(left, right)
      : Math.min(left, right);
  }
  if (left !== right) {
    throw clash(keyword, left, right, options);
  }
  return left;
}

function stricterMin(
  left: number | undefined,
  right: number | undefined
): number | undefined {
  if (left === undefined) return right;
  if (right === undefined) return left;
  return Math.max(left, right);
}

function stricterMax(
  left: number | undefined,
  right: number | undefined
): number | undefined {
  if (left === undefined) return right;
  if (right === undefined) return left;
  return Math.min(left, right);
}

function firstNonEmpty<T>(left: T | undefined, right: T | undefined): T | undefined {
  if (left === undefined || left === '') return right;
  return left;
}

function mergeAdditionalProperties(
  s1: SchemaObject,
  s2: SchemaObject,
  options: MergeOptions
): boolean | SchemaObject | undefined {
  const left = s1.additionalProperties;
  const right = s2.additionalProperties;
  if (left === false || right === false) return false;
  if (typeof left === 'object' && typeof right === 'object') {
    if (!structurallyEqual(left, right)) {
      throw clash('additionalProperties', left, right, options);
    }
    return left;
  }
  if (typeof left === 'object') return left;
  if (typeof right === 'object') return right;
  if (left === true || right === true) return true;
  return undefined;
}

function assignDefined<K extends keyof SchemaObject>(
  target: SchemaObject,
  key: K,
  value: SchemaObject[K] | undefined
): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

/**
 * Merge two allOf members into one schema (logical AND).
 *
 * Properties are unioned with last-writer-wins on conflicting keys.
 * Declared types must match unless one side has no type at all.
 */
export function mergeSchemaNodes(
  s1: SchemaObject,
  s2: SchemaObject,
  options: MergeOptions = {}
): SchemaObject {
  const t1 = effectiveTypes(s1);
  const t2 = effectiveTypes(s2);
  if (t1.length > 0 && t2.length > 0 && !sameTypes(t1, t2)) {
    throw clash('type', t1, t2, options);
  }

  if (s1.format !== undefined && s2.format !== undefined && s1.format !== s2.format) {
    throw clash('format', s1.format, s2.format, options);
  }
  if (s1.default !== undefined && s2.default !== undefined) {
    throw clash('default', s1.default, s2.default, options);
  }
  if (
    s1.items !== undefined &&
    s2.items !== undefined &&
    !structurallyEqual(s1.items, s2.items)
  ) {
    throw clash('items', s1.items, s2.items, options);
  }

  const result: SchemaObject = {};

  // extensions: later members win
  for (const source of [s1, s2]) {
    for (const [key, value] of Object.entries(source)) {
      if (key.startsWith('x-')) {
        result[`x-${key.slice(2)}`] = value;
      }
    }
  }

  const type = s1.type ?? s2.type;
  if (type !== undefined) result.type = type;
  assignDefined(result, 'format', s1.format ?? s2.format);
  assignDefined(result, 'default', s1.default ?? s2.default);
  assignDefined(result, 'title', firstNonEmpty(s1.title, s2.title));
  assignDefined(
    result,
    'description',
    firstNonEmpty(s1.description, s2.description)
  );
  assignDefined(result, 'discriminator', s1.discriminator ?? s2.discriminator);

  assignDefined(result, 'uniqueItems', mergeFlag('uniqueItems', s1, s2, options));
  assignDefined(result, 'readOnly', mergeFlag('readOnly', s1, s2, options));
  assignDefined(result, 'writeOnly', mergeFlag('writeOnly', s1, s2, options));
  assignDefined(
    result,
    'exclusiveMinimum',
    mergeExclusive('exclusiveMinimum', s1, s2, options)
  );
  assignDefined(
    result,
    'exclusiveMaximum',
    mergeExclusive('exclusiveMaximum', s1, s2, options)
  );

  if (s1.nullable === true || s2.nullable === true) result.nullable = true;
  if (s1.deprecated === true || s2.deprecated === true) result.deprecated = true;

  if (s1.required !== undefined || s2.required !== undefined) {
    result.required = [...(s1.required ?? []), ...(s2.required ?? [])];
  }
  if (s1.enum !== undefined || s2.enum !== undefined) {
    result.enum = [...(s1.enum ?? []), ...(s2.enum ?? [])];
  }
  if (s1.oneOf !== undefined || s2.oneOf !== undefined) {
    result.oneOf = [...(s1.oneOf ?? []), ...(s2.oneOf ?? [])];
  }
  if (s1.anyOf !== undefined || s2.anyOf !== undefined) {
    result.anyOf = [...(s1.anyOf ?? []), ...(s2.anyOf ?? [])];
  }

  if (s1.properties !== undefined || s2.properties !== undefined) {
    const properties: Record<string, SchemaObject> = { ...s1.properties };
    for (const [name, schema] of Object.entries(s2.properties ?? {})) {
      const previous = properties[name];
      if (previous !== undefined && !structurallyEqual(previous, schema)) {
        options.onPropertyOverride?.(name);
      }
      properties[name] = schema;
    }
    result.properties = properties;
  }

  assignDefined(
    result,
    'additionalProperties',
    mergeAdditionalProperties(s1, s2, options)
  );
  assignDefined(result, 'items', s1.items ?? s2.items);

  assignDefined(result, 'minimum', stricterMin(s1.minimum, s2.minimum));
  assignDefined(result, 'maximum', stricterMax(s1.maximum, s2.maximum));
  assignDefined(result, 'minLength', stricterMin(s1.minLength, s2.minLength));
  assignDefined(result, 'maxLength', stricterMax(s1.maxLength, s2.maxLength));
  assignDefined(result, 'minItems', stricterMin(s1.minItems, s2.minItems));
  assignDefined(result, 'maxItems', stricterMax(s1.maxItems, s2.maxItems));
  assignDefined(
    result,
    'minProperties',
    stricterMin(s1.minProperties, s2.minProperties)
  );
  assignDefined(
    result,
    'maxProperties',
    stricterMax(s1.maxProperties, s2.maxProperties)
  );
  assignDefined(result, 'pattern', s2.pattern ?? s1.pattern);
  assignDefined(result, 'multipleOf', s2.multipleOf ?? s1.multipleOf);
  assignDefined(result, 'const', s2.const ?? s1.const);

  return result;
}
