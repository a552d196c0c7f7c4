import { referenceTokens } from './pointer.js';

/**
 * Deterministic identifier derivation. Every generated name is a pure
 * function of the declaration path, never of traversal order.
 */

function upperFirst(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** 'pet-store_item' -> 'PetStoreItem'; leading digits get an 'N' prefix */
export function toTypeName(name: string, fallback = 'Type'): string {
  const joined = name
    .split(/[^A-Za-z0-9]+/)
    .filter((part) => part.length > 0)
    .map(upperFirst)
    .join('');
  if (joined === '') return fallback;
  return /^[0-9]/.test(joined) ? `N${joined}` : joined;
}

export function toFieldName(jsonName: string): string {
  return toTypeName(jsonName, 'Field');
}

/**
 * ['Pet', 'oneOf', '0'] -> 'Pet_OneOf_0'. Index segments stay numeric.
 */
export function pathToTypeName(path: readonly string[]): string {
  return path
    .map((segment, index) =>
      index > 0 && /^\d+$/.test(segment) ? segment : toTypeName(segment)
    )
    .join('_');
}

const REF_SEGMENT_ALIASES: Record<string, string | null> = {
  properties: null,
  items: 'Item',
  additionalProperties: 'AdditionalProperties',
};

/**
 * Naming path of a reference. Component references start at the component
 * name; `properties` hops are dropped so a reference into a property yields
 * the same path the property's hoisted type is named from.
 */
export function referenceNamePath(ref: string): string[] {
  const tokens = referenceTokens(ref) ?? [ref];
  const start =
    tokens[0] === 'components' && tokens.length >= 3 ? 2 : 0;
  const path: string[] = [];
  for (const token of tokens.slice(start)) {
    const alias = REF_SEGMENT_ALIASES[token];
    if (alias === null) continue;
    path.push(alias ?? token);
  }
  return path;
}

export function refToTypeName(ref: string): string {
  return pathToTypeName(referenceNamePath(ref));
}

/** Raw last segment of a reference: '#/components/schemas/Cat' -> 'Cat' */
export function refToObjectName(ref: string): string {
  const tokens = referenceTokens(ref);
  if (!tokens || tokens.length === 0) return ref;
  return tokens[tokens.length - 1] ?? ref;
}

export function enumMemberName(value: string | number | boolean): string {
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') {
    const digits = String(Math.abs(value)).replace(/[^0-9]+/g, '_');
    return value < 0 ? `Minus${digits}` : `N${digits}`;
  }
  return toTypeName(value, 'Empty');
}
