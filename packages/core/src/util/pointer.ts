import { isRecord } from '../types/document.js';

/**
 * JSON Pointer (RFC 6901) helpers for local `#/...` references.
 */

export function decodePointerToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

export function encodePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Split a local reference into decoded tokens.
 * Returns undefined for references that leave the document.
 */
export function referenceTokens(ref: string): string[] | undefined {
  if (!ref.startsWith('#')) return undefined;
  const pointer = ref.slice(1);
  if (pointer === '' || pointer === '/') return [];
  if (!pointer.startsWith('/')) return undefined;
  return pointer.split('/').slice(1).map(decodePointerToken);
}

export function toPointer(tokens: readonly string[]): string {
  if (tokens.length === 0) return '#';
  return `#/${tokens.map(encodePointerToken).join('/')}`;
}

export function appendPointer(
  pointer: string,
  ...tokens: readonly string[]
): string {
  if (tokens.length === 0) return pointer;
  return `${pointer}/${tokens.map(encodePointerToken).join('/')}`;
}

export function getByPointer(
  root: unknown,
  tokens: readonly string[]
): unknown {
  let current: unknown = root;
  for (const token of tokens) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(token)) return undefined;
      current = current[Number(token)];
    } else if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, token)) {
        return undefined;
      }
      current = current[token];
    } else {
      return undefined;
    }
  }
  return current;
}

/** `#/components/<kind>/<name>` for a component entry */
export function componentReference(kind: string, name: string): string {
  return toPointer(['components', kind, name]);
}

/** True for `#/components/<kind>/<name>` with nothing after the name */
export function isComponentReference(ref: string): boolean {
  const tokens = referenceTokens(ref);
  return tokens !== undefined && tokens.length === 3 && tokens[0] === 'components';
}

/**
 * The component a reference lands in, for references that point inside a
 * component (`#/components/schemas/Foo/properties/bar` -> `#/components/schemas/Foo`).
 */
export function owningComponentReference(ref: string): string | undefined {
  const tokens = referenceTokens(ref);
  if (!tokens || tokens.length <= 3 || tokens[0] !== 'components') {
    return undefined;
  }
  return toPointer(tokens.slice(0, 3));
}
