import { isRecord, type OpenApiDocument } from '../types/document.js';
import { owningComponentReference } from '../util/pointer.js';
import { DATA_KEYS } from './cleanup.js';

function collect(value: unknown, refs: Set<string>): void {
  if (Array.isArray(value)) {
    for (const item of value) collect(item, refs);
    return;
  }
  if (!isRecord(value)) return;

  const ref = value.$ref;
  if (typeof ref === 'string') {
    refs.add(ref);
    // a reference into a component keeps the whole component
    const owner = owningComponentReference(ref);
    if (owner !== undefined) refs.add(owner);
  }
  for (const [key, child] of Object.entries(value)) {
    if (DATA_KEYS.has(key)) continue;
    collect(child, refs);
  }
}

/**
 * Every reference string used by the retained operations (and the path
 * items around them) and by the component declarations themselves.
 * Extension values are walked as well, so `{ "$ref": ... }` maps nested in
 * an extension count too.
 */
export function collectReferences(document: OpenApiDocument): Set<string> {
  const refs = new Set<string>();
  collect(document.paths, refs);
  collect(document.components, refs);
  return refs;
}
