import { createHash } from 'node:crypto';
import { canonicalizeForHash } from './canonical-json.js';

export interface StructuralHashResult {
  digest: string;
  canonical: string;
}

/**
 * Key-order independent fingerprint used to decide whether two schema
 * nodes are the same definition.
 */
export function structuralHash(value: unknown): StructuralHashResult {
  const canonical = canonicalizeForHash(value);
  const digest = createHash('sha256').update(canonical.buffer).digest('hex');
  return { digest, canonical: canonical.text };
}

export function structurallyEqual(left: unknown, right: unknown): boolean {
  return structuralHash(left).digest === structuralHash(right).digest;
}
