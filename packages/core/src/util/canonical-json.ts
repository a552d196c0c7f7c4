import { Buffer } from 'node:buffer';
import { isRecord } from '../types/document.js';

export interface CanonicalJSONResult {
  text: string;
  buffer: Buffer;
  byteLength: number;
}

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

// Sorted keys, undefined members dropped, -0 folded into 0
function canonicalize(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'number') {
    return Number.isFinite(value)
      ? JSON.stringify(normalizeNumber(value))
      : 'null';
  }
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'bigint') return JSON.stringify(value.toString());
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }
  if (!isRecord(value)) return 'null';

  const entries: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const member = value[key];
    if (member === undefined || typeof member === 'function') continue;
    entries.push(`${JSON.stringify(key)}:${canonicalize(member)}`);
  }
  return `{${entries.join(',')}}`;
}

export function canonicalizeForHash(value: unknown): CanonicalJSONResult {
  const text = canonicalize(value);
  const buffer = Buffer.from(text, 'utf8');
  return {
    text,
    buffer,
    byteLength: buffer.byteLength,
  };
}
