/* eslint-disable complexity */
import type { DiagnosticCollector } from '../diag/collector.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import { RECOGNIZED_EXTENSIONS } from '../extensions/extensions.js';
import { isRecord, type OpenApiDocument } from '../types/document.js';
import { appendPointer, toPointer } from '../util/pointer.js';

/**
 * First-pass document cleanup: drop what the compiler never reads.
 */

/** Keywords whose value is user data, never walked */
export const DATA_KEYS: ReadonlySet<string> = new Set([
  'default',
  'const',
  'enum',
]);

/** Keywords whose value maps user-chosen names to objects */
export const NAMED_MAP_KEYS: ReadonlySet<string> = new Set([
  'paths',
  'properties',
  'patternProperties',
  'schemas',
  'parameters',
  'requestBodies',
  'responses',
  'headers',
  'links',
  'callbacks',
  'content',
  'encoding',
  'mapping',
  'variables',
  '$defs',
  'definitions',
]);

const EXAMPLE_KEYS: ReadonlySet<string> = new Set(['example', 'examples']);

export interface CleanupStats {
  extensionsStripped: number;
  examplesRemoved: number;
}

interface CleanupState {
  allowed: ReadonlySet<string>;
  stats: CleanupStats;
  diagnostics?: DiagnosticCollector;
}

function cleanValue(value: unknown, pointer: string, state: CleanupState): void {
  if (Array.isArray(value)) {
    value.forEach((item, index) =>
      cleanValue(item, appendPointer(pointer, String(index)), state)
    );
    return;
  }
  if (isRecord(value)) cleanKeywords(value, pointer, state);
}

function cleanNamedMap(
  map: Record<string, unknown>,
  pointer: string,
  state: CleanupState
): void {
  for (const [name, entry] of Object.entries(map)) {
    cleanValue(entry, appendPointer(pointer, name), state);
  }
}

function cleanKeywords(
  node: Record<string, unknown>,
  pointer: string,
  state: CleanupState
): void {
  for (const key of Object.keys(node)) {
    const value = node[key];
    const childPointer = appendPointer(pointer, key);

    if (key.startsWith('x-')) {
      if (state.allowed.has(key)) continue;
      delete node[key];
      state.stats.extensionsStripped += 1;
      state.diagnostics?.record({
        code: DIAGNOSTIC_CODES.EXTENSION_STRIPPED,
        phase: DIAGNOSTIC_PHASES.PRUNE,
        path: childPointer,
        details: { key },
      });
      continue;
    }
    if (EXAMPLE_KEYS.has(key)) {
      delete node[key];
      state.stats.examplesRemoved += 1;
      state.diagnostics?.record({
        code: DIAGNOSTIC_CODES.EXAMPLES_REMOVED,
        phase: DIAGNOSTIC_PHASES.PRUNE,
        path: childPointer,
      });
      continue;
    }
    if (DATA_KEYS.has(key)) continue;

    if (NAMED_MAP_KEYS.has(key) && isRecord(value)) {
      cleanNamedMap(value, childPointer, state);
    } else {
      cleanValue(value, childPointer, state);
    }
  }
}

/**
 * Remove webhooks, security schemes, component callbacks and examples,
 * then strip every extension that is neither recognized nor allowed and
 * every example value, recursively. Mutates `document`.
 */
export function cleanupDocument(
  document: OpenApiDocument,
  allowedExtensions: readonly string[],
  diagnostics?: DiagnosticCollector
): CleanupStats {
  delete document.webhooks;
  if (document.components !== undefined) {
    delete document.components.securitySchemes;
    delete document.components.callbacks;
    delete document.components.examples;
  }

  const state: CleanupState = {
    allowed: new Set([...RECOGNIZED_EXTENSIONS, ...allowedExtensions]),
    stats: { extensionsStripped: 0, examplesRemoved: 0 },
    diagnostics,
  };
  const root: unknown = document;
  if (isRecord(root)) cleanKeywords(root, toPointer([]), state);
  return state.stats;
}
