/* eslint-disable complexity */
import type { DiagnosticCollector } from '../diag/collector.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import {
  PRUNABLE_COMPONENT_KINDS,
  type OpenApiDocument,
  type PrunableComponentKind,
} from '../types/document.js';
import { PruneIterationLimitExceededError } from '../types/errors.js';
import { componentReference } from '../util/pointer.js';
import { cleanupDocument } from './cleanup.js';
import { collectReferences } from './collect-refs.js';

export interface PruneSettings {
  maxIterations: number;
  /** Extension keys kept besides the recognized ones */
  allowedExtensions: readonly string[];
}

export interface RemovedComponent {
  kind: PrunableComponentKind;
  name: string;
  iteration: number;
}

export interface PruneResult {
  document: OpenApiDocument;
  /** Passes run, the cleanup pass included */
  iterations: number;
  removed: RemovedComponent[];
  extensionsStripped: number;
  examplesRemoved: number;
}

function removeOrphans(
  document: OpenApiDocument,
  refs: ReadonlySet<string>,
  iteration: number,
  diagnostics?: DiagnosticCollector
): RemovedComponent[] {
  const components = document.components;
  if (components === undefined) return [];

  const removed: RemovedComponent[] = [];
  for (const kind of PRUNABLE_COMPONENT_KINDS) {
    const collection = components[kind];
    if (collection === undefined) continue;
    for (const name of Object.keys(collection)) {
      const ref = componentReference(kind, name);
      if (refs.has(ref)) continue;
      delete collection[name];
      removed.push({ kind, name, iteration });
      diagnostics?.record({
        code: DIAGNOSTIC_CODES.COMPONENT_PRUNED,
        phase: DIAGNOSTIC_PHASES.PRUNE,
        path: ref,
        details: { kind, name, iteration },
      });
    }
  }
  return removed;
}

/**
 * Remove every component no retained operation can reach, repeating until
 * a pass removes nothing. The first pass only cleans the document up.
 * The input is not modified.
 *
 * @throws {PruneIterationLimitExceededError} When no fixed point is reached
 * within `maxIterations` passes
 */
export function pruneComponents(
  input: OpenApiDocument,
  settings: PruneSettings,
  diagnostics?: DiagnosticCollector
): PruneResult {
  const document = structuredClone(input);
  const cleanup = cleanupDocument(
    document,
    settings.allowedExtensions,
    diagnostics
  );

  const removed: RemovedComponent[] = [];
  let iteration = 1;
  for (;;) {
    iteration += 1;
    if (iteration > settings.maxIterations) {
      throw new PruneIterationLimitExceededError(settings.maxIterations);
    }
    const pass = removeOrphans(
      document,
      collectReferences(document),
      iteration,
      diagnostics
    );
    removed.push(...pass);
    if (pass.length === 0) break;
  }

  return {
    document,
    iterations: iteration,
    removed,
    extensionsStripped: cleanup.extensionsStripped,
    examplesRemoved: cleanup.examplesRemoved,
  };
}
