/* eslint-disable complexity */
import type { DiagnosticCollector } from '../diag/collector.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../diag/codes.js';
import {
  HTTP_METHODS,
  type HttpMethod,
  type OpenApiDocument,
  type OperationObject,
  type PathItemObject,
} from '../types/document.js';
import type {
  ResolvedCompilerOptions,
  ResolvedSelector,
} from '../types/options.js';
import { appendPointer, toPointer } from '../util/pointer.js';

/**
 * Operation filter
 *
 * Runs before pruning: whatever it removes no longer keeps components
 * reachable.
 */

export type FilterReason =
  | 'include.paths'
  | 'exclude.paths'
  | 'include.tags'
  | 'exclude.tags'
  | 'include.operationIds'
  | 'exclude.operationIds';

export interface RemovedOperation {
  path: string;
  method: HttpMethod;
  operationId?: string;
  reason: FilterReason;
}

export interface FilterResult {
  document: OpenApiDocument;
  removed: RemovedOperation[];
  propertiesRemoved: number;
}

type FilterSettings = ResolvedCompilerOptions['filter'];

function rejectReason(
  path: string,
  operation: OperationObject,
  filter: FilterSettings
): FilterReason | undefined {
  const { include, exclude } = filter;
  const tags = operation.tags ?? [];

  if (include.paths.length > 0 && !include.paths.includes(path)) {
    return 'include.paths';
  }
  if (exclude.paths.includes(path)) return 'exclude.paths';

  if (tags.some((tag) => exclude.tags.includes(tag))) return 'exclude.tags';
  if (
    include.tags.length > 0 &&
    !tags.some((tag) => include.tags.includes(tag))
  ) {
    return 'include.tags';
  }

  const { operationId } = operation;
  if (operationId !== undefined && exclude.operationIds.includes(operationId)) {
    return 'exclude.operationIds';
  }
  if (
    include.operationIds.length > 0 &&
    (operationId === undefined || !include.operationIds.includes(operationId))
  ) {
    return 'include.operationIds';
  }
  return undefined;
}

function hasOperations(pathItem: PathItemObject): boolean {
  return HTTP_METHODS.some((method) => pathItem[method] !== undefined);
}

function filterSchemaProperties(
  document: OpenApiDocument,
  include: ResolvedSelector['schemaProperties'],
  exclude: ResolvedSelector['schemaProperties'],
  diagnostics?: DiagnosticCollector
): number {
  const schemas = document.components?.schemas;
  if (schemas === undefined) return 0;

  let removed = 0;
  const names = new Set([...Object.keys(include), ...Object.keys(exclude)]);
  for (const name of names) {
    const schema = schemas[name];
    const properties = schema?.properties;
    if (schema === undefined || properties === undefined) continue;

    const required = new Set(schema.required ?? []);
    const keep = include[name];
    const drop = new Set(exclude[name] ?? []);
    for (const property of Object.keys(properties)) {
      if (required.has(property)) continue;
      const excluded =
        (keep !== undefined && !keep.includes(property)) || drop.has(property);
      if (!excluded) continue;

      delete properties[property];
      removed += 1;
      diagnostics?.record({
        code: DIAGNOSTIC_CODES.SCHEMA_PROPERTY_FILTERED,
        phase: DIAGNOSTIC_PHASES.FILTER,
        path: appendPointer(
          toPointer(['components', 'schemas', name]),
          'properties',
          property
        ),
        details: { schema: name, property },
      });
    }
  }
  return removed;
}

/**
 * Apply include/exclude rules to the operations of `document`.
 * The input is not modified; path items left without operations are
 * dropped from the result.
 */
export function filterOperations(
  document: OpenApiDocument,
  filter: FilterSettings,
  diagnostics?: DiagnosticCollector
): FilterResult {
  const result = structuredClone(document);
  const removed: RemovedOperation[] = [];

  for (const [path, pathItem] of Object.entries(result.paths ?? {})) {
    let touched = false;
    for (const method of HTTP_METHODS) {
      const operation = pathItem[method];
      if (operation === undefined) continue;

      const reason = rejectReason(path, operation, filter);
      if (reason === undefined) continue;

      delete pathItem[method];
      touched = true;
      const entry: RemovedOperation = { path, method, reason };
      if (operation.operationId !== undefined) {
        entry.operationId = operation.operationId;
      }
      removed.push(entry);
      diagnostics?.record({
        code: DIAGNOSTIC_CODES.OPERATION_FILTERED,
        phase: DIAGNOSTIC_PHASES.FILTER,
        path: toPointer(['paths', path, method]),
        details: { ...entry },
      });
    }
    if (touched && !hasOperations(pathItem) && result.paths !== undefined) {
      delete result.paths[path];
    }
  }

  const propertiesRemoved = filterSchemaProperties(
    result,
    filter.include.schemaProperties,
    filter.exclude.schemaProperties,
    diagnostics
  );

  return { document: result, removed, propertiesRemoved };
}
