export const DIAGNOSTIC_PHASES = {
  FILTER: 'filter',
  PRUNE: 'prune',
  RESOLVE: 'resolve',
} as const;

export type DiagnosticPhase =
  (typeof DIAGNOSTIC_PHASES)[keyof typeof DIAGNOSTIC_PHASES];

export const DIAGNOSTIC_CODES = {
  OPERATION_FILTERED: 'OPERATION_FILTERED',
  SCHEMA_PROPERTY_FILTERED: 'SCHEMA_PROPERTY_FILTERED',
  EXTENSION_STRIPPED: 'EXTENSION_STRIPPED',
  EXAMPLES_REMOVED: 'EXAMPLES_REMOVED',
  COMPONENT_PRUNED: 'COMPONENT_PRUNED',
  ALLOF_PROPERTY_OVERRIDDEN: 'ALLOF_PROPERTY_OVERRIDDEN',
  UNION_ELEMENT_DEDUPLICATED: 'UNION_ELEMENT_DEDUPLICATED',
  UNION_EMPTY_RECORD_DROPPED: 'UNION_EMPTY_RECORD_DROPPED',
  TYPE_MERGED_EQUIVALENT: 'TYPE_MERGED_EQUIVALENT',
  TYPE_RENAMED: 'TYPE_RENAMED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

const PHASES_BY_CODE: Record<DiagnosticCode, ReadonlySet<DiagnosticPhase>> = {
  OPERATION_FILTERED: new Set([DIAGNOSTIC_PHASES.FILTER]),
  SCHEMA_PROPERTY_FILTERED: new Set([DIAGNOSTIC_PHASES.FILTER]),
  EXTENSION_STRIPPED: new Set([DIAGNOSTIC_PHASES.PRUNE]),
  EXAMPLES_REMOVED: new Set([DIAGNOSTIC_PHASES.PRUNE]),
  COMPONENT_PRUNED: new Set([DIAGNOSTIC_PHASES.PRUNE]),
  ALLOF_PROPERTY_OVERRIDDEN: new Set([DIAGNOSTIC_PHASES.RESOLVE]),
  UNION_ELEMENT_DEDUPLICATED: new Set([DIAGNOSTIC_PHASES.RESOLVE]),
  UNION_EMPTY_RECORD_DROPPED: new Set([DIAGNOSTIC_PHASES.RESOLVE]),
  TYPE_MERGED_EQUIVALENT: new Set([DIAGNOSTIC_PHASES.RESOLVE]),
  TYPE_RENAMED: new Set([DIAGNOSTIC_PHASES.RESOLVE]),
};

export function getAllowedDiagnosticPhases(
  code: DiagnosticCode
): ReadonlySet<DiagnosticPhase> {
  return PHASES_BY_CODE[code];
}
