/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Reference Errors (E010–E019)
  UNRESOLVABLE_REFERENCE = 'E010',

  // Merge Errors (E020–E029)
  INCOMPATIBLE_MERGE = 'E020',

  // Discriminator Errors (E030–E039)
  AMBIGUOUS_DISCRIMINATOR_MAPPING = 'E030',
  DISCRIMINATOR_NOT_ALL_MAPPED = 'E031',

  // Naming Errors (E040–E049)
  DUPLICATE_TYPE_NAME = 'E040',

  // Pruning Errors (E050–E059)
  PRUNE_ITERATION_LIMIT_EXCEEDED = 'E050',

  // Extension Errors (E060–E069)
  INVALID_EXTENSION = 'E060',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.UNRESOLVABLE_REFERENCE]: 10,
  [ErrorCode.INCOMPATIBLE_MERGE]: 20,
  [ErrorCode.AMBIGUOUS_DISCRIMINATOR_MAPPING]: 30,
  [ErrorCode.DISCRIMINATOR_NOT_ALL_MAPPED]: 31,
  [ErrorCode.DUPLICATE_TYPE_NAME]: 40,
  [ErrorCode.PRUNE_ITERATION_LIMIT_EXCEEDED]: 50,
  [ErrorCode.INVALID_EXTENSION]: 60,
  [ErrorCode.CONFIGURATION_ERROR]: 70,
  [ErrorCode.PARSE_ERROR]: 80,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
