// @openapi-ir/core entry point
//
// compileDocument() runs filter -> prune -> resolve and is the preferred
// entry point; the stage functions and IR building blocks are exported for
// tools that run a single stage.

// Pipeline
export {
  compile,
  compileDocument,
  stageCompilerError,
  toPipelineStageError,
  tryCompileDocument,
} from './pipeline/compiler.js';
export {
  PipelineStageError,
  type CompilationResult,
  type FilterStageOutput,
  type PipelineOptions,
  type PipelineStageName,
  type PipelineStageReport,
  type PipelineStages,
  type PipelineStageStatus,
  type PipelineStatus,
  type PruneStageOutput,
  type ResolveStageOutput,
} from './pipeline/types.js';

// Document model and loading
export * from './types/document.js';
export {
  assertOpenApiDocument,
  formatAjvErrors,
  isOpenApiDocument,
} from './openapi/document.js';
export {
  filterOperations,
  type FilterReason,
  type FilterResult,
  type RemovedOperation,
} from './openapi/filter.js';

// Pruning
export {
  pruneComponents,
  type PruneResult,
  type PruneSettings,
  type RemovedComponent,
} from './prune/pruner.js';
export { cleanupDocument, type CleanupStats } from './prune/cleanup.js';
export { collectReferences } from './prune/collect-refs.js';

// IR
export * from './ir/types.js';
export { resolveDocument, type ResolveResult } from './ir/resolve.js';
export { operationTypeName } from './ir/operations.js';
export {
  TypeRegistry,
  resolveCollision,
  type NameLookup,
  type RegistryCheckpoint,
  type TypeRegistryOptions,
} from './ir/registry.js';
export { mergeSchemaNodes, type MergeOptions } from './ir/merge.js';
export { extractConstraints, countActiveConstraints } from './ir/constraints.js';
export {
  EXTENSION_KEYS,
  RECOGNIZED_EXTENSIONS,
  isRecognizedExtension,
  parseExtensions,
  type SchemaExtensions,
  type SensitiveDataConfig,
  type SensitiveDataKind,
} from './extensions/extensions.js';

// Options and configuration
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateOptions,
  type CompilerOptions,
  type ErrorHandlingOptions,
  type ExtensionOptions,
  type FilterOptions,
  type NamingOptions,
  type OperationSelector,
  type PruneOptions,
  type ResolvedCompilerOptions,
} from './types/options.js';
export {
  CONFIG_FILE_NAME,
  CONFIG_SCHEMA,
  parseCompilerConfig,
} from './config/config-file.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export * from './types/errors.js';
export * from './types/result.js';

// Diagnostics and metrics
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_PHASES,
  getAllowedDiagnosticPhases,
  type DiagnosticCode,
  type DiagnosticPhase,
} from './diag/codes.js';
export {
  DiagnosticCollector,
  type DiagnosticEnvelope,
} from './diag/collector.js';
export {
  METRIC_PHASES,
  MetricsCollector,
  type MetricPhase,
  type MetricsCollectorOptions,
  type MetricsSnapshot,
} from './util/metrics.js';
export { toTypeName, pathToTypeName, refToTypeName } from './util/names.js';
