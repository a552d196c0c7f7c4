import type { DiagnosticEnvelope } from '../diag/collector.js';
import type { RemovedOperation } from '../openapi/filter.js';
import type { RemovedComponent } from '../prune/pruner.js';
import type { TypeDefinition } from '../ir/types.js';
import type { OpenApiDocument } from '../types/document.js';
import type { CompilerError } from '../types/errors.js';
import type {
  MetricsCollector,
  MetricsCollectorOptions,
  MetricsSnapshot,
} from '../util/metrics.js';

export type PipelineStageName = 'filter' | 'prune' | 'resolve';

export type PipelineStageStatus =
  | 'pending'
  | 'completed'
  | 'failed'
  | 'skipped';

export type PipelineStatus = 'completed' | 'failed';

export class PipelineStageError extends Error {
  public readonly stage: PipelineStageName;
  public override readonly cause: unknown;

  constructor(stage: PipelineStageName, message: string, cause?: unknown) {
    if (cause === undefined) {
      super(message);
    } else {
      super(message, { cause });
    }
    this.name = 'PipelineStageError';
    this.stage = stage;
    this.cause = cause;
  }
}

export interface PipelineStageReport<TOutput> {
  status: PipelineStageStatus;
  output?: TOutput;
  error?: PipelineStageError;
}

export interface FilterStageOutput {
  removed: RemovedOperation[];
  propertiesRemoved: number;
}

export interface PruneStageOutput {
  iterations: number;
  removed: RemovedComponent[];
  extensionsStripped: number;
  examplesRemoved: number;
}

export interface ResolveStageOutput {
  types: TypeDefinition[];
  /** Site failures gathered when errors are collected */
  errors: CompilerError[];
}

export interface PipelineStages {
  filter: PipelineStageReport<FilterStageOutput>;
  prune: PipelineStageReport<PruneStageOutput>;
  resolve: PipelineStageReport<ResolveStageOutput>;
}

export interface PipelineOptions {
  metrics?: MetricsCollectorOptions;
  collector?: MetricsCollector;
}

export interface CompilationResult {
  status: PipelineStatus;
  /** Filtered and pruned working copy; the input is never modified */
  document: OpenApiDocument;
  types: TypeDefinition[];
  stages: PipelineStages;
  diagnostics: DiagnosticEnvelope[];
  metrics: MetricsSnapshot;
  errors: PipelineStageError[];
  timeline: PipelineStageName[];
}
