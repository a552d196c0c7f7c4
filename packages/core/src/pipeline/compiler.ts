/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */
import { DiagnosticCollector } from '../diag/collector.js';
import { resolveDocument } from '../ir/resolve.js';
import { filterOperations } from '../openapi/filter.js';
import { pruneComponents } from '../prune/pruner.js';
import type { OpenApiDocument } from '../types/document.js';
import { isCompilerError, type CompilerError } from '../types/errors.js';
import {
  resolveOptions,
  type CompilerOptions,
} from '../types/options.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import { MetricsCollector } from '../util/metrics.js';
import {
  PipelineStageError,
  type CompilationResult,
  type PipelineOptions,
  type PipelineStageName,
  type PipelineStages,
  type PipelineStatus,
} from './types.js';

const STAGE_SEQUENCE: readonly PipelineStageName[] = [
  'filter',
  'prune',
  'resolve',
];

function createInitialStages(): PipelineStages {
  return {
    filter: { status: 'pending' },
    prune: { status: 'pending' },
    resolve: { status: 'pending' },
  };
}

export function toPipelineStageError(
  stage: PipelineStageName,
  throwable: unknown
): PipelineStageError {
  if (throwable instanceof PipelineStageError) {
    return throwable;
  }
  if (throwable instanceof Error) {
    return new PipelineStageError(stage, throwable.message, throwable);
  }
  return new PipelineStageError(stage, String(throwable));
}

function markRemainingStagesAsSkipped(
  stages: PipelineStages,
  failedStage: PipelineStageName
): void {
  const failedIndex = STAGE_SEQUENCE.indexOf(failedStage);
  for (const name of STAGE_SEQUENCE.slice(failedIndex + 1)) {
    const stage = stages[name];
    if (stage.status === 'pending') {
      stage.status = 'skipped';
    }
  }
}

/**
 * Run filter -> prune -> resolve on a working copy of `document`.
 *
 * Stage failures are reported in the result rather than thrown; only
 * invalid options throw (ConfigError), before any stage runs.
 */
export function compileDocument(
  document: OpenApiDocument,
  userOptions: CompilerOptions = {},
  pipeline: PipelineOptions = {}
): CompilationResult {
  const options = resolveOptions(userOptions);
  const metrics = pipeline.collector ?? new MetricsCollector(pipeline.metrics);
  const diagnostics = new DiagnosticCollector();

  const stages = createInitialStages();
  const timeline: PipelineStageName[] = [];
  const errors: PipelineStageError[] = [];
  let status: PipelineStatus = 'completed';
  let working = document;

  const finish = (failedStage?: PipelineStageName): CompilationResult => {
    if (failedStage !== undefined) {
      markRemainingStagesAsSkipped(stages, failedStage);
    }
    const types = stages.resolve.output?.types ?? [];
    return {
      status,
      document: working,
      types,
      stages,
      diagnostics: diagnostics.list(),
      metrics: metrics.snapshotMetrics(),
      errors,
      timeline,
    };
  };

  // Filter stage
  metrics.begin('FILTER');
  try {
    const filtered = filterOperations(working, options.filter, diagnostics);
    working = filtered.document;
    metrics.addOperationsRemoved(filtered.removed.length);
    stages.filter = {
      status: 'completed',
      output: {
        removed: filtered.removed,
        propertiesRemoved: filtered.propertiesRemoved,
      },
    };
  } catch (error) {
    const stageError = toPipelineStageError('filter', error);
    stages.filter = { status: 'failed', error: stageError };
    errors.push(stageError);
    status = 'failed';
  } finally {
    metrics.end('FILTER');
    timeline.push('filter');
  }
  if (status === 'failed') return finish('filter');

  // Prune stage
  if (options.prune.enabled) {
    metrics.begin('PRUNE');
    try {
      const pruned = pruneComponents(
        working,
        {
          maxIterations: options.prune.maxIterations,
          allowedExtensions: options.extensions.allowed,
        },
        diagnostics
      );
      working = pruned.document;
      metrics.recordPrune({
        iterations: pruned.iterations,
        componentsRemoved: pruned.removed.length,
        extensionsStripped: pruned.extensionsStripped,
      });
      stages.prune = {
        status: 'completed',
        output: {
          iterations: pruned.iterations,
          removed: pruned.removed,
          extensionsStripped: pruned.extensionsStripped,
          examplesRemoved: pruned.examplesRemoved,
        },
      };
    } catch (error) {
      const stageError = toPipelineStageError('prune', error);
      stages.prune = { status: 'failed', error: stageError };
      errors.push(stageError);
      status = 'failed';
    } finally {
      metrics.end('PRUNE');
      timeline.push('prune');
    }
    if (status === 'failed') return finish('prune');
  } else {
    stages.prune = { status: 'skipped' };
  }

  // Resolve stage
  metrics.begin('RESOLVE');
  try {
    const resolved = resolveDocument(working, options, diagnostics);
    metrics.setTypesRegistered(resolved.types.length);
    if (resolved.errors.length > 0) {
      const siteErrors = resolved.errors.map((siteError) =>
        toPipelineStageError('resolve', siteError)
      );
      const [first] = siteErrors;
      stages.resolve = { status: 'failed', output: resolved, error: first };
      errors.push(...siteErrors);
      status = 'failed';
    } else {
      stages.resolve = { status: 'completed', output: resolved };
    }
  } catch (error) {
    const stageError = toPipelineStageError('resolve', error);
    stages.resolve = { status: 'failed', error: stageError };
    errors.push(stageError);
    status = 'failed';
  } finally {
    metrics.end('RESOLVE');
    timeline.push('resolve');
  }

  return finish();
}

/** The typed error behind a stage failure, when there is one */
export function stageCompilerError(
  error: PipelineStageError
): CompilerError | undefined {
  return isCompilerError(error.cause) ? error.cause : undefined;
}

/**
 * compileDocument for callers that prefer a Result. Invalid options and
 * failed stages both land in Err.
 */
export function tryCompileDocument(
  document: OpenApiDocument,
  options: CompilerOptions = {},
  pipeline: PipelineOptions = {}
): Result<CompilationResult, CompilerError | PipelineStageError> {
  let result: CompilationResult;
  try {
    result = compileDocument(document, options, pipeline);
  } catch (error) {
    if (isCompilerError(error)) return err(error);
    throw error;
  }
  const [first] = result.errors;
  if (first === undefined) return ok(result);
  return err(stageCompilerError(first) ?? first);
}

/**
 * Throwing convenience: the compilation result, or the first failure's
 * typed error.
 */
export function compile(
  document: OpenApiDocument,
  options: CompilerOptions = {},
  pipeline: PipelineOptions = {}
): CompilationResult {
  const result = tryCompileDocument(document, options, pipeline);
  if (isErr(result)) throw result.error;
  return result.value;
}
