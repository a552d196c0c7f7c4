#!/usr/bin/env node
/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */

// CLI entry point
// - Command name: `openapi-ir` with subcommands `compile` and `prune`.
// - `compile` bundles an OpenAPI document, runs filter -> prune -> resolve and
//   prints the type definitions (or the filtered document) as JSON.
// - `prune` runs filter -> prune only and prints the reduced document.
// Options from openapi-ir.config.json (or --config) are applied first; flags
// given on the command line win.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  CompilerError,
  DiagnosticCollector,
  InternalError,
  PipelineStageError,
  filterOperations,
  isCompilerError,
  compileDocument,
  pruneComponents,
  resolveOptions,
  stageCompilerError,
  type CompilationResult,
} from '@openapi-ir/core';
import { renderCLIView } from './render.js';
import {
  collectList,
  mergeCompilerOptions,
  parseCompilerOptions,
  resolveEmitFormat,
  type CliOptions,
} from './flags.js';
import { loadConfig, loadDocument } from './load.js';
import { renderDocument, renderTypes, writeOutput } from './emit.js';
import { printCompilationDebug } from './debug.js';

function addFilterOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Configuration file (default: ./openapi-ir.config.json)')
    .option('--include-tag <tag>', 'Keep only operations carrying this tag (repeatable)', collectList)
    .option('--exclude-tag <tag>', 'Drop operations carrying this tag (repeatable)', collectList)
    .option('--include-operation <id>', 'Keep only this operationId (repeatable)', collectList)
    .option('--exclude-operation <id>', 'Drop this operationId (repeatable)', collectList)
    .option('--include-path <path>', 'Keep only this path template (repeatable)', collectList)
    .option('--exclude-path <path>', 'Drop this path template (repeatable)', collectList)
    .option('--max-prune-iterations <number>', 'Safety cap on pruning passes')
    .option('-o, --out <file>', 'Write output to a file instead of stdout');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('openapi-ir')
    .description('Compile OpenAPI 3.x documents into a canonical type IR')
    .version('0.1.0');

  addFilterOptions(
    program
      .command('compile')
      .description('Resolve every schema and operation into type definitions')
      .argument('<file>', 'OpenAPI document (JSON or YAML)')
  )
    .option('--no-prune', 'Keep components no operation reaches')
    .option('--collect-errors', 'Keep resolving after a failure and report every error')
    .option('--emit <what>', 'Output: types|document', 'types')
    .option('--debug', 'Print stage statuses and diagnostics to stderr')
    .option('--print-metrics', 'Print pipeline metrics as JSON to stderr', false)
    .action(async (file: string, options: CliOptions) => {
      try {
        const emit = resolveEmitFormat(options.emit);
        const fromFile = await loadConfig(options.config);
        const compilerOptions = mergeCompilerOptions(fromFile, parseCompilerOptions(options));

        if (options.debug) {
          process.stderr.write(
            `[openapi-ir] effective config: ${JSON.stringify(resolveOptions(compilerOptions), null, 2)}\n`
          );
        }

        const document = await loadDocument(file);
        const result = compileDocument(document, compilerOptions);

        if (options.debug) {
          printCompilationDebug(result);
        }

        await handleCompilationOutput(result, {
          emit,
          out: options.out,
          printMetrics: options.printMetrics === true,
          debug: options.debug === true,
        });
      } catch (err: unknown) {
        handleCliError(err, [], options.debug === true);
      }
    });

  addFilterOptions(
    program
      .command('prune')
      .description('Drop filtered operations and every component they no longer reach')
      .argument('<file>', 'OpenAPI document (JSON or YAML)')
  ).action(async (file: string, options: CliOptions) => {
    try {
      const fromFile = await loadConfig(options.config);
      const resolved = resolveOptions(
        mergeCompilerOptions(fromFile, parseCompilerOptions(options))
      );
      const document = await loadDocument(file);
      const diagnostics = new DiagnosticCollector();

      const filtered = filterOperations(document, resolved.filter, diagnostics);
      const pruned = pruneComponents(
        filtered.document,
        {
          maxIterations: resolved.prune.maxIterations,
          allowedExtensions: resolved.extensions.allowed,
        },
        diagnostics
      );

      await writeOutput(renderDocument(pruned.document), options.out);
      process.stderr.write(
        `[openapi-ir] removed ${filtered.removed.length} operation(s) and ${pruned.removed.length} component(s) in ${pruned.iterations} pass(es)\n`
      );
    } catch (err: unknown) {
      handleCliError(err);
    }
  });

  return program;
}

async function handleCompilationOutput(
  result: CompilationResult,
  settings: {
    emit: 'types' | 'document';
    out?: string;
    printMetrics: boolean;
    debug: boolean;
  }
): Promise<void> {
  if (settings.printMetrics) {
    process.stderr.write(
      `[openapi-ir] metrics: ${JSON.stringify(result.metrics)}\n`
    );
  }

  if (result.status === 'completed') {
    const text =
      settings.emit === 'document'
        ? renderDocument(result.document)
        : renderTypes(result.types);
    await writeOutput(text, settings.out);
    return;
  }

  const [first, ...rest] = result.errors;
  if (!first) {
    throw new PipelineStageError('resolve', 'Compilation failed');
  }
  const related = rest
    .map((stageError) => stageCompilerError(stageError))
    .filter((error): error is CompilerError => error !== undefined);
  handleCliError(stageCompilerError(first) ?? first, related, settings.debug);
}

function toCompilerError(err: unknown): CompilerError {
  if (isCompilerError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(
    message || 'Unexpected error',
    err instanceof Error ? err : undefined
  );
}

/**
 * Print the error (and the collected ones after it) and exit with its code.
 * With `debug`, the log payload of every error follows on stderr.
 */
export function handleCliError(
  err: unknown,
  related: readonly CompilerError[] = [],
  debug = false
): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  const error = toCompilerError(err);
  const view = presenter.formatForCLI(error, related);
  console.error(renderCLIView(view));
  if (debug) {
    for (const logged of [error, ...related]) {
      process.stderr.write(
        `[openapi-ir] error: ${JSON.stringify(presenter.formatForLog(logged))}\n`
      );
    }
  }

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
