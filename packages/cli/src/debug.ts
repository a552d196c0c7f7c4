import type { CompilationResult } from '@openapi-ir/core';

/**
 * Print stage statuses and diagnostics to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printCompilationDebug(result: CompilationResult): void {
  const stages = Object.entries(result.stages).map(
    ([name, stage]) => `${name}=${stage.status}`
  );
  process.stderr.write(`[openapi-ir] stages: ${stages.join(' ')}\n`);

  if (result.diagnostics.length === 0) {
    process.stderr.write('[openapi-ir] diagnostics: []\n');
    return;
  }

  const counts = new Map<string, number>();
  for (const diagnostic of result.diagnostics) {
    counts.set(diagnostic.code, (counts.get(diagnostic.code) ?? 0) + 1);
  }
  process.stderr.write(
    `[openapi-ir] diagnostics: ${JSON.stringify(Object.fromEntries(counts))}\n`
  );
  for (const diagnostic of result.diagnostics) {
    process.stderr.write(
      `[openapi-ir] ${diagnostic.phase} ${diagnostic.code} ${diagnostic.path}\n`
    );
  }
}
