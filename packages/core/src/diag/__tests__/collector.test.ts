import { describe, it, expect } from 'vitest';

import { DiagnosticCollector } from '../collector.js';
import { DIAGNOSTIC_CODES, DIAGNOSTIC_PHASES } from '../codes.js';

describe('DiagnosticCollector', () => {
  it('keeps entries in recording order', () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.record({
      code: DIAGNOSTIC_CODES.COMPONENT_PRUNED,
      phase: DIAGNOSTIC_PHASES.PRUNE,
      path: '#/components/schemas/A',
    });
    diagnostics.record({
      code: DIAGNOSTIC_CODES.TYPE_RENAMED,
      phase: DIAGNOSTIC_PHASES.RESOLVE,
      path: '#/components/schemas/B',
      details: { from: 'B', to: 'B1' },
    });

    expect(diagnostics.size).toBe(2);
    expect(diagnostics.list().map((entry) => entry.code)).toEqual([
      'COMPONENT_PRUNED',
      'TYPE_RENAMED',
    ]);
    expect(diagnostics.byCode(DIAGNOSTIC_CODES.TYPE_RENAMED)[0]?.details).toEqual({
      from: 'B',
      to: 'B1',
    });
  });

  it('rejects a code outside its phase', () => {
    const diagnostics = new DiagnosticCollector();

    expect(() =>
      diagnostics.record({
        code: DIAGNOSTIC_CODES.OPERATION_FILTERED,
        phase: DIAGNOSTIC_PHASES.RESOLVE,
        path: '#/paths/~1a/get',
      })
    ).toThrow('Diagnostic OPERATION_FILTERED is not allowed in phase resolve');
    expect(diagnostics.size).toBe(0);
  });

  it('hands out copies', () => {
    const diagnostics = new DiagnosticCollector();
    diagnostics.list().push({
      code: DIAGNOSTIC_CODES.COMPONENT_PRUNED,
      phase: DIAGNOSTIC_PHASES.PRUNE,
      path: '#',
    });
    expect(diagnostics.size).toBe(0);
  });
});
