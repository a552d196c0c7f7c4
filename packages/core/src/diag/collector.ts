import {
  type DiagnosticCode,
  type DiagnosticPhase,
  getAllowedDiagnosticPhases,
} from './codes.js';

export interface DiagnosticEnvelope {
  code: DiagnosticCode;
  phase: DiagnosticPhase;
  /** JSON Pointer of the node the note is about */
  path: string;
  details?: Record<string, unknown>;
}

/**
 * Append-only sink for the structured notes every phase emits. The core
 * never prints; callers decide what to surface.
 */
export class DiagnosticCollector {
  private readonly entries: DiagnosticEnvelope[] = [];

  record(envelope: DiagnosticEnvelope): void {
    if (!getAllowedDiagnosticPhases(envelope.code).has(envelope.phase)) {
      throw new Error(
        `Diagnostic ${envelope.code} is not allowed in phase ${envelope.phase}`
      );
    }
    this.entries.push(envelope);
  }

  list(): DiagnosticEnvelope[] {
    return [...this.entries];
  }

  byCode(code: DiagnosticCode): DiagnosticEnvelope[] {
    return this.entries.filter((entry) => entry.code === code);
  }

  get size(): number {
    return this.entries.length;
  }
}
