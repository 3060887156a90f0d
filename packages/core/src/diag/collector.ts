import {
  DIAGNOSTIC_SEVERITY,
  type DiagnosticCode,
} from './codes.js';

export interface DiagnosticEnvelope {
  code: DiagnosticCode;
  typeName: string;
  property?: string;
  details?: Record<string, unknown>;
}

/**
 * Sink for structured diagnostics. The engine never prints; callers decide
 * what to do with the envelopes.
 */
export interface DiagnosticSink {
  report(diagnostic: DiagnosticEnvelope): void;
}

export class DiagnosticCollector implements DiagnosticSink {
  readonly #entries: DiagnosticEnvelope[] = [];

  report(diagnostic: DiagnosticEnvelope): void {
    this.#entries.push(diagnostic);
  }

  entries(): readonly DiagnosticEnvelope[] {
    return this.#entries;
  }

  byCode(code: DiagnosticCode): DiagnosticEnvelope[] {
    return this.#entries.filter((entry) => entry.code === code);
  }

  warnings(): DiagnosticEnvelope[] {
    return this.#entries.filter(
      (entry) => DIAGNOSTIC_SEVERITY[entry.code] === 'warn'
    );
  }
}

export const NOOP_DIAGNOSTICS: DiagnosticSink = {
  report: () => undefined,
};

export function formatDiagnostic(diagnostic: DiagnosticEnvelope): string {
  const where = diagnostic.property
    ? `${diagnostic.typeName}.${diagnostic.property}`
    : diagnostic.typeName;
  const details = diagnostic.details
    ? ` ${JSON.stringify(diagnostic.details)}`
    : '';
  return `${DIAGNOSTIC_SEVERITY[diagnostic.code]} ${diagnostic.code} ${where}${details}`;
}
