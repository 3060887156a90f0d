import {
  DIAGNOSTIC_SEVERITY,
  formatDiagnostic,
  type DiagnosticEnvelope,
} from '@schema-rules/core';

/**
 * Print diagnostics to stderr. Warnings are always printed; informational
 * entries only behind --debug.
 */
export function printDiagnostics(
  diagnostics: readonly DiagnosticEnvelope[],
  debug: boolean
): void {
  for (const diagnostic of diagnostics) {
    if (!debug && DIAGNOSTIC_SEVERITY[diagnostic.code] !== 'warn') continue;
    process.stderr.write(`[schema-rules] ${formatDiagnostic(diagnostic)}\n`);
  }
}
