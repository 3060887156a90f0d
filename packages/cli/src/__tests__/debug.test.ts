import { afterEach, describe, expect, it, vi } from 'vitest';
import type { DiagnosticEnvelope } from '@schema-rules/core';
import { printDiagnostics } from '../debug.js';

const diagnostics: DiagnosticEnvelope[] = [
  { code: 'VALIDATOR_NOT_FOUND', typeName: 'Order' },
  { code: 'PROPERTY_NOT_FOUND', typeName: 'Order', property: 'Total' },
];

describe('printDiagnostics', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints only warnings by default', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    printDiagnostics(diagnostics, false);
    expect(spy.mock.calls.map((call) => String(call[0]))).toEqual([
      '[schema-rules] warn PROPERTY_NOT_FOUND Order.Total\n',
    ]);
  });

  it('prints every diagnostic in debug mode', () => {
    const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    printDiagnostics(diagnostics, true);
    expect(spy.mock.calls.map((call) => String(call[0]))).toEqual([
      '[schema-rules] info VALIDATOR_NOT_FOUND Order\n',
      '[schema-rules] warn PROPERTY_NOT_FOUND Order.Total\n',
    ]);
  });
});
