export const DIAGNOSTIC_CODES = {
  VALIDATOR_NOT_FOUND: 'VALIDATOR_NOT_FOUND',
  PROPERTY_NOT_FOUND: 'PROPERTY_NOT_FOUND',
  PROPERTY_UNREACHABLE: 'PROPERTY_UNREACHABLE',
  RULE_SKIPPED_CONDITIONAL: 'RULE_SKIPPED_CONDITIONAL',
  CONTRADICTORY_BOUNDS: 'CONTRADICTORY_BOUNDS',
  SCHEMA_MATERIALIZED: 'SCHEMA_MATERIALIZED',
  SCHEMA_REMOVED: 'SCHEMA_REMOVED',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export const DIAGNOSTIC_SEVERITY: Record<DiagnosticCode, 'info' | 'warn'> = {
  VALIDATOR_NOT_FOUND: 'info',
  PROPERTY_NOT_FOUND: 'warn',
  PROPERTY_UNREACHABLE: 'info',
  RULE_SKIPPED_CONDITIONAL: 'info',
  CONTRADICTORY_BOUNDS: 'warn',
  SCHEMA_MATERIALIZED: 'info',
  SCHEMA_REMOVED: 'info',
};
