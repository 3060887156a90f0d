/**
 * Error Code Infrastructure
 * Stable error codes and their CLI exit codes.
 */

export type Severity = 'info' | 'warn' | 'error';

export enum ErrorCode {
  // Configuration Errors (E100–E199)
  CONFIGURATION_ERROR = 'E100',
  UNKNOWN_TYPE = 'E101',

  // Parse Errors (E200–E299)
  PARSE_ERROR = 'E200',
  MANIFEST_INVALID = 'E201',

  // Protocol Errors (E300–E399)
  MATERIALIZATION_PROTOCOL_VIOLATION = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

export const EXIT_CODES = {
  [ErrorCode.CONFIGURATION_ERROR]: 10,
  [ErrorCode.UNKNOWN_TYPE]: 11,
  [ErrorCode.PARSE_ERROR]: 20,
  [ErrorCode.MANIFEST_INVALID]: 21,
  [ErrorCode.MATERIALIZATION_PROTOCOL_VIOLATION]: 30,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
