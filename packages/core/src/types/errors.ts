/**
 * Error hierarchy for schema-rules
 * Structured errors with a stable code and context
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

export interface ErrorContext {
  typeName?: string; // Reflected type the error relates to
  property?: string; // Reflected property name
  setting?: string; // Option name for configuration errors
  pointer?: string; // JSON Pointer inside a manifest or document
  value?: unknown; // Problematic value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  pointer?: string;
}

export interface ErrorParams {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all schema-rules errors
 */
export abstract class SchemaRulesError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const {
      message,
      errorCode,
      severity = 'error',
      context,
      cause,
    } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and context values
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#stripValues(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Minimal structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      pointer: this.context?.pointer,
    };
  }

  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #stripValues(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return rest;
  }
}

/**
 * Configuration and setup errors (bad options, unknown catalog types)
 */
export class ConfigError extends SchemaRulesError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Manifest and document parsing errors
 */
export class ParseError extends SchemaRulesError {
  public readonly issues: readonly ParseIssue[];

  constructor(params: ErrorParams & { issues?: readonly ParseIssue[] }) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR });
    this.issues = params.issues ?? [];
  }
}

export interface ParseIssue {
  pointer: string;
  message: string;
  keyword?: string;
}

/**
 * Misuse of the snapshot/cleanup protocol. This is a programming error in
 * the host integration and is the only error raised toward the host while
 * a document is being generated.
 */
export class MaterializationProtocolError extends SchemaRulesError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode:
        params.errorCode ?? ErrorCode.MATERIALIZATION_PROTOCOL_VIOLATION,
    });
  }
}

export function isSchemaRulesError(error: unknown): error is SchemaRulesError {
  return error instanceof SchemaRulesError;
}
