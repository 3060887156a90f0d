/**
 * ErrorPresenter - pure presentation layer for SchemaRulesError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import {
  ParseError,
  type ErrorContext,
  type SchemaRulesError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  /** Parse issues listed in the CLI view (default: 10) */
  maxIssues?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  /** One line per parse issue: "<pointer>: <message>" */
  issues: string[];
  hint?: string;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError;

const DEFAULT_REDACT_KEYS = ['password', 'apiKey', 'secret', 'token'];

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: SchemaRulesError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      issues: this.#formatIssues(error),
      hint: this.#formatHint(error.context),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForProduction(error: SchemaRulesError): ProductionView {
    return this.#applyAdditionalRedaction(error.toJSON('prod'));
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.pointer) return `Location: ${ctx.pointer}`;
    if (ctx.typeName) {
      return ctx.property
        ? `Type: ${ctx.typeName}.${ctx.property}`
        : `Type: ${ctx.typeName}`;
    }
    return ctx.setting ? `Option: ${ctx.setting}` : undefined;
  }

  #formatIssues(error: SchemaRulesError): string[] {
    if (!(error instanceof ParseError)) return [];
    const max = this.options.maxIssues ?? 10;
    const lines = error.issues
      .slice(0, max)
      .map((issue) => `${issue.pointer}: ${issue.message}`);
    if (error.issues.length > max) {
      lines.push(`... ${error.issues.length - max} more`);
    }
    return lines;
  }

  #formatHint(ctx?: ErrorContext): string | undefined {
    const hint = ctx?.hint;
    return typeof hint === 'string' ? hint : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const redactor = (val: unknown): unknown => {
      if (Array.isArray(val)) return val.map(redactor);
      if (val && typeof val === 'object') {
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
        }
        return out;
      }
      return val;
    };
    if (!view.context) return view;
    const context: ErrorContext = {};
    for (const [k, v] of Object.entries(view.context)) {
      context[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
    }
    return { ...view, context };
  }
}
