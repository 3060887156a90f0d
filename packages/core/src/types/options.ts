/**
 * Configuration options for rule-to-schema augmentation
 *
 * All options are optional; resolveOptions() fills the defaults and rejects
 * values of the wrong shape.
 */

import { ConfigError } from './errors.js';
import { NameResolvers, type NameResolver } from '../util/naming.js';

export type SchemaIdSelector = (typeName: string) => string;

export interface SchemaGenerationOptions {
  /**
   * Only the first validator found for a type is used (default: true).
   * Unkeyed validators come before keyed ones.
   */
  oneValidatorPerType: boolean;
  /** Maps reflected property names to schema property keys (default: identity) */
  nameResolver: NameResolver;
  /** Store identifier for a type (default: the type name) */
  schemaIdSelector: SchemaIdSelector;
  /** Pattern written for emailAddress rules */
  emailPattern: string;
  /** Skip rules that only apply under a runtime condition (default: true) */
  skipConditionalRules: boolean;
}

export type ResolvedOptions = Readonly<SchemaGenerationOptions>;

export const DEFAULT_EMAIL_PATTERN = '^[^@\\s]+@[^@\\s]+$';

export const DEFAULT_OPTIONS: ResolvedOptions = {
  oneValidatorPerType: true,
  nameResolver: NameResolvers.identity,
  schemaIdSelector: (typeName) => typeName,
  emailPattern: DEFAULT_EMAIL_PATTERN,
  skipConditionalRules: true,
};

export function resolveOptions(
  userOptions: Partial<SchemaGenerationOptions> = {}
): ResolvedOptions {
  const resolved: SchemaGenerationOptions = { ...DEFAULT_OPTIONS };
  // Explicit undefined keeps the default
  for (const [key, value] of Object.entries(userOptions)) {
    if (value !== undefined) {
      Object.assign(resolved, { [key]: value });
    }
  }
  validateOptions(resolved);
  return Object.freeze(resolved);
}

function validateOptions(options: SchemaGenerationOptions): void {
  const booleans = ['oneValidatorPerType', 'skipConditionalRules'] as const;
  for (const setting of booleans) {
    if (typeof options[setting] !== 'boolean') {
      throw invalid(setting, 'must be a boolean', options[setting]);
    }
  }

  const functions = ['nameResolver', 'schemaIdSelector'] as const;
  for (const setting of functions) {
    if (typeof options[setting] !== 'function') {
      throw invalid(setting, 'must be a function', options[setting]);
    }
  }

  if (typeof options.emailPattern !== 'string') {
    throw invalid('emailPattern', 'must be a string', options.emailPattern);
  }
  try {
    new RegExp(options.emailPattern, 'u');
  } catch (error) {
    throw invalid(
      'emailPattern',
      'must be a valid regular expression',
      options.emailPattern,
      error instanceof Error ? error : undefined
    );
  }
}

function invalid(
  setting: string,
  problem: string,
  value: unknown,
  cause?: Error
): ConfigError {
  return new ConfigError({
    message: `Invalid option "${setting}": ${problem}`,
    context: { setting, value },
    cause,
  });
}
