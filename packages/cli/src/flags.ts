import {
  ConfigError,
  type ManifestNaming,
  type ManifestOptions,
} from '@schema-rules/core';

export type SchemaModel = 'openapi' | 'json-schema';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  manifest: string;
  model?: string;
  naming?: string;
  oneValidatorPerType?: string | boolean;
  useReferences?: boolean;
  debug?: boolean;
}

export function resolveModel(value: string | undefined): SchemaModel {
  const normalized = (value ?? 'openapi').trim().toLowerCase();
  if (normalized === 'openapi' || normalized === 'oas') return 'openapi';
  if (normalized === 'json-schema' || normalized === 'jsonschema') {
    return 'json-schema';
  }
  throw new ConfigError({
    message: `Invalid --model "${value}". Expected openapi|json-schema`,
    context: { setting: 'model', value },
  });
}

export function resolveNaming(
  value: string | undefined
): ManifestNaming | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'identity') return 'identity';
  if (normalized === 'camel' || normalized === 'camelcase') return 'camel';
  throw new ConfigError({
    message: `Invalid --naming "${value}". Expected identity|camel`,
    context: { setting: 'naming', value },
  });
}

export function parseBooleanFlag(
  value: string | boolean | undefined,
  setting: string
): boolean | undefined {
  if (value === undefined || typeof value === 'boolean') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError({
    message: `Invalid --${setting} "${value}". Expected true|false`,
    context: { setting, value },
  });
}

/**
 * Manifest options overridden on the command line. Unset flags leave the
 * manifest's own values in place.
 */
export function parseManifestOverrides(options: CliOptions): ManifestOptions {
  return {
    naming: resolveNaming(options.naming),
    oneValidatorPerType: parseBooleanFlag(
      options.oneValidatorPerType,
      'one-validator-per-type'
    ),
  };
}
