/**
 * Manifest loading: JSON text -> validated Manifest.
 *
 * Structural checks run through ajv against MANIFEST_SCHEMA; cross-reference
 * checks (unknown type names, duplicate declarations, invalid patterns,
 * numeric parameters out of range) follow. Every failure is reported as a
 * ParseIssue with a JSON Pointer.
 */

import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';
import type {
  BuildOpenApiParams,
  OperationDeclaration,
  ValidatorDeclaration,
} from '../api.js';
import { ErrorCode } from '../errors/codes.js';
import type { PropertyType, TypeDescriptor } from '../types/catalog.js';
import { ConfigError, ParseError, type ParseIssue } from '../types/errors.js';
import type { SchemaGenerationOptions } from '../types/options.js';
import type { NumericParam, Rule } from '../types/rules.js';
import { err, ok, type Result } from '../types/result.js';
import { toDecimal } from '../util/decimal.js';
import { NameResolvers } from '../util/naming.js';
import { MANIFEST_SCHEMA } from './manifest-schema.js';

export type ManifestNaming = 'identity' | 'camel';

export interface ManifestOptions {
  oneValidatorPerType?: boolean;
  naming?: ManifestNaming;
  emailPattern?: string;
  skipConditionalRules?: boolean;
}

export interface Manifest {
  info?: { title: string; version: string };
  options?: ManifestOptions;
  types: TypeDescriptor[];
  validators?: ValidatorDeclaration[];
  roots?: string[];
  operations?: OperationDeclaration[];
}

let compiled: ValidateFunction<Manifest> | undefined;

function manifestValidator(): ValidateFunction<Manifest> {
  if (!compiled) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    compiled = ajv.compile<Manifest>(MANIFEST_SCHEMA);
  }
  return compiled;
}

function toIssue(error: ErrorObject): ParseIssue {
  return {
    pointer: error.instancePath === '' ? '/' : error.instancePath,
    message: error.message ?? 'is invalid',
    keyword: error.keyword,
  };
}

function invalid(issues: ParseIssue[]): ParseError {
  const first = issues[0];
  return new ParseError({
    message: first
      ? `Manifest is invalid at ${first.pointer}: ${first.message}`
      : 'Manifest is invalid',
    errorCode: ErrorCode.MANIFEST_INVALID,
    context: { pointer: first?.pointer },
    issues,
  });
}

/**
 * Validate an already parsed manifest.
 */
export function loadManifest(input: unknown): Result<Manifest, ParseError> {
  const validate = manifestValidator();
  if (!validate(input)) {
    return err(invalid((validate.errors ?? []).map(toIssue)));
  }
  const issues = crossCheck(input);
  return issues.length > 0 ? err(invalid(issues)) : ok(input);
}

/**
 * Parse manifest JSON text, then validate it.
 */
export function parseManifest(text: string): Result<Manifest, ParseError> {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (error) {
    return err(
      new ParseError({
        message: 'Manifest is not valid JSON',
        context: { pointer: '/' },
        cause: error instanceof Error ? error : undefined,
        issues: [
          {
            pointer: '/',
            message: error instanceof Error ? error.message : String(error),
          },
        ],
      })
    );
  }
  return loadManifest(input);
}

function crossCheck(manifest: Manifest): ParseIssue[] {
  const issues: ParseIssue[] = [];
  const known = new Set<string>();

  manifest.types.forEach((type, index) => {
    if (known.has(type.name)) {
      issues.push({
        pointer: `/types/${index}/name`,
        message: `duplicate type "${type.name}"`,
      });
    }
    known.add(type.name);
  });

  const requireType = (name: string, pointer: string): void => {
    if (!known.has(name)) {
      issues.push({ pointer, message: `unknown type "${name}"` });
    }
  };

  const checkPropertyType = (type: PropertyType, pointer: string): void => {
    if (type.kind === 'ref') requireType(type.name, `${pointer}/name`);
    if (type.kind === 'array') checkPropertyType(type.items, `${pointer}/items`);
  };

  manifest.types.forEach((type, index) => {
    if (type.kind !== 'object') return;
    for (const [name, property] of Object.entries(type.properties)) {
      checkPropertyType(
        property,
        `/types/${index}/properties/${escapePointer(name)}`
      );
    }
  });

  manifest.validators?.forEach((validator, index) => {
    requireType(validator.typeName, `/validators/${index}/typeName`);
    validator.properties.forEach((entry, propertyIndex) => {
      entry.rules.forEach((rule, ruleIndex) => {
        const pointer = `/validators/${index}/properties/${propertyIndex}/rules/${ruleIndex}`;
        if (rule.kind === 'matches') {
          const message = regexProblem(rule.pattern);
          if (message !== undefined) {
            issues.push({ pointer: `${pointer}/pattern`, message, keyword: 'pattern' });
          }
        }
        for (const [name, value] of numericParams(rule)) {
          const message = numericProblem(value);
          if (message !== undefined) {
            issues.push({ pointer: `${pointer}/${name}`, message });
          }
        }
      });
    });
  });

  manifest.roots?.forEach((root, index) => requireType(root, `/roots/${index}`));

  manifest.operations?.forEach((operation, index) => {
    const base = `/operations/${index}`;
    if (operation.queryType !== undefined) {
      requireType(operation.queryType, `${base}/queryType`);
    }
    if (operation.requestBodyType !== undefined) {
      requireType(operation.requestBodyType, `${base}/requestBodyType`);
    }
    if (operation.responseType !== undefined) {
      requireType(operation.responseType, `${base}/responseType`);
    }
    operation.parameters?.forEach((parameter, parameterIndex) =>
      checkPropertyType(
        parameter.type,
        `${base}/parameters/${parameterIndex}/type`
      )
    );
  });

  return issues;
}

function regexProblem(pattern: string): string | undefined {
  try {
    new RegExp(pattern, 'u');
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : 'invalid pattern';
  }
}

function numericParams(rule: Rule): Array<[string, NumericParam]> {
  switch (rule.kind) {
    case 'greaterThan':
    case 'greaterThanOrEqual':
    case 'lessThan':
    case 'lessThanOrEqual':
      return [['value', rule.value]];
    case 'inclusiveBetween':
    case 'exclusiveBetween':
      return [
        ['from', rule.from],
        ['to', rule.to],
      ];
    default:
      return [];
  }
}

function numericProblem(value: NumericParam): string | undefined {
  try {
    toDecimal(value);
    return undefined;
  } catch (error) {
    if (error instanceof ConfigError) return error.message;
    throw error;
  }
}

function escapePointer(segment: string): string {
  return segment.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Generation options declared by the manifest, with `overrides` (from the
 * command line) taking precedence.
 */
export function manifestGenerationOptions(
  manifest: Manifest,
  overrides: ManifestOptions = {}
): Partial<SchemaGenerationOptions> {
  const merged: ManifestOptions = { ...manifest.options };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return {
    oneValidatorPerType: merged.oneValidatorPerType,
    nameResolver:
      merged.naming === 'camel'
        ? NameResolvers.camelCase
        : merged.naming === 'identity'
          ? NameResolvers.identity
          : undefined,
    emailPattern: merged.emailPattern,
    skipConditionalRules: merged.skipConditionalRules,
  };
}

/** Facade parameters for a validated manifest. */
export function manifestBuildParams(
  manifest: Manifest,
  overrides: ManifestOptions = {}
): BuildOpenApiParams {
  return {
    types: manifest.types,
    validators: manifest.validators,
    roots: manifest.roots,
    operations: manifest.operations,
    info: manifest.info,
    options: manifestGenerationOptions(manifest, overrides),
  };
}
