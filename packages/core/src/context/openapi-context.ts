/**
 * Reference-model adapter (OpenAPI 3.0).
 *
 * Object and enum properties are `$ref` pointers into components.schemas;
 * they surface as empty nodes. Exclusive bounds use the boolean
 * `exclusiveMinimum` / `exclusiveMaximum` flags of OpenAPI 3.0.
 */

import type { OpenAPIV3 } from 'openapi-types';
import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import { NOOP_DIAGNOSTICS, type DiagnosticSink } from '../diag/collector.js';
import {
  isReferenceObject,
  openApiRefToId,
  type OpenApiSchemaGenerator,
  type OpenApiSchemaStore,
} from '../generator/openapi-generator.js';
import type { Bound, ConstraintSet } from '../rules/constraint-set.js';
import { isScalar } from '../types/rules.js';
import { decimalToNumber, toDecimal } from '../util/decimal.js';
import type { SchemaContext, SchemaProvider } from './schema-context.js';
import {
  concreteNode,
  emptyNode,
  type ConstraintTarget,
  type DataType,
  type SchemaNode,
} from './schema-node.js';

function readBound(
  value: number | undefined,
  exclusive: boolean | undefined
): Bound | undefined {
  return value === undefined
    ? undefined
    : { value: toDecimal(value), exclusive: exclusive === true };
}

export class OpenApiConstraintTarget implements ConstraintTarget {
  constructor(private readonly schema: OpenAPIV3.SchemaObject) {}

  get dataType(): DataType | undefined {
    return this.schema.type;
  }

  read(): ConstraintSet {
    const s = this.schema;
    const set: ConstraintSet = {};
    if (s.nullable === false) set.nonNullable = true;
    if (s.minLength !== undefined) set.minLength = s.minLength;
    if (s.maxLength !== undefined) set.maxLength = s.maxLength;
    if (s.minItems !== undefined) set.minItems = s.minItems;
    if (s.maxItems !== undefined) set.maxItems = s.maxItems;
    const minimum = readBound(s.minimum, s.exclusiveMinimum);
    if (minimum) set.minimum = minimum;
    const maximum = readBound(s.maximum, s.exclusiveMaximum);
    if (maximum) set.maximum = maximum;
    if (s.pattern !== undefined) set.pattern = s.pattern;
    if (Array.isArray(s.enum)) set.enumValues = s.enum.filter(isScalar);
    return set;
  }

  write(set: ConstraintSet): void {
    const s = this.schema;
    if (set.nonNullable) s.nullable = false;
    if (set.minLength !== undefined) s.minLength = set.minLength;
    if (set.maxLength !== undefined) s.maxLength = set.maxLength;
    if (set.minItems !== undefined) s.minItems = set.minItems;
    if (set.maxItems !== undefined) s.maxItems = set.maxItems;
    if (set.minimum) {
      s.minimum = decimalToNumber(set.minimum.value);
      if (set.minimum.exclusive) s.exclusiveMinimum = true;
      else delete s.exclusiveMinimum;
    }
    if (set.maximum) {
      s.maximum = decimalToNumber(set.maximum.value);
      if (set.maximum.exclusive) s.exclusiveMaximum = true;
      else delete s.exclusiveMaximum;
    }
    if (set.pattern !== undefined) s.pattern = set.pattern;
    if (set.enumValues !== undefined) s.enum = [...set.enumValues];
  }
}

/** A wrapper such as `{ allOf: [$ref], nullable: true }`. */
function isReferenceWrapper(schema: OpenAPIV3.SchemaObject): boolean {
  if (schema.type !== undefined) return false;
  const members = [
    ...(schema.allOf ?? []),
    ...(schema.oneOf ?? []),
    ...(schema.anyOf ?? []),
  ];
  return members.some(isReferenceObject);
}

export class OpenApiSchemaContext implements SchemaContext {
  constructor(
    readonly typeName: string,
    readonly schema: OpenAPIV3.SchemaObject,
    private readonly provider: SchemaProvider
  ) {}

  propertyKeys(): string[] {
    return Object.keys(this.schema.properties ?? {});
  }

  getPropertyNode(key: string): SchemaNode {
    const properties = this.schema.properties;
    if (!properties || !Object.prototype.hasOwnProperty.call(properties, key)) {
      return emptyNode(key, 'missing');
    }
    const property = properties[key];
    if (
      typeof property !== 'object' ||
      property === null ||
      Array.isArray(property)
    ) {
      return emptyNode(key, 'shape');
    }
    if (isReferenceObject(property) || isReferenceWrapper(property)) {
      return emptyNode(key, 'reference');
    }
    return concreteNode(key, new OpenApiConstraintTarget(property));
  }

  markRequired(key: string): void {
    const required = this.schema.required ?? [];
    if (!required.includes(key)) required.push(key);
    this.schema.required = required;
  }

  isRequired(key: string): boolean {
    return this.schema.required?.includes(key) ?? false;
  }

  getSchemaForType(typeName: string): SchemaContext {
    return this.provider.getSchemaForType(typeName);
  }
}

export interface OpenApiSchemaProviderParams {
  store: OpenApiSchemaStore;
  generator: OpenApiSchemaGenerator;
  diagnostics?: DiagnosticSink;
}

/**
 * Fetch-or-create over components.schemas. A type missing from the store is
 * generated into it, which is the side effect the materialization tracker
 * accounts for.
 */
export class OpenApiSchemaProvider implements SchemaProvider {
  readonly store: OpenApiSchemaStore;
  readonly generator: OpenApiSchemaGenerator;
  private readonly diagnostics: DiagnosticSink;

  constructor(params: OpenApiSchemaProviderParams) {
    this.store = params.store;
    this.generator = params.generator;
    this.diagnostics = params.diagnostics ?? NOOP_DIAGNOSTICS;
  }

  getSchemaForType(typeName: string): OpenApiSchemaContext {
    const id = this.generator.naming.schemaIdSelector(typeName);
    if (!this.store.has(id)) {
      this.generator.generateSchema(typeName, this.store);
      this.diagnostics.report({
        code: DIAGNOSTIC_CODES.SCHEMA_MATERIALIZED,
        typeName,
        details: { id },
      });
    }
    return new OpenApiSchemaContext(typeName, this.resolve(id), this);
  }

  /** Follow store-local references; anything unresolvable reads as `{}`. */
  private resolve(id: string): OpenAPIV3.SchemaObject {
    let current = this.store.get(id);
    for (let hops = 0; hops <= this.store.size; hops += 1) {
      if (current === undefined) break;
      if (!isReferenceObject(current)) return current;
      const next = openApiRefToId(current.$ref);
      current = next === undefined ? undefined : this.store.get(next);
    }
    return {};
  }
}
