/**
 * Tree-model adapter (JSON Schema draft-07).
 *
 * Nested schemas are usually inline and editable; `$ref` properties and
 * boolean schemas come back as empty nodes. Exclusive bounds use the numeric
 * draft-07 `exclusiveMinimum` / `exclusiveMaximum`; nullability is a `"null"`
 * member of `type`.
 */

import type {
  JSONSchema7,
  JSONSchema7Definition,
  JSONSchema7TypeName,
} from 'json-schema';
import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import { NOOP_DIAGNOSTICS, type DiagnosticSink } from '../diag/collector.js';
import {
  jsonSchemaRefToId,
  type JsonSchemaGenerator,
  type JsonSchemaStore,
} from '../generator/json-schema-generator.js';
import {
  higherBound,
  lowerBound,
  mergeConstraints,
  type Bound,
  type ConstraintSet,
} from '../rules/constraint-set.js';
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

function typeList(schema: JSONSchema7): JSONSchema7TypeName[] {
  if (schema.type === undefined) return [];
  return Array.isArray(schema.type) ? schema.type : [schema.type];
}

function bound(value: number | undefined, exclusive: boolean): Bound | undefined {
  return value === undefined ? undefined : { value: toDecimal(value), exclusive };
}

export class JsonSchemaConstraintTarget implements ConstraintTarget {
  constructor(private readonly schema: JSONSchema7) {}

  get dataType(): DataType | undefined {
    for (const type of typeList(this.schema)) {
      if (type !== 'null') return type;
    }
    return undefined;
  }

  read(): ConstraintSet {
    const s = this.schema;
    const types = typeList(s);
    const set: ConstraintSet = {};
    if (types.length > 0 && !types.includes('null')) set.nonNullable = true;
    if (s.minLength !== undefined) set.minLength = s.minLength;
    if (s.maxLength !== undefined) set.maxLength = s.maxLength;
    if (s.minItems !== undefined) set.minItems = s.minItems;
    if (s.maxItems !== undefined) set.maxItems = s.maxItems;
    if (s.pattern !== undefined) set.pattern = s.pattern;
    if (Array.isArray(s.enum)) set.enumValues = s.enum.filter(isScalar);
    // Both forms may be present on hand-written schemas; the tighter wins
    return mergeConstraints(set, {
      minimum: higherBound(
        bound(s.minimum, false),
        bound(s.exclusiveMinimum, true)
      ),
      maximum: lowerBound(
        bound(s.maximum, false),
        bound(s.exclusiveMaximum, true)
      ),
    });
  }

  write(set: ConstraintSet): void {
    const s = this.schema;
    if (set.nonNullable) {
      const [first, ...rest] = typeList(s).filter((type) => type !== 'null');
      if (first !== undefined) s.type = rest.length > 0 ? [first, ...rest] : first;
    }
    if (set.minLength !== undefined) s.minLength = set.minLength;
    if (set.maxLength !== undefined) s.maxLength = set.maxLength;
    if (set.minItems !== undefined) s.minItems = set.minItems;
    if (set.maxItems !== undefined) s.maxItems = set.maxItems;
    if (set.minimum) {
      const value = decimalToNumber(set.minimum.value);
      if (set.minimum.exclusive) {
        s.exclusiveMinimum = value;
        delete s.minimum;
      } else {
        s.minimum = value;
        delete s.exclusiveMinimum;
      }
    }
    if (set.maximum) {
      const value = decimalToNumber(set.maximum.value);
      if (set.maximum.exclusive) {
        s.exclusiveMaximum = value;
        delete s.maximum;
      } else {
        s.maximum = value;
        delete s.exclusiveMaximum;
      }
    }
    if (set.pattern !== undefined) s.pattern = set.pattern;
    if (set.enumValues !== undefined) s.enum = [...set.enumValues];
  }
}

/** `$ref`, or a composition such as `{ oneOf: [{ type: 'null' }, $ref] }`. */
function isReferenceLike(schema: JSONSchema7): boolean {
  if (typeof schema.$ref === 'string') return true;
  if (schema.type !== undefined) return false;
  const members: JSONSchema7Definition[] = [
    ...(schema.allOf ?? []),
    ...(schema.oneOf ?? []),
    ...(schema.anyOf ?? []),
  ];
  return members.some(
    (member) => typeof member === 'object' && typeof member.$ref === 'string'
  );
}

export class JsonSchemaContext implements SchemaContext {
  constructor(
    readonly typeName: string,
    readonly schema: JSONSchema7,
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
    if (isReferenceLike(property)) return emptyNode(key, 'reference');
    return concreteNode(key, new JsonSchemaConstraintTarget(property));
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

export interface JsonSchemaProviderParams {
  store: JsonSchemaStore;
  generator: JsonSchemaGenerator;
  diagnostics?: DiagnosticSink;
}

/**
 * Fetch-or-create over `definitions`. A type missing from the store is
 * generated and registered there.
 */
export class JsonSchemaProvider implements SchemaProvider {
  readonly store: JsonSchemaStore;
  readonly generator: JsonSchemaGenerator;
  private readonly diagnostics: DiagnosticSink;

  constructor(params: JsonSchemaProviderParams) {
    this.store = params.store;
    this.generator = params.generator;
    this.diagnostics = params.diagnostics ?? NOOP_DIAGNOSTICS;
  }

  getSchemaForType(typeName: string): JsonSchemaContext {
    const id = this.generator.naming.schemaIdSelector(typeName);
    if (!this.store.has(id)) {
      this.store.set(id, this.generator.generateSchema(typeName, this.store));
      this.diagnostics.report({
        code: DIAGNOSTIC_CODES.SCHEMA_MATERIALIZED,
        typeName,
        details: { id },
      });
    }
    return new JsonSchemaContext(typeName, this.resolve(id), this);
  }

  private resolve(id: string): JSONSchema7 {
    let current = this.store.get(id);
    for (let hops = 0; hops <= this.store.size; hops += 1) {
      if (current === undefined) break;
      if (typeof current.$ref !== 'string') return current;
      const next = jsonSchemaRefToId(current.$ref);
      current = next === undefined ? undefined : this.store.get(next);
    }
    return {};
  }
}
