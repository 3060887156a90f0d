/**
 * Tree-model generator (JSON Schema draft-07).
 *
 * Nested object and enum types are inlined into the owning schema. With
 * `useReferences`, or when a type refers back to itself, they are
 * registered in the store (`definitions`) and used through `$ref` instead.
 */

import type { JSONSchema7, JSONSchema7TypeName } from 'json-schema';
import type {
  EnumTypeDescriptor,
  ObjectTypeDescriptor,
  PropertyType,
} from '../types/catalog.js';
import { DEFAULT_OPTIONS } from '../types/options.js';
import {
  pointerRef,
  pointerRefResolver,
  type SchemaStore,
} from '../store/schema-store.js';
import type { GeneratorNaming } from './openapi-generator.js';
import type { TypeCatalog } from './type-catalog.js';

export type JsonSchemaStore = SchemaStore<JSONSchema7>;

export const JSON_SCHEMA_REF_PREFIX = '#/definitions/';
export const jsonSchemaRefToId = pointerRefResolver(JSON_SCHEMA_REF_PREFIX);

export function jsonSchemaRef(id: string): JSONSchema7 {
  return { $ref: pointerRef(JSON_SCHEMA_REF_PREFIX, id) };
}

export interface JsonSchemaHookContext {
  typeName: string;
  schema: JSONSchema7;
  store: JsonSchemaStore;
  generator: JsonSchemaGenerator;
}

export type JsonSchemaHook = (context: JsonSchemaHookContext) => void;

export interface JsonSchemaGeneratorSettings {
  /** Reference nested types through `definitions` (default: false) */
  useReferences?: boolean;
}

export class JsonSchemaGenerator {
  readonly #hooks: JsonSchemaHook[] = [];
  readonly #building = new Map<string, JSONSchema7>();

  constructor(
    readonly catalog: TypeCatalog,
    readonly naming: GeneratorNaming = DEFAULT_OPTIONS,
    readonly settings: JsonSchemaGeneratorSettings = {}
  ) {}

  addHook(hook: JsonSchemaHook): this {
    this.#hooks.push(hook);
    return this;
  }

  /**
   * Build the full schema of a named type. The result is not registered;
   * types it references through `$ref` are.
   */
  generateSchema(typeName: string, store: JsonSchemaStore): JSONSchema7 {
    const descriptor = this.catalog.get(typeName);
    return descriptor.kind === 'enum'
      ? enumSchema(descriptor)
      : this.#objectSchema(descriptor, store);
  }

  generatePropertySchema(
    type: PropertyType,
    store: JsonSchemaStore
  ): JSONSchema7 {
    switch (type.kind) {
      case 'ref': {
        const nested =
          this.settings.useReferences || this.#building.has(type.name)
            ? this.#reference(type.name, store)
            : this.generateSchema(type.name, store);
        if (!type.nullable) return nested;
        return nested.$ref
          ? { oneOf: [{ type: 'null' }, nested] }
          : withNullType(nested);
      }
      case 'array': {
        const schema: JSONSchema7 = {
          type: 'array',
          items: this.generatePropertySchema(type.items, store),
        };
        return type.nullable ? withNullType(schema) : schema;
      }
      default: {
        const schema: JSONSchema7 = type.format
          ? { type: type.kind, format: type.format }
          : { type: type.kind };
        return type.nullable ? withNullType(schema) : schema;
      }
    }
  }

  #objectSchema(
    descriptor: ObjectTypeDescriptor,
    store: JsonSchemaStore
  ): JSONSchema7 {
    const properties: Record<string, JSONSchema7> = {};
    const schema: JSONSchema7 = { type: 'object', properties };
    this.#building.set(descriptor.name, schema);
    try {
      for (const [name, type] of Object.entries(descriptor.properties)) {
        properties[this.naming.nameResolver(name)] =
          this.generatePropertySchema(type, store);
      }
    } finally {
      this.#building.delete(descriptor.name);
    }

    for (const hook of this.#hooks) {
      hook({ typeName: descriptor.name, schema, store, generator: this });
    }
    return schema;
  }

  #reference(typeName: string, store: JsonSchemaStore): JSONSchema7 {
    const id = this.naming.schemaIdSelector(typeName);
    if (!store.has(id)) {
      const inProgress = this.#building.get(typeName);
      if (inProgress) {
        store.set(id, inProgress);
      } else {
        // Placeholder first, so references back to this type stop here
        store.set(id, {});
        store.set(id, this.generateSchema(typeName, store));
      }
    }
    return jsonSchemaRef(id);
  }
}

function withNullType(schema: JSONSchema7): JSONSchema7 {
  const current = schema.type;
  if (current === undefined) return schema;
  const types: JSONSchema7TypeName[] = Array.isArray(current)
    ? [...current]
    : [current];
  if (!types.includes('null')) types.push('null');
  return { ...schema, type: types };
}

function enumSchema(descriptor: EnumTypeDescriptor): JSONSchema7 {
  const values = descriptor.values.filter((value) => value !== null);
  const allIntegers =
    values.length > 0 &&
    values.every(
      (value) => typeof value === 'number' && Number.isInteger(value)
    );
  return {
    type: allIntegers ? 'integer' : 'string',
    enum: [...descriptor.values],
  };
}
