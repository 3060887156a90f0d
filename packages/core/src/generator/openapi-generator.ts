/**
 * Reference-model generator (OpenAPI 3.0).
 *
 * Object and enum types are always registered in the store
 * (components.schemas) and used through `$ref`; only primitives and arrays
 * are inline. Registered hooks run once per generated type schema.
 */

import type { OpenAPIV3 } from 'openapi-types';
import type { EnumTypeDescriptor, PropertyType } from '../types/catalog.js';
import {
  DEFAULT_OPTIONS,
  type ResolvedOptions,
} from '../types/options.js';
import { pointerRef, pointerRefResolver, SchemaStore } from '../store/schema-store.js';
import type { TypeCatalog } from './type-catalog.js';

export type OpenApiSchema = OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject;
export type OpenApiSchemaStore = SchemaStore<OpenApiSchema>;

export const OPENAPI_REF_PREFIX = '#/components/schemas/';
export const openApiRefToId = pointerRefResolver(OPENAPI_REF_PREFIX);

export function openApiRef(id: string): OpenAPIV3.ReferenceObject {
  return { $ref: pointerRef(OPENAPI_REF_PREFIX, id) };
}

export function isReferenceObject(
  schema: unknown
): schema is OpenAPIV3.ReferenceObject {
  return (
    typeof schema === 'object' &&
    schema !== null &&
    '$ref' in schema &&
    typeof schema.$ref === 'string'
  );
}

export interface OpenApiSchemaHookContext {
  typeName: string;
  schema: OpenAPIV3.SchemaObject;
  store: OpenApiSchemaStore;
  generator: OpenApiSchemaGenerator;
}

export type OpenApiSchemaHook = (context: OpenApiSchemaHookContext) => void;

export type GeneratorNaming = Pick<
  ResolvedOptions,
  'nameResolver' | 'schemaIdSelector'
>;

export class OpenApiSchemaGenerator {
  readonly #hooks: OpenApiSchemaHook[] = [];

  constructor(
    readonly catalog: TypeCatalog,
    readonly naming: GeneratorNaming = DEFAULT_OPTIONS
  ) {}

  addHook(hook: OpenApiSchemaHook): this {
    this.#hooks.push(hook);
    return this;
  }

  /**
   * Register the schema of a named type (and of the types it uses) in the
   * store and return a reference to it. Existing entries are reused.
   */
  generateSchema(
    typeName: string,
    store: OpenApiSchemaStore
  ): OpenAPIV3.ReferenceObject {
    const id = this.naming.schemaIdSelector(typeName);
    if (store.has(id)) return openApiRef(id);

    const descriptor = this.catalog.get(typeName);
    if (descriptor.kind === 'enum') {
      store.set(id, enumSchema(descriptor));
      return openApiRef(id);
    }

    const properties: Record<string, OpenApiSchema> = {};
    const schema: OpenAPIV3.SchemaObject = { type: 'object', properties };
    // Registered before the members so self references resolve to it
    store.set(id, schema);
    for (const [name, type] of Object.entries(descriptor.properties)) {
      properties[this.naming.nameResolver(name)] = this.generatePropertySchema(
        type,
        store
      );
    }

    for (const hook of this.#hooks) {
      hook({ typeName, schema, store, generator: this });
    }
    return openApiRef(id);
  }

  generatePropertySchema(
    type: PropertyType,
    store: OpenApiSchemaStore
  ): OpenApiSchema {
    switch (type.kind) {
      case 'ref': {
        const ref = this.generateSchema(type.name, store);
        return type.nullable ? { allOf: [ref], nullable: true } : ref;
      }
      case 'array':
        return withNullable(
          { type: 'array', items: this.generatePropertySchema(type.items, store) },
          type.nullable
        );
      default:
        return withNullable(
          type.format ? { type: type.kind, format: type.format } : { type: type.kind },
          type.nullable
        );
    }
  }
}

function withNullable(
  schema: OpenAPIV3.SchemaObject,
  nullable: boolean | undefined
): OpenAPIV3.SchemaObject {
  return nullable ? { ...schema, nullable: true } : schema;
}

function enumSchema(descriptor: EnumTypeDescriptor): OpenAPIV3.SchemaObject {
  const values = descriptor.values.filter((value) => value !== null);
  const allIntegers =
    values.length > 0 &&
    values.every((value) => typeof value === 'number' && Number.isInteger(value));
  return {
    type: allIntegers ? 'integer' : 'string',
    enum: [...descriptor.values],
  };
}
