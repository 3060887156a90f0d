/**
 * High-level facades: build a complete document from type descriptions and
 * validators with both host-generator stand-ins wired to the rule engine.
 */

import type { JSONSchema7 } from 'json-schema';
import type { OpenAPIV3 } from 'openapi-types';
import type { DiagnosticSink } from './diag/collector.js';
import {
  JsonSchemaGenerator,
  type JsonSchemaGeneratorSettings,
} from './generator/json-schema-generator.js';
import {
  OpenApiSchemaGenerator,
  type OpenApiSchema,
} from './generator/openapi-generator.js';
import { TypeCatalog } from './generator/type-catalog.js';
import {
  createOpenApiOperationHook,
  type ParameterDescription,
  type ParameterLocation,
} from './hooks/operation-hook.js';
import {
  createJsonSchemaHook,
  createOpenApiSchemaHook,
} from './hooks/schema-hooks.js';
import { ValidatorRegistry } from './registry/validator-registry.js';
import { RuleEngine } from './rules/rule-engine.js';
import { SchemaStore } from './store/schema-store.js';
import type {
  ObjectTypeDescriptor,
  PropertyType,
  TypeDescriptor,
} from './types/catalog.js';
import { ConfigError } from './types/errors.js';
import {
  resolveOptions,
  type SchemaGenerationOptions,
} from './types/options.js';
import type { TypeValidator } from './types/rules.js';

export type HttpMethod = 'get' | 'put' | 'post' | 'delete' | 'patch';

/** A validator with the registration key it is declared under, if any. */
export type ValidatorDeclaration = TypeValidator & { key?: string };

export interface ParameterDeclaration {
  name: string;
  in: ParameterLocation;
  type: PropertyType;
  required?: boolean;
}

export interface OperationDeclaration {
  operationId: string;
  method: HttpMethod;
  path: string;
  /** Object type whose members are bound as individual query parameters. */
  queryType?: string;
  parameters?: readonly ParameterDeclaration[];
  requestBodyType?: string;
  responseType?: string;
}

export interface BuildDocumentParams {
  types: readonly TypeDescriptor[];
  validators?: readonly ValidatorDeclaration[];
  /** Existing registry; `validators` are added to it. */
  registry?: ValidatorRegistry;
  /**
   * Types published in the document. Default: every object type, except
   * those bound only as an operation's `queryType`.
   */
  roots?: readonly string[];
  options?: Partial<SchemaGenerationOptions>;
  diagnostics?: DiagnosticSink;
}

export interface BuildOpenApiParams extends BuildDocumentParams {
  operations?: readonly OperationDeclaration[];
  info?: OpenAPIV3.InfoObject;
}

export interface BuildJsonSchemaParams extends BuildDocumentParams {
  settings?: JsonSchemaGeneratorSettings;
}

function createEngine(params: BuildDocumentParams): RuleEngine {
  const options = resolveOptions(params.options);
  const registry = params.registry ?? new ValidatorRegistry(options);
  for (const { key, ...validator } of params.validators ?? []) {
    registry.register(validator.typeName, validator, { key });
  }
  return new RuleEngine({ registry, options, diagnostics: params.diagnostics });
}

function rootTypes(
  params: BuildDocumentParams,
  operations: readonly OperationDeclaration[] = []
): readonly string[] {
  if (params.roots) return params.roots;

  // Query containers are materialized per operation and cleaned up again
  const queryOnly = new Set<string>();
  for (const operation of operations) {
    if (operation.queryType !== undefined) queryOnly.add(operation.queryType);
  }
  for (const operation of operations) {
    if (operation.requestBodyType !== undefined) {
      queryOnly.delete(operation.requestBodyType);
    }
    if (operation.responseType !== undefined) {
      queryOnly.delete(operation.responseType);
    }
  }
  return params.types
    .filter((type) => type.kind === 'object' && !queryOnly.has(type.name))
    .map((type) => type.name);
}

function objectType(catalog: TypeCatalog, name: string): ObjectTypeDescriptor {
  const descriptor = catalog.get(name);
  if (descriptor.kind !== 'object') {
    throw new ConfigError({
      message: `Type "${name}" is an enum and cannot bind parameters`,
      context: { typeName: name },
    });
  }
  return descriptor;
}

/**
 * OpenAPI 3.0 document (reference model) with rule-derived constraints on
 * component schemas and operation parameters.
 */
export function buildOpenApiDocument(
  params: BuildOpenApiParams
): OpenAPIV3.Document {
  const catalog = new TypeCatalog(params.types);
  const engine = createEngine(params);
  const generator = new OpenApiSchemaGenerator(catalog, engine.options);
  generator.addHook(createOpenApiSchemaHook(engine));

  const schemas: Record<string, OpenApiSchema> = {};
  const store = new SchemaStore(schemas);
  for (const root of rootTypes(params, params.operations)) {
    generator.generateSchema(root, store);
  }

  const operationHook = createOpenApiOperationHook(engine);
  const paths: OpenAPIV3.PathsObject = {};
  for (const declaration of params.operations ?? []) {
    const parameters: OpenAPIV3.ParameterObject[] = [];
    const descriptions: ParameterDescription[] = [];

    for (const parameter of declaration.parameters ?? []) {
      parameters.push({
        name: parameter.name,
        in: parameter.in,
        required: parameter.required ?? parameter.in === 'path',
        schema: generator.generatePropertySchema(parameter.type, store),
      });
      descriptions.push({ name: parameter.name, in: parameter.in });
    }

    if (declaration.queryType !== undefined) {
      const container = objectType(catalog, declaration.queryType);
      for (const [property, type] of Object.entries(container.properties)) {
        const name = engine.options.nameResolver(property);
        parameters.push({
          name,
          in: 'query',
          schema: generator.generatePropertySchema(type, store),
        });
        descriptions.push({
          name,
          in: 'query',
          containerType: container.name,
          propertyName: property,
        });
      }
    }

    const operation: OpenAPIV3.OperationObject = {
      operationId: declaration.operationId,
      parameters,
      responses: {
        '200':
          declaration.responseType === undefined
            ? { description: 'OK' }
            : {
                description: 'OK',
                content: {
                  'application/json': {
                    schema: generator.generateSchema(declaration.responseType, store),
                  },
                },
              },
      },
    };
    if (declaration.requestBodyType !== undefined) {
      operation.requestBody = {
        required: true,
        content: {
          'application/json': {
            schema: generator.generateSchema(declaration.requestBodyType, store),
          },
        },
      };
    }

    operationHook({ operation, parameters: descriptions, store, generator });

    const item: OpenAPIV3.PathItemObject = paths[declaration.path] ?? {};
    item[declaration.method] = operation;
    paths[declaration.path] = item;
  }

  return {
    openapi: '3.0.3',
    info: params.info ?? { title: 'schema-rules', version: '1.0.0' },
    paths,
    components: { schemas },
  };
}

/**
 * Draft-07 JSON Schema (tree model): each root type under `definitions`,
 * nested types inline unless `settings.useReferences` is set.
 */
export function buildJsonSchemaDocument(
  params: BuildJsonSchemaParams
): JSONSchema7 {
  const catalog = new TypeCatalog(params.types);
  const engine = createEngine(params);
  const generator = new JsonSchemaGenerator(
    catalog,
    engine.options,
    params.settings
  );
  generator.addHook(createJsonSchemaHook(engine));

  const definitions: Record<string, JSONSchema7> = {};
  const store = new SchemaStore(definitions);
  for (const root of rootTypes(params)) {
    const id = engine.options.schemaIdSelector(root);
    if (!store.has(id)) store.set(id, generator.generateSchema(root, store));
  }

  return {
    $schema: 'http://json-schema.org/draft-07/schema#',
    definitions,
  };
}
