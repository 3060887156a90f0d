import { describe, it, expect } from 'vitest';
import type { OpenAPIV3 } from 'openapi-types';
import {
  createOpenApiOperationHook,
  type ParameterDescription,
} from '../operation-hook.js';
import { createOpenApiSchemaHook } from '../schema-hooks.js';
import { DiagnosticCollector } from '../../diag/collector.js';
import {
  OpenApiSchemaGenerator,
  openApiRef,
  type OpenApiSchema,
} from '../../generator/openapi-generator.js';
import { TypeCatalog } from '../../generator/type-catalog.js';
import { RuleEngine } from '../../rules/rule-engine.js';
import { defineValidator } from '../../rules/validator-builder.js';
import { SchemaStore } from '../../store/schema-store.js';

interface SearchRequest {
  Query: string;
  Page: number;
  Sort: string;
}

const catalog = new TypeCatalog([
  {
    kind: 'object',
    name: 'SearchRequest',
    properties: {
      Query: { kind: 'string' },
      Page: { kind: 'integer' },
      Sort: { kind: 'ref', name: 'SortOrder' },
    },
  },
  { kind: 'enum', name: 'SortOrder', values: ['asc', 'desc'] },
]);

const searchValidator = defineValidator<SearchRequest>('SearchRequest', (v) => {
  v.ruleFor('Query').notEmpty().maximumLength(200);
  v.ruleFor('Page').greaterThan(0);
  v.ruleFor('Sort').notNull();
});

const descriptions: ParameterDescription[] = ['Query', 'Page', 'Sort'].map(
  (name): ParameterDescription => ({
    name,
    in: 'query',
    containerType: 'SearchRequest',
    propertyName: name,
  })
);

function searchOperation(
  responses: OpenAPIV3.ResponsesObject = { '200': { description: 'OK' } }
): OpenAPIV3.OperationObject {
  return {
    operationId: 'search',
    parameters: [
      { name: 'Query', in: 'query', schema: { type: 'string' } },
      { name: 'Page', in: 'query', schema: { type: 'integer' } },
      { name: 'Sort', in: 'query', schema: openApiRef('SortOrder') },
    ],
    responses,
  };
}

function parameter(
  operation: OpenAPIV3.OperationObject,
  index: number
): OpenAPIV3.ParameterObject | OpenAPIV3.ReferenceObject | undefined {
  return operation.parameters?.[index];
}

describe('createOpenApiOperationHook', () => {
  it('copies container constraints to the bound parameters', () => {
    const diagnostics = new DiagnosticCollector();
    const engine = new RuleEngine({ validators: [searchValidator], diagnostics });
    const store = new SchemaStore<OpenApiSchema>();
    const operation = searchOperation();

    const result = createOpenApiOperationHook(engine)({
      operation,
      parameters: descriptions,
      store,
      generator: new OpenApiSchemaGenerator(catalog),
    });

    expect(parameter(operation, 0)).toEqual({
      name: 'Query',
      in: 'query',
      required: true,
      schema: { type: 'string', nullable: false, minLength: 1, maxLength: 200 },
    });
    expect(parameter(operation, 1)).toEqual({
      name: 'Page',
      in: 'query',
      schema: { type: 'integer', minimum: 0, exclusiveMinimum: true },
    });
    // Enum-typed member: the reference is kept, the requirement is copied
    expect(parameter(operation, 2)).toEqual({
      name: 'Sort',
      in: 'query',
      required: true,
      schema: { $ref: '#/components/schemas/SortOrder' },
    });

    expect(result.removed).toEqual(['SearchRequest']);
    expect(store.ids()).toEqual(['SortOrder']);
    expect(diagnostics.byCode('SCHEMA_REMOVED')).toEqual([
      {
        code: 'SCHEMA_REMOVED',
        typeName: 'SearchRequest',
        details: { scope: 'search' },
      },
    ]);
  });

  it('keeps the container when the operation references it', () => {
    const engine = new RuleEngine({ validators: [searchValidator] });
    const store = new SchemaStore<OpenApiSchema>();
    const operation = searchOperation({
      '200': {
        description: 'OK',
        content: { 'application/json': { schema: openApiRef('SearchRequest') } },
      },
    });

    const result = createOpenApiOperationHook(engine)({
      operation,
      parameters: descriptions,
      store,
      generator: new OpenApiSchemaGenerator(catalog),
    });

    expect(result.removed).toEqual([]);
    expect(store.ids()).toEqual(['SearchRequest', 'SortOrder']);
    expect(store.get('SearchRequest')).toMatchObject({ required: ['Query', 'Sort'] });
  });

  it('keeps a container that existed before the operation', () => {
    const engine = new RuleEngine({ validators: [searchValidator] });
    const generator = new OpenApiSchemaGenerator(catalog);
    const store = new SchemaStore<OpenApiSchema>();
    generator.generateSchema('SearchRequest', store);

    const result = createOpenApiOperationHook(engine)({
      operation: searchOperation(),
      parameters: descriptions,
      store,
      generator,
    });

    expect(result.removed).toEqual([]);
    expect(store.ids()).toEqual(['SearchRequest', 'SortOrder']);
  });

  it('leaves parameters alone when the container has no validator', () => {
    const engine = new RuleEngine();
    const store = new SchemaStore<OpenApiSchema>();
    const operation = searchOperation();

    const result = createOpenApiOperationHook(engine)({
      operation,
      parameters: descriptions,
      store,
      generator: new OpenApiSchemaGenerator(catalog),
    });

    expect(result.removed).toEqual([]);
    expect(store.size).toBe(0);
    expect(parameter(operation, 0)).toEqual({
      name: 'Query',
      in: 'query',
      schema: { type: 'string' },
    });
  });

  it('creates a schema for parameters declared without one', () => {
    const engine = new RuleEngine({ validators: [searchValidator] });
    const operation: OpenAPIV3.OperationObject = {
      operationId: 'search',
      parameters: [{ name: 'Page', in: 'query' }],
      responses: {},
    };

    createOpenApiOperationHook(engine)({
      operation,
      parameters: descriptions,
      store: new SchemaStore<OpenApiSchema>(),
      generator: new OpenApiSchemaGenerator(catalog),
    });

    expect(parameter(operation, 0)).toEqual({
      name: 'Page',
      in: 'query',
      schema: { type: 'integer', minimum: 0, exclusiveMinimum: true },
    });
  });

  it('ignores parameters not bound from a container', () => {
    const engine = new RuleEngine({ validators: [searchValidator] });
    const operation: OpenAPIV3.OperationObject = {
      operationId: 'get-order',
      parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'string' } }],
      responses: {},
    };
    const store = new SchemaStore<OpenApiSchema>();

    const result = createOpenApiOperationHook(engine)({
      operation,
      parameters: [{ name: 'id', in: 'path' }],
      store,
      generator: new OpenApiSchemaGenerator(catalog),
    });

    expect(result.removed).toEqual([]);
    expect(store.size).toBe(0);
  });

  it('applies container rules once when the generator runs the schema hook', () => {
    const diagnostics = new DiagnosticCollector();
    const engine = new RuleEngine({ validators: [searchValidator], diagnostics });
    const generator = new OpenApiSchemaGenerator(catalog).addHook(
      createOpenApiSchemaHook(engine)
    );
    const operation = searchOperation();

    createOpenApiOperationHook(engine)({
      operation,
      parameters: descriptions,
      store: new SchemaStore<OpenApiSchema>(),
      generator,
    });

    expect(diagnostics.byCode('PROPERTY_UNREACHABLE')).toEqual([
      {
        code: 'PROPERTY_UNREACHABLE',
        typeName: 'SearchRequest',
        property: 'Sort',
        details: { reason: 'reference' },
      },
    ]);
    expect(parameter(operation, 0)).toEqual({
      name: 'Query',
      in: 'query',
      required: true,
      schema: { type: 'string', nullable: false, minLength: 1, maxLength: 200 },
    });
  });
});
