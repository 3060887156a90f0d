import { describe, it, expect } from 'vitest';
import type { OpenAPIV3 } from 'openapi-types';
import { RuleEngine } from '../rule-engine.js';
import { defineValidator } from '../validator-builder.js';
import { OpenApiSchemaContext } from '../../context/openapi-context.js';
import type { SchemaProvider } from '../../context/schema-context.js';
import { DiagnosticCollector } from '../../diag/collector.js';
import { ValidatorRegistry } from '../../registry/validator-registry.js';
import { NameResolvers } from '../../util/naming.js';

interface SearchRequest {
  Query: string;
  PageSize: number;
}

const noProvider: SchemaProvider = {
  getSchemaForType: (typeName) => {
    throw new Error(`unexpected lookup of ${typeName}`);
  },
};

function camelSchema(): OpenAPIV3.SchemaObject {
  return {
    type: 'object',
    properties: {
      query: { type: 'string' },
      pageSize: { type: 'integer' },
    },
  };
}

describe('RuleEngine', () => {
  it('resolves property keys through the configured name resolver', () => {
    const schema = camelSchema();
    const engine = new RuleEngine({
      validators: [
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').notEmpty();
          v.ruleFor('PageSize').inclusiveBetween(1, 100);
        }),
      ],
      options: { nameResolver: NameResolvers.camelCase },
    });

    const outcomes = engine.applyToType(
      new OpenApiSchemaContext('SearchRequest', schema, noProvider)
    );

    expect(outcomes.map((outcome) => outcome.key)).toEqual(['query', 'pageSize']);
    expect(schema.required).toEqual(['query']);
    expect(schema.properties?.pageSize).toEqual({
      type: 'integer',
      minimum: 1,
      maximum: 100,
    });
  });

  it('falls back to a case-insensitive key match', () => {
    const schema = camelSchema();
    const engine = new RuleEngine({
      validators: [
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').maximumLength(20);
        }),
      ],
    });
    engine.applyToType(new OpenApiSchemaContext('SearchRequest', schema, noProvider));
    expect(schema.properties?.query).toEqual({ type: 'string', maxLength: 20 });
  });

  it('reports types without validators and unknown properties', () => {
    const diagnostics = new DiagnosticCollector();
    const engine = new RuleEngine({
      validators: [
        {
          typeName: 'SearchRequest',
          properties: [{ property: 'Sort', rules: [{ kind: 'notNull' }] }],
        },
      ],
      diagnostics,
    });

    expect(
      engine.applyToType(new OpenApiSchemaContext('Other', camelSchema(), noProvider))
    ).toEqual([]);
    expect(
      engine.applyToType(
        new OpenApiSchemaContext('SearchRequest', camelSchema(), noProvider)
      )
    ).toEqual([]);

    expect(diagnostics.entries()).toEqual([
      { code: 'VALIDATOR_NOT_FOUND', typeName: 'Other' },
      { code: 'PROPERTY_NOT_FOUND', typeName: 'SearchRequest', property: 'Sort' },
    ]);
  });

  it('applies every validator when oneValidatorPerType is off', () => {
    const registry = new ValidatorRegistry({ oneValidatorPerType: false });
    const engine = new RuleEngine({
      registry,
      validators: [
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').minimumLength(2);
        }),
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').maximumLength(8);
        }),
      ],
    });
    const schema = camelSchema();
    engine.applyToType(new OpenApiSchemaContext('SearchRequest', schema, noProvider));
    expect(schema.properties?.query).toEqual({
      type: 'string',
      minLength: 2,
      maxLength: 8,
    });
  });

  it('uses only the first validator by default', () => {
    const engine = new RuleEngine({
      validators: [
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').minimumLength(2);
        }),
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').maximumLength(8);
        }),
      ],
    });
    const schema = camelSchema();
    engine.applyToType(new OpenApiSchemaContext('SearchRequest', schema, noProvider));
    expect(schema.properties?.query).toEqual({ type: 'string', minLength: 2 });
  });

  it('applies validators once per schema object through applyOnce', () => {
    const diagnostics = new DiagnosticCollector();
    const engine = new RuleEngine({
      validators: [
        defineValidator<SearchRequest>('SearchRequest', (v) => {
          v.ruleFor('Query').notEmpty();
        }),
      ],
      diagnostics,
    });
    const schema = camelSchema();
    const context = new OpenApiSchemaContext('SearchRequest', schema, noProvider);

    expect(engine.applyOnce(schema, context).map((outcome) => outcome.key)).toEqual([
      'query',
    ]);
    expect(engine.applyOnce(schema, context)).toEqual([]);

    const other = camelSchema();
    engine.applyOnce(other, new OpenApiSchemaContext('SearchRequest', other, noProvider));
    expect(other.required).toEqual(['query']);
  });
});
