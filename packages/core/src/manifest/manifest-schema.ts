/**
 * JSON Schema (draft-07) of the generation manifest read by the CLI.
 */

const identifier = { type: 'string', minLength: 1 } as const;

const numericParam = {
  oneOf: [
    { type: 'number' },
    { type: 'string', pattern: '^[+-]?(\\d+\\.?\\d*|\\.\\d+)([eE][+-]?\\d+)?$' },
  ],
} as const;

const scalar = { type: ['string', 'number', 'boolean', 'null'] } as const;

const when = { enum: ['always', 'conditional'] } as const;

function ruleVariant(
  kind: string | readonly string[],
  properties: Record<string, unknown> = {},
  required: readonly string[] = []
) {
  return {
    type: 'object',
    required: ['kind', ...required],
    properties: {
      kind: typeof kind === 'string' ? { const: kind } : { enum: kind },
      when,
      ...properties,
    },
    additionalProperties: false,
  };
}

export const MANIFEST_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'https://schema-rules.dev/manifest.schema.json',
  type: 'object',
  required: ['types'],
  additionalProperties: false,
  properties: {
    info: {
      type: 'object',
      required: ['title', 'version'],
      properties: { title: { type: 'string' }, version: { type: 'string' } },
      additionalProperties: false,
    },
    options: {
      type: 'object',
      additionalProperties: false,
      properties: {
        oneValidatorPerType: { type: 'boolean' },
        naming: { enum: ['identity', 'camel'] },
        emailPattern: { type: 'string' },
        skipConditionalRules: { type: 'boolean' },
      },
    },
    types: { type: 'array', items: { $ref: '#/definitions/typeDescriptor' } },
    validators: { type: 'array', items: { $ref: '#/definitions/validator' } },
    roots: { type: 'array', items: identifier },
    operations: { type: 'array', items: { $ref: '#/definitions/operation' } },
  },
  definitions: {
    propertyType: {
      oneOf: [
        {
          type: 'object',
          required: ['kind'],
          properties: {
            kind: { enum: ['string', 'integer', 'number', 'boolean'] },
            format: { type: 'string' },
            nullable: { type: 'boolean' },
          },
          additionalProperties: false,
        },
        {
          type: 'object',
          required: ['kind', 'items'],
          properties: {
            kind: { const: 'array' },
            items: { $ref: '#/definitions/propertyType' },
            nullable: { type: 'boolean' },
          },
          additionalProperties: false,
        },
        {
          type: 'object',
          required: ['kind', 'name'],
          properties: {
            kind: { const: 'ref' },
            name: identifier,
            nullable: { type: 'boolean' },
          },
          additionalProperties: false,
        },
      ],
    },
    typeDescriptor: {
      oneOf: [
        {
          type: 'object',
          required: ['kind', 'name', 'properties'],
          properties: {
            kind: { const: 'object' },
            name: identifier,
            properties: {
              type: 'object',
              additionalProperties: { $ref: '#/definitions/propertyType' },
            },
          },
          additionalProperties: false,
        },
        {
          type: 'object',
          required: ['kind', 'name', 'values'],
          properties: {
            kind: { const: 'enum' },
            name: identifier,
            values: { type: 'array', items: scalar, minItems: 1 },
          },
          additionalProperties: false,
        },
      ],
    },
    rule: {
      oneOf: [
        ruleVariant(['notNull', 'notEmpty', 'emailAddress']),
        ruleVariant('maximumLength', { max: { type: 'integer', minimum: 0 } }, ['max']),
        ruleVariant('minimumLength', { min: { type: 'integer', minimum: 0 } }, ['min']),
        ruleVariant(
          'length',
          {
            min: { type: 'integer', minimum: 0 },
            max: { type: 'integer', minimum: 0 },
          },
          ['min']
        ),
        ruleVariant(
          ['greaterThan', 'greaterThanOrEqual', 'lessThan', 'lessThanOrEqual'],
          { value: numericParam },
          ['value']
        ),
        ruleVariant(
          ['inclusiveBetween', 'exclusiveBetween'],
          { from: numericParam, to: numericParam },
          ['from', 'to']
        ),
        ruleVariant('matches', { pattern: { type: 'string' } }, ['pattern']),
        ruleVariant(
          'isInEnum',
          { values: { type: 'array', items: scalar, minItems: 1 } },
          ['values']
        ),
      ],
    },
    validator: {
      type: 'object',
      required: ['typeName', 'properties'],
      properties: {
        typeName: identifier,
        key: identifier,
        properties: {
          type: 'array',
          items: {
            type: 'object',
            required: ['property', 'rules'],
            properties: {
              property: identifier,
              rules: { type: 'array', items: { $ref: '#/definitions/rule' } },
            },
            additionalProperties: false,
          },
        },
      },
      additionalProperties: false,
    },
    parameter: {
      type: 'object',
      required: ['name', 'in', 'type'],
      properties: {
        name: identifier,
        in: { enum: ['query', 'path', 'header', 'cookie'] },
        type: { $ref: '#/definitions/propertyType' },
        required: { type: 'boolean' },
      },
      additionalProperties: false,
    },
    operation: {
      type: 'object',
      required: ['operationId', 'method', 'path'],
      properties: {
        operationId: identifier,
        method: { enum: ['get', 'put', 'post', 'delete', 'patch'] },
        path: { type: 'string', pattern: '^/' },
        queryType: identifier,
        parameters: {
          type: 'array',
          items: { $ref: '#/definitions/parameter' },
        },
        requestBodyType: identifier,
        responseType: identifier,
      },
      additionalProperties: false,
    },
  },
} as const;
