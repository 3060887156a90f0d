import { describe, it, expect } from 'vitest';
import {
  loadManifest,
  manifestBuildParams,
  manifestGenerationOptions,
  parseManifest,
  type Manifest,
} from '../loader.js';
import { ErrorCode } from '../../errors/codes.js';
import type { ParseError } from '../../types/errors.js';
import type { Result } from '../../types/result.js';
import { NameResolvers } from '../../util/naming.js';

function failure(result: Result<Manifest, ParseError>): ParseError {
  if (result.isOk()) throw new Error('expected the manifest to be rejected');
  return result.error;
}

const searchManifest = {
  options: { naming: 'camel' },
  types: [
    {
      kind: 'object',
      name: 'SearchRequest',
      properties: {
        Query: { kind: 'string' },
        Page: { kind: 'integer', format: 'int32' },
      },
    },
  ],
  validators: [
    {
      typeName: 'SearchRequest',
      properties: [
        {
          property: 'Query',
          rules: [{ kind: 'notEmpty' }, { kind: 'maximumLength', max: 200 }],
        },
        { property: 'Page', rules: [{ kind: 'greaterThan', value: '0' }] },
      ],
    },
  ],
  roots: [],
  operations: [
    { operationId: 'search', method: 'get', path: '/search', queryType: 'SearchRequest' },
  ],
};

describe('loadManifest', () => {
  it('accepts a well-formed manifest', () => {
    const result = loadManifest(searchManifest);
    expect(result.isOk()).toBe(true);
    if (result.isOk()) expect(result.value).toBe(searchManifest);
  });

  it('reports structural problems with their pointer', () => {
    const error = failure(loadManifest({}));
    expect(error.errorCode).toBe(ErrorCode.MANIFEST_INVALID);
    expect(error.message).toBe(
      "Manifest is invalid at /: must have required property 'types'"
    );
    expect(error.issues).toEqual([
      {
        pointer: '/',
        message: "must have required property 'types'",
        keyword: 'required',
      },
    ]);
  });

  it('rejects malformed numeric rule parameters', () => {
    const error = failure(
      loadManifest({
        ...searchManifest,
        validators: [
          {
            typeName: 'SearchRequest',
            properties: [
              { property: 'Page', rules: [{ kind: 'greaterThan', value: 'zero' }] },
            ],
          },
        ],
      })
    );
    expect(error.errorCode).toBe(ErrorCode.MANIFEST_INVALID);
    expect(error.issues.length).toBeGreaterThan(0);
  });

  it('rejects numeric rule parameters with no finite number form', () => {
    const error = failure(
      loadManifest({
        ...searchManifest,
        validators: [
          {
            typeName: 'SearchRequest',
            properties: [
              { property: 'Page', rules: [{ kind: 'lessThanOrEqual', value: '1e400' }] },
              {
                property: 'Page',
                rules: [{ kind: 'inclusiveBetween', from: 0, to: '1e999999999' }],
              },
            ],
          },
        ],
      })
    );
    expect(error.issues).toEqual([
      {
        pointer: '/validators/0/properties/0/rules/0/value',
        message: 'Numeric rule parameter is out of range: "1e400"',
      },
      {
        pointer: '/validators/0/properties/1/rules/0/to',
        message: 'Numeric rule parameter is out of range: "1e999999999"',
      },
    ]);
  });

  it('reports unknown type references', () => {
    const error = failure(
      loadManifest({
        types: [
          {
            kind: 'object',
            name: 'Order',
            properties: {
              Customer: { kind: 'ref', name: 'Customer' },
              Tags: { kind: 'array', items: { kind: 'ref', name: 'Tag' } },
            },
          },
        ],
        validators: [{ typeName: 'Invoice', properties: [] }],
        roots: ['Order', 'Line'],
        operations: [
          { operationId: 'list', method: 'get', path: '/orders', queryType: 'Filter' },
        ],
      })
    );
    expect(error.issues).toEqual([
      { pointer: '/types/0/properties/Customer/name', message: 'unknown type "Customer"' },
      { pointer: '/types/0/properties/Tags/items/name', message: 'unknown type "Tag"' },
      { pointer: '/validators/0/typeName', message: 'unknown type "Invoice"' },
      { pointer: '/roots/1', message: 'unknown type "Line"' },
      { pointer: '/operations/0/queryType', message: 'unknown type "Filter"' },
    ]);
    expect(error.message).toBe(
      'Manifest is invalid at /types/0/properties/Customer/name: unknown type "Customer"'
    );
  });

  it('reports duplicate types and invalid patterns', () => {
    const error = failure(
      loadManifest({
        types: [
          { kind: 'enum', name: 'Status', values: ['open'] },
          { kind: 'enum', name: 'Status', values: ['closed'] },
          { kind: 'object', name: 'Order', properties: { Code: { kind: 'string' } } },
        ],
        validators: [
          {
            typeName: 'Order',
            properties: [{ property: 'Code', rules: [{ kind: 'matches', pattern: '(' }] }],
          },
        ],
      })
    );
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toEqual({
      pointer: '/types/1/name',
      message: 'duplicate type "Status"',
    });
    expect(error.issues[1]).toMatchObject({
      pointer: '/validators/0/properties/0/rules/0/pattern',
      keyword: 'pattern',
    });
  });
});

describe('parseManifest', () => {
  it('reports invalid JSON as a parse error', () => {
    const error = failure(parseManifest('{"types": ['));
    expect(error.errorCode).toBe(ErrorCode.PARSE_ERROR);
    expect(error.message).toBe('Manifest is not valid JSON');
    expect(error.issues[0]?.pointer).toBe('/');
  });

  it('parses and validates JSON text', () => {
    expect(parseManifest(JSON.stringify(searchManifest)).isOk()).toBe(true);
  });
});

describe('manifestGenerationOptions', () => {
  it('maps naming and lets overrides win', () => {
    const manifest: Manifest = {
      options: { naming: 'camel', oneValidatorPerType: false },
      types: [],
    };
    expect(manifestGenerationOptions(manifest)).toEqual({
      oneValidatorPerType: false,
      nameResolver: NameResolvers.camelCase,
      emailPattern: undefined,
      skipConditionalRules: undefined,
    });

    const overridden = manifestGenerationOptions(manifest, {
      naming: 'identity',
      oneValidatorPerType: undefined,
    });
    expect(overridden.nameResolver).toBe(NameResolvers.identity);
    expect(overridden.oneValidatorPerType).toBe(false);
  });

  it('builds facade parameters from the manifest', () => {
    const manifest: Manifest = {
      info: { title: 'Search', version: '2.0.0' },
      types: [],
      roots: [],
    };
    const params = manifestBuildParams(manifest, { skipConditionalRules: false });
    expect(params.info).toEqual({ title: 'Search', version: '2.0.0' });
    expect(params.roots).toEqual([]);
    expect(params.options?.skipConditionalRules).toBe(false);
    expect(params.options?.nameResolver).toBeUndefined();
  });
});
