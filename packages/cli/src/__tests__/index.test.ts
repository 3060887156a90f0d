import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { DEFAULT_EMAIL_PATTERN, ErrorCode, getExitCode } from '@schema-rules/core';
import { main, runGenerate } from '../index.js';
import { stripAnsi } from '../render.js';

const manifestPath = fileURLToPath(
  new URL('./fixtures/search.manifest.json', import.meta.url)
);

function written(spy: { mock: { calls: unknown[][] } }): string {
  return spy.mock.calls.map((call) => String(call[0])).join('');
}

describe('schema-rules generate', () => {
  let stdout: MockInstance<typeof process.stdout.write>;
  let stderr: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints the augmented OpenAPI document', async () => {
    await runGenerate({ manifest: manifestPath });

    const document = JSON.parse(written(stdout));
    expect(document.info).toEqual({ title: 'Search API', version: '1.0.0' });
    expect(document.paths['/search'].get.parameters).toEqual([
      {
        name: 'query',
        in: 'query',
        required: true,
        schema: { type: 'string', nullable: false, minLength: 1, maxLength: 200 },
      },
      {
        name: 'page',
        in: 'query',
        schema: { type: 'integer', format: 'int32', minimum: 0, exclusiveMinimum: true },
      },
      {
        name: 'sort',
        in: 'query',
        schema: { $ref: '#/components/schemas/SortOrder' },
      },
    ]);
    expect(Object.keys(document.components.schemas)).toEqual([
      'SearchResult',
      'Author',
      'SortOrder',
    ]);
    expect(document.components.schemas.SearchResult.required).toEqual(['title']);
    expect(written(stderr)).toBe('');
  });

  it('prints every diagnostic with --debug', async () => {
    await runGenerate({ manifest: manifestPath, debug: true });
    expect(written(stderr)).toBe(
      '[schema-rules] info SCHEMA_MATERIALIZED SearchRequest {"id":"SearchRequest"}\n' +
        '[schema-rules] info SCHEMA_REMOVED SearchRequest {"scope":"search"}\n'
    );
  });

  it('applies command-line overrides over manifest options', async () => {
    await runGenerate({ manifest: manifestPath, naming: 'identity' });
    const document = JSON.parse(written(stdout));
    const names = document.paths['/search'].get.parameters.map(
      (parameter: { name: string }) => parameter.name
    );
    expect(names).toEqual(['Query', 'Page', 'Sort']);
  });

  it('prints draft-07 definitions for the json-schema model', async () => {
    await runGenerate({ manifest: manifestPath, model: 'json-schema' });
    expect(JSON.parse(written(stdout))).toEqual({
      $schema: 'http://json-schema.org/draft-07/schema#',
      definitions: {
        SearchResult: {
          type: 'object',
          properties: {
            title: { type: 'string' },
            author: {
              type: ['object', 'null'],
              properties: { email: { type: 'string', pattern: DEFAULT_EMAIL_PATTERN } },
            },
          },
          required: ['title'],
        },
      },
    });
  });

  it('references nested types with --use-references', async () => {
    await runGenerate({ manifest: manifestPath, model: 'jsonschema', useReferences: true });
    const document = JSON.parse(written(stdout));
    expect(Object.keys(document.definitions)).toEqual(['Author', 'SearchResult']);
    expect(document.definitions.SearchResult.properties.author).toEqual({
      oneOf: [{ type: 'null' }, { $ref: '#/definitions/Author' }],
    });
  });

  describe('errors', () => {
    let dir: string;
    let consoleError: MockInstance<typeof console.error>;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), 'schema-rules-cli-'));
      consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('reports an unreadable manifest as a configuration error', async () => {
      const missing = path.join(dir, 'missing.json');
      await main(['node', 'schema-rules', 'generate', '-m', missing]);

      expect(process.exitCode).toBe(getExitCode(ErrorCode.CONFIGURATION_ERROR));
      expect(stripAnsi(String(consoleError.mock.calls[0]?.[0]))).toBe(
        `Error E100: Cannot read manifest "${missing}"\nOption: manifest`
      );
      expect(written(stdout)).toBe('');
    });

    it('reports manifest problems with their pointers', async () => {
      const file = path.join(dir, 'invalid.json');
      await writeFile(
        file,
        JSON.stringify({ types: [], roots: ['Missing'] }),
        'utf8'
      );
      await main(['node', 'schema-rules', 'generate', '-m', file]);

      expect(process.exitCode).toBe(21);
      expect(stripAnsi(String(consoleError.mock.calls[0]?.[0]))).toBe(
        [
          'Error E201: Manifest is invalid at /roots/0: unknown type "Missing"',
          'Location: /roots/0',
          '  - /roots/0: unknown type "Missing"',
        ].join('\n')
      );
    });

    it('rejects an unknown model before reading the manifest', async () => {
      await expect(
        runGenerate({ manifest: path.join(dir, 'unused.json'), model: 'xml' })
      ).rejects.toThrow('Invalid --model "xml". Expected openapi|json-schema');
    });
  });
});
