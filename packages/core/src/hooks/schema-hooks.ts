/**
 * Per-type schema hooks: apply a type's validators to the schema the host
 * generator just produced for it.
 */

import {
  JsonSchemaContext,
  JsonSchemaProvider,
} from '../context/json-schema-context.js';
import {
  OpenApiSchemaContext,
  OpenApiSchemaProvider,
} from '../context/openapi-context.js';
import type { JsonSchemaHook } from '../generator/json-schema-generator.js';
import type { OpenApiSchemaHook } from '../generator/openapi-generator.js';
import type { RuleEngine } from '../rules/rule-engine.js';

export function createOpenApiSchemaHook(engine: RuleEngine): OpenApiSchemaHook {
  return ({ typeName, schema, store, generator }) => {
    const provider = new OpenApiSchemaProvider({
      store,
      generator,
      diagnostics: engine.diagnostics,
    });
    engine.applyOnce(schema, new OpenApiSchemaContext(typeName, schema, provider));
  };
}

export function createJsonSchemaHook(engine: RuleEngine): JsonSchemaHook {
  return ({ typeName, schema, store, generator }) => {
    const provider = new JsonSchemaProvider({
      store,
      generator,
      diagnostics: engine.diagnostics,
    });
    engine.applyOnce(schema, new JsonSchemaContext(typeName, schema, provider));
  };
}
