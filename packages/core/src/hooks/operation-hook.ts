/**
 * Per-operation hook (reference model).
 *
 * Parameters bound from a container type (one query parameter per member of
 * a request object) take their constraints from the container's validator.
 * Resolving that validator may materialize the container schema in
 * components.schemas; the pass runs under a MaterializationTracker so
 * anything the final operation does not reference is removed again.
 */

import type { OpenAPIV3 } from 'openapi-types';
import {
  OpenApiConstraintTarget,
  OpenApiSchemaProvider,
  type OpenApiSchemaContext,
} from '../context/openapi-context.js';
import type { DataType } from '../context/schema-node.js';
import {
  isReferenceObject,
  openApiRefToId,
  type OpenApiSchemaGenerator,
  type OpenApiSchemaStore,
} from '../generator/openapi-generator.js';
import { mergeConstraints } from '../rules/constraint-set.js';
import type { RuleEngine } from '../rules/rule-engine.js';
import {
  MaterializationTracker,
  withMaterializationGuard,
} from '../store/materialization.js';
import { findSchemaKey } from '../util/naming.js';

export type ParameterLocation = 'query' | 'path' | 'header' | 'cookie';

export interface ParameterDescription {
  name: string;
  in: ParameterLocation;
  /** Type the parameter was bound from, when it is a member of one. */
  containerType?: string;
  /** Reflected property of `containerType` behind the parameter. */
  propertyName?: string;
}

export interface OperationHookContext {
  operation: OpenAPIV3.OperationObject;
  parameters: readonly ParameterDescription[];
  store: OpenApiSchemaStore;
  generator: OpenApiSchemaGenerator;
}

export interface OperationHookResult {
  /** Schema ids materialized during the pass and removed afterwards. */
  removed: string[];
}

export type OpenApiOperationHook = (
  context: OperationHookContext
) => OperationHookResult;

export function createOpenApiOperationHook(
  engine: RuleEngine
): OpenApiOperationHook {
  return ({ operation, parameters, store, generator }) => {
    const provider = new OpenApiSchemaProvider({
      store,
      generator,
      diagnostics: engine.diagnostics,
    });
    const tracker = new MaterializationTracker(
      store,
      openApiRefToId,
      engine.diagnostics,
      operation.operationId ?? 'operation'
    );

    const removed = withMaterializationGuard(tracker, () => {
      const containers = new Map<string, OpenApiSchemaContext>();
      for (const description of parameters) {
        const { containerType, propertyName } = description;
        if (containerType === undefined || propertyName === undefined) continue;
        if (!engine.registry.hasValidators(containerType)) continue;

        let container = containers.get(containerType);
        if (!container) {
          container = provider.getSchemaForType(containerType);
          engine.applyOnce(container.schema, container);
          containers.set(containerType, container);
        }

        const parameter = findParameter(operation, description);
        if (parameter) {
          copyToParameter(container, propertyName, parameter, engine);
        }
      }
      return [operation.parameters, operation.requestBody, operation.responses];
    });

    return { removed };
  };
}

function findParameter(
  operation: OpenAPIV3.OperationObject,
  description: ParameterDescription
): OpenAPIV3.ParameterObject | undefined {
  for (const parameter of operation.parameters ?? []) {
    if (isReferenceObject(parameter)) continue;
    if (parameter.name === description.name && parameter.in === description.in) {
      return parameter;
    }
  }
  return undefined;
}

function copyToParameter(
  container: OpenApiSchemaContext,
  propertyName: string,
  parameter: OpenAPIV3.ParameterObject,
  engine: RuleEngine
): void {
  const key = findSchemaKey(
    propertyName,
    container.propertyKeys(),
    engine.options.nameResolver
  );
  if (key === undefined) return;

  if (container.isRequired(key)) parameter.required = true;

  const node = container.getPropertyNode(key);
  if (node.kind === 'empty') return;

  if (parameter.schema === undefined) {
    parameter.schema = inlineSchema(node.target.dataType);
  }
  if (isReferenceObject(parameter.schema)) return;

  const target = new OpenApiConstraintTarget(parameter.schema);
  target.write(mergeConstraints(target.read(), node.target.read()));
}

function inlineSchema(dataType: DataType | undefined): OpenAPIV3.SchemaObject {
  if (dataType === undefined) return {};
  if (dataType === 'array') return { type: 'array', items: {} };
  return { type: dataType };
}
