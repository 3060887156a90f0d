// @schema-rules/core entry point
//
// - High-level facades buildOpenApiDocument / buildJsonSchemaDocument (./api.js)
//   wire the rule engine into both generator stand-ins.
// - Lower-level building blocks for host integrations: the registry, the rule
//   engine and mapper, the two schema contexts, the per-type and per-operation
//   hooks and the materialization tracker.

export * from './api.js';

// Rule vocabulary and type descriptions
export * from './types/rules.js';
export * from './types/catalog.js';
export {
  defineValidator,
  ValidatorBuilder,
  RuleChainBuilder,
} from './rules/validator-builder.js';

// Options
export {
  resolveOptions,
  DEFAULT_OPTIONS,
  DEFAULT_EMAIL_PATTERN,
  type SchemaGenerationOptions,
  type ResolvedOptions,
  type SchemaIdSelector,
} from './types/options.js';
export {
  NameResolvers,
  findSchemaKey,
  type NameResolver,
  type NamingPolicy,
} from './util/naming.js';

// Registry and engine
export * from './registry/index.js';
export { RuleEngine, type RuleEngineParams } from './rules/rule-engine.js';
export {
  mapRule,
  applyRuleChain,
  type MapperOptions,
  type RuleChainOutcome,
} from './rules/rule-mapper.js';
export {
  mergeConstraints,
  mergeAll,
  findContradictions,
  higherBound,
  lowerBound,
  EMPTY_CONSTRAINTS,
  type Bound,
  type ConstraintSet,
  type Contradiction,
} from './rules/constraint-set.js';
export {
  toDecimal,
  compareDecimal,
  decimalEquals,
  formatDecimal,
  decimalToNumber,
  type Decimal,
} from './util/decimal.js';

// Schema contexts
export * from './context/schema-node.js';
export type { SchemaContext, SchemaProvider } from './context/schema-context.js';
export {
  OpenApiConstraintTarget,
  OpenApiSchemaContext,
  OpenApiSchemaProvider,
  type OpenApiSchemaProviderParams,
} from './context/openapi-context.js';
export {
  JsonSchemaConstraintTarget,
  JsonSchemaContext,
  JsonSchemaProvider,
  type JsonSchemaProviderParams,
} from './context/json-schema-context.js';

// Generators and hooks
export { TypeCatalog } from './generator/type-catalog.js';
export * from './generator/openapi-generator.js';
export * from './generator/json-schema-generator.js';
export {
  createOpenApiSchemaHook,
  createJsonSchemaHook,
} from './hooks/schema-hooks.js';
export * from './hooks/operation-hook.js';

// Store and materialization
export {
  SchemaStore,
  pointerRef,
  pointerRefResolver,
  type RefResolver,
} from './store/schema-store.js';
export { collectReferencedIds, reachableIds } from './store/references.js';
export {
  MaterializationTracker,
  withMaterializationGuard,
} from './store/materialization.js';

// Diagnostics
export {
  DIAGNOSTIC_CODES,
  DIAGNOSTIC_SEVERITY,
  type DiagnosticCode,
} from './diag/codes.js';
export {
  DiagnosticCollector,
  NOOP_DIAGNOSTICS,
  formatDiagnostic,
  type DiagnosticEnvelope,
  type DiagnosticSink,
} from './diag/collector.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export * from './types/errors.js';
export * from './types/result.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
  type ProductionView,
} from './errors/presenter.js';

// Manifest
export { MANIFEST_SCHEMA } from './manifest/manifest-schema.js';
export * from './manifest/loader.js';
