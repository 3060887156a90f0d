/**
 * RuleEngine: applies the registered validators of a type to that type's
 * schema. Written against SchemaContext only.
 */

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import { NOOP_DIAGNOSTICS, type DiagnosticSink } from '../diag/collector.js';
import type { SchemaContext } from '../context/schema-context.js';
import { ValidatorRegistry } from '../registry/validator-registry.js';
import {
  resolveOptions,
  type ResolvedOptions,
  type SchemaGenerationOptions,
} from '../types/options.js';
import type { TypeValidator } from '../types/rules.js';
import { findSchemaKey } from '../util/naming.js';
import { applyRuleChain, type RuleChainOutcome } from './rule-mapper.js';

export interface RuleEngineParams {
  /** Validators to register unkeyed, in order. */
  validators?: readonly TypeValidator[];
  /** Existing registry; `validators` are added to it. */
  registry?: ValidatorRegistry;
  options?: Partial<SchemaGenerationOptions>;
  diagnostics?: DiagnosticSink;
}

export class RuleEngine {
  readonly options: ResolvedOptions;
  readonly registry: ValidatorRegistry;
  readonly diagnostics: DiagnosticSink;
  readonly #applied = new WeakSet<object>();

  constructor(params: RuleEngineParams = {}) {
    this.options = resolveOptions(params.options);
    this.registry = params.registry ?? new ValidatorRegistry(this.options);
    this.diagnostics = params.diagnostics ?? NOOP_DIAGNOSTICS;
    for (const validator of params.validators ?? []) {
      this.registry.register(validator.typeName, validator);
    }
  }

  /**
   * Apply every validator of `context.typeName`. A type without validators
   * is left untouched.
   */
  applyToType(context: SchemaContext): RuleChainOutcome[] {
    const validators = this.registry.getValidators(context.typeName);
    if (validators.length === 0) {
      this.diagnostics.report({
        code: DIAGNOSTIC_CODES.VALIDATOR_NOT_FOUND,
        typeName: context.typeName,
      });
      return [];
    }

    const outcomes: RuleChainOutcome[] = [];
    for (const validator of validators) {
      for (const { property, rules } of validator.properties) {
        const key = findSchemaKey(
          property,
          context.propertyKeys(),
          this.options.nameResolver
        );
        if (key === undefined) {
          this.diagnostics.report({
            code: DIAGNOSTIC_CODES.PROPERTY_NOT_FOUND,
            typeName: context.typeName,
            property,
          });
          continue;
        }
        outcomes.push(
          applyRuleChain(context, key, rules, this.options, this.diagnostics)
        );
      }
    }
    return outcomes;
  }

  /**
   * applyToType at most once per schema object. The schema hook and the
   * operation hook both reach a container materialized during an operation.
   */
  applyOnce(schema: object, context: SchemaContext): RuleChainOutcome[] {
    if (this.#applied.has(schema)) return [];
    this.#applied.add(schema);
    return this.applyToType(context);
  }
}
