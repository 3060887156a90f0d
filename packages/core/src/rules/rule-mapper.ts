/**
 * Rule-to-constraint mapping for a single property.
 */

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import type { DiagnosticSink } from '../diag/collector.js';
import type { SchemaContext } from '../context/schema-context.js';
import type { DataType } from '../context/schema-node.js';
import type { ResolvedOptions } from '../types/options.js';
import type { Rule, RuleChain } from '../types/rules.js';
import { toDecimal } from '../util/decimal.js';
import {
  findContradictions,
  mergeAll,
  mergeConstraints,
  type ConstraintSet,
} from './constraint-set.js';

export type MapperOptions = Pick<
  ResolvedOptions,
  'emailPattern' | 'skipConditionalRules'
>;

function lengthFields(
  dataType: DataType | undefined,
  min: number | undefined,
  max: number | undefined
): ConstraintSet {
  return dataType === 'array'
    ? { minItems: min, maxItems: max }
    : { minLength: min, maxLength: max };
}

/**
 * Constraints proposed by one rule for a property of `dataType`.
 */
export function mapRule(
  rule: Rule,
  dataType: DataType | undefined,
  options: Pick<MapperOptions, 'emailPattern'>
): ConstraintSet {
  switch (rule.kind) {
    case 'notNull':
      return { required: true, nonNullable: true };
    case 'notEmpty': {
      const base: ConstraintSet = { required: true, nonNullable: true };
      if (dataType === 'string') return { ...base, minLength: 1 };
      if (dataType === 'array') return { ...base, minItems: 1 };
      return base;
    }
    case 'maximumLength':
      return lengthFields(dataType, undefined, rule.max);
    case 'minimumLength':
      return lengthFields(dataType, rule.min, undefined);
    case 'length':
      return lengthFields(dataType, rule.min, rule.max);
    case 'greaterThan':
    case 'greaterThanOrEqual':
      return {
        minimum: {
          value: toDecimal(rule.value),
          exclusive: rule.kind === 'greaterThan',
        },
      };
    case 'lessThan':
    case 'lessThanOrEqual':
      return {
        maximum: {
          value: toDecimal(rule.value),
          exclusive: rule.kind === 'lessThan',
        },
      };
    case 'inclusiveBetween':
    case 'exclusiveBetween': {
      const exclusive = rule.kind === 'exclusiveBetween';
      return {
        minimum: { value: toDecimal(rule.from), exclusive },
        maximum: { value: toDecimal(rule.to), exclusive },
      };
    }
    case 'matches':
      return { pattern: rule.pattern };
    case 'emailAddress':
      return { pattern: options.emailPattern };
    case 'isInEnum':
      return { enumValues: [...rule.values] };
  }
}

export interface RuleChainOutcome {
  key: string;
  /** Constraints proposed by the chain alone. */
  proposed: ConstraintSet;
  /** False when the property node was empty and nothing was written. */
  written: boolean;
}

/**
 * Compute the chain's constraints and apply them to property `key` of
 * `context`. `required` goes to the owning schema even when the property
 * node itself is empty.
 */
export function applyRuleChain(
  context: SchemaContext,
  key: string,
  chain: RuleChain,
  options: MapperOptions,
  diagnostics: DiagnosticSink
): RuleChainOutcome {
  const rules = chain.filter((rule) => {
    if (rule.when !== 'conditional' || !options.skipConditionalRules) {
      return true;
    }
    diagnostics.report({
      code: DIAGNOSTIC_CODES.RULE_SKIPPED_CONDITIONAL,
      typeName: context.typeName,
      property: key,
      details: { rule: rule.kind },
    });
    return false;
  });

  const node = context.getPropertyNode(key);
  const dataType = node.kind === 'concrete' ? node.target.dataType : undefined;
  const proposed = mergeAll(rules.map((rule) => mapRule(rule, dataType, options)));

  if (proposed.required) {
    context.markRequired(key);
  }

  if (node.kind === 'empty') {
    if (rules.length > 0) {
      diagnostics.report({
        code: DIAGNOSTIC_CODES.PROPERTY_UNREACHABLE,
        typeName: context.typeName,
        property: key,
        details: { reason: node.reason },
      });
    }
    return { key, proposed, written: false };
  }

  const merged = mergeConstraints(node.target.read(), proposed);
  for (const contradiction of findContradictions(merged)) {
    diagnostics.report({
      code: DIAGNOSTIC_CODES.CONTRADICTORY_BOUNDS,
      typeName: context.typeName,
      property: key,
      details: { ...contradiction },
    });
  }
  node.target.write(merged);
  return { key, proposed, written: true };
}
