/**
 * Validation rule vocabulary
 *
 * A rule is an opaque fact coming from the validation layer: a kind plus its
 * parameters. The engine never executes rules, it only reads them.
 */

export type Scalar = string | number | boolean | null;

export function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Numeric rule parameter. Strings carry exact decimal literals ("1.333")
 * that would otherwise pick up binary-float noise.
 */
export type NumericParam = number | string;

interface RuleBase {
  /**
   * Rules guarded by a runtime condition are not always enforced and are not
   * reflected in the schema.
   */
  when?: 'always' | 'conditional';
}

export interface NotNullRule extends RuleBase {
  kind: 'notNull';
}

export interface NotEmptyRule extends RuleBase {
  kind: 'notEmpty';
}

export interface MaximumLengthRule extends RuleBase {
  kind: 'maximumLength';
  max: number;
}

export interface MinimumLengthRule extends RuleBase {
  kind: 'minimumLength';
  min: number;
}

export interface LengthRule extends RuleBase {
  kind: 'length';
  min: number;
  max?: number;
}

export interface ComparisonRule extends RuleBase {
  kind: 'greaterThan' | 'greaterThanOrEqual' | 'lessThan' | 'lessThanOrEqual';
  value: NumericParam;
}

export interface BetweenRule extends RuleBase {
  kind: 'inclusiveBetween' | 'exclusiveBetween';
  from: NumericParam;
  to: NumericParam;
}

export interface MatchesRule extends RuleBase {
  kind: 'matches';
  pattern: string;
}

export interface EmailAddressRule extends RuleBase {
  kind: 'emailAddress';
}

export interface IsInEnumRule extends RuleBase {
  kind: 'isInEnum';
  values: readonly Scalar[];
}

export type Rule =
  | NotNullRule
  | NotEmptyRule
  | MaximumLengthRule
  | MinimumLengthRule
  | LengthRule
  | ComparisonRule
  | BetweenRule
  | MatchesRule
  | EmailAddressRule
  | IsInEnumRule;

export type RuleKind = Rule['kind'];

export const RULE_KINDS = [
  'notNull',
  'notEmpty',
  'maximumLength',
  'minimumLength',
  'length',
  'greaterThan',
  'greaterThanOrEqual',
  'lessThan',
  'lessThanOrEqual',
  'inclusiveBetween',
  'exclusiveBetween',
  'matches',
  'emailAddress',
  'isInEnum',
] as const satisfies readonly RuleKind[];

/** Ordered rules attached to one property. */
export type RuleChain = readonly Rule[];

export interface PropertyRules {
  /** Reflected property name, before any naming policy is applied. */
  property: string;
  rules: RuleChain;
}

/**
 * Rules declared for one type. A type may have several validators.
 */
export interface TypeValidator {
  readonly typeName: string;
  readonly properties: readonly PropertyRules[];
}
