/**
 * ConstraintSet: schema-level facts derived from a rule chain, and the merge
 * policy applied when several rules propose the same field.
 *
 * - lower bounds (minLength, minItems, minimum): the highest proposal wins
 * - upper bounds (maxLength, maxItems, maximum): the lowest proposal wins
 * - required / nonNullable: once true, stay true
 * - pattern / enumValues: the last proposal wins
 *
 * Merging never repairs a contradictory set; see findContradictions().
 */

import {
  compareDecimal,
  formatDecimal,
  type Decimal,
} from '../util/decimal.js';
import type { Scalar } from '../types/rules.js';

export interface Bound {
  value: Decimal;
  exclusive: boolean;
}

export interface ConstraintSet {
  required?: boolean;
  /** The property rejects null. */
  nonNullable?: boolean;
  minLength?: number;
  maxLength?: number;
  minItems?: number;
  maxItems?: number;
  minimum?: Bound;
  maximum?: Bound;
  pattern?: string;
  enumValues?: readonly Scalar[];
}

export const EMPTY_CONSTRAINTS: Readonly<ConstraintSet> = Object.freeze({});

function higher(a?: number, b?: number): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

function lower(a?: number, b?: number): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

export function higherBound(a?: Bound, b?: Bound): Bound | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  const order = compareDecimal(a.value, b.value);
  if (order === 0) {
    return { value: a.value, exclusive: a.exclusive || b.exclusive };
  }
  return order > 0 ? a : b;
}

export function lowerBound(a?: Bound, b?: Bound): Bound | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  const order = compareDecimal(a.value, b.value);
  if (order === 0) {
    return { value: a.value, exclusive: a.exclusive || b.exclusive };
  }
  return order < 0 ? a : b;
}

function sticky(a?: boolean, b?: boolean): boolean | undefined {
  return a === true || b === true ? true : undefined;
}

/**
 * Merge `next` onto `base`. Commutative for every field except pattern and
 * enumValues, where `next` wins.
 */
export function mergeConstraints(
  base: ConstraintSet,
  next: ConstraintSet
): ConstraintSet {
  return compact({
    required: sticky(base.required, next.required),
    nonNullable: sticky(base.nonNullable, next.nonNullable),
    minLength: higher(base.minLength, next.minLength),
    maxLength: lower(base.maxLength, next.maxLength),
    minItems: higher(base.minItems, next.minItems),
    maxItems: lower(base.maxItems, next.maxItems),
    minimum: higherBound(base.minimum, next.minimum),
    maximum: lowerBound(base.maximum, next.maximum),
    pattern: next.pattern ?? base.pattern,
    enumValues: next.enumValues ?? base.enumValues,
  });
}

export function mergeAll(sets: Iterable<ConstraintSet>): ConstraintSet {
  let merged: ConstraintSet = EMPTY_CONSTRAINTS;
  for (const set of sets) {
    merged = mergeConstraints(merged, set);
  }
  return merged;
}

function compact(set: ConstraintSet): ConstraintSet {
  const out: ConstraintSet = {};
  for (const [key, value] of Object.entries(set)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}

export interface Contradiction {
  field: 'length' | 'items' | 'range';
  lower: string;
  upper: string;
}

export function findContradictions(set: ConstraintSet): Contradiction[] {
  const found: Contradiction[] = [];
  if (
    set.minLength !== undefined &&
    set.maxLength !== undefined &&
    set.minLength > set.maxLength
  ) {
    found.push({
      field: 'length',
      lower: String(set.minLength),
      upper: String(set.maxLength),
    });
  }
  if (
    set.minItems !== undefined &&
    set.maxItems !== undefined &&
    set.minItems > set.maxItems
  ) {
    found.push({
      field: 'items',
      lower: String(set.minItems),
      upper: String(set.maxItems),
    });
  }
  if (set.minimum && set.maximum) {
    const order = compareDecimal(set.minimum.value, set.maximum.value);
    const touching =
      order === 0 && (set.minimum.exclusive || set.maximum.exclusive);
    if (order > 0 || touching) {
      found.push({
        field: 'range',
        lower: formatDecimal(set.minimum.value),
        upper: formatDecimal(set.maximum.value),
      });
    }
  }
  return found;
}
