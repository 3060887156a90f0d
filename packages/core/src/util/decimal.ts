// Exact decimal values for schema bounds.
//
// Bounds are kept as reduced rationals built from the decimal literal of the
// rule parameter (the shortest round-trip form for numbers), so `5.1` is
// exactly 51/10 and compares equal to another `5.1` or to "5.10".

import { ConfigError } from '../types/errors.js';
import type { NumericParam } from '../types/rules.js';

export type Decimal = { readonly p: bigint; readonly q: bigint };

const DECIMAL_LITERAL = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const MAX_SCALE = 400;
// Beyond this a bound cannot be written as a finite JSON number
const MAX_EXPONENT = 400;

export function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

export function reduce(p: bigint, q: bigint): Decimal {
  if (q === 0n) throw new Error('Denominator must be non-zero');
  if (q < 0n) {
    p = -p;
    q = -q;
  }
  if (p === 0n) return { p: 0n, q: 1n };
  const g = gcd(p, q);
  return { p: p / g, q: q / g };
}

export function toDecimal(value: NumericParam): Decimal {
  const literal = typeof value === 'number' ? numberLiteral(value) : value;
  const match = DECIMAL_LITERAL.exec(literal.trim());
  const intPart = match?.[2] ?? '';
  const fracPart = match?.[3] ?? '';
  if (!match || intPart.length + fracPart.length === 0) {
    throw new ConfigError({
      message: `Invalid numeric rule parameter: ${JSON.stringify(value)}`,
      context: { value },
    });
  }

  const sign = match[1] === '-' ? -1n : 1n;
  const exponent = Number(match[4] ?? '0') - fracPart.length;
  if (!Number.isSafeInteger(exponent) || Math.abs(exponent) > MAX_EXPONENT) {
    throw outOfRange(value);
  }
  let p = sign * BigInt(intPart + fracPart);
  let q = 1n;
  if (exponent >= 0) {
    p *= 10n ** BigInt(exponent);
  } else {
    q = 10n ** BigInt(-exponent);
  }
  const decimal = reduce(p, q);
  if (!Number.isFinite(Number(formatDecimal(decimal)))) {
    throw outOfRange(value);
  }
  return decimal;
}

function outOfRange(value: NumericParam): ConfigError {
  return new ConfigError({
    message: `Numeric rule parameter is out of range: ${JSON.stringify(value)}`,
    context: { value },
  });
}

function numberLiteral(value: number): string {
  if (!Number.isFinite(value)) {
    throw new ConfigError({
      message: `Numeric rule parameter must be finite, got ${value}`,
      context: { value },
    });
  }
  return String(value);
}

export function compareDecimal(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const left = a.p * b.q;
  const right = b.p * a.q;
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function decimalEquals(a: Decimal, b: Decimal): boolean {
  return compareDecimal(a, b) === 0;
}

/**
 * Plain decimal string for a terminating decimal (denominator of the form
 * 2^a * 5^b, which is always the case for values built by toDecimal).
 */
export function formatDecimal(d: Decimal): string {
  if (d.q === 1n) return d.p.toString();

  let scale = 1n;
  let digits = 0;
  while (scale % d.q !== 0n) {
    scale *= 10n;
    digits += 1;
    if (digits > MAX_SCALE) {
      return String(Number(d.p) / Number(d.q));
    }
  }

  const negative = d.p < 0n;
  const magnitude = ((negative ? -d.p : d.p) * (scale / d.q))
    .toString()
    .padStart(digits + 1, '0');
  const intPart = magnitude.slice(0, magnitude.length - digits);
  const fracPart = magnitude.slice(magnitude.length - digits);
  return `${negative ? '-' : ''}${intPart}.${fracPart}`;
}

export function decimalToNumber(d: Decimal): number {
  const value = Number(formatDecimal(d));
  if (!Number.isFinite(value)) {
    throw new ConfigError({
      message: `Bound ${d.p}/${d.q} has no finite number form`,
      context: { p: d.p.toString(), q: d.q.toString() },
    });
  }
  return value;
}
