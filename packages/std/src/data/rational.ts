/**
 * Rational Numbers
 *
 * Exact rational arithmetic using bigint numerator and denominator.
 * All operations return normalized (reduced) form with positive denominator.
 *
 * Rational has Numeric, Ord and Printable instances but no SquareRoot
 * instance: the square root of a rational is generally irrational.
 *
 * @example
 * ```typescript
 * const half = rational(1n, 2n);
 * const third = rational(1n, 3n);
 * const sum = numericRational.add(half, third); // 5/6
 * ```
 */

import type { Coercible, Numeric, Ord, Printable } from "../typeclasses/index.js";
import { EQ_ORD, GT, LT, makeOrd } from "../typeclasses/index.js";

/**
 * Exact rational number represented as num/den.
 * Invariants:
 * - den > 0 (denominator always positive)
 * - gcd(|num|, den) = 1 (always in reduced form)
 */
export interface Rational {
  readonly num: bigint;
  readonly den: bigint;
}

/**
 * Compute GCD of two bigints using Euclidean algorithm.
 */
function gcd(a: bigint, b: bigint): bigint {
  a = a < 0n ? -a : a;
  b = b < 0n ? -b : b;
  while (b !== 0n) {
    const t = b;
    b = a % b;
    a = t;
  }
  return a;
}

/**
 * Normalize a rational: reduce to lowest terms, ensure positive denominator.
 */
function normalize(num: bigint, den: bigint): Rational {
  if (den === 0n) {
    throw new RangeError("Rational: denominator cannot be zero");
  }

  if (num === 0n) {
    return { num: 0n, den: 1n };
  }

  if (den < 0n) {
    num = -num;
    den = -den;
  }

  const g = gcd(num, den);
  return {
    num: num / g,
    den: den / g,
  };
}

/**
 * Create a rational number from numerator and denominator.
 * Auto-reduces and normalizes sign; number arguments are truncated to integers.
 *
 * @throws RangeError if denominator is zero
 */
export function rational(num: bigint | number, den: bigint | number = 1n): Rational {
  const n = typeof num === "number" ? BigInt(Math.trunc(num)) : num;
  const d = typeof den === "number" ? BigInt(Math.trunc(den)) : den;
  return normalize(n, d);
}

/**
 * Format a rational as "num/den", or just "num" when it is an integer.
 */
export function formatRational(r: Rational): string {
  if (r.den === 1n) {
    return r.num.toString();
  }
  return `${r.num}/${r.den}`;
}

/**
 * Numeric instance for Rational numbers: exact add, sub, mul and div.
 * Division by zero throws `RangeError`.
 */
export const numericRational: Numeric<Rational> = {
  add: (a, b) => normalize(a.num * b.den + b.num * a.den, a.den * b.den),
  sub: (a, b) => normalize(a.num * b.den - b.num * a.den, a.den * b.den),
  mul: (a, b) => normalize(a.num * b.num, a.den * b.den),
  div: (a, b) => {
    if (b.num === 0n) {
      throw new RangeError("Rational division by zero");
    }
    return normalize(a.num * b.den, a.den * b.num);
  },
  defaultValue: () => ({ num: 0n, den: 1n }),
};

/**
 * Ord instance for Rational numbers.
 * Compares by cross-multiplication to avoid floating-point.
 */
export const ordRational: Ord<Rational> = makeOrd((a, b) => {
  // a/b vs c/d => compare a*d vs c*b
  const lhs = a.num * b.den;
  const rhs = b.num * a.den;
  return lhs < rhs ? LT : lhs > rhs ? GT : EQ_ORD;
});

export const printableRational: Printable<Rational> = {
  display: formatRational,
};

/**
 * bigint → Rational (exact).
 */
export const bigIntToRational: Coercible<bigint, Rational> = {
  coerce: (a) => ({ num: a, den: 1n }),
};

// Bits kept from the denominator when it is too large for a double.
const FRACTION_BITS = 1000;

function bitLength(n: bigint): number {
  return n === 0n ? 0 : n.toString(2).length;
}

/**
 * Rational → number, the nearest double or ±Infinity for magnitudes beyond
 * the double range.
 *
 * The integer part and the remainder are converted separately; the remainder
 * and denominator are shifted down together so neither overflows.
 */
export const rationalToNumber: Coercible<Rational, number> = {
  coerce: (r) => {
    const whole = r.num / r.den;
    const rem = r.num % r.den;
    const magnitude = rem < 0n ? -rem : rem;
    const shift = BigInt(Math.max(0, bitLength(r.den) - FRACTION_BITS));
    const fraction = Number(magnitude >> shift) / Number(r.den >> shift);
    return Number(whole) + (rem < 0n ? -fraction : fraction);
  },
};
