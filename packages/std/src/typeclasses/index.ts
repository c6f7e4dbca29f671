/**
 * Standard Typeclasses
 *
 * Small capability interfaces in the style of Haskell and Scala 3 type
 * classes. Generic code asks for exactly the capabilities it uses — `Additive`
 * for `+`/`-`, `SquareRoot` for `sqrt`, `Ord` for ordering — rather than one
 * monolithic number interface, and callers pass the instance explicitly:
 *
 * ```ts
 * function sum<A>(xs: A[], N: Additive<A> & Defaultable<A>): A {
 *   return xs.reduce(N.add, N.defaultValue());
 * }
 * sum([1n, 2n], numericBigInt); // 3n
 * ```
 */

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 * - `notEquals(x, y) === !equals(x, y)`
 *
 * @typeclass
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/**
 * Create an Eq instance from a custom equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// PartialOrd / Ord — Rust PartialOrd/Ord, Haskell Ord, Scala Ordering
// ============================================================================

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * PartialOrd typeclass - a partial order.
 *
 * Some pairs are incomparable: for them `partialCompare` is `undefined` and
 * all four relations are false.
 *
 * @typeclass
 */
export interface PartialOrd<A> extends Eq<A> {
  partialCompare(a: A, b: A): Ordering | undefined;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 *
 * @typeclass
 */
export interface Ord<A> extends PartialOrd<A> {
  compare(a: A, b: A): Ordering;
}

export const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  partialCompare: (a, b) => (a < b ? LT : a > b ? GT : a === b ? EQ_ORD : undefined),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

export const ordBigInt: Ord<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  partialCompare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
};

/**
 * Create a PartialOrd from equality and `<=`.
 *
 * `lessThan` is `<=` without equality; the `greater*` relations swap the
 * arguments.
 */
export function makePartialOrd<A>(
  equals: (a: A, b: A) => boolean,
  lessThanOrEqual: (a: A, b: A) => boolean
): PartialOrd<A> {
  const lessThan = (a: A, b: A): boolean => lessThanOrEqual(a, b) && !equals(a, b);
  return {
    equals,
    notEquals: (a, b) => !equals(a, b),
    partialCompare: (a, b) => {
      if (equals(a, b)) return EQ_ORD;
      if (lessThanOrEqual(a, b)) return LT;
      if (lessThanOrEqual(b, a)) return GT;
      return undefined;
    },
    lessThan,
    lessThanOrEqual,
    greaterThan: (a, b) => lessThan(b, a),
    greaterThanOrEqual: (a, b) => lessThanOrEqual(b, a),
  };
}

/**
 * Create an Ord instance from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    compare,
    partialCompare: compare,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

/**
 * Create an Ord instance from a strict `<` (a strict weak ordering).
 *
 * `greaterThan(a, b)` is `lessThan(b, a)`; `lessThanOrEqual` and
 * `greaterThanOrEqual` are the negations of `greaterThan` and `lessThan`.
 */
export function ordFromLessThan<A>(lessThan: (a: A, b: A) => boolean): Ord<A> {
  const greaterThan = (a: A, b: A): boolean => lessThan(b, a);
  const compare = (a: A, b: A): Ordering => (lessThan(a, b) ? LT : greaterThan(a, b) ? GT : EQ_ORD);
  return {
    equals: (a, b) => !lessThan(a, b) && !greaterThan(a, b),
    notEquals: (a, b) => lessThan(a, b) || greaterThan(a, b),
    compare,
    partialCompare: compare,
    lessThan,
    lessThanOrEqual: (a, b) => !greaterThan(a, b),
    greaterThan,
    greaterThanOrEqual: (a, b) => !lessThan(a, b),
  };
}

/**
 * A sorted copy of `xs` under `O`.
 */
export function sorted<A>(xs: Iterable<A>, O: Ord<A>): A[] {
  return [...xs].sort(O.compare);
}

// ============================================================================
// Arithmetic capabilities — Haskell Num/Fractional/Floating split by operation
// ============================================================================

/**
 * Additive typeclass - `+` and `-`.
 *
 * @typeclass
 */
export interface Additive<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
}

/**
 * Multiplicative typeclass - `*`.
 *
 * @typeclass
 */
export interface Multiplicative<A> {
  mul(a: A, b: A): A;
}

/**
 * Divisible typeclass - `/` with the type's own semantics (truncating for
 * integers, IEEE for floats). No zero check is added.
 *
 * @typeclass
 */
export interface Divisible<A> {
  div(a: A, b: A): A;
}

/**
 * SquareRoot typeclass - the type's own square root (floor for integers).
 *
 * @typeclass
 */
export interface SquareRoot<A> {
  sqrt(a: A): A;
}

/**
 * Defaultable typeclass - the default value, which for numeric types is the
 * additive identity.
 *
 * @typeclass
 */
export interface Defaultable<A> {
  defaultValue(): A;
}

/**
 * Numeric typeclass - the four arithmetic operations and zero.
 *
 * @typeclass
 */
export interface Numeric<A> extends Additive<A>, Multiplicative<A>, Divisible<A>, Defaultable<A> {}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  defaultValue: () => 0,
};

/**
 * Numeric instance for bigint. Division truncates toward zero and throws
 * `RangeError` for a zero divisor.
 */
export const numericBigInt: Numeric<bigint> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  defaultValue: () => 0n,
};

export const sqrtNumber: SquareRoot<number> = {
  sqrt: Math.sqrt,
};

/**
 * Integer square root: the largest `r` with `r * r <= a` (Newton's method).
 */
function isqrt(a: bigint): bigint {
  if (a < 0n) {
    throw new RangeError("square root of a negative bigint");
  }
  if (a < 2n) return a;

  let x = a;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + a / x) / 2n;
  }
  return x;
}

export const sqrtBigInt: SquareRoot<bigint> = {
  sqrt: isqrt,
};

// ============================================================================
// Printable — Rust Display, Haskell Show (but human-readable focus)
// ============================================================================

export interface Printable<A> {
  display(a: A): string;
}

export const printableNumber: Printable<number> = {
  display: (a) => String(a),
};

export const printableBigInt: Printable<bigint> = {
  display: (a) => a.toString(),
};

// ============================================================================
// Coercible — Scala Conversion, Rust From/Into
// Safe (widening) type conversions.
// ============================================================================

export interface Coercible<A, B> {
  coerce(a: A): B;
}

/**
 * The conversion of a type to itself.
 */
export function coerceIdentity<A>(): Coercible<A, A> {
  return { coerce: (a) => a };
}

/**
 * bigint → number. Exact up to 2^53; beyond that the nearest double.
 */
export const bigIntToNumber: Coercible<bigint, number> = {
  coerce: (a) => Number(a),
};
