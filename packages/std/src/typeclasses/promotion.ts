/**
 * Numeric promotion.
 *
 * A `Promotion<L, R, C>` names the common type `C` of two element types and
 * how each side widens into it, like C's usual arithmetic conversions or
 * Scala's numeric widening. Only widening promotions ship:
 *
 *   bigint ⊂ Rational ⊂ number
 *
 * so there is no `Promotion<number, bigint, bigint>`, and code asking for one
 * does not type-check.
 */

import {
  bigIntToRational,
  rationalToNumber,
  type Rational,
} from "../data/rational.js";
import { bigIntToNumber, coerceIdentity, type Coercible } from "./index.js";

export interface Promotion<L, R, C> {
  readonly left: Coercible<L, C>;
  readonly right: Coercible<R, C>;
}

export function promotion<L, R, C>(left: Coercible<L, C>, right: Coercible<R, C>): Promotion<L, R, C> {
  return { left, right };
}

/**
 * The promotion of a type with itself: both sides unchanged.
 */
export function samePromotion<A>(): Promotion<A, A, A> {
  const id = coerceIdentity<A>();
  return { left: id, right: id };
}

/**
 * Swap the sides of a promotion.
 */
export function flipPromotion<L, R, C>(P: Promotion<L, R, C>): Promotion<R, L, C> {
  return { left: P.right, right: P.left };
}

export const bigIntNumberPromotion: Promotion<bigint, number, number> = promotion(
  bigIntToNumber,
  coerceIdentity<number>()
);
export const numberBigIntPromotion: Promotion<number, bigint, number> =
  flipPromotion(bigIntNumberPromotion);

export const bigIntRationalPromotion: Promotion<bigint, Rational, Rational> = promotion(
  bigIntToRational,
  coerceIdentity<Rational>()
);
export const rationalBigIntPromotion: Promotion<Rational, bigint, Rational> =
  flipPromotion(bigIntRationalPromotion);

export const rationalNumberPromotion: Promotion<Rational, number, number> = promotion(
  rationalToNumber,
  coerceIdentity<number>()
);
export const numberRationalPromotion: Promotion<number, Rational, number> =
  flipPromotion(rationalNumberPromotion);
