import { numericRational, ordRational, printableRational, type Rational } from "../data/rational.js";
import {
  numericBigInt,
  numericNumber,
  ordBigInt,
  ordNumber,
  printableBigInt,
  printableNumber,
  sqrtBigInt,
  sqrtNumber,
  type Numeric,
  type Ord,
  type Printable,
  type SquareRoot,
} from "./index.js";

/**
 * Every capability an element type ships with, in one object, so call sites
 * can pass a single instance wherever any subset is required.
 */
export interface Scalar<A> extends Numeric<A>, Ord<A>, Printable<A> {}

export const numberScalar: Scalar<number> & SquareRoot<number> = {
  ...numericNumber,
  ...ordNumber,
  ...printableNumber,
  ...sqrtNumber,
};

export const bigintScalar: Scalar<bigint> & SquareRoot<bigint> = {
  ...numericBigInt,
  ...ordBigInt,
  ...printableBigInt,
  ...sqrtBigInt,
};

export const rationalScalar: Scalar<Rational> = {
  ...numericRational,
  ...ordRational,
  ...printableRational,
};
