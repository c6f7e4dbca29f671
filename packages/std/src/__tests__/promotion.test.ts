import { describe, it, expect, expectTypeOf } from "vitest";
import {
  bigIntNumberPromotion,
  bigIntToNumber,
  bigIntRationalPromotion,
  flipPromotion,
  numberBigIntPromotion,
  numberRationalPromotion,
  numericNumber,
  rational,
  rationalBigIntPromotion,
  rationalNumberPromotion,
  rationalToNumber,
  samePromotion,
  type Coercible,
  type Promotion,
  type Rational,
} from "../index.js";

function addPromoted<L, R, C>(a: L, b: R, P: Promotion<L, R, C>, add: (x: C, y: C) => C): C {
  return add(P.left.coerce(a), P.right.coerce(b));
}

describe("promotions", () => {
  it("widens bigint with number to number", () => {
    expect(addPromoted(2n, 0.5, bigIntNumberPromotion, numericNumber.add)).toBe(2.5);
    expect(addPromoted(0.5, 2n, numberBigIntPromotion, numericNumber.add)).toBe(2.5);
  });

  it("widens bigint with Rational to Rational", () => {
    expect(bigIntRationalPromotion.left.coerce(3n)).toEqual({ num: 3n, den: 1n });
    expect(rationalBigIntPromotion.right.coerce(3n)).toEqual({ num: 3n, den: 1n });
  });

  it("widens Rational with number to number", () => {
    expect(numberRationalPromotion.right.coerce(rational(1n, 4n))).toBe(0.25);
    expect(numberRationalPromotion.left.coerce(1.5)).toBe(1.5);
  });

  it("leaves both sides of the same type unchanged", () => {
    const same = samePromotion<bigint>();
    expect(same.left.coerce(5n)).toBe(5n);
    expect(same.right.coerce(6n)).toBe(6n);
  });

  it("flips the sides", () => {
    const flipped = flipPromotion(bigIntNumberPromotion);
    expect(flipped.left.coerce(1.25)).toBe(1.25);
    expect(flipped.right.coerce(9n)).toBe(9);
  });

  it("ships no narrowing promotion", () => {
    expectTypeOf(numberBigIntPromotion).not.toMatchTypeOf<Promotion<number, bigint, bigint>>();
    expectTypeOf(bigIntNumberPromotion).not.toMatchTypeOf<Promotion<bigint, number, bigint>>();
    expectTypeOf(rationalNumberPromotion).not.toMatchTypeOf<
      Promotion<Rational, number, Rational>
    >();
    expectTypeOf(bigIntToNumber).not.toMatchTypeOf<Coercible<number, bigint>>();
    expectTypeOf(rationalToNumber).not.toMatchTypeOf<Coercible<number, Rational>>();
  });
});
