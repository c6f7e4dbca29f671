import { describe, it, expect } from "vitest";
import {
  GT,
  LT,
  bigIntToRational,
  formatRational,
  numericRational,
  ordRational,
  rational,
  rationalScalar,
  rationalToNumber,
} from "../index.js";

describe("rational", () => {
  it("reduces to lowest terms", () => {
    expect(rational(6n, 8n)).toEqual({ num: 3n, den: 4n });
  });

  it("keeps the denominator positive", () => {
    expect(rational(1n, -2n)).toEqual({ num: -1n, den: 2n });
    expect(rational(-3, -9)).toEqual({ num: 1n, den: 3n });
  });

  it("normalizes zero", () => {
    expect(rational(0n, -7n)).toEqual({ num: 0n, den: 1n });
  });

  it("defaults the denominator to one", () => {
    expect(rational(5)).toEqual({ num: 5n, den: 1n });
  });

  it("rejects a zero denominator", () => {
    expect(() => rational(1n, 0n)).toThrow(RangeError);
  });
});

describe("numericRational", () => {
  const half = rational(1n, 2n);
  const third = rational(1n, 3n);

  it("adds and subtracts exactly", () => {
    expect(numericRational.add(half, third)).toEqual({ num: 5n, den: 6n });
    expect(numericRational.sub(third, half)).toEqual({ num: -1n, den: 6n });
  });

  it("multiplies and divides exactly", () => {
    expect(numericRational.mul(half, third)).toEqual({ num: 1n, den: 6n });
    expect(numericRational.div(half, third)).toEqual({ num: 3n, den: 2n });
  });

  it("throws on division by zero", () => {
    expect(() => numericRational.div(half, numericRational.defaultValue())).toThrow(
      "Rational division by zero"
    );
  });
});

describe("ordRational", () => {
  it("compares by cross-multiplication", () => {
    expect(ordRational.compare(rational(1n, 3n), rational(1n, 2n))).toBe(LT);
    expect(ordRational.compare(rational(-1n, 2n), rational(-2n, 3n))).toBe(GT);
    expect(ordRational.equals(rational(2n, 4n), rational(1n, 2n))).toBe(true);
  });
});

describe("formatting and conversion", () => {
  it("formats fractions and integers", () => {
    expect(formatRational(rational(3n, 4n))).toBe("3/4");
    expect(formatRational(rational(-8n, 4n))).toBe("-2");
    expect(rationalScalar.display(rational(1n, 3n))).toBe("1/3");
  });

  it("widens bigint exactly and narrows to number", () => {
    expect(bigIntToRational.coerce(7n)).toEqual({ num: 7n, den: 1n });
    expect(rationalToNumber.coerce(rational(3n, 4n))).toBe(0.75);
    expect(rationalToNumber.coerce(rational(-7n, 2n))).toBe(-3.5);
  });

  it("converts values whose parts overflow a double", () => {
    const big = 10n ** 400n;
    expect(rationalToNumber.coerce(rational(big + 1n, big))).toBe(1);
    expect(rationalToNumber.coerce(rational(big + 1n, 2n * big))).toBeCloseTo(0.5, 12);
    expect(rationalToNumber.coerce(rational(-(big + 1n), 2n * big))).toBeCloseTo(-0.5, 12);
    expect(rationalToNumber.coerce(rational(1n, big))).toBe(0);
  });

  it("converts magnitudes beyond the double range to infinity", () => {
    const big = 10n ** 400n;
    expect(rationalToNumber.coerce(rational(big))).toBe(Infinity);
    expect(rationalToNumber.coerce(rational(-big, 3n))).toBe(-Infinity);
  });
});
