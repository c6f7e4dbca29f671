import { describe, expect, it } from "vitest";
import {
  EQ_ORD,
  GT,
  LT,
  numberScalar,
  ordBigInt,
  ordNumber,
  sorted,
} from "@planar/std";
import {
  eqPoint,
  eqVector,
  lexicographicPoint,
  lexicographicVector,
  point2d,
  productOrderPoint,
  productOrderVector,
  vec2,
} from "../index.js";

describe("eqVector", () => {
  const E = eqVector(numberScalar);

  it("compares both coordinates exactly", () => {
    expect(E.equals(vec2(1, 2), vec2(1, 2))).toBe(true);
    expect(E.equals(vec2(1, 2), vec2(1, 3))).toBe(false);
    expect(E.equals(vec2(1, 2), vec2(2, 2))).toBe(false);
    expect(E.equals(vec2(0.1 + 0.2, 0), vec2(0.3, 0))).toBe(false);
  });

  it("makes equals and notEquals exclusive", () => {
    const vs = [vec2(0, 0), vec2(1, 2), vec2(2, 1), vec2(1, 2)];
    for (const a of vs) {
      for (const b of vs) {
        expect(E.notEquals(a, b)).toBe(!E.equals(a, b));
      }
    }
  });
});

describe("productOrderVector", () => {
  const O = productOrderVector(numberScalar);

  it("orders vectors whose coordinates agree", () => {
    expect(O.lessThanOrEqual(vec2(1, 1), vec2(2, 2))).toBe(true);
    expect(O.lessThan(vec2(1, 1), vec2(2, 2))).toBe(true);
    expect(O.lessThan(vec2(1, 1), vec2(1, 2))).toBe(true);
    expect(O.greaterThan(vec2(2, 2), vec2(1, 1))).toBe(true);
    expect(O.partialCompare(vec2(1, 1), vec2(2, 2))).toBe(LT);
    expect(O.partialCompare(vec2(2, 2), vec2(1, 1))).toBe(GT);
  });

  it("treats equal vectors as <= but not <", () => {
    expect(O.lessThan(vec2(1, 1), vec2(1, 1))).toBe(false);
    expect(O.lessThanOrEqual(vec2(1, 1), vec2(1, 1))).toBe(true);
    expect(O.greaterThanOrEqual(vec2(1, 2), vec2(1, 2))).toBe(true);
    expect(O.partialCompare(vec2(1, 2), vec2(1, 2))).toBe(EQ_ORD);
  });

  it("leaves crossing vectors incomparable", () => {
    const a = vec2(1, 5);
    const b = vec2(5, 1);
    expect(O.lessThanOrEqual(a, b)).toBe(false);
    expect(O.lessThanOrEqual(b, a)).toBe(false);
    expect(O.lessThan(a, b)).toBe(false);
    expect(O.greaterThan(a, b)).toBe(false);
    expect(O.greaterThanOrEqual(a, b)).toBe(false);
    expect(O.partialCompare(a, b)).toBeUndefined();
  });
});

describe("lexicographicVector", () => {
  const O = lexicographicVector(ordNumber);

  it("compares x first, then y", () => {
    expect(O.lessThan(vec2(1, 5), vec2(5, 1))).toBe(true);
    expect(O.compare(vec2(1, 5), vec2(5, 1))).toBe(LT);
    expect(O.compare(vec2(5, 1), vec2(1, 5))).toBe(GT);
    expect(O.compare(vec2(1, 2), vec2(1, 3))).toBe(LT);
    expect(O.compare(vec2(2, 2), vec2(2, 2))).toBe(EQ_ORD);
  });

  it("derives the other relations from <", () => {
    expect(O.equals(vec2(2, 2), vec2(2, 2))).toBe(true);
    expect(O.lessThanOrEqual(vec2(2, 2), vec2(2, 2))).toBe(true);
    expect(O.greaterThanOrEqual(vec2(2, 3), vec2(2, 2))).toBe(true);
    expect(O.greaterThan(vec2(2, 2), vec2(2, 3))).toBe(false);
  });

  it("orders pairs that the product order cannot", () => {
    const product = productOrderVector(ordNumber);
    expect(product.lessThan(vec2(1, 5), vec2(5, 1))).toBe(false);
    expect(O.lessThan(vec2(1, 5), vec2(5, 1))).toBe(true);
  });

  it("sorts vectors", () => {
    const input = [vec2(5, 1), vec2(1, 5), vec2(1, 2)];
    expect(sorted(input, O)).toEqual([vec2(1, 2), vec2(1, 5), vec2(5, 1)]);
    expect(input).toEqual([vec2(5, 1), vec2(1, 5), vec2(1, 2)]);
  });
});

describe("point instances", () => {
  it("compares points the same way as vectors", () => {
    expect(eqPoint(ordBigInt).equals(point2d(1n, 2n), point2d(1n, 2n))).toBe(true);
    expect(productOrderPoint(ordBigInt).lessThanOrEqual(point2d(1n, 1n), point2d(2n, 2n))).toBe(
      true
    );
    expect(productOrderPoint(ordBigInt).partialCompare(point2d(1n, 5n), point2d(5n, 1n))).toBe(
      undefined
    );
    expect(
      sorted([point2d(2n, 0n), point2d(1n, 9n), point2d(1n, 3n)], lexicographicPoint(ordBigInt))
    ).toEqual([point2d(1n, 3n), point2d(1n, 9n), point2d(2n, 0n)]);
  });
});
