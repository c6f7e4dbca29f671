/**
 * Typeclass instances for geometry types.
 *
 * Vectors and points carry two orders, on purpose:
 *
 * - The **product order** (`productOrderVector`, `productOrderPoint`):
 *   `a <= b` when both coordinates are `<=`. It is partial; `(1, 5)` and
 *   `(5, 1)` are incomparable. These are the relational operators.
 * - The **lexicographic order** (`lexicographicVector`, `lexicographicPoint`):
 *   x first, then y. It is total, so use it to sort or to key ordered
 *   collections. It is not the same relation as the product order.
 */

import {
  makeEq,
  makePartialOrd,
  ordFromLessThan,
  type Eq,
  type Ord,
  type PartialOrd,
  type Printable,
} from "@planar/std";
import type { Coordinates, Point, Vector } from "./types.js";

// ============================================================================
// Shared by both shapes
// ============================================================================

function coordinatesEq<T, S extends Coordinates<T>>(E: Eq<T>): Eq<S> {
  return makeEq<S>((a, b) => E.equals(a.x, b.x) && E.equals(a.y, b.y));
}

function coordinatesProductOrder<T, S extends Coordinates<T>>(O: PartialOrd<T>): PartialOrd<S> {
  return makePartialOrd<S>(
    (a, b) => O.equals(a.x, b.x) && O.equals(a.y, b.y),
    (a, b) => O.lessThanOrEqual(a.x, b.x) && O.lessThanOrEqual(a.y, b.y)
  );
}

function coordinatesLexicographic<T, S extends Coordinates<T>>(O: Ord<T>): Ord<S> {
  return ordFromLessThan<S>(
    (a, b) => O.lessThan(a.x, b.x) || (!O.lessThan(b.x, a.x) && O.lessThan(a.y, b.y))
  );
}

function coordinatesPrintable<T, S extends Coordinates<T>>(P: Printable<T>): Printable<S> {
  return {
    display: (c) => `${P.display(c.x)}, ${P.display(c.y)}`,
  };
}

// ============================================================================
// Vector instances
// ============================================================================

/** Exact component-wise equality; no tolerance. */
export function eqVector<T>(E: Eq<T>): Eq<Vector<T>> {
  return coordinatesEq<T, Vector<T>>(E);
}

/** Product order: `==`, `!=`, `<=`, `>=`, `<` and `>` for vectors. */
export function productOrderVector<T>(O: PartialOrd<T>): PartialOrd<Vector<T>> {
  return coordinatesProductOrder<T, Vector<T>>(O);
}

/** Lexicographic total order for sorting and ordered collections. */
export function lexicographicVector<T>(O: Ord<T>): Ord<Vector<T>> {
  return coordinatesLexicographic<T, Vector<T>>(O);
}

/** `"x, y"` */
export function printableVector<T>(P: Printable<T>): Printable<Vector<T>> {
  return coordinatesPrintable<T, Vector<T>>(P);
}

// ============================================================================
// Point instances
// ============================================================================

export function eqPoint<T>(E: Eq<T>): Eq<Point<T>> {
  return coordinatesEq<T, Point<T>>(E);
}

export function productOrderPoint<T>(O: PartialOrd<T>): PartialOrd<Point<T>> {
  return coordinatesProductOrder<T, Point<T>>(O);
}

export function lexicographicPoint<T>(O: Ord<T>): Ord<Point<T>> {
  return coordinatesLexicographic<T, Point<T>>(O);
}

export function printablePoint<T>(P: Printable<T>): Printable<Point<T>> {
  return coordinatesPrintable<T, Point<T>>(P);
}
