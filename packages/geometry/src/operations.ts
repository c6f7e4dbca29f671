import type {
  Additive,
  Coercible,
  Defaultable,
  Divisible,
  Eq,
  Multiplicative,
  Promotion,
  SquareRoot,
} from "@planar/std";
import { pointFrom, vectorFrom, zeroVector } from "./constructors.js";
import { Point, Vector } from "./types.js";

// ---------------------------------------------------------------------------
// Vector arithmetic
// ---------------------------------------------------------------------------

/** `v += w`, in place */
export function addAssign<T>(v: Vector<T>, w: Vector<T>, A: Additive<T>): Vector<T> {
  v.x = A.add(v.x, w.x);
  v.y = A.add(v.y, w.y);
  return v;
}

/** `v -= w`, in place */
export function subAssign<T>(v: Vector<T>, w: Vector<T>, A: Additive<T>): Vector<T> {
  v.x = A.sub(v.x, w.x);
  v.y = A.sub(v.y, w.y);
  return v;
}

/** `v *= scalar`, in place */
export function scaleAssign<T>(v: Vector<T>, scalar: T, M: Multiplicative<T>): Vector<T> {
  v.x = M.mul(v.x, scalar);
  v.y = M.mul(v.y, scalar);
  return v;
}

/** `v /= scalar`, in place. A zero scalar divides with the element type's own semantics. */
export function divideAssign<T>(v: Vector<T>, scalar: T, D: Divisible<T>): Vector<T> {
  v.x = D.div(v.x, scalar);
  v.y = D.div(v.y, scalar);
  return v;
}

/** `v += w` where `w`'s element type converts to `v`'s, in place */
export function addAssignFrom<T, U>(
  v: Vector<T>,
  w: Vector<U>,
  C: Coercible<U, T>,
  A: Additive<T>
): Vector<T> {
  return addAssign(v, vectorFrom(w, C), A);
}

/** `v -= w` where `w`'s element type converts to `v`'s, in place */
export function subAssignFrom<T, U>(
  v: Vector<T>,
  w: Vector<U>,
  C: Coercible<U, T>,
  A: Additive<T>
): Vector<T> {
  return subAssign(v, vectorFrom(w, C), A);
}

/** `v *= scalar` with a scalar that converts to `v`'s element type, in place */
export function scaleAssignFrom<T, U>(
  v: Vector<T>,
  scalar: U,
  C: Coercible<U, T>,
  M: Multiplicative<T>
): Vector<T> {
  return scaleAssign(v, C.coerce(scalar), M);
}

/** `v /= scalar` with a scalar that converts to `v`'s element type, in place */
export function divideAssignFrom<T, U>(
  v: Vector<T>,
  scalar: U,
  C: Coercible<U, T>,
  D: Divisible<T>
): Vector<T> {
  return divideAssign(v, C.coerce(scalar), D);
}

/** Component-wise vector addition */
export function addVec<T>(a: Vector<T>, b: Vector<T>, A: Additive<T>): Vector<T> {
  return new Vector(A.add(a.x, b.x), A.add(a.y, b.y));
}

/** Component-wise vector subtraction */
export function subVec<T>(a: Vector<T>, b: Vector<T>, A: Additive<T>): Vector<T> {
  return new Vector(A.sub(a.x, b.x), A.sub(a.y, b.y));
}

/** Scale a vector by a scalar: `v * scalar` */
export function scale<T>(v: Vector<T>, scalar: T, M: Multiplicative<T>): Vector<T> {
  return new Vector(M.mul(v.x, scalar), M.mul(v.y, scalar));
}

/** `scalar * v`, the same as `scale(v, scalar)` */
export function premultiply<T>(scalar: T, v: Vector<T>, M: Multiplicative<T>): Vector<T> {
  return scale(v, scalar, M);
}

/**
 * Divide a vector by a scalar: `v / scalar`.
 *
 * There is no zero check: a zero scalar gives `Infinity`/`NaN` for `number`
 * and throws `RangeError` for `bigint`.
 */
export function divide<T>(v: Vector<T>, scalar: T, D: Divisible<T>): Vector<T> {
  return new Vector(D.div(v.x, scalar), D.div(v.y, scalar));
}

/** Euclidean length of a vector, using the element type's square root */
export function length<T>(
  v: Vector<T>,
  S: Additive<T> & Multiplicative<T> & SquareRoot<T>
): T {
  return S.sqrt(S.add(S.mul(v.x, v.x), S.mul(v.y, v.y)));
}

/** Unit vector in the same direction. Returns the zero vector if the length is 0. */
export function normalized<T>(
  v: Vector<T>,
  S: Additive<T> & Multiplicative<T> & Divisible<T> & SquareRoot<T> & Eq<T> & Defaultable<T>
): Vector<T> {
  const l = length(v, S);
  if (S.equals(l, S.defaultValue())) return zeroVector(S);
  return divide(v, l, S);
}

// ---------------------------------------------------------------------------
// Point / vector arithmetic
// ---------------------------------------------------------------------------

/** Translate a point by a vector: `p + v` */
export function translate<T>(p: Point<T>, v: Vector<T>, A: Additive<T>): Point<T> {
  return new Point(A.add(p.x, v.x), A.add(p.y, v.y));
}

/** Translate a point back by a vector: `p - v` */
export function untranslate<T>(p: Point<T>, v: Vector<T>, A: Additive<T>): Point<T> {
  return new Point(A.sub(p.x, v.x), A.sub(p.y, v.y));
}

/** `p += v`, in place */
export function translateAssign<T>(p: Point<T>, v: Vector<T>, A: Additive<T>): Point<T> {
  p.x = A.add(p.x, v.x);
  p.y = A.add(p.y, v.y);
  return p;
}

/** `p -= v`, in place */
export function untranslateAssign<T>(p: Point<T>, v: Vector<T>, A: Additive<T>): Point<T> {
  p.x = A.sub(p.x, v.x);
  p.y = A.sub(p.y, v.y);
  return p;
}

/** `p += v` where `v`'s element type converts to `p`'s, in place */
export function translateAssignFrom<T, U>(
  p: Point<T>,
  v: Vector<U>,
  C: Coercible<U, T>,
  A: Additive<T>
): Point<T> {
  return translateAssign(p, vectorFrom(v, C), A);
}

/** `p -= v` where `v`'s element type converts to `p`'s, in place */
export function untranslateAssignFrom<T, U>(
  p: Point<T>,
  v: Vector<U>,
  C: Coercible<U, T>,
  A: Additive<T>
): Point<T> {
  return untranslateAssign(p, vectorFrom(v, C), A);
}

/** The vector from `b` to `a`: `a - b` */
export function subPoints<T>(a: Point<T>, b: Point<T>, A: Additive<T>): Vector<T> {
  return new Vector(A.sub(a.x, b.x), A.sub(a.y, b.y));
}

/** Displacement vector from one point to another: `to - from` */
export function displacement<T>(from: Point<T>, to: Point<T>, A: Additive<T>): Vector<T> {
  return subPoints(to, from, A);
}

// ---------------------------------------------------------------------------
// Mixed element types — both operands are widened to the promotion's common type
// ---------------------------------------------------------------------------

export function addVecPromoted<L, R, C>(
  a: Vector<L>,
  b: Vector<R>,
  P: Promotion<L, R, C>,
  A: Additive<C>
): Vector<C> {
  return addVec(vectorFrom(a, P.left), vectorFrom(b, P.right), A);
}

export function subVecPromoted<L, R, C>(
  a: Vector<L>,
  b: Vector<R>,
  P: Promotion<L, R, C>,
  A: Additive<C>
): Vector<C> {
  return subVec(vectorFrom(a, P.left), vectorFrom(b, P.right), A);
}

export function scalePromoted<L, R, C>(
  v: Vector<L>,
  scalar: R,
  P: Promotion<L, R, C>,
  M: Multiplicative<C>
): Vector<C> {
  return scale(vectorFrom(v, P.left), P.right.coerce(scalar), M);
}

export function dividePromoted<L, R, C>(
  v: Vector<L>,
  scalar: R,
  P: Promotion<L, R, C>,
  D: Divisible<C>
): Vector<C> {
  return divide(vectorFrom(v, P.left), P.right.coerce(scalar), D);
}

export function translatePromoted<L, R, C>(
  p: Point<L>,
  v: Vector<R>,
  P: Promotion<L, R, C>,
  A: Additive<C>
): Point<C> {
  return translate(pointFrom(p, P.left), vectorFrom(v, P.right), A);
}

export function untranslatePromoted<L, R, C>(
  p: Point<L>,
  v: Vector<R>,
  P: Promotion<L, R, C>,
  A: Additive<C>
): Point<C> {
  return untranslate(pointFrom(p, P.left), vectorFrom(v, P.right), A);
}

export function subPointsPromoted<L, R, C>(
  a: Point<L>,
  b: Point<R>,
  P: Promotion<L, R, C>,
  A: Additive<C>
): Vector<C> {
  return subPoints(pointFrom(a, P.left), pointFrom(b, P.right), A);
}
