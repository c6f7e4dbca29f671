import type { Coercible, Defaultable } from "@planar/std";
import { Point, Vector } from "./types.js";

/** Create a 2D vector */
export function vec2<T>(x: T, y: T): Vector<T> {
  return new Vector(x, y);
}

/** Create a 2D point */
export function point2d<T>(x: T, y: T): Point<T> {
  return new Point(x, y);
}

/** The zero vector: both coordinates are the element type's default (zero) */
export function zeroVector<T>(Z: Defaultable<T>): Vector<T> {
  return Vector.zero(Z);
}

/** The origin: both coordinates are the element type's default (zero) */
export function origin<T>(Z: Defaultable<T>): Point<T> {
  return Point.zero(Z);
}

/** Convert each coordinate of a vector into another element type */
export function vectorFrom<U, T>(v: Vector<U>, C: Coercible<U, T>): Vector<T> {
  return new Vector(C.coerce(v.x), C.coerce(v.y));
}

/** Convert each coordinate of a point into another element type */
export function pointFrom<U, T>(p: Point<U>, C: Coercible<U, T>): Point<T> {
  return new Point(C.coerce(p.x), C.coerce(p.y));
}
