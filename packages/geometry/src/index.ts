/**
 * @planar/geometry — Type-safe 2D points and vectors.
 *
 * `Vector<T>` and `Point<T>` are generic over the element type. Operations
 * take the capability instances they need from `@planar/std` explicitly, so
 * `length` is available for `number` and `bigint` (which have a square root)
 * but not for `Rational`. Points and vectors are distinct types: a point
 * cannot be added to a point, scaled, or measured.
 *
 * @example
 * ```ts
 * import { numberScalar } from "@planar/std";
 * import { point2d, vec2, translate, subPoints } from "@planar/geometry";
 *
 * translate(point2d(1, 1), vec2(2, 3), numberScalar); // Point(3, 4)
 * subPoints(point2d(3, 4), point2d(1, 1), numberScalar); // Vector(2, 3)
 * ```
 *
 * @packageDocumentation
 */

export { Coordinates, Point, Vector } from "./types.js";

export { vec2, point2d, zeroVector, origin, vectorFrom, pointFrom } from "./constructors.js";

export {
  addAssign,
  subAssign,
  scaleAssign,
  divideAssign,
  addAssignFrom,
  subAssignFrom,
  scaleAssignFrom,
  divideAssignFrom,
  addVec,
  subVec,
  scale,
  premultiply,
  divide,
  length,
  normalized,
  translate,
  untranslate,
  translateAssign,
  untranslateAssign,
  translateAssignFrom,
  untranslateAssignFrom,
  subPoints,
  displacement,
  addVecPromoted,
  subVecPromoted,
  scalePromoted,
  dividePromoted,
  translatePromoted,
  untranslatePromoted,
  subPointsPromoted,
} from "./operations.js";

export {
  eqVector,
  productOrderVector,
  lexicographicVector,
  printableVector,
  eqPoint,
  productOrderPoint,
  lexicographicPoint,
  printablePoint,
} from "./typeclasses.js";

export { print, type TextSink } from "./format.js";
