/**
 * @planar/std — Standard Library
 *
 * Capability typeclasses and their instances for the element types the
 * geometry package is generic over.
 *
 * ## Typeclasses
 *
 * - Eq, PartialOrd, Ord
 * - Additive, Multiplicative, Divisible, SquareRoot, Defaultable, Numeric
 * - Printable, Coercible
 * - Promotion (common type of two element types)
 *
 * ## Element types
 *
 * - number, bigint
 * - Rational (exact bigint fraction)
 *
 * @example
 * ```ts
 * import { numberScalar, bigIntNumberPromotion } from "@planar/std";
 *
 * numberScalar.sqrt(numberScalar.add(9, 16)); // 5
 * bigIntNumberPromotion.left.coerce(2n);      // 2
 * ```
 */

// Typeclasses
export * from "./typeclasses/index.js";
export * from "./typeclasses/promotion.js";
export * from "./typeclasses/scalar.js";

// Data types
export * from "./data/rational.js";
