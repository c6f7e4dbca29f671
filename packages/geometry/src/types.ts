import { requires } from "@planar/contracts";
import type { Defaultable } from "@planar/std";

function checkIndex(index: number): void {
  requires(index === 0 || index === 1, `index ${index} is out of range for a 2D coordinate`);
}

/**
 * The two mutable coordinates shared by {@link Vector} and {@link Point}.
 *
 * Indexed access takes a plain `number` so it can be driven by loops; an
 * index other than 0 or 1 is a precondition violation.
 */
export abstract class Coordinates<T> {
  constructor(
    public x: T,
    public y: T
  ) {}

  /** x for index 0, y for index 1. */
  at(index: number): T {
    checkIndex(index);
    return index === 0 ? this.x : this.y;
  }

  set(index: number, value: T): void {
    checkIndex(index);
    if (index === 0) {
      this.x = value;
    } else {
      this.y = value;
    }
  }

  /**
   * Copy both coordinates from another value of the same shape and element
   * type. Use `vectorFrom`/`pointFrom` first to assign across element types.
   */
  assign(source: this): this {
    this.x = source.x;
    this.y = source.y;
    return this;
  }

  /** `"x, y"`, using each coordinate's own `String()` form. */
  toString(): string {
    return `${String(this.x)}, ${String(this.y)}`;
  }
}

/**
 * A free displacement in 2D: magnitude and direction, no location.
 */
export class Vector<T> extends Coordinates<T> {
  readonly kind = "vector";

  /** `(zero, zero)` for the element type. */
  static zero<T>(Z: Defaultable<T>): Vector<T> {
    return new Vector(Z.defaultValue(), Z.defaultValue());
  }

  clone(): Vector<T> {
    return new Vector(this.x, this.y);
  }
}

/**
 * A fixed position in 2D. Points translate by vectors and subtract to
 * vectors; they cannot be added or scaled.
 */
export class Point<T> extends Coordinates<T> {
  readonly kind = "point";

  /** The origin for the element type. */
  static zero<T>(Z: Defaultable<T>): Point<T> {
    return new Point(Z.defaultValue(), Z.defaultValue());
  }

  clone(): Point<T> {
    return new Point(this.x, this.y);
  }
}
