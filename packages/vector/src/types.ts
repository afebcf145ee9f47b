/**
 * Vector value types.
 *
 * Vectors are plain readonly records. Points and colours are the same shape
 * with a type-level role brand, so a position cannot be passed where only a
 * displacement makes sense (and vice versa) without an explicit conversion.
 * The brand has no runtime representation.
 */

import type { Scalar } from "./scalar.js";

/** A 2-dimensional vector. */
export interface Vec2 {
  readonly x: Scalar;
  readonly y: Scalar;
}

/** A 3-dimensional vector. */
export interface Vec3 {
  readonly x: Scalar;
  readonly y: Scalar;
  readonly z: Scalar;
}

/** Type-level brand for the semantic role of a vector */
export interface Role<R extends string> {
  readonly __role: R;
}

/** A position in 2D space. Every Vec2 operation accepts it. */
export type Point2D = Vec2 & Role<"Point">;

/** A position in 3D space. Every Vec3 operation accepts it. */
export type Point3D = Vec3 & Role<"Point">;

/** An RGB colour; components are conventionally in [0, 1] but not checked. */
export type Colour = Vec3 & Role<"Colour">;
