/**
 * Vec3 / Point3D / Colour — 3D vector math
 *
 * Vector arithmetic, dot and cross products, and normalization for
 * graphics, ray tracing and physics code.
 *
 * @example
 * ```typescript
 * cross(UNIT_X, UNIT_Y);        // { x: 0, y: 0, z: 1 }
 * display(vec3(1, 0.5, -2));    // "(1, 0.5, -2)"
 * ```
 */

import { ZeroVectorError, compareLexicographic, config, reportError } from "@vecmat/core";
import type { Ordering } from "@vecmat/core";
import { formatScalar, type Scalar } from "./scalar.js";
import type { Colour, Point3D, Vec3 } from "./types.js";

// ============================================================================
// Constructors & Constants
// ============================================================================

/** Create a 3D vector */
export function vec3(x: Scalar, y: Scalar, z: Scalar): Vec3 {
  return { x, y, z };
}

/** Create a 3D point */
export function point3d(x: Scalar, y: Scalar, z: Scalar): Point3D {
  return { x, y, z } as Point3D;
}

/** Create an RGB colour */
export function colour(r: Scalar, g: Scalar, b: Scalar): Colour {
  return { x: r, y: g, z: b } as Colour;
}

/** Treat an existing vector as a position */
export function asPoint3D(v: Vec3): Point3D {
  return point3d(v.x, v.y, v.z);
}

/** Treat an existing vector as a colour */
export function asColour(v: Vec3): Colour {
  return colour(v.x, v.y, v.z);
}

/** `(0, 0, 0)` */
export const ZERO: Vec3 = Object.freeze(vec3(0, 0, 0));
/** `(1, 1, 1)` */
export const ONE: Vec3 = Object.freeze(vec3(1, 1, 1));
/** `(1, 0, 0)` */
export const UNIT_X: Vec3 = Object.freeze(vec3(1, 0, 0));
/** `(0, 1, 0)` */
export const UNIT_Y: Vec3 = Object.freeze(vec3(0, 1, 0));
/** `(0, 0, 1)` */
export const UNIT_Z: Vec3 = Object.freeze(vec3(0, 0, 1));

/** The default Vec3, equal to {@link ZERO} */
export function defaultValue(): Vec3 {
  return ZERO;
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Component-wise addition */
export function add(a: Vec3, b: Vec3): Vec3 {
  return vec3(a.x + b.x, a.y + b.y, a.z + b.z);
}

/** Component-wise subtraction */
export function sub(a: Vec3, b: Vec3): Vec3 {
  return vec3(a.x - b.x, a.y - b.y, a.z - b.z);
}

/** Negate each component */
export function neg(v: Vec3): Vec3 {
  return vec3(-v.x, -v.y, -v.z);
}

/**
 * Multiplication.
 *
 * - `mul(v, s)` / `mul(s, v)`: scale by a scalar (both orders agree)
 * - `mul(a, b)`: component-wise product, e.g. for colour blending
 */
export function mul(v: Vec3, s: Scalar): Vec3;
export function mul(s: Scalar, v: Vec3): Vec3;
export function mul(a: Vec3, b: Vec3): Vec3;
export function mul(a: Vec3 | Scalar, b: Vec3 | Scalar): Vec3 {
  if (typeof a === "number") {
    if (typeof b === "number") throw new TypeError("mul() needs a Vec3 operand");
    return vec3(a * b.x, a * b.y, a * b.z);
  }
  if (typeof b === "number") {
    return vec3(a.x * b, a.y * b, a.z * b);
  }
  return vec3(a.x * b.x, a.y * b.y, a.z * b.z);
}

/**
 * Division. A zero divisor yields ±Infinity or NaN; it is not an error.
 *
 * - `div(v, s)`: each component divided by `s`
 * - `div(s, v)`: `s` divided by each component
 * - `div(a, b)`: component-wise quotient
 */
export function div(v: Vec3, s: Scalar): Vec3;
export function div(s: Scalar, v: Vec3): Vec3;
export function div(a: Vec3, b: Vec3): Vec3;
export function div(a: Vec3 | Scalar, b: Vec3 | Scalar): Vec3 {
  if (typeof a === "number") {
    if (typeof b === "number") throw new TypeError("div() needs a Vec3 operand");
    return vec3(a / b.x, a / b.y, a / b.z);
  }
  if (typeof b === "number") {
    return vec3(a.x / b, a.y / b, a.z / b);
  }
  return vec3(a.x / b.x, a.y / b.y, a.z / b.z);
}

// ============================================================================
// Products & Norms
// ============================================================================

/** Dot product */
export function dot(a: Vec3, b: Vec3): Scalar {
  return a.x * b.x + a.y * b.y + a.z * b.z;
}

/**
 * Cross product: perpendicular to both inputs (right-hand rule), with length
 * equal to the area of the parallelogram they span.
 */
export function cross(a: Vec3, b: Vec3): Vec3 {
  return vec3(a.y * b.z - a.z * b.y, a.z * b.x - a.x * b.z, a.x * b.y - a.y * b.x);
}

/** Euclidean length */
export function mag(v: Vec3): Scalar {
  return Math.sqrt(magSq(v));
}

/** Squared length; skips the square root */
export function magSq(v: Vec3): Scalar {
  return v.x * v.x + v.y * v.y + v.z * v.z;
}

/** Apply `f` to each component */
export function map(v: Vec3, f: (component: Scalar) => Scalar): Vec3 {
  return vec3(f(v.x), f(v.y), f(v.z));
}

/**
 * Unit vector in the same direction.
 *
 * @throws ZeroVectorError if the magnitude is zero
 */
export function normalize(v: Vec3): Vec3 {
  const m = mag(v);
  if (m === 0) {
    throw reportError(new ZeroVectorError("Vec3"));
  }
  return map(v, (c) => c / m);
}

// ============================================================================
// Points
// ============================================================================

/** Unsigned distance between two points */
export function dist(a: Point3D, b: Point3D): Scalar {
  return Math.abs(mag(sub(a, b)));
}

/** Squared distance between two points */
export function distSq(a: Point3D, b: Point3D): Scalar {
  return Math.abs(magSq(sub(a, b)));
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

/** Exact component equality */
export function equals(a: Vec3, b: Vec3): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

/** Component-wise `|a - b| <= tolerance` */
export function approxEquals(
  a: Vec3,
  b: Vec3,
  tolerance: number = config.get("tolerance.default")
): boolean {
  return (
    Math.abs(a.x - b.x) <= tolerance &&
    Math.abs(a.y - b.y) <= tolerance &&
    Math.abs(a.z - b.z) <= tolerance
  );
}

/** Lexicographic order on (x, y, z); `undefined` if a NaN is involved */
export function partialCompare(a: Vec3, b: Vec3): Ordering | undefined {
  return compareLexicographic([a.x, a.y, a.z], [b.x, b.y, b.z]);
}

/** `(x, y, z)` */
export function display(v: Vec3): string {
  return `(${formatScalar(v.x)}, ${formatScalar(v.y)}, ${formatScalar(v.z)})`;
}

/** `Vec3 { x: 1, y: 2, z: 3 }` */
export function debug(v: Vec3): string {
  return `Vec3 { x: ${formatScalar(v.x)}, y: ${formatScalar(v.y)}, z: ${formatScalar(v.z)} }`;
}
