/**
 * Vec2 / Point2D — 2D vector math
 *
 * Vector addition, subtraction, scaling, dot and cross products, and
 * normalization over immutable `{ x, y }` records.
 *
 * @example
 * ```typescript
 * const a = vec2(3, 4);
 * mag(a);                      // 5
 * cross(vec2(1, 0), vec2(0, 1)); // 1 (a scalar in 2D)
 * ```
 */

import { ZeroVectorError, compareLexicographic, config, reportError } from "@vecmat/core";
import type { Ordering } from "@vecmat/core";
import { formatScalar, type Scalar } from "./scalar.js";
import type { Point2D, Vec2 } from "./types.js";

// ============================================================================
// Constructors & Constants
// ============================================================================

/** Create a 2D vector */
export function vec2(x: Scalar, y: Scalar): Vec2 {
  return { x, y };
}

/** Create a 2D point */
export function point2d(x: Scalar, y: Scalar): Point2D {
  return { x, y } as Point2D;
}

/** Treat an existing vector as a position */
export function asPoint2D(v: Vec2): Point2D {
  return point2d(v.x, v.y);
}

export const ZERO: Vec2 = Object.freeze(vec2(0, 0));
export const ONE: Vec2 = Object.freeze(vec2(1, 1));
export const UNIT_X: Vec2 = Object.freeze(vec2(1, 0));
export const UNIT_Y: Vec2 = Object.freeze(vec2(0, 1));

/** The default Vec2, `(0, 0)` */
export function defaultValue(): Vec2 {
  return ZERO;
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Component-wise addition */
export function add(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x + b.x, a.y + b.y);
}

/** Component-wise subtraction */
export function sub(a: Vec2, b: Vec2): Vec2 {
  return vec2(a.x - b.x, a.y - b.y);
}

/** Negate each component */
export function neg(v: Vec2): Vec2 {
  return vec2(-v.x, -v.y);
}

/**
 * Multiplication.
 *
 * - `mul(v, s)` / `mul(s, v)`: scale by a scalar (both orders agree)
 * - `mul(a, b)`: component-wise (Hadamard) product
 */
export function mul(v: Vec2, s: Scalar): Vec2;
export function mul(s: Scalar, v: Vec2): Vec2;
export function mul(a: Vec2, b: Vec2): Vec2;
export function mul(a: Vec2 | Scalar, b: Vec2 | Scalar): Vec2 {
  if (typeof a === "number") {
    if (typeof b === "number") throw new TypeError("mul() needs a Vec2 operand");
    return vec2(a * b.x, a * b.y);
  }
  if (typeof b === "number") {
    return vec2(a.x * b, a.y * b);
  }
  return vec2(a.x * b.x, a.y * b.y);
}

/**
 * Division. A zero divisor yields ±Infinity or NaN; it is not an error.
 *
 * - `div(v, s)`: each component divided by `s`
 * - `div(s, v)`: `s` divided by each component
 * - `div(a, b)`: component-wise quotient
 */
export function div(v: Vec2, s: Scalar): Vec2;
export function div(s: Scalar, v: Vec2): Vec2;
export function div(a: Vec2, b: Vec2): Vec2;
export function div(a: Vec2 | Scalar, b: Vec2 | Scalar): Vec2 {
  if (typeof a === "number") {
    if (typeof b === "number") throw new TypeError("div() needs a Vec2 operand");
    return vec2(a / b.x, a / b.y);
  }
  if (typeof b === "number") {
    return vec2(a.x / b, a.y / b);
  }
  return vec2(a.x / b.x, a.y / b.y);
}

// ============================================================================
// Products & Norms
// ============================================================================

/** Dot product */
export function dot(a: Vec2, b: Vec2): Scalar {
  return a.x * b.x + a.y * b.y;
}

/**
 * 2D cross product. Unlike the 3D version this is a scalar: the signed area
 * of the parallelogram spanned by `a` and `b` (the z of their 3D cross).
 */
export function cross(a: Vec2, b: Vec2): Scalar {
  return a.x * b.y - a.y * b.x;
}

/** Euclidean length */
export function mag(v: Vec2): Scalar {
  return Math.sqrt(magSq(v));
}

/** Squared length; skips the square root */
export function magSq(v: Vec2): Scalar {
  return v.x * v.x + v.y * v.y;
}

/** Apply `f` to each component */
export function map(v: Vec2, f: (component: Scalar) => Scalar): Vec2 {
  return vec2(f(v.x), f(v.y));
}

/**
 * Unit vector in the same direction.
 *
 * @throws ZeroVectorError if the magnitude is zero
 */
export function normalize(v: Vec2): Vec2 {
  const m = mag(v);
  if (m === 0) {
    throw reportError(new ZeroVectorError("Vec2"));
  }
  return map(v, (c) => c / m);
}

// ============================================================================
// Points
// ============================================================================

/** Unsigned distance between two points */
export function dist(a: Point2D, b: Point2D): Scalar {
  return Math.abs(mag(sub(a, b)));
}

/** Squared distance between two points */
export function distSq(a: Point2D, b: Point2D): Scalar {
  return Math.abs(magSq(sub(a, b)));
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

/** Exact component equality */
export function equals(a: Vec2, b: Vec2): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Component-wise `|a - b| <= tolerance` */
export function approxEquals(
  a: Vec2,
  b: Vec2,
  tolerance: number = config.get("tolerance.default")
): boolean {
  return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;
}

/** Lexicographic order on (x, y); `undefined` if a NaN is involved */
export function partialCompare(a: Vec2, b: Vec2): Ordering | undefined {
  return compareLexicographic([a.x, a.y], [b.x, b.y]);
}

/** `(x, y)` */
export function display(v: Vec2): string {
  return `(${formatScalar(v.x)}, ${formatScalar(v.y)})`;
}

/** `Vec2 { x: 1, y: 2 }` */
export function debug(v: Vec2): string {
  return `Vec2 { x: ${formatScalar(v.x)}, y: ${formatScalar(v.y)} }`;
}
