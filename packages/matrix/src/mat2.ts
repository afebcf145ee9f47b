/**
 * Mat2 — 2×2 matrices
 *
 * Addition, subtraction, scalar and matrix multiplication, and inversion.
 * Pairs with Vec2 for 2D linear transformations.
 *
 * @example
 * ```typescript
 * const m = mat2(1, 2, 3, 4);
 * mul(m, vec2(1, 1));          // { x: 3, y: 7 }
 * inverse(mat2(7, 2, 6, 2));   // mat2(1, -1, -3, 3.5)
 * ```
 */

import { SingularMatrixError, compareLexicographic, config, reportError } from "@vecmat/core";
import type { Ordering } from "@vecmat/core";
import { formatScalar, vec2, type Scalar, type Vec2 } from "@vecmat/vector";
import type { InverseResult, Mat2 } from "./types.js";

// ============================================================================
// Constructors & Constants
// ============================================================================

/** Create a 2×2 matrix from its entries in row-major order */
export function mat2(a: Scalar, b: Scalar, c: Scalar, d: Scalar): Mat2 {
  return { a, b, c, d };
}

/**
 * Create a 2×2 matrix from row arrays.
 *
 * @throws RangeError if the shape is not 2×2
 */
export function fromRows(rows: readonly (readonly Scalar[])[]): Mat2 {
  if (rows.length !== 2 || rows.some((r) => r.length !== 2)) {
    throw new RangeError("Mat2 needs exactly 2 rows of 2 entries");
  }
  return mat2(rows[0][0], rows[0][1], rows[1][0], rows[1][1]);
}

/** The multiplicative identity */
// prettier-ignore
export const IDENTITY: Mat2 = Object.freeze(mat2(
  1, 0,
  0, 1,
));

/** The zero matrix */
// prettier-ignore
export const ZERO: Mat2 = Object.freeze(mat2(
  0, 0,
  0, 0,
));

/** The default Mat2, equal to {@link ZERO} */
export function defaultValue(): Mat2 {
  return ZERO;
}

// ============================================================================
// Arithmetic
// ============================================================================

/** Entry-wise addition */
export function add(m: Mat2, n: Mat2): Mat2 {
  return mat2(m.a + n.a, m.b + n.b, m.c + n.c, m.d + n.d);
}

/** Entry-wise subtraction */
export function sub(m: Mat2, n: Mat2): Mat2 {
  return mat2(m.a - n.a, m.b - n.b, m.c - n.c, m.d - n.d);
}

/** Negate every entry */
export function neg(m: Mat2): Mat2 {
  return mat2(-m.a, -m.b, -m.c, -m.d);
}

function scale(m: Mat2, s: Scalar): Mat2 {
  return mat2(m.a * s, m.b * s, m.c * s, m.d * s);
}

/**
 * Multiplication.
 *
 * - `mul(m, s)` / `mul(s, m)`: scale every entry (both orders agree)
 * - `mul(m, v)`: linear map, `(a·x + b·y, c·x + d·y)`
 * - `mul(m, n)`: matrix product (not commutative)
 */
export function mul(m: Mat2, s: Scalar): Mat2;
export function mul(s: Scalar, m: Mat2): Mat2;
export function mul(m: Mat2, v: Vec2): Vec2;
export function mul(m: Mat2, n: Mat2): Mat2;
export function mul(left: Mat2 | Scalar, right: Mat2 | Vec2 | Scalar): Mat2 | Vec2 {
  if (typeof left === "number") {
    if (typeof right === "number" || "x" in right) {
      throw new TypeError("mul(scalar, _) needs a Mat2 on the right");
    }
    return scale(right, left);
  }
  if (typeof right === "number") {
    return scale(left, right);
  }
  if ("x" in right) {
    return vec2(left.a * right.x + left.b * right.y, left.c * right.x + left.d * right.y);
  }
  return mat2(
    left.a * right.a + left.b * right.c,
    left.a * right.b + left.b * right.d,
    left.c * right.a + left.d * right.c,
    left.c * right.b + left.d * right.d
  );
}

/** Divide every entry by a scalar; a zero divisor follows IEEE rules */
export function div(m: Mat2, s: Scalar): Mat2 {
  return mat2(m.a / s, m.b / s, m.c / s, m.d / s);
}

// ============================================================================
// Square Matrix Operations
// ============================================================================

/** `a·d − b·c` */
export function determinant(m: Mat2): Scalar {
  return m.a * m.d - m.b * m.c;
}

/**
 * Inverse: `(1 / det) · [[d, −b], [−c, a]]`.
 *
 * Only an exactly-zero determinant is rejected; near-singular matrices
 * invert to very large entries.
 *
 * @throws SingularMatrixError if the determinant is 0
 */
export function inverse(m: Mat2): Mat2 {
  const det = determinant(m);
  if (det === 0) {
    throw reportError(new SingularMatrixError("Mat2", det));
  }
  return scaledAdjugate(m, det);
}

/** {@link inverse} without throwing */
export function tryInverse(m: Mat2): InverseResult<Mat2> {
  const det = determinant(m);
  if (det === 0) {
    return { ok: false, error: new SingularMatrixError("Mat2", det) };
  }
  return { ok: true, value: scaledAdjugate(m, det) };
}

function scaledAdjugate(m: Mat2, det: Scalar): Mat2 {
  const recDet = 1 / det;
  return mul(recDet, mat2(m.d, -m.b, -m.c, m.a));
}

/** Swap rows and columns */
export function transpose(m: Mat2): Mat2 {
  return mat2(m.a, m.c, m.b, m.d);
}

/** Sum of the diagonal */
export function trace(m: Mat2): Scalar {
  return m.a + m.d;
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

/** Exact entry-wise equality */
export function equals(m: Mat2, n: Mat2): boolean {
  return m.a === n.a && m.b === n.b && m.c === n.c && m.d === n.d;
}

/** Entry-wise `|m - n| <= tolerance` */
export function approxEquals(
  m: Mat2,
  n: Mat2,
  tolerance: number = config.get("tolerance.default")
): boolean {
  return (
    Math.abs(m.a - n.a) <= tolerance &&
    Math.abs(m.b - n.b) <= tolerance &&
    Math.abs(m.c - n.c) <= tolerance &&
    Math.abs(m.d - n.d) <= tolerance
  );
}

/** Lexicographic order on (a, b, c, d); `undefined` if a NaN is involved */
export function partialCompare(m: Mat2, n: Mat2): Ordering | undefined {
  return compareLexicographic(toArray(m), toArray(n));
}

/** Entries in row-major order */
export function toArray(m: Mat2): Scalar[] {
  return [m.a, m.b, m.c, m.d];
}

/** Entries as row arrays */
export function toRows(m: Mat2): Scalar[][] {
  return [
    [m.a, m.b],
    [m.c, m.d],
  ];
}

/** `[[a, b], [c, d]]` */
export function display(m: Mat2): string {
  return `[${toRows(m)
    .map((row) => `[${row.map(formatScalar).join(", ")}]`)
    .join(", ")}]`;
}

/** `Mat2 { a: 1, b: 2, c: 3, d: 4 }` */
export function debug(m: Mat2): string {
  return `Mat2 { a: ${formatScalar(m.a)}, b: ${formatScalar(m.b)}, c: ${formatScalar(m.c)}, d: ${formatScalar(m.d)} }`;
}
