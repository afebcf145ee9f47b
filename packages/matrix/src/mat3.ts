/**
 * Mat3 — 3×3 matrices
 *
 * Addition, subtraction, scalar and matrix multiplication, determinant and
 * inversion. Pairs with Vec3 for 3D linear transformations.
 *
 * Equality on Mat3 is tolerance-based (`|Δ| < tolerance.mat3`, default 1e-9)
 * so that results of {@link inverse} compare equal to their exact values.
 * Mat2 equality, by contrast, is exact.
 */

import { SingularMatrixError, compareLexicographic, config, reportError } from "@vecmat/core";
import type { Ordering } from "@vecmat/core";
import { formatScalar, vec3, type Scalar, type Vec3 } from "@vecmat/vector";
import type { InverseResult, Mat3 } from "./types.js";

// ============================================================================
// Constructors & Constants
// ============================================================================

/** Create a 3×3 matrix from its entries in row-major order */
export function mat3(
  a: Scalar,
  b: Scalar,
  c: Scalar,
  d: Scalar,
  e: Scalar,
  f: Scalar,
  g: Scalar,
  h: Scalar,
  i: Scalar
): Mat3 {
  return { a, b, c, d, e, f, g, h, i };
}

/**
 * Create a 3×3 matrix from row arrays.
 *
 * @throws RangeError if the shape is not 3×3
 */
export function fromRows(rows: readonly (readonly Scalar[])[]): Mat3 {
  if (rows.length !== 3 || rows.some((r) => r.length !== 3)) {
    throw new RangeError("Mat3 needs exactly 3 rows of 3 entries");
  }
  const [r0, r1, r2] = rows;
  return mat3(r0[0], r0[1], r0[2], r1[0], r1[1], r1[2], r2[0], r2[1], r2[2]);
}

/** The multiplicative identity */
// prettier-ignore
export const IDENTITY: Mat3 = Object.freeze(mat3(
  1, 0, 0,
  0, 1, 0,
  0, 0, 1,
));

/** The zero matrix */
// prettier-ignore
export const ZERO: Mat3 = Object.freeze(mat3(
  0, 0, 0,
  0, 0, 0,
  0, 0, 0,
));

/** The default Mat3, equal to {@link ZERO} */
export function defaultValue(): Mat3 {
  return ZERO;
}

// ============================================================================
// Arithmetic
// ============================================================================

function zipWith(m: Mat3, n: Mat3, op: (x: Scalar, y: Scalar) => Scalar): Mat3 {
  return mat3(
    op(m.a, n.a),
    op(m.b, n.b),
    op(m.c, n.c),
    op(m.d, n.d),
    op(m.e, n.e),
    op(m.f, n.f),
    op(m.g, n.g),
    op(m.h, n.h),
    op(m.i, n.i)
  );
}

/** Apply `f` to every entry */
export function map(m: Mat3, f: (entry: Scalar) => Scalar): Mat3 {
  return mat3(f(m.a), f(m.b), f(m.c), f(m.d), f(m.e), f(m.f), f(m.g), f(m.h), f(m.i));
}

/** Entry-wise addition */
export function add(m: Mat3, n: Mat3): Mat3 {
  return zipWith(m, n, (x, y) => x + y);
}

/** Entry-wise subtraction */
export function sub(m: Mat3, n: Mat3): Mat3 {
  return zipWith(m, n, (x, y) => x - y);
}

/** Negate every entry */
export function neg(m: Mat3): Mat3 {
  return map(m, (x) => -x);
}

/**
 * Multiplication.
 *
 * - `mul(m, s)` / `mul(s, m)`: scale every entry (both orders agree)
 * - `mul(m, v)`: linear map of a Vec3
 * - `mul(m, n)`: matrix product (not commutative)
 */
export function mul(m: Mat3, s: Scalar): Mat3;
export function mul(s: Scalar, m: Mat3): Mat3;
export function mul(m: Mat3, v: Vec3): Vec3;
export function mul(m: Mat3, n: Mat3): Mat3;
export function mul(left: Mat3 | Scalar, right: Mat3 | Vec3 | Scalar): Mat3 | Vec3 {
  if (typeof left === "number") {
    if (typeof right === "number" || "x" in right) {
      throw new TypeError("mul(scalar, _) needs a Mat3 on the right");
    }
    const s = left;
    return map(right, (x) => x * s);
  }
  if (typeof right === "number") {
    const s = right;
    return map(left, (x) => x * s);
  }
  if ("x" in right) {
    return vec3(
      left.a * right.x + left.b * right.y + left.c * right.z,
      left.d * right.x + left.e * right.y + left.f * right.z,
      left.g * right.x + left.h * right.y + left.i * right.z
    );
  }
  return mat3(
    left.a * right.a + left.b * right.d + left.c * right.g,
    left.a * right.b + left.b * right.e + left.c * right.h,
    left.a * right.c + left.b * right.f + left.c * right.i,

    left.d * right.a + left.e * right.d + left.f * right.g,
    left.d * right.b + left.e * right.e + left.f * right.h,
    left.d * right.c + left.e * right.f + left.f * right.i,

    left.g * right.a + left.h * right.d + left.i * right.g,
    left.g * right.b + left.h * right.e + left.i * right.h,
    left.g * right.c + left.h * right.f + left.i * right.i
  );
}

/** Divide every entry by a scalar, e.g. an adjugate by a determinant */
export function div(m: Mat3, s: Scalar): Mat3 {
  return map(m, (x) => x / s);
}

// ============================================================================
// Square Matrix Operations
// ============================================================================

/** Cofactor expansion along the first row: `a(ei−fh) − b(di−fg) + c(dh−eg)` */
export function determinant(m: Mat3): Scalar {
  return (
    m.a * (m.e * m.i - m.f * m.h) -
    m.b * (m.d * m.i - m.f * m.g) +
    m.c * (m.d * m.h - m.e * m.g)
  );
}

/**
 * Inverse via the adjugate:
 *
 * ```text
 *          1        | ei − fh   ch − bi   bf − ce |
 * M⁻¹ = -------  ·  | fg − di   ai − cg   cd − af |
 *        det(M)     | dh − eg   bg − ah   ae − bd |
 * ```
 *
 * @throws SingularMatrixError if the determinant is exactly 0
 */
export function inverse(m: Mat3): Mat3 {
  const det = determinant(m);
  if (det === 0) {
    throw reportError(new SingularMatrixError("Mat3", det));
  }
  return scaledAdjugate(m, det);
}

/** {@link inverse} without throwing */
export function tryInverse(m: Mat3): InverseResult<Mat3> {
  const det = determinant(m);
  if (det === 0) {
    return { ok: false, error: new SingularMatrixError("Mat3", det) };
  }
  return { ok: true, value: scaledAdjugate(m, det) };
}

function scaledAdjugate(m: Mat3, det: Scalar): Mat3 {
  const invDet = 1 / det;

  return mat3(
    (m.e * m.i - m.f * m.h) * invDet,
    (m.c * m.h - m.b * m.i) * invDet,
    (m.b * m.f - m.c * m.e) * invDet,
    (m.f * m.g - m.d * m.i) * invDet,
    (m.a * m.i - m.c * m.g) * invDet,
    (m.c * m.d - m.a * m.f) * invDet,
    (m.d * m.h - m.e * m.g) * invDet,
    (m.b * m.g - m.a * m.h) * invDet,
    (m.a * m.e - m.b * m.d) * invDet
  );
}

/** Swap rows and columns */
export function transpose(m: Mat3): Mat3 {
  return mat3(m.a, m.d, m.g, m.b, m.e, m.h, m.c, m.f, m.i);
}

/** Sum of the diagonal */
export function trace(m: Mat3): Scalar {
  return m.a + m.e + m.i;
}

// ============================================================================
// Comparison & Formatting
// ============================================================================

function everyEntry(m: Mat3, n: Mat3, pred: (x: Scalar, y: Scalar) => boolean): boolean {
  const xs = toArray(m);
  const ys = toArray(n);
  return xs.every((x, k) => pred(x, ys[k]));
}

/**
 * Equality within `epsilon` per entry (strict `<`). The default epsilon is
 * the `tolerance.mat3` configuration value, 1e-9 unless overridden.
 */
export function equals(
  m: Mat3,
  n: Mat3,
  epsilon: number = config.get("tolerance.mat3")
): boolean {
  return everyEntry(m, n, (x, y) => Math.abs(x - y) < epsilon);
}

/** Entry-wise `|m - n| <= tolerance` */
export function approxEquals(
  m: Mat3,
  n: Mat3,
  tolerance: number = config.get("tolerance.default")
): boolean {
  return everyEntry(m, n, (x, y) => Math.abs(x - y) <= tolerance);
}

/** Lexicographic order on (a, ..., i); `undefined` if a NaN is involved */
export function partialCompare(m: Mat3, n: Mat3): Ordering | undefined {
  return compareLexicographic(toArray(m), toArray(n));
}

/** Entries in row-major order */
export function toArray(m: Mat3): Scalar[] {
  return [m.a, m.b, m.c, m.d, m.e, m.f, m.g, m.h, m.i];
}

/** Entries as row arrays */
export function toRows(m: Mat3): Scalar[][] {
  return [
    [m.a, m.b, m.c],
    [m.d, m.e, m.f],
    [m.g, m.h, m.i],
  ];
}

/** `[[a, b, c], [d, e, f], [g, h, i]]` */
export function display(m: Mat3): string {
  return `[${toRows(m)
    .map((row) => `[${row.map(formatScalar).join(", ")}]`)
    .join(", ")}]`;
}

/** `Mat3 { a: 1, b: 0, ... }` */
export function debug(m: Mat3): string {
  const fields = (["a", "b", "c", "d", "e", "f", "g", "h", "i"] as const).map(
    (key) => `${key}: ${formatScalar(m[key])}`
  );
  return `Mat3 { ${fields.join(", ")} }`;
}
