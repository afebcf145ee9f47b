import type { SingularMatrixError } from "@vecmat/core";
import type { Scalar } from "@vecmat/vector";

/**
 * A 2×2 matrix, stored row-major:
 *
 * ```text
 * | a  b |
 * | c  d |
 * ```
 */
export interface Mat2 {
  readonly a: Scalar;
  readonly b: Scalar;
  readonly c: Scalar;
  readonly d: Scalar;
}

/**
 * A 3×3 matrix, stored row-major:
 *
 * ```text
 * | a  b  c |
 * | d  e  f |
 * | g  h  i |
 * ```
 */
export interface Mat3 {
  readonly a: Scalar;
  readonly b: Scalar;
  readonly c: Scalar;
  readonly d: Scalar;
  readonly e: Scalar;
  readonly f: Scalar;
  readonly g: Scalar;
  readonly h: Scalar;
  readonly i: Scalar;
}

/** Outcome of a non-throwing inversion */
export type InverseResult<M> =
  | { readonly ok: true; readonly value: M }
  | { readonly ok: false; readonly error: SingularMatrixError };
