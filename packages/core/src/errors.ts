/**
 * Domain errors raised by vecmat operations.
 *
 * Only two operations can fail: inverting a singular matrix and normalizing
 * a zero-length vector. Everything else follows IEEE-754 and may return
 * NaN or Infinity without throwing.
 */

/** Discriminator shared by every vecmat error. */
export type LinalgErrorKind = "singular-matrix" | "zero-vector";

/**
 * Base class for all vecmat domain errors.
 */
export class LinalgError extends Error {
  constructor(
    message: string,
    public readonly kind: LinalgErrorKind
  ) {
    super(message);
    this.name = "LinalgError";
  }
}

/**
 * Thrown by `inverse()` when the determinant is exactly zero.
 */
export class SingularMatrixError extends LinalgError {
  constructor(
    readonly matrixType: "Mat2" | "Mat3",
    readonly determinant: number
  ) {
    super(`${matrixType} is singular (determinant ${determinant}) and cannot be inverted`, "singular-matrix");
    this.name = "SingularMatrixError";
  }
}

/**
 * Thrown by `normalize()` when the vector has zero magnitude.
 */
export class ZeroVectorError extends LinalgError {
  constructor(readonly vectorType: "Vec2" | "Vec3") {
    super(`Cannot normalize a zero-length ${vectorType}`, "zero-vector");
    this.name = "ZeroVectorError";
  }
}

/** Narrow an unknown thrown value to a vecmat error. */
export function isLinalgError(error: unknown): error is LinalgError {
  return error instanceof LinalgError;
}
