/**
 * @vecmat/matrix — fixed-size 2×2 and 3×3 matrices
 *
 * Row-major Mat2 and Mat3 with addition, scalar and matrix multiplication,
 * matrix × vector transformation, determinant and inverse.
 *
 * @example
 * ```typescript
 * import { mat3, mat3Determinant, mat3Inverse, mat3Mul, MAT3_IDENTITY, mat3Equals } from "@vecmat/matrix";
 *
 * const m = mat3(1, 2, 3, 3, 2, 1, 2, 1, 3);
 * mat3Determinant(m);                                  // -12
 * mat3Equals(mat3Mul(m, mat3Inverse(m)), MAT3_IDENTITY); // true
 * ```
 *
 * @packageDocumentation
 */

export type { Mat2, Mat3, InverseResult } from "./types.js";

// ============================================================================
// Mat2
// ============================================================================

export {
  // Constructors
  mat2,
  fromRows as mat2FromRows,
  // Constants
  IDENTITY as MAT2_IDENTITY,
  ZERO as MAT2_ZERO,
  defaultValue as mat2Default,
  // Arithmetic
  add as mat2Add,
  sub as mat2Sub,
  neg as mat2Neg,
  mul as mat2Mul,
  div as mat2Div,
  // Square matrix operations
  determinant as mat2Determinant,
  inverse as mat2Inverse,
  tryInverse as mat2TryInverse,
  transpose as mat2Transpose,
  trace as mat2Trace,
  // Comparison & formatting
  equals as mat2Equals,
  approxEquals as mat2ApproxEquals,
  partialCompare as mat2PartialCompare,
  toArray as mat2ToArray,
  toRows as mat2ToRows,
  display as mat2Display,
  debug as mat2Debug,
} from "./mat2.js";

// ============================================================================
// Mat3
// ============================================================================

export {
  // Constructors
  mat3,
  fromRows as mat3FromRows,
  // Constants
  IDENTITY as MAT3_IDENTITY,
  ZERO as MAT3_ZERO,
  defaultValue as mat3Default,
  // Arithmetic
  map as mat3Map,
  add as mat3Add,
  sub as mat3Sub,
  neg as mat3Neg,
  mul as mat3Mul,
  div as mat3Div,
  // Square matrix operations
  determinant as mat3Determinant,
  inverse as mat3Inverse,
  tryInverse as mat3TryInverse,
  transpose as mat3Transpose,
  trace as mat3Trace,
  // Comparison & formatting
  equals as mat3Equals,
  approxEquals as mat3ApproxEquals,
  partialCompare as mat3PartialCompare,
  toArray as mat3ToArray,
  toRows as mat3ToRows,
  display as mat3Display,
  debug as mat3Debug,
} from "./mat3.js";

// ============================================================================
// Typeclass instances
// ============================================================================

export {
  vectorSpaceMat2,
  vectorSpaceMat3,
  linearMapMat2,
  linearMapMat3,
  eqMat2,
  eqMat3,
  approxEqMat2,
  approxEqMat3,
  partialOrdMat2,
  partialOrdMat3,
  printableMat2,
  printableMat3,
  defaultableMat2,
  defaultableMat3,
} from "./typeclasses.js";
