/**
 * Typeclass instances for matrix types.
 *
 * - VectorSpace: entry-wise addition and scaling
 * - LinearMap: matrix × vector, matrix × matrix, identity
 * - Eq: exact for Mat2, tolerance-based for Mat3
 */

import {
  type Defaultable,
  type Eq,
  type LinearMap,
  type PartialOrd,
  type Printable,
  type VectorSpace,
  makeEq,
  makePartialOrd,
} from "@vecmat/core";
import type { Vec2, Vec3 } from "@vecmat/vector";
import * as M2 from "./mat2.js";
import * as M3 from "./mat3.js";
import type { Mat2, Mat3 } from "./types.js";

// ============================================================================
// VectorSpace / LinearMap
// ============================================================================

export const vectorSpaceMat2: VectorSpace<Mat2, number> = {
  vAdd: M2.add,
  vScale: (s, m) => M2.mul(s, m),
  vZero: M2.defaultValue,
};

export const vectorSpaceMat3: VectorSpace<Mat3, number> = {
  vAdd: M3.add,
  vScale: (s, m) => M3.mul(s, m),
  vZero: M3.defaultValue,
};

/** Mat2 acting on Vec2 */
export const linearMapMat2: LinearMap<Mat2, Vec2> = {
  apply: (m, v) => M2.mul(m, v),
  compose: (a, b) => M2.mul(a, b),
  identity: () => M2.IDENTITY,
};

/** Mat3 acting on Vec3 */
export const linearMapMat3: LinearMap<Mat3, Vec3> = {
  apply: (m, v) => M3.mul(m, v),
  compose: (a, b) => M3.mul(a, b),
  identity: () => M3.IDENTITY,
};

// ============================================================================
// Eq / PartialOrd
// ============================================================================

/** Exact entry-wise equality */
export const eqMat2: Eq<Mat2> = makeEq(M2.equals);

/** Entry-wise `|Δ| < tolerance.mat3` */
export const eqMat3: Eq<Mat3> = makeEq((a, b) => M3.equals(a, b));

export function approxEqMat2(tolerance?: number): Eq<Mat2> {
  return makeEq((a, b) => M2.approxEquals(a, b, tolerance));
}

export function approxEqMat3(tolerance?: number): Eq<Mat3> {
  return makeEq((a, b) => M3.approxEquals(a, b, tolerance));
}

export const partialOrdMat2: PartialOrd<Mat2> = makePartialOrd(M2.partialCompare);
export const partialOrdMat3: PartialOrd<Mat3> = makePartialOrd(M3.partialCompare);

// ============================================================================
// Printable / Defaultable
// ============================================================================

export const printableMat2: Printable<Mat2> = { display: M2.display };
export const printableMat3: Printable<Mat3> = { display: M3.display };

export const defaultableMat2: Defaultable<Mat2> = { defaultValue: M2.defaultValue };
export const defaultableMat3: Defaultable<Mat3> = { defaultValue: M3.defaultValue };
