/**
 * Typeclass instances for vector types.
 *
 * Lets generic code from @vecmat/core (distanceBy, normSquared, vSub, ...)
 * operate on Vec2 and Vec3 without knowing their layout.
 */

import {
  type Defaultable,
  type Eq,
  type InnerProduct,
  type Normed,
  type PartialOrd,
  type Printable,
  makeEq,
  makePartialOrd,
} from "@vecmat/core";
import type { Vec2, Vec3 } from "./types.js";
import * as V2 from "./vec2.js";
import * as V3 from "./vec3.js";

// ============================================================================
// InnerProduct / Normed
// ============================================================================

/** Euclidean inner product space on Vec2 */
export const innerProductVec2: InnerProduct<Vec2, number> = {
  vAdd: V2.add,
  vScale: (s, v) => V2.mul(s, v),
  vZero: V2.defaultValue,
  dot: V2.dot,
};

/** Euclidean inner product space on Vec3 */
export const innerProductVec3: InnerProduct<Vec3, number> = {
  vAdd: V3.add,
  vScale: (s, v) => V3.mul(s, v),
  vZero: V3.defaultValue,
  dot: V3.dot,
};

export const normedVec2: Normed<Vec2, number> = { norm: V2.mag };
export const normedVec3: Normed<Vec3, number> = { norm: V3.mag };

// ============================================================================
// Eq / PartialOrd
// ============================================================================

/** Exact component-wise equality */
export const eqVec2: Eq<Vec2> = makeEq(V2.equals);

/** Exact component-wise equality */
export const eqVec3: Eq<Vec3> = makeEq(V3.equals);

/**
 * Tolerance-based equality. Without an argument the tolerance is read from
 * configuration on every comparison.
 */
export function approxEqVec2(tolerance?: number): Eq<Vec2> {
  return makeEq((a, b) => V2.approxEquals(a, b, tolerance));
}

/** Tolerance-based equality; see {@link approxEqVec2}. */
export function approxEqVec3(tolerance?: number): Eq<Vec3> {
  return makeEq((a, b) => V3.approxEquals(a, b, tolerance));
}

export const partialOrdVec2: PartialOrd<Vec2> = makePartialOrd(V2.partialCompare);
export const partialOrdVec3: PartialOrd<Vec3> = makePartialOrd(V3.partialCompare);

// ============================================================================
// Printable / Defaultable
// ============================================================================

export const printableVec2: Printable<Vec2> = { display: V2.display };
export const printableVec3: Printable<Vec3> = { display: V3.display };

export const defaultableVec2: Defaultable<Vec2> = { defaultValue: V2.defaultValue };
export const defaultableVec3: Defaultable<Vec3> = { defaultValue: V3.defaultValue };
