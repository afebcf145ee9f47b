/**
 * @vecmat/vector — fixed-size 2D and 3D vectors
 *
 * Vec2 and Vec3 with component-wise arithmetic, dot/cross products,
 * magnitude and normalization, plus the Point2D, Point3D and Colour roles.
 *
 * Each family is also available as a module namespace through the
 * `@vecmat/vector/vec2` and `@vecmat/vector/vec3` entry points, where the
 * operations carry their short names (`add`, `dot`, ...).
 *
 * @example
 * ```typescript
 * import { vec3, vec3Cross, vec3Display, point2d, point2dDist } from "@vecmat/vector";
 *
 * vec3Display(vec3Cross(vec3(1, 0, 0), vec3(0, 1, 0))); // "(0, 0, 1)"
 * point2dDist(point2d(1, 2), point2d(1, 0));           // 2
 * ```
 *
 * @packageDocumentation
 */

export type { Scalar } from "./scalar.js";
export { formatScalar } from "./scalar.js";
export type { Vec2, Vec3, Point2D, Point3D, Colour, Role } from "./types.js";

// ============================================================================
// Vec2 / Point2D
// ============================================================================

export {
  // Constructors
  vec2,
  point2d,
  asPoint2D,
  // Constants
  ZERO as VEC2_ZERO,
  ONE as VEC2_ONE,
  UNIT_X as VEC2_UNIT_X,
  UNIT_Y as VEC2_UNIT_Y,
  defaultValue as vec2Default,
  // Operations
  add as vec2Add,
  sub as vec2Sub,
  neg as vec2Neg,
  mul as vec2Mul,
  div as vec2Div,
  dot as vec2Dot,
  cross as vec2Cross,
  mag as vec2Mag,
  magSq as vec2MagSq,
  map as vec2Map,
  normalize as vec2Normalize,
  dist as point2dDist,
  distSq as point2dDistSq,
  // Comparison & formatting
  equals as vec2Equals,
  approxEquals as vec2ApproxEquals,
  partialCompare as vec2PartialCompare,
  display as vec2Display,
  debug as vec2Debug,
} from "./vec2.js";

// ============================================================================
// Vec3 / Point3D / Colour
// ============================================================================

export {
  // Constructors
  vec3,
  point3d,
  colour,
  asPoint3D,
  asColour,
  // Constants
  ZERO as VEC3_ZERO,
  ONE as VEC3_ONE,
  UNIT_X as VEC3_UNIT_X,
  UNIT_Y as VEC3_UNIT_Y,
  UNIT_Z as VEC3_UNIT_Z,
  defaultValue as vec3Default,
  // Operations
  add as vec3Add,
  sub as vec3Sub,
  neg as vec3Neg,
  mul as vec3Mul,
  div as vec3Div,
  dot as vec3Dot,
  cross as vec3Cross,
  mag as vec3Mag,
  magSq as vec3MagSq,
  map as vec3Map,
  normalize as vec3Normalize,
  dist as point3dDist,
  distSq as point3dDistSq,
  // Comparison & formatting
  equals as vec3Equals,
  approxEquals as vec3ApproxEquals,
  partialCompare as vec3PartialCompare,
  display as vec3Display,
  debug as vec3Debug,
} from "./vec3.js";

// ============================================================================
// Typeclass instances
// ============================================================================

export {
  innerProductVec2,
  innerProductVec3,
  normedVec2,
  normedVec3,
  eqVec2,
  eqVec3,
  approxEqVec2,
  approxEqVec3,
  partialOrdVec2,
  partialOrdVec3,
  printableVec2,
  printableVec3,
  defaultableVec2,
  defaultableVec3,
} from "./typeclasses.js";
